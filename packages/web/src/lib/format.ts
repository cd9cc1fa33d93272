import { METRIC_CONFIG, type MetricKey } from "@vitalog/shared";

/** "2025-01-05" -> "Jan 5". Parsed as a calendar date, not an instant. */
export function shortDate(iso: string): string {
  const [y, m, d] = iso.split("-").map(Number);
  return new Date(y, m - 1, d).toLocaleDateString(undefined, {
    month: "short",
    day: "numeric",
  });
}

export function longDate(iso: string): string {
  const [y, m, d] = iso.split("-").map(Number);
  return new Date(y, m - 1, d).toLocaleDateString(undefined, {
    weekday: "short",
    month: "short",
    day: "numeric",
    year: "numeric",
  });
}

export function formatTimestamp(iso: string): string {
  return new Date(iso).toLocaleString(undefined, {
    month: "short",
    day: "numeric",
    hour: "2-digit",
    minute: "2-digit",
  });
}

export function formatMetric(key: MetricKey, value: number | null): string {
  if (value === null) return "—";
  const cfg = METRIC_CONFIG[key];
  const shown = cfg.integer ? Math.round(value) : Number(value.toFixed(1));
  return `${shown} ${cfg.unit}`;
}

export function formatBloodPressure(systolic: number | null, diastolic: number | null): string {
  if (systolic === null || diastolic === null) return "—";
  return `${systolic}/${diastolic} mmHg`;
}

/** Blank input -> null, otherwise the parsed number (NaN stays NaN for validation). */
export function parseNumberInput(raw: string): number | null {
  const trimmed = raw.trim();
  return trimmed === "" ? null : Number(trimmed);
}
