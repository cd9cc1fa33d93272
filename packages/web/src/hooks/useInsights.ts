import { useState, useCallback, useEffect } from "react";
import { api, apiDownload, ApiError } from "../api/client";
import type {
  InsightHistoryItem,
  InsightRecord,
  InsightType,
} from "@vitalog/shared";

export type InsightPeriod = 7 | 14 | 30 | 90;

type InsightError =
  | { type: "no_data"; message: string }
  | { type: "not_configured"; message: string }
  | { type: "error"; message: string };

const GENERATE_PATHS: Record<InsightType, string> = {
  assessment: "/insights/assessment",
  trend_analysis: "/insights/trends",
  goal_suggestions: "/insights/goal-suggestions",
};

const HISTORY_DAYS = 90;

function toInsightError(err: unknown): InsightError {
  if (!(err instanceof ApiError)) {
    return { type: "error", message: "An unexpected error occurred" };
  }
  if (err.code === "NO_DATA") return { type: "no_data", message: err.message };
  if (err.code === "AI_NOT_CONFIGURED") {
    return { type: "not_configured", message: err.message };
  }
  return { type: "error", message: err.message };
}

export function useInsights(type: InsightType) {
  const [result, setResult] = useState<InsightRecord | null>(null);
  const [loading, setLoading] = useState(false);
  const [initialLoading, setInitialLoading] = useState(true);
  const [error, setError] = useState<InsightError | null>(null);
  const [history, setHistory] = useState<InsightHistoryItem[]>([]);
  const [activeId, setActiveId] = useState<string | null>(null);

  const fetchHistory = useCallback(async () => {
    const data = await api<InsightHistoryItem[]>(
      `/insights/history?days=${HISTORY_DAYS}&type=${type}`,
    );
    setHistory(data);
  }, [type]);

  // Latest stored result + history whenever the tab changes
  useEffect(() => {
    let cancelled = false;
    setInitialLoading(true);
    setResult(null);
    setError(null);
    setActiveId(null);
    (async () => {
      try {
        const [latest, items] = await Promise.all([
          api<{ insight: InsightRecord | null }>(`/insights/latest?type=${type}`),
          api<InsightHistoryItem[]>(`/insights/history?days=${HISTORY_DAYS}&type=${type}`),
        ]);
        if (cancelled) return;
        setResult(latest.insight);
        setHistory(items);
      } catch (err) {
        if (!cancelled) setError(toInsightError(err));
      } finally {
        if (!cancelled) setInitialLoading(false);
      }
    })();
    return () => {
      cancelled = true;
    };
  }, [type]);

  const generate = useCallback(
    async (days: InsightPeriod, refresh = false) => {
      setLoading(true);
      setError(null);
      setActiveId(null);
      try {
        const data = await api<InsightRecord>(GENERATE_PATHS[type], {
          method: "POST",
          body: JSON.stringify({ days, refresh }),
        });
        setResult(data);
        if (data.id && !data.cached) await fetchHistory();
      } catch (err) {
        setError(toInsightError(err));
      } finally {
        setLoading(false);
      }
    },
    [type, fetchHistory],
  );

  const loadById = useCallback(async (id: string) => {
    setLoading(true);
    setError(null);
    setActiveId(id);
    try {
      setResult(await api<InsightRecord>(`/insights/${id}`));
    } catch (err) {
      setError(toInsightError(err));
    } finally {
      setLoading(false);
    }
  }, []);

  const remove = useCallback(
    async (id: string) => {
      await api(`/insights/${id}`, { method: "DELETE" });
      setHistory((prev) => prev.filter((h) => h.id !== id));
      if (result?.id === id) {
        setResult(null);
        setActiveId(null);
      }
    },
    [result],
  );

  const downloadReport = useCallback(
    (id: string) => apiDownload(`/insights/${id}/report`, "health-insights-report.md"),
    [],
  );

  return {
    result,
    loading,
    initialLoading,
    error,
    history,
    activeId,
    generate,
    loadById,
    remove,
    downloadReport,
  };
}
