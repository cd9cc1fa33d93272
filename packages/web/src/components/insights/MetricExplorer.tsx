import { useEffect, useMemo, useState } from "react";
import {
  ResponsiveContainer,
  LineChart,
  Line,
  XAxis,
  YAxis,
  Tooltip,
  Legend,
  CartesianGrid,
} from "recharts";
import { METRIC_CONFIG, type MetricKey } from "@vitalog/shared";
import { useMetrics } from "../../hooks/useMetrics";
import { metricSeries, metricStats } from "../../lib/chart-data";
import { shortDate } from "../../lib/format";

const EXPLORABLE: MetricKey[] = ["weightKg", "heartRate", "sleepHours", "exerciseMinutes"];

export function MetricExplorer({ days }: { days: number }) {
  const { entries, loading, fetchEntries } = useMetrics();
  const [selected, setSelected] = useState<MetricKey[]>(["weightKg", "heartRate"]);
  const [failed, setFailed] = useState(false);

  useEffect(() => {
    setFailed(false);
    fetchEntries(days).catch(() => setFailed(true));
  }, [days, fetchEntries]);

  const available = useMemo(
    () => EXPLORABLE.filter((key) => entries.some((e) => e[key] !== null)),
    [entries],
  );
  const shown = selected.filter((key) => available.includes(key));

  const toggle = (key: MetricKey) =>
    setSelected((prev) => (prev.includes(key) ? prev.filter((k) => k !== key) : [...prev, key]));

  return (
    <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
      <h2 className="text-sm font-semibold text-slate-300 mb-3">🔍 Explore Your Data</h2>

      {failed && <p className="text-xs text-red-400">Could not load entries.</p>}
      {!failed && !loading && available.length === 0 && (
        <p className="text-xs text-slate-500 py-6 text-center">
          No numeric health metrics available for exploration.
        </p>
      )}

      {available.length > 0 && (
        <>
          <div className="flex flex-wrap gap-1.5 mb-3">
            {available.map((key) => (
              <button
                key={key}
                onClick={() => toggle(key)}
                className={`px-3 py-1 rounded-full text-xs transition-colors ${
                  shown.includes(key)
                    ? "bg-indigo-600 text-white"
                    : "bg-slate-800 text-slate-400 hover:text-slate-300"
                }`}
              >
                {METRIC_CONFIG[key].label}
              </button>
            ))}
          </div>

          {shown.length > 0 && (
            <>
              <div className="h-56">
                <ResponsiveContainer width="100%" height="100%">
                  <LineChart data={entries}>
                    <CartesianGrid stroke="#1e293b" strokeDasharray="3 3" />
                    <XAxis dataKey="date" tickFormatter={shortDate} stroke="#64748b" fontSize={11} />
                    <YAxis stroke="#64748b" fontSize={11} width={36} />
                    <Tooltip
                      contentStyle={{ background: "#0f172a", border: "1px solid #334155", borderRadius: 8, fontSize: 12 }}
                      labelFormatter={shortDate}
                    />
                    <Legend wrapperStyle={{ fontSize: 11 }} />
                    {shown.map((key) => (
                      <Line
                        key={key}
                        type="monotone"
                        dataKey={key}
                        name={METRIC_CONFIG[key].label}
                        stroke={METRIC_CONFIG[key].color}
                        strokeWidth={2}
                        dot={{ r: 2 }}
                        connectNulls
                      />
                    ))}
                  </LineChart>
                </ResponsiveContainer>
              </div>

              <table className="w-full text-xs mt-4">
                <thead className="text-slate-500">
                  <tr>
                    <th className="text-left font-medium py-1">Metric</th>
                    <th className="text-right font-medium py-1">Average</th>
                    <th className="text-right font-medium py-1">Min</th>
                    <th className="text-right font-medium py-1">Max</th>
                    <th className="text-right font-medium py-1">Latest</th>
                  </tr>
                </thead>
                <tbody className="text-slate-300">
                  {shown.map((key) => {
                    const stats = metricStats(metricSeries(entries, key));
                    if (!stats) return null;
                    return (
                      <tr key={key}>
                        <td className="py-1">{METRIC_CONFIG[key].label}</td>
                        <td className="py-1 text-right">{stats.average}</td>
                        <td className="py-1 text-right">{stats.min}</td>
                        <td className="py-1 text-right">{stats.max}</td>
                        <td className="py-1 text-right">{stats.latest}</td>
                      </tr>
                    );
                  })}
                </tbody>
              </table>
            </>
          )}
        </>
      )}
    </section>
  );
}
