import { MOOD_CONFIG, type HealthEntryResponse } from "@vitalog/shared";
import { formatBloodPressure, formatMetric, shortDate } from "../../lib/format";

export function RecentEntries({ entries }: { entries: HealthEntryResponse[] }) {
  if (entries.length === 0) return null;

  return (
    <section>
      <h2 className="text-sm font-medium text-slate-500 uppercase tracking-wider mb-3">
        Recent Entries
      </h2>
      <div className="overflow-x-auto rounded-xl border border-slate-700/50">
        <table className="w-full text-xs">
          <thead className="bg-slate-800/80 text-slate-400">
            <tr>
              <th className="text-left font-medium px-3 py-2">Date</th>
              <th className="text-right font-medium px-3 py-2">Weight</th>
              <th className="text-right font-medium px-3 py-2">BP</th>
              <th className="text-right font-medium px-3 py-2">HR</th>
              <th className="text-right font-medium px-3 py-2">Sleep</th>
              <th className="text-right font-medium px-3 py-2">Exercise</th>
              <th className="text-center font-medium px-3 py-2">Mood</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-800">
            {entries.map((e) => (
              <tr key={e.id} className="text-slate-300">
                <td className="px-3 py-2 whitespace-nowrap">{shortDate(e.date)}</td>
                <td className="px-3 py-2 text-right whitespace-nowrap">{formatMetric("weightKg", e.weightKg)}</td>
                <td className="px-3 py-2 text-right whitespace-nowrap">{formatBloodPressure(e.systolic, e.diastolic)}</td>
                <td className="px-3 py-2 text-right whitespace-nowrap">{formatMetric("heartRate", e.heartRate)}</td>
                <td className="px-3 py-2 text-right whitespace-nowrap">{formatMetric("sleepHours", e.sleepHours)}</td>
                <td className="px-3 py-2 text-right whitespace-nowrap">{formatMetric("exerciseMinutes", e.exerciseMinutes)}</td>
                <td className="px-3 py-2 text-center">{e.mood ? MOOD_CONFIG[e.mood].emoji : "—"}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </section>
  );
}
