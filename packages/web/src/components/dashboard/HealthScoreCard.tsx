import type { HealthScore } from "@vitalog/shared";

function scoreColor(value: number): string {
  if (value >= 70) return "#10B981";
  if (value >= 40) return "#F59E0B";
  return "#EF4444";
}

export function HealthScoreCard({ score, entries }: { score: HealthScore; entries: number }) {
  const color = scoreColor(score.score);
  const circumference = 2 * Math.PI * 54;
  const offset = circumference - (score.score / 100) * circumference;

  return (
    <div className="bg-slate-800/50 rounded-2xl p-5 border border-slate-700/50">
      <h3 className="text-sm font-semibold text-slate-300 mb-4">Health Score</h3>

      <div className="flex items-center gap-6">
        <div className="relative w-32 h-32 shrink-0">
          <svg className="w-full h-full -rotate-90" viewBox="0 0 120 120">
            <circle
              cx="60"
              cy="60"
              r="54"
              fill="none"
              stroke="currentColor"
              strokeWidth="8"
              className="text-slate-700"
            />
            <circle
              cx="60"
              cy="60"
              r="54"
              fill="none"
              stroke={color}
              strokeWidth="8"
              strokeLinecap="round"
              strokeDasharray={circumference}
              strokeDashoffset={offset}
              style={{ transition: "stroke-dashoffset 1s ease" }}
            />
          </svg>
          <div className="absolute inset-0 flex flex-col items-center justify-center">
            <span className="text-3xl font-bold text-white">{score.score}</span>
            <span className="text-xs text-slate-500">/ 100</span>
          </div>
        </div>

        <div className="flex-1 min-w-0">
          {score.factors.length > 0 ? (
            <ul className="space-y-1.5">
              {score.factors.map((f) => (
                <li key={f} className="flex items-center gap-2 text-xs text-slate-300">
                  <span className="w-1.5 h-1.5 rounded-full shrink-0" style={{ background: color }} />
                  {f}
                </li>
              ))}
            </ul>
          ) : (
            <p className="text-xs text-slate-500">
              Log a few days of metrics to build your score.
            </p>
          )}
          <p className="text-[10px] text-slate-600 mt-3">Based on {entries} entries</p>
        </div>
      </div>
    </div>
  );
}
