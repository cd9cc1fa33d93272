import type { Significance, TrendAnalysisContent, TrendDirection } from "@vitalog/shared";

const DIRECTION_CONFIG: Record<TrendDirection, { icon: string; color: string }> = {
  increasing: { icon: "📈", color: "text-sky-400" },
  decreasing: { icon: "📉", color: "text-amber-400" },
  stable: { icon: "➡️", color: "text-slate-400" },
};

const SIGNIFICANCE_BADGE: Record<Significance, string> = {
  high: "bg-indigo-500/20 text-indigo-300",
  medium: "bg-amber-500/20 text-amber-300",
  low: "bg-slate-500/20 text-slate-400",
};

export function TrendsView({ content }: { content: TrendAnalysisContent }) {
  if (content.trends.length === 0 && content.patterns.length === 0) {
    return (
      <p className="text-center text-sm text-slate-400 py-8">
        No trends identified yet. Keep logging to build a clearer picture.
      </p>
    );
  }

  return (
    <div className="space-y-6">
      {content.trends.length > 0 && (
        <section>
          <h2 className="text-sm font-semibold text-slate-300 mb-3">Trends</h2>
          <div className="space-y-3">
            {content.trends.map((t) => {
              const dir = DIRECTION_CONFIG[t.trend];
              return (
                <div key={t.metric} className="bg-slate-800/50 rounded-xl p-4 border border-slate-700/50">
                  <div className="flex items-start justify-between gap-2 mb-2">
                    <div className="flex items-center gap-2">
                      <span>{dir.icon}</span>
                      <span className="text-sm font-medium text-white capitalize">{t.metric}</span>
                    </div>
                    <div className="flex items-center gap-2">
                      <span className={`text-xs font-semibold ${dir.color}`}>{t.trend}</span>
                      <span className={`text-[10px] font-semibold px-2 py-0.5 rounded-full ${SIGNIFICANCE_BADGE[t.significance]}`}>
                        {t.significance}
                      </span>
                    </div>
                  </div>
                  <p className="text-xs text-slate-300">{t.description}</p>
                </div>
              );
            })}
          </div>
        </section>
      )}

      {content.patterns.length > 0 && (
        <section>
          <h2 className="text-sm font-semibold text-slate-300 mb-3">Patterns</h2>
          <div className="space-y-3">
            {content.patterns.map((p) => (
              <div key={p.pattern} className="rounded-xl p-4 border border-indigo-500/30 bg-indigo-500/5">
                <p className="text-sm font-medium text-white mb-1">{p.pattern}</p>
                {p.correlation && (
                  <p className="text-xs text-slate-400 mb-2">Related: {p.correlation}</p>
                )}
                {p.recommendation && (
                  <p className="text-xs text-slate-300">💡 {p.recommendation}</p>
                )}
              </div>
            ))}
          </div>
        </section>
      )}
    </div>
  );
}
