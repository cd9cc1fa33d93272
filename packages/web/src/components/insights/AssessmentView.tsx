import type { HealthAssessmentContent } from "@vitalog/shared";

const SECTIONS: Array<{
  key: Exclude<keyof HealthAssessmentContent, "overall_health">;
  title: string;
  icon: string;
  style: string;
}> = [
  { key: "positive_aspects", title: "What's Going Well", icon: "✅", style: "border-emerald-500/30 bg-emerald-500/5" },
  { key: "areas_for_improvement", title: "Areas for Improvement", icon: "📈", style: "border-amber-500/30 bg-amber-500/5" },
  { key: "recommendations", title: "Recommendations", icon: "💡", style: "border-indigo-500/40 bg-indigo-500/5" },
  { key: "trends", title: "Trends", icon: "📊", style: "border-slate-700/50 bg-slate-800/50" },
  { key: "risk_factors", title: "Risk Factors", icon: "⚠️", style: "border-red-500/30 bg-red-500/5" },
];

export function AssessmentView({ content }: { content: HealthAssessmentContent }) {
  return (
    <div className="space-y-4">
      <div className="bg-slate-800/50 rounded-xl p-4 border border-slate-700/50">
        <p className="text-sm text-slate-300 leading-relaxed">{content.overall_health}</p>
      </div>

      {SECTIONS.map(({ key, title, icon, style }) =>
        content[key].length > 0 ? (
          <section key={key} className={`rounded-xl p-4 border ${style}`}>
            <h3 className="text-sm font-semibold text-white mb-2">
              {icon} {title}
            </h3>
            <ul className="space-y-1.5">
              {content[key].map((item) => (
                <li key={item} className="text-xs text-slate-300 leading-relaxed">
                  • {item}
                </li>
              ))}
            </ul>
          </section>
        ) : null,
      )}
    </div>
  );
}
