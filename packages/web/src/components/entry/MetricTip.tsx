import { useState } from "react";
import { Info } from "lucide-react";
import { METRIC_TIPS, type MetricTipTopic } from "@vitalog/shared";

export function MetricTip({ topic }: { topic: MetricTipTopic }) {
  const [open, setOpen] = useState(false);
  const tip = METRIC_TIPS[topic];

  return (
    <div>
      <button
        type="button"
        onClick={() => setOpen((v) => !v)}
        className="flex items-center gap-1 text-[11px] text-slate-500 hover:text-slate-300"
      >
        <Info className="w-3 h-3" />
        {tip.title}
      </button>
      {open && <p className="mt-1 text-xs text-slate-400 leading-relaxed">{tip.text}</p>}
    </div>
  );
}
