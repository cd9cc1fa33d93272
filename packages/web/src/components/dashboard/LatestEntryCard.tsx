import { MOOD_CONFIG, type HealthAssessment, type HealthEntryResponse } from "@vitalog/shared";
import { formatBloodPressure, formatMetric, longDate } from "../../lib/format";

interface Props {
  entry: HealthEntryResponse;
  assessment: HealthAssessment;
}

export function LatestEntryCard({ entry, assessment }: Props) {
  const mood = entry.mood ? MOOD_CONFIG[entry.mood] : null;

  return (
    <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
      <div className="flex items-baseline justify-between mb-3">
        <h3 className="text-sm font-semibold text-slate-300">Latest Reading</h3>
        <span className="text-xs text-slate-500">{longDate(entry.date)}</span>
      </div>

      <div className="grid grid-cols-2 gap-3">
        <Stat
          label="Weight"
          value={formatMetric("weightKg", entry.weightKg)}
          note={assessment.bmi !== null ? `BMI ${assessment.bmi} · ${assessment.bmiCategory}` : assessment.bmiCategory}
        />
        <Stat
          label="Blood Pressure"
          value={formatBloodPressure(entry.systolic, entry.diastolic)}
          note={assessment.bloodPressureCategory}
        />
        <Stat
          label="Heart Rate"
          value={formatMetric("heartRate", entry.heartRate)}
          note={assessment.heartRateCategory}
        />
        <Stat
          label="Mood"
          value={mood ? `${mood.emoji} ${mood.label}` : "—"}
        />
      </div>
    </section>
  );
}

function Stat({ label, value, note }: { label: string; value: string; note?: string }) {
  return (
    <div className="bg-slate-900/60 rounded-xl p-3">
      <p className="text-[10px] uppercase tracking-wider text-slate-500">{label}</p>
      <p className="text-base font-semibold text-white mt-0.5">{value}</p>
      {note && <p className="text-[11px] text-slate-400 mt-0.5">{note}</p>}
    </div>
  );
}
