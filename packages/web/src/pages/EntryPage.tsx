import { useEffect, useState, type FormEvent } from "react";
import { useNavigate } from "react-router-dom";
import { toast } from "sonner";
import { Trash2 } from "lucide-react";
import {
  METRIC_CONFIG,
  METRIC_KEYS,
  healthEntryDto,
  todayIso,
  type HealthEntryResponse,
  type MetricKey,
  type MetricTipTopic,
  type Mood,
} from "@vitalog/shared";
import { useMetrics } from "../hooks/useMetrics";
import { ApiError } from "../api/client";
import { MoodSelect } from "../components/entry/MoodSelect";
import { MetricTip } from "../components/entry/MetricTip";
import { inputClass, gradientButtonStyle } from "../components/ui/styles";
import { parseNumberInput } from "../lib/format";

type MetricInputs = Record<MetricKey, string>;

const EMPTY_INPUTS: MetricInputs = {
  weightKg: "",
  systolic: "",
  diastolic: "",
  heartRate: "",
  sleepHours: "",
  exerciseMinutes: "",
};

const STEP: Record<MetricKey, string> = {
  weightKg: "0.1",
  systolic: "1",
  diastolic: "1",
  heartRate: "1",
  sleepHours: "0.5",
  exerciseMinutes: "5",
};

const TIP_TOPIC: Partial<Record<MetricKey, MetricTipTopic>> = {
  weightKg: "weight",
  systolic: "blood_pressure",
  heartRate: "heart_rate",
  sleepHours: "sleep",
  exerciseMinutes: "exercise",
};

const EXERCISE_PRESETS = [30, 60, 90];
const SLEEP_PRESETS = [7, 8, 9];
const MOOD_PRESETS: Mood[] = ["excellent", "good", "average"];

function inputsFrom(entry: HealthEntryResponse): MetricInputs {
  const inputs = { ...EMPTY_INPUTS };
  for (const key of METRIC_KEYS) {
    const value = entry[key];
    inputs[key] = value === null ? "" : String(value);
  }
  return inputs;
}

export function EntryPage() {
  const navigate = useNavigate();
  const { fetchEntry, saveEntry, deleteEntry } = useMetrics();
  const [date, setDate] = useState(todayIso());
  const [inputs, setInputs] = useState<MetricInputs>(EMPTY_INPUTS);
  const [mood, setMood] = useState<Mood | null>(null);
  const [symptoms, setSymptoms] = useState("");
  const [notes, setNotes] = useState("");
  const [existing, setExisting] = useState<HealthEntryResponse | null>(null);
  const [error, setError] = useState("");
  const [saving, setSaving] = useState(false);

  // Prefill from whatever was already logged for the chosen date
  useEffect(() => {
    let cancelled = false;
    fetchEntry(date)
      .then((entry) => {
        if (cancelled) return;
        setExisting(entry);
        setInputs(entry ? inputsFrom(entry) : EMPTY_INPUTS);
        setMood(entry?.mood ?? null);
        setSymptoms(entry?.symptoms ?? "");
        setNotes(entry?.notes ?? "");
      })
      .catch((err) => {
        if (!cancelled) setError(err instanceof ApiError ? err.message : "Failed to load entry");
      });
    return () => {
      cancelled = true;
    };
  }, [date, fetchEntry]);

  const setInput = (key: MetricKey, value: string) =>
    setInputs((prev) => ({ ...prev, [key]: value }));

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setError("");

    const numbers = {
      weightKg: parseNumberInput(inputs.weightKg),
      systolic: parseNumberInput(inputs.systolic),
      diastolic: parseNumberInput(inputs.diastolic),
      heartRate: parseNumberInput(inputs.heartRate),
      sleepHours: parseNumberInput(inputs.sleepHours),
      exerciseMinutes: parseNumberInput(inputs.exerciseMinutes),
    };
    const parsed = healthEntryDto.safeParse({ date, ...numbers, mood, symptoms, notes });
    if (!parsed.success) {
      setError(parsed.error.issues.map((i) => i.message).join(". "));
      return;
    }
    if (parsed.data.date > todayIso()) {
      setError("Entries cannot be logged for future dates");
      return;
    }

    setSaving(true);
    try {
      const result = await saveEntry(parsed.data);
      setExisting(result.entry);
      toast.success(result.created ? "Health data saved!" : "Entry updated");
      result.feedback.forEach((msg) => toast(msg));
    } catch (err) {
      setError(err instanceof ApiError ? [err.message, ...(err.errors ?? [])].join(". ") : "Failed to save entry");
    } finally {
      setSaving(false);
    }
  };

  const handleDelete = async () => {
    if (!existing || !window.confirm(`Delete the entry for ${existing.date}?`)) return;
    try {
      await deleteEntry(existing.date);
      toast.success("Entry deleted");
      setExisting(null);
      setInputs(EMPTY_INPUTS);
      setMood(null);
      setSymptoms("");
      setNotes("");
    } catch (err) {
      toast.error(err instanceof ApiError ? err.message : "Failed to delete entry");
    }
  };

  return (
    <div className="px-4 pt-6 pb-8">
      <div className="flex items-center justify-between mb-6">
        <h1 className="text-xl font-bold text-white">Log Health Data</h1>
        {existing && (
          <button
            type="button"
            onClick={() => void handleDelete()}
            className="flex items-center gap-1 text-xs text-red-400 hover:text-red-300"
          >
            <Trash2 className="w-3.5 h-3.5" />
            Delete
          </button>
        )}
      </div>

      <form onSubmit={handleSubmit} className="space-y-5">
        {error && (
          <div className="bg-red-500/10 border border-red-500/30 text-red-400 text-sm rounded-lg p-3">
            {error}
          </div>
        )}

        <div>
          <label className="block text-xs text-slate-400 mb-1">Date</label>
          <input
            type="date"
            value={date}
            max={todayIso()}
            onChange={(e) => e.target.value && setDate(e.target.value)}
            className={inputClass}
          />
          {existing && (
            <p className="text-[11px] text-amber-400/80 mt-1">
              Already logged. Saving will update this day's entry.
            </p>
          )}
        </div>

        <div className="grid grid-cols-2 gap-3">
          {METRIC_KEYS.map((key) => {
            const cfg = METRIC_CONFIG[key];
            const topic = TIP_TOPIC[key];
            return (
              <div key={key}>
                <label className="block text-xs text-slate-400 mb-1">
                  {cfg.label} ({cfg.unit})
                </label>
                <input
                  type="number"
                  inputMode="decimal"
                  step={STEP[key]}
                  min={cfg.min}
                  max={cfg.max}
                  value={inputs[key]}
                  onChange={(e) => setInput(key, e.target.value)}
                  className={inputClass}
                />
                {topic && <div className="mt-1"><MetricTip topic={topic} /></div>}
              </div>
            );
          })}
        </div>

        <div>
          <label className="block text-xs text-slate-400 mb-1">Mood</label>
          <MoodSelect value={mood} onChange={setMood} />
          <div className="mt-1"><MetricTip topic="mood" /></div>
        </div>

        <div>
          <label className="block text-xs text-slate-400 mb-1">Symptoms</label>
          <textarea
            value={symptoms}
            onChange={(e) => setSymptoms(e.target.value)}
            rows={2}
            maxLength={1000}
            placeholder="Headache, fatigue..."
            className={inputClass}
          />
        </div>

        <div>
          <label className="block text-xs text-slate-400 mb-1">Notes</label>
          <textarea
            value={notes}
            onChange={(e) => setNotes(e.target.value)}
            rows={3}
            maxLength={2000}
            className={inputClass}
          />
        </div>

        <section className="bg-slate-800/50 rounded-xl p-4 border border-slate-700/50 space-y-3">
          <p className="text-xs font-semibold text-slate-300">Quick Entry</p>
          <PresetRow
            label="Exercise"
            options={EXERCISE_PRESETS.map((m) => ({ key: String(m), text: `${m} min` }))}
            onPick={(k) => setInput("exerciseMinutes", k)}
          />
          <PresetRow
            label="Sleep"
            options={SLEEP_PRESETS.map((h) => ({ key: String(h), text: `${h} hours` }))}
            onPick={(k) => setInput("sleepHours", k)}
          />
          <PresetRow
            label="Mood"
            options={MOOD_PRESETS.map((m) => ({ key: m, text: m.charAt(0).toUpperCase() + m.slice(1) }))}
            onPick={(k) => setMood(MOOD_PRESETS.find((m) => m === k) ?? null)}
          />
        </section>

        <div className="flex gap-3">
          <button
            type="submit"
            disabled={saving}
            className="flex-1 disabled:opacity-50 text-white font-medium rounded-lg py-3 transition-all duration-200 active:scale-[0.98]"
            style={gradientButtonStyle}
          >
            {saving ? "Saving..." : existing ? "Update Entry" : "Save Entry"}
          </button>
          <button
            type="button"
            onClick={() => navigate("/")}
            className="px-4 rounded-lg text-sm text-slate-300 bg-slate-800 hover:bg-slate-700"
          >
            Dashboard
          </button>
        </div>
      </form>
    </div>
  );
}

function PresetRow({
  label,
  options,
  onPick,
}: {
  label: string;
  options: Array<{ key: string; text: string }>;
  onPick: (key: string) => void;
}) {
  return (
    <div className="flex items-center gap-2">
      <span className="w-16 text-[11px] text-slate-500">{label}</span>
      <div className="flex flex-wrap gap-1.5">
        {options.map((o) => (
          <button
            key={o.key}
            type="button"
            onClick={() => onPick(o.key)}
            className="px-3 py-1.5 rounded-full bg-slate-800 text-xs text-slate-300 hover:bg-slate-700"
          >
            {o.text}
          </button>
        ))}
      </div>
    </div>
  );
}
