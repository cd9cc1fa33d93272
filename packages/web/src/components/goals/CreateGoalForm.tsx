import { useState, type FormEvent } from "react";
import {
  GOAL_TYPES,
  GOAL_TYPE_CONFIG,
  addDays,
  createGoalDto,
  todayIso,
  type CreateGoalDto,
  type GoalType,
} from "@vitalog/shared";
import { inputClass, gradientButtonStyle } from "../ui/styles";
import { parseNumberInput } from "../../lib/format";

interface Props {
  onCreate: (dto: CreateGoalDto) => Promise<unknown>;
}

export function CreateGoalForm({ onCreate }: Props) {
  const [type, setType] = useState<GoalType>("weight_loss");
  const [description, setDescription] = useState("");
  const [target, setTarget] = useState("");
  const [current, setCurrent] = useState("0");
  const [targetDate, setTargetDate] = useState(() => addDays(todayIso(), 30));
  const [error, setError] = useState("");
  const [saving, setSaving] = useState(false);
  const tip = GOAL_TYPE_CONFIG[type].tip;

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setError("");
    const parsed = createGoalDto.safeParse({
      type,
      description,
      targetValue: parseNumberInput(target),
      currentValue: parseNumberInput(current) ?? 0,
      targetDate,
    });
    if (!parsed.success) {
      setError(parsed.error.issues[0]?.message ?? "Please check the form");
      return;
    }
    if (parsed.data.targetDate < todayIso()) {
      setError("Target date cannot be in the past.");
      return;
    }

    setSaving(true);
    try {
      await onCreate(parsed.data);
      setDescription("");
      setTarget("");
      setCurrent("0");
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to create goal");
    } finally {
      setSaving(false);
    }
  };

  return (
    <form onSubmit={handleSubmit} className="space-y-4">
      {error && (
        <div className="bg-red-500/10 border border-red-500/30 text-red-400 text-sm rounded-lg p-3">
          {error}
        </div>
      )}

      <div>
        <label className="block text-xs text-slate-400 mb-1">Goal type</label>
        <div className="flex flex-wrap gap-1.5">
          {GOAL_TYPES.map((t) => (
            <button
              key={t}
              type="button"
              onClick={() => setType(t)}
              className={`px-2.5 py-1 rounded-full text-xs ${
                type === t ? "bg-indigo-600 text-white" : "bg-slate-800 text-slate-400"
              }`}
            >
              {GOAL_TYPE_CONFIG[t].icon} {GOAL_TYPE_CONFIG[t].label}
            </button>
          ))}
        </div>
        {tip && <p className="text-[11px] text-slate-500 mt-2">💡 {tip}</p>}
      </div>

      <div>
        <label className="block text-xs text-slate-400 mb-1">Description</label>
        <input
          type="text"
          value={description}
          maxLength={200}
          onChange={(e) => setDescription(e.target.value)}
          placeholder="e.g. Lose 5 kg before summer"
          className={inputClass}
        />
      </div>

      <div className="grid grid-cols-2 gap-3">
        <div>
          <label className="block text-xs text-slate-400 mb-1">Target value</label>
          <input
            type="number"
            step="any"
            value={target}
            onChange={(e) => setTarget(e.target.value)}
            className={inputClass}
          />
        </div>
        <div>
          <label className="block text-xs text-slate-400 mb-1">Current value</label>
          <input
            type="number"
            step="any"
            min={0}
            value={current}
            onChange={(e) => setCurrent(e.target.value)}
            className={inputClass}
          />
        </div>
      </div>

      <div>
        <label className="block text-xs text-slate-400 mb-1">Target date</label>
        <input
          type="date"
          min={todayIso()}
          value={targetDate}
          onChange={(e) => setTargetDate(e.target.value)}
          className={inputClass}
        />
      </div>

      <button
        type="submit"
        disabled={saving}
        className="w-full disabled:opacity-50 text-white font-medium rounded-lg py-3 transition-all duration-200 active:scale-[0.98]"
        style={gradientButtonStyle}
      >
        {saving ? "Creating..." : "Create Goal"}
      </button>
    </form>
  );
}
