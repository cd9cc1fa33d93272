import { useState } from "react";
import { Drawer } from "vaul";
import { toast } from "sonner";
import { todayIso, type GoalResponse } from "@vitalog/shared";
import { ApiError } from "../../api/client";
import { parseNumberInput } from "../../lib/format";

interface Props {
  goal: GoalResponse;
  onClose: () => void;
  onUpdateProgress: (id: string, value: number) => Promise<GoalResponse>;
  onExtend: (id: string, targetDate: string) => Promise<GoalResponse>;
}

export function GoalEditSheet({ goal, onClose, onUpdateProgress, onExtend }: Props) {
  const [value, setValue] = useState(String(goal.currentValue));
  const [targetDate, setTargetDate] = useState(goal.targetDate);
  const [saving, setSaving] = useState(false);

  const run = async (action: () => Promise<GoalResponse>, success: (g: GoalResponse) => string) => {
    setSaving(true);
    try {
      const updated = await action();
      toast.success(success(updated));
      onClose();
    } catch (err) {
      toast.error(err instanceof ApiError ? err.message : "Update failed");
    } finally {
      setSaving(false);
    }
  };

  const saveProgress = () => {
    const parsed = parseNumberInput(value);
    if (parsed === null || Number.isNaN(parsed) || parsed < 0) {
      toast.error("Enter a value of 0 or more");
      return;
    }
    void run(
      () => onUpdateProgress(goal.id, parsed),
      (g) => (g.status === "completed" ? "🎉 Goal achieved!" : "Progress updated"),
    );
  };

  const saveDeadline = () => {
    if (targetDate < todayIso()) {
      toast.error("Target date cannot be in the past");
      return;
    }
    void run(() => onExtend(goal.id, targetDate), () => "Deadline updated");
  };

  return (
    <Drawer.Root open onOpenChange={(open) => !open && onClose()}>
      <Drawer.Portal>
        <Drawer.Overlay className="fixed inset-0 bg-black/60 z-40" />
        <Drawer.Content className="fixed bottom-0 left-0 right-0 z-50 bg-slate-900 rounded-t-2xl max-h-[85vh] overflow-y-auto">
          <div className="mx-auto w-12 h-1.5 bg-slate-700 rounded-full mt-3 mb-2" />
          <div className="px-4 pb-8 max-w-lg mx-auto">
            <Drawer.Title className="text-lg font-semibold text-white mb-1">
              {goal.description}
            </Drawer.Title>
            <Drawer.Description className="text-xs text-slate-400 mb-5">
              Target {goal.targetValue} by {goal.targetDate}
            </Drawer.Description>

            <div className="mb-5">
              <label className="block text-xs text-slate-400 mb-1">Current value</label>
              <div className="flex gap-2">
                <input
                  type="number"
                  inputMode="decimal"
                  min={0}
                  step="any"
                  value={value}
                  onChange={(e) => setValue(e.target.value)}
                  className="flex-1 bg-slate-800 border border-slate-700 rounded-lg px-3 py-2 text-sm text-white"
                />
                <button
                  onClick={saveProgress}
                  disabled={saving}
                  className="px-4 rounded-lg text-sm font-medium bg-indigo-600 text-white disabled:opacity-50"
                >
                  Save
                </button>
              </div>
            </div>

            <div>
              <label className="block text-xs text-slate-400 mb-1">Target date</label>
              <div className="flex gap-2">
                <input
                  type="date"
                  min={todayIso()}
                  value={targetDate}
                  onChange={(e) => setTargetDate(e.target.value)}
                  className="flex-1 bg-slate-800 border border-slate-700 rounded-lg px-3 py-2 text-sm text-white"
                />
                <button
                  onClick={saveDeadline}
                  disabled={saving || targetDate === goal.targetDate}
                  className="px-4 rounded-lg text-sm font-medium bg-slate-700 text-white disabled:opacity-50"
                >
                  Extend
                </button>
              </div>
            </div>
          </div>
        </Drawer.Content>
      </Drawer.Portal>
    </Drawer.Root>
  );
}
