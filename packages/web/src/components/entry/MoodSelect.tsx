import * as Select from "@radix-ui/react-select";
import { ChevronDown, Check } from "lucide-react";
import { MOODS, MOOD_CONFIG, type Mood } from "@vitalog/shared";

interface Props {
  value: Mood | null;
  onChange: (mood: Mood | null) => void;
}

export function MoodSelect({ value, onChange }: Props) {
  return (
    <div className="flex gap-2">
      <Select.Root
        value={value ?? undefined}
        onValueChange={(v) => onChange(MOODS.find((m) => m === v) ?? null)}
      >
        <Select.Trigger
          aria-label="Mood"
          className="flex-1 flex items-center justify-between bg-slate-800 border border-slate-700 rounded-lg px-4 py-3 text-sm text-white focus:outline-none focus:border-indigo-500"
        >
          <Select.Value placeholder="How are you feeling?" />
          <Select.Icon>
            <ChevronDown className="w-4 h-4 text-slate-500" />
          </Select.Icon>
        </Select.Trigger>
        <Select.Portal>
          <Select.Content
            position="popper"
            sideOffset={4}
            className="z-50 w-[var(--radix-select-trigger-width)] bg-slate-900 border border-slate-700 rounded-lg shadow-xl overflow-hidden"
          >
            <Select.Viewport className="p-1">
              {MOODS.map((m) => (
                <Select.Item
                  key={m}
                  value={m}
                  className="flex items-center justify-between px-3 py-2 text-sm text-slate-200 rounded-md outline-none data-[highlighted]:bg-slate-800 cursor-pointer"
                >
                  <Select.ItemText>
                    {MOOD_CONFIG[m].emoji} {MOOD_CONFIG[m].label}
                  </Select.ItemText>
                  <Select.ItemIndicator>
                    <Check className="w-4 h-4 text-indigo-400" />
                  </Select.ItemIndicator>
                </Select.Item>
              ))}
            </Select.Viewport>
          </Select.Content>
        </Select.Portal>
      </Select.Root>
      {value && (
        <button
          type="button"
          onClick={() => onChange(null)}
          className="px-3 rounded-lg text-xs text-slate-400 bg-slate-800 hover:text-slate-200"
        >
          Clear
        </button>
      )}
    </div>
  );
}
