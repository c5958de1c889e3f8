// src/components/ModePicker.tsx
"use client";

import type { ModeSummary } from "@/lib/types";

type ModePickerProps = {
  modes: Record<string, ModeSummary>;
  active: string;
  onSelect: (mode: string) => void;
  onChip: (text: string) => void;
};

export default function ModePicker({
  modes,
  active,
  onSelect,
  onChip,
}: ModePickerProps) {
  const chips = modes[active]?.chips ?? [];

  return (
    <section className="rounded-2xl border bg-white p-4 space-y-3">
      <div className="grid grid-cols-2 sm:grid-cols-4 gap-2">
        {Object.entries(modes).map(([key, mode]) => (
          <button
            key={key}
            onClick={() => onSelect(key)}
            className={`rounded-xl border px-3 py-2 text-sm transition ${
              key === active
                ? "border-blue-500 bg-blue-50 text-blue-700"
                : "hover:bg-gray-50"
            }`}
          >
            {mode.label}
          </button>
        ))}
      </div>

      {chips.length > 0 && (
        <div className="flex flex-wrap gap-2">
          {chips.map((text) => (
            <button
              key={text}
              onClick={() => onChip(text)}
              className="rounded-full border px-3 py-1 text-xs text-gray-700 hover:bg-gray-50"
            >
              {text}
            </button>
          ))}
        </div>
      )}
    </section>
  );
}
