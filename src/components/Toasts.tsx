// src/components/Toasts.tsx
"use client";

export type ToastType = "success" | "error" | "warn";

export type Toast = {
  id: string;
  message: string;
  type: ToastType;
};

const ICONS: Record<ToastType, string> = {
  success: "✅",
  error: "❌",
  warn: "⚠️",
};

export default function Toasts({ toasts }: { toasts: Toast[] }) {
  return (
    <div className="fixed top-4 right-4 z-50 flex flex-col gap-2 pt-16">
      {toasts.map((t) => (
        <div
          key={t.id}
          className={`max-w-sm w-full rounded-lg px-4 py-2 shadow-md text-sm text-white flex gap-2 ${
            t.type === "success"
              ? "bg-green-600"
              : t.type === "error"
              ? "bg-red-600"
              : "bg-amber-600"
          }`}
        >
          <span>{ICONS[t.type]}</span>
          <span>{t.message}</span>
        </div>
      ))}
    </div>
  );
}
