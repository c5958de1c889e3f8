// src/components/Navbar.tsx
"use client";

type NavBarProps = {
  model: string;
  modeLabel: string;
  docCount: number;
  queryCount: number;
  onClear: () => void;
};

function plural(n: number, one: string, many: string) {
  return `${n} ${n === 1 ? one : many}`;
}

export default function NavBar({
  model,
  modeLabel,
  docCount,
  queryCount,
  onClear,
}: NavBarProps) {
  return (
    <nav className="w-full bg-white border-b shadow-sm">
      <div className="mx-auto max-w-7xl px-4 sm:px-6">
        <div className="flex h-16 items-center justify-between">
          <div className="flex items-center gap-3">
            <span className="text-lg font-semibold">Knowledge Desk</span>
            {model && (
              <span className="text-xs text-gray-500 truncate max-w-[30vw]">
                {model}
              </span>
            )}
          </div>

          <div className="flex items-center gap-3 text-xs text-gray-600">
            <span className="px-2 py-0.5 rounded-full bg-blue-50 text-blue-700">
              {modeLabel}
            </span>
            <span>{plural(docCount, "Document", "Documents")}</span>
            <span>{plural(queryCount, "Query", "Queries")}</span>
            <button
              onClick={onClear}
              className="text-sm px-3 py-1 rounded-md border hover:bg-gray-50"
            >
              Clear chat
            </button>
          </div>
        </div>
      </div>
    </nav>
  );
}
