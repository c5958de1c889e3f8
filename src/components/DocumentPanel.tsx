// src/components/DocumentPanel.tsx
"use client";

import React, { useRef, useState } from "react";
import type { DocumentSummary } from "@/lib/types";

type DocumentPanelProps = {
  apiKey: string;
  keyRequired: boolean;
  onApiKeyChange: (key: string) => void;
  documents: DocumentSummary[];
  ingested: boolean;
  ingesting: boolean;
  uploading: boolean;
  onUpload: (files: File[]) => void;
  onRemove: (name: string) => void;
  onIngest: () => void;
};

const ACCEPT = ".pdf,.txt,.md,.csv,.json";

export default function DocumentPanel({
  apiKey,
  keyRequired,
  onApiKeyChange,
  documents,
  ingested,
  ingesting,
  uploading,
  onUpload,
  onRemove,
  onIngest,
}: DocumentPanelProps) {
  const [showKey, setShowKey] = useState(false);
  const [dragActive, setDragActive] = useState(false);
  const fileInputRef = useRef<HTMLInputElement | null>(null);

  return (
    <aside className="space-y-4">
      <section className="rounded-2xl border bg-white p-4 space-y-2">
        <h2 className="font-semibold">API key</h2>
        <div className="flex gap-2">
          <input
            type={showKey ? "text" : "password"}
            value={apiKey}
            onChange={(e) => onApiKeyChange(e.target.value)}
            placeholder={keyRequired ? "sk-..." : "Using the server key"}
            className="flex-1 min-w-0 rounded-xl border px-3 py-2 text-sm"
            aria-label="API key"
          />
          <button
            onClick={() => setShowKey((s) => !s)}
            className="rounded-xl border px-3 py-1 text-sm hover:bg-gray-50"
            title={showKey ? "Hide key" : "Show key"}
          >
            {showKey ? "🙈" : "👁"}
          </button>
        </div>
        <p className="text-xs text-gray-500">
          Kept in this browser tab only and sent with each question.
        </p>
      </section>

      <section className="relative rounded-2xl border bg-white p-4 space-y-3">
        <h2 className="font-semibold">Documents</h2>

        <input
          ref={fileInputRef}
          id="file-upload"
          type="file"
          multiple
          accept={ACCEPT}
          onChange={(e) => {
            const files = Array.from(e.target.files ?? []);
            if (files.length > 0) onUpload(files);
            e.target.value = "";
          }}
          className="hidden"
          aria-label="Upload documents"
        />

        <label
          htmlFor="file-upload"
          onDragOver={(e) => {
            e.preventDefault();
            setDragActive(true);
          }}
          onDragLeave={() => setDragActive(false)}
          onDrop={(e) => {
            e.preventDefault();
            setDragActive(false);
            const files = Array.from(e.dataTransfer.files);
            if (files.length > 0) onUpload(files);
          }}
          className={`block w-full cursor-pointer rounded-xl border-2 border-dashed p-4 text-sm transition ${
            dragActive
              ? "border-blue-400 bg-blue-50"
              : "border-gray-300 hover:border-blue-400 hover:bg-gray-50"
          }`}
        >
          <div className="font-medium">
            {uploading ? "Uploading..." : "Click or drop files here"}
          </div>
          <div className="text-xs text-gray-500 mt-0.5">
            PDF, TXT, MD, CSV or JSON. Each file is added to the list below.
          </div>
        </label>

        {documents.length > 0 && (
          <ul className="space-y-1">
            {documents.map((doc) => (
              <li
                key={doc.name}
                className="flex items-center gap-2 rounded-lg bg-gray-50 px-2 py-1 text-sm"
              >
                <span className="flex-1 min-w-0 truncate" title={doc.name}>
                  📄 {doc.name}
                </span>
                <span className="px-2 py-0.5 rounded-full bg-gray-200 text-gray-600 text-xs">
                  {doc.size_label}
                </span>
                <button
                  onClick={() => onRemove(doc.name)}
                  className="text-red-500 hover:underline"
                  title="Remove"
                >
                  ✕
                </button>
              </li>
            ))}
          </ul>
        )}

        <button
          onClick={onIngest}
          disabled={documents.length === 0 || ingesting}
          className="w-full rounded-xl px-4 py-2 bg-blue-600 text-white hover:bg-blue-700 disabled:bg-gray-200 disabled:text-gray-600 disabled:cursor-not-allowed"
        >
          {ingesting
            ? "Processing..."
            : ingested
            ? "✅ Re-ingest Documents"
            : "⚡ Ingest Documents"}
        </button>
      </section>
    </aside>
  );
}
