// src/components/ChatStream.tsx
"use client";

import React, { useEffect, useRef } from "react";
import { renderMarkdown } from "@/lib/renderMarkdown";

export type ChatMessage = {
  id: string;
  role: "user" | "assistant";
  text: string;
  isError?: boolean;
};

type ChatStreamProps = {
  messages: ChatMessage[];
  thinking: boolean;
  modelLabel: string;
};

export default function ChatStream({
  messages,
  thinking,
  modelLabel,
}: ChatStreamProps) {
  const endRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView({ block: "end" });
  }, [messages, thinking]);

  if (messages.length === 0 && !thinking) {
    return (
      <div className="flex flex-col items-center justify-center gap-2 py-16 text-center text-gray-500">
        <div className="text-3xl">⚡</div>
        <div className="font-medium text-gray-700">
          Upload documents, ingest them, then ask away
        </div>
        <div className="text-xs">
          Pick a mode above or start from one of its suggested prompts.
        </div>
      </div>
    );
  }

  return (
    <div className="space-y-3">
      {messages.map((m) => (
        <div
          key={m.id}
          className={m.role === "user" ? "text-right" : "text-left"}
        >
          <div className="text-xs text-gray-500 mb-0.5">
            {m.role === "user" ? "You" : modelLabel}
          </div>
          <div
            className={`inline-block rounded-2xl px-3 py-2 text-sm text-left whitespace-normal break-words max-w-full ${
              m.role === "user"
                ? "bg-blue-50"
                : m.isError
                ? "bg-red-50 text-red-700"
                : "bg-gray-100"
            }`}
            dangerouslySetInnerHTML={{ __html: renderMarkdown(m.text) }}
          />
        </div>
      ))}

      {thinking && (
        <div className="text-left">
          <span className="inline-block rounded-2xl px-3 py-2 bg-gray-100 text-sm">
            <span className="italic">Thinking</span>{" "}
            <span className="ml-2">
              <Dots />
            </span>
          </span>
        </div>
      )}
      <div ref={endRef} />
    </div>
  );
}

// small animated dots component for typing indicator
function Dots() {
  return (
    <span className="inline-flex items-center gap-1">
      {[0, 150, 300].map((delay) => (
        <span
          key={delay}
          className="w-1 h-1 rounded-full bg-gray-500 dot-bounce"
          style={{ animationDelay: `${delay}ms` }}
        />
      ))}
    </span>
  );
}
