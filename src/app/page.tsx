"use client";
import React, { useCallback, useEffect, useRef, useState } from "react";
import NavBar from "../components/Navbar";
import ChatStream, { type ChatMessage } from "../components/ChatStream";
import DocumentPanel from "../components/DocumentPanel";
import ModePicker from "../components/ModePicker";
import Toasts, { type Toast, type ToastType } from "../components/Toasts";
import { api } from "@/lib/apiClient";
import { TimerSet } from "@/lib/timers";
import type { DocumentSummary, ModeSummary } from "@/lib/types";

const KEY_STORAGE = "kbchat:key";
const DEFAULT_MODE = "general";
const MAX_INPUT_HEIGHT = 120;

function newId() {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

function describe(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

export default function Home() {
  const [apiKey, setApiKey] = useState("");
  const [keyConfigured, setKeyConfigured] = useState(false);
  const [model, setModel] = useState("");

  const [modes, setModes] = useState<Record<string, ModeSummary>>({});
  const [mode, setMode] = useState(DEFAULT_MODE);

  const [documents, setDocuments] = useState<DocumentSummary[]>([]);
  const [ingested, setIngested] = useState(false);
  const [uploading, setUploading] = useState(false);
  const [ingesting, setIngesting] = useState(false);

  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [question, setQuestion] = useState("");
  const [sending, setSending] = useState(false);
  const [queryCount, setQueryCount] = useState(0);

  const [toasts, setToasts] = useState<Toast[]>([]);
  const inputRef = useRef<HTMLTextAreaElement | null>(null);
  const toastTimers = useRef(new TimerSet());

  useEffect(() => {
    const timers = toastTimers.current;
    return () => timers.clearAll();
  }, []);

  const showToast = useCallback(
    (message: string, type: ToastType = "success", duration = 3500) => {
      const id = newId();
      setToasts((s) => [...s, { id, message, type }]);
      toastTimers.current.schedule(() => {
        setToasts((s) => s.filter((x) => x.id !== id));
      }, duration);
    },
    []
  );

  // initial load: key from this tab, then modes, documents, model
  useEffect(() => {
    try {
      setApiKey(sessionStorage.getItem(KEY_STORAGE) ?? "");
    } catch {
      // storage disabled; the key just won't survive a reload
    }

    const load = async () => {
      try {
        const [modesRes, docsRes, healthRes] = await Promise.all([
          api.modes(),
          api.documents(),
          api.health(),
        ]);
        if (modesRes.ok) setModes(modesRes.modes);
        if (docsRes.ok) {
          setDocuments(docsRes.documents);
          setIngested(docsRes.ingested);
        }
        if (healthRes.ok) {
          setModel(healthRes.model);
          setKeyConfigured(healthRes.key_configured);
        }
      } catch (err) {
        console.warn("Initial load failed:", err);
        showToast(`Could not reach the server: ${describe(err)}`, "error");
      }
    };
    void load();
  }, [showToast]);

  // Ctrl+/ focuses the question box
  useEffect(() => {
    const onKey = (e: KeyboardEvent) => {
      if ((e.ctrlKey || e.metaKey) && e.key === "/") {
        e.preventDefault();
        inputRef.current?.focus();
      }
    };
    document.addEventListener("keydown", onKey);
    return () => document.removeEventListener("keydown", onKey);
  }, []);

  // grow the textarea with its content
  useEffect(() => {
    const el = inputRef.current;
    if (!el) return;
    el.style.height = "auto";
    el.style.height = `${Math.min(el.scrollHeight, MAX_INPUT_HEIGHT)}px`;
  }, [question]);

  const changeKey = (key: string) => {
    setApiKey(key);
    try {
      sessionStorage.setItem(KEY_STORAGE, key);
    } catch {
      // see initial load
    }
  };

  const appendMessage = (
    role: ChatMessage["role"],
    text: string,
    isError = false
  ) => {
    setMessages((prev) => [...prev, { id: newId(), role, text, isError }]);
  };

  const uploadFiles = async (files: File[]) => {
    setUploading(true);
    try {
      const data = await api.upload(files);
      if (!data.ok) {
        showToast(data.error, "error");
        return;
      }
      for (const r of data.results) {
        showToast(r.message, r.ok ? "success" : "warn");
      }
      setDocuments(data.documents);
      if (data.results.some((r) => r.ok)) setIngested(false);
    } catch (err) {
      showToast(`Upload failed: ${describe(err)}`, "error");
    } finally {
      setUploading(false);
    }
  };

  const removeDocument = async (name: string) => {
    try {
      const data = await api.remove(name);
      if (!data.ok) {
        showToast(data.error, "error");
        return;
      }
      showToast(data.message, "success");
      setDocuments(data.documents);
      setIngested(false);
    } catch (err) {
      showToast(`Remove failed: ${describe(err)}`, "error");
    }
  };

  const ingestDocuments = async () => {
    setIngesting(true);
    try {
      const data = await api.ingest();
      if (!data.ok) {
        showToast(data.error, "error");
        return;
      }
      setIngested(true);
      setDocuments((docs) => docs.map((d) => ({ ...d, ingested: true })));
      showToast(`${data.message} (~${data.tokens} tokens)`, "success");
    } catch (err) {
      showToast(`Ingest failed: ${describe(err)}`, "error");
    } finally {
      setIngesting(false);
    }
  };

  const ask = async () => {
    const query = question.trim();
    if (!query || sending) return;

    const key = apiKey.trim();
    if (!key && !keyConfigured) {
      showToast("Please enter your API key", "error");
      return;
    }

    appendMessage("user", query);
    setQuestion("");
    setQueryCount((n) => n + 1);
    setSending(true);

    try {
      const data = await api.chat({ apiKey: key, query, mode });
      if (data.ok) {
        appendMessage("assistant", data.reply);
      } else {
        appendMessage("assistant", `⚠️ ${data.error}`, true);
        showToast(data.error, "error");
      }
    } catch (err) {
      appendMessage("assistant", `⚠️ Network error: ${describe(err)}`, true);
      showToast(`Network error: ${describe(err)}`, "error");
    } finally {
      setSending(false);
      inputRef.current?.focus();
    }
  };

  const clearConversation = async () => {
    if (!confirm("Clear conversation history?")) return;
    try {
      await api.clear();
      setMessages([]);
      setQueryCount(0);
    } catch (err) {
      showToast(`Clear failed: ${describe(err)}`, "error");
    }
  };

  const modeLabel = modes[mode]?.label ?? mode;

  return (
    <main className="min-h-screen bg-gray-50">
      <NavBar
        model={model}
        modeLabel={modeLabel}
        docCount={documents.length}
        queryCount={queryCount}
        onClear={() => void clearConversation()}
      />
      <Toasts toasts={toasts} />

      <div className="mx-auto max-w-6xl p-6 grid gap-6 md:grid-cols-[320px_1fr]">
        <DocumentPanel
          apiKey={apiKey}
          keyRequired={!keyConfigured}
          onApiKeyChange={changeKey}
          documents={documents}
          ingested={ingested}
          ingesting={ingesting}
          uploading={uploading}
          onUpload={(files) => void uploadFiles(files)}
          onRemove={(name) => void removeDocument(name)}
          onIngest={() => void ingestDocuments()}
        />

        <div className="space-y-4 min-w-0">
          <ModePicker
            modes={modes}
            active={mode}
            onSelect={setMode}
            onChip={(text) => {
              setQuestion(text);
              inputRef.current?.focus();
            }}
          />

          <section className="rounded-2xl border bg-white p-4 space-y-3">
            <ChatStream
              messages={messages}
              thinking={sending}
              modelLabel={model ? `Assistant · ${model}` : "Assistant"}
            />

            <div className="flex flex-col sm:flex-row sm:items-end gap-2">
              <textarea
                ref={inputRef}
                rows={1}
                value={question}
                onChange={(e) => setQuestion(e.target.value)}
                onKeyDown={(e) => {
                  // Enter to send (Shift+Enter for newline)
                  if (e.key === "Enter" && !e.shiftKey) {
                    e.preventDefault();
                    void ask();
                  }
                }}
                placeholder="Ask about your documents… (Ctrl+/ to focus)"
                className="flex-1 min-w-0 resize-none rounded-xl border px-3 py-2 text-sm"
                aria-label="Ask a question about the ingested documents"
              />
              <button
                onClick={() => void ask()}
                disabled={sending || !question.trim()}
                className="w-full sm:w-auto rounded-xl px-4 py-2 bg-blue-600 text-white hover:bg-blue-700 disabled:bg-gray-200 disabled:text-gray-600 disabled:cursor-not-allowed"
              >
                {sending ? "Thinking..." : "Send"}
              </button>
            </div>
            <div className="text-right text-xs text-gray-500">
              {question.length} char{question.length !== 1 ? "s" : ""}
            </div>
          </section>
        </div>
      </div>
    </main>
  );
}
