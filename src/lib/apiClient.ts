// src/lib/apiClient.ts
// Browser-side wrappers for the JSON endpoints.
import type {
  ApiReply,
  ChatPayload,
  ClearPayload,
  DocumentsPayload,
  HealthPayload,
  IngestPayload,
  ModesPayload,
  RemovePayload,
  UploadPayload,
} from "@/lib/types";

async function request<T>(url: string, init?: RequestInit): Promise<ApiReply<T>> {
  const res = await fetch(url, init);
  return (await res.json()) as ApiReply<T>;
}

function postJson<T>(url: string, body: unknown): Promise<ApiReply<T>> {
  return request<T>(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

export const api = {
  documents: () => request<DocumentsPayload>("/api/documents"),
  modes: () => request<ModesPayload>("/api/modes"),
  health: () => request<HealthPayload>("/api/health"),

  upload(files: Iterable<File>) {
    const form = new FormData();
    for (const f of files) form.append("file", f);
    return request<UploadPayload>("/api/upload", { method: "POST", body: form });
  },

  remove: (name: string) => postJson<RemovePayload>("/api/remove", { name }),
  ingest: () => request<IngestPayload>("/api/ingest", { method: "POST" }),

  chat: (args: { apiKey: string; query: string; mode: string }) =>
    postJson<ChatPayload>("/api/chat", {
      api_key: args.apiKey,
      query: args.query,
      mode: args.mode,
    }),

  clear: () => request<ClearPayload>("/api/clear", { method: "POST" }),
};
