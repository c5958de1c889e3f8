// src/lib/types.ts
// Wire shapes shared by the API routes and the browser client.

export type DocumentSummary = {
  name: string;
  ext: string;
  size: number;
  size_label: string;
  ingested: boolean;
  preview: string;
};

export type ModeSummary = {
  label: string;
  chips: string[];
};

export type ChatRole = "user" | "assistant";

export type ChatTurn = {
  role: ChatRole;
  content: string;
};

export type UploadResult = {
  name: string;
  ok: boolean;
  message: string;
};

export type ApiFailure = { ok: false; error: string };

export type ApiReply<T> = ({ ok: true } & T) | ApiFailure;

export type DocumentsPayload = {
  documents: DocumentSummary[];
  ingested: boolean;
  count: number;
  tokens: number;
};

export type ModesPayload = { modes: Record<string, ModeSummary> };

export type HealthPayload = {
  model: string;
  status: "online";
  key_configured: boolean;
};

export type UploadPayload = {
  results: UploadResult[];
  documents: DocumentSummary[];
};

export type RemovePayload = { message: string; documents: DocumentSummary[] };

export type IngestPayload = { message: string; ingested: true; tokens: number };

export type ChatPayload = {
  reply: string;
  mode: string;
  history_length: number;
};

export type ClearPayload = { message: string };
