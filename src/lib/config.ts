// src/lib/config.ts
import modes from "./modes.json";

export type ModeKey = keyof typeof modes;

export type ModeDefinition = {
  label: string;
  instruction: string;
  chips: string[];
};

const MODES: Record<ModeKey, ModeDefinition> = modes;
const DEFAULT_MODE: ModeKey = "general";

function readNumber(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    console.warn(`[config] Ignoring ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(name: string, fallback: string): string {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
}

export const config = {
  // upstream chat-completions API (OpenAI-compatible)
  apiBaseUrl: readString("LLM_API_BASE_URL", "https://openrouter.ai/api/v1"),
  model: readString("LLM_MODEL", "nvidia/nemotron-nano-12b-v2-vl:free"),
  apiKey: readString("LLM_API_KEY", ""),
  maxTokens: Math.floor(readNumber("LLM_MAX_TOKENS", 2048, 1)),
  temperature: readNumber("LLM_TEMPERATURE", 0.3, 0),
  requestTimeoutMs: readNumber("LLM_TIMEOUT_MS", 60_000, 1),
  siteUrl: readString("SITE_URL", "http://localhost:8000"),
  siteName: readString("SITE_NAME", "Knowledge Desk"),

  // ingestion
  maxDocChars: Math.floor(readNumber("MAX_DOC_CHARS", 40_000, 1)),
  historyLimit: Math.floor(readNumber("HISTORY_LIMIT", 10, 1)), // message pairs
  supportedExtensions: [".pdf", ".txt", ".md", ".csv", ".json"] as const,

  defaultMode: DEFAULT_MODE,
};

export function isModeKey(key: string): key is ModeKey {
  return Object.hasOwn(MODES, key);
}

export function getMode(key: string): ModeDefinition {
  return isModeKey(key) ? MODES[key] : MODES[config.defaultMode];
}

export function listModes(): Record<string, { label: string; chips: string[] }> {
  const out: Record<string, { label: string; chips: string[] }> = {};
  for (const [key, mode] of Object.entries(MODES)) {
    out[key] = { label: mode.label, chips: [...mode.chips] };
  }
  return out;
}

export function isSupportedExtension(ext: string): boolean {
  return config.supportedExtensions.some((e) => e === ext);
}
