// src/lib/llmClient.ts
import OpenAI from "openai";
import { config, getMode } from "@/lib/config";
import type { ChatTurn } from "@/lib/types";

export type ChatErrorKind =
  | "auth"
  | "rate_limit"
  | "quota"
  | "api"
  | "network"
  | "timeout"
  | "empty";

/** An upstream failure whose message is meant for the user. */
export class ChatError extends Error {
  readonly kind: ChatErrorKind;
  readonly status?: number;

  constructor(kind: ChatErrorKind, message: string, status?: number) {
    super(message);
    this.name = "ChatError";
    this.kind = kind;
    this.status = status;
  }
}

export type ChatRequest = {
  apiKey: string;
  messages: ChatTurn[];
  mode: string;
  knowledgeBase: string;
};

export type ChatOptions = {
  fetch?: typeof fetch;
};

const RULE = "═".repeat(43);

export function buildSystemPrompt(knowledgeBase: string, mode: string): string {
  const { instruction } = getMode(mode);

  const kbSection = knowledgeBase.trim()
    ? `\n\n${RULE}\nKNOWLEDGE BASE (ingested documents)\n${RULE}\n` +
      knowledgeBase
    : "\n\n[No documents ingested. Advise the user to upload and " +
      "ingest documents. You can still answer general questions " +
      "from your training knowledge.]";

  return (
    `You are ${config.siteName}, an enterprise knowledge and contract intelligence assistant.\n` +
    "You analyze corporate documents, contracts, HR policies, and financial " +
    "filings with precision and structured clarity.\n\n" +
    "RESPONSE GUIDELINES:\n" +
    "- Be precise, professional, and well-structured.\n" +
    "- Use clear headings (##) when organizing multi-part answers.\n" +
    "- Quote specific clauses or document text verbatim when relevant.\n" +
    "- Use these inline markers for important items:\n" +
    "    ✅  Compliant / positive finding\n" +
    "    ⚠️  Warning / needs attention\n" +
    "    ❌  Risk / non-compliant item\n" +
    "- Always reference the document name when citing information.\n" +
    "- For risk mode, use 🔴 HIGH / 🟡 MEDIUM / 🟢 LOW risk tags.\n" +
    instruction +
    kbSection
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

// OpenAI-compatible providers nest details as { error: { message } }
function nestedErrorMessage(body: unknown): string | undefined {
  if (isRecord(body) && isRecord(body.error)) {
    const { message } = body.error;
    if (typeof message === "string" && message) return message;
  }
  return undefined;
}

function toChatError(err: unknown): unknown {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new ChatError(
      "timeout",
      "Request timed out. The model may be busy — try again."
    );
  }
  if (err instanceof OpenAI.APIConnectionError) {
    const reason = err.cause instanceof Error ? err.cause.message : err.message;
    return new ChatError(
      "network",
      `Network error — check your connection: ${reason}`
    );
  }
  if (err instanceof OpenAI.APIError) {
    switch (err.status) {
      case 401:
        return new ChatError(
          "auth",
          "Invalid API key — check your API key.",
          401
        );
      case 429:
        return new ChatError(
          "rate_limit",
          "Rate limit reached. Wait a moment and retry.",
          429
        );
      case 402:
        return new ChatError(
          "quota",
          "Provider quota exhausted. Add credits with your provider.",
          402
        );
      default: {
        const detail = nestedErrorMessage({ error: err.error }) ?? err.message;
        return new ChatError("api", `API error ${err.status}: ${detail}`, err.status);
      }
    }
  }
  return err;
}

/**
 * Sends one chat-completion request: the system prompt (mode + knowledge
 * base) followed by the most recent `historyLimit` pairs of turns.
 */
export async function chat(
  { apiKey, messages, mode, knowledgeBase }: ChatRequest,
  options: ChatOptions = {}
): Promise<string> {
  const client = new OpenAI({
    apiKey,
    baseURL: config.apiBaseUrl,
    maxRetries: 0,
    timeout: config.requestTimeoutMs,
    defaultHeaders: {
      "HTTP-Referer": config.siteUrl,
      "X-Title": config.siteName,
    },
    fetch: options.fetch,
  });

  const history = messages.slice(-(config.historyLimit * 2));

  const completion = await client.chat.completions
    .create({
      model: config.model,
      max_tokens: config.maxTokens,
      temperature: config.temperature,
      messages: [
        { role: "system", content: buildSystemPrompt(knowledgeBase, mode) },
        ...history,
      ],
    })
    .catch((err: unknown) => {
      throw toChatError(err);
    });

  // some providers answer 200 with an error body and no choices
  const choices = Array.isArray(completion.choices) ? completion.choices : [];
  if (choices.length === 0) {
    throw new ChatError(
      "empty",
      nestedErrorMessage(completion) ?? "Empty response from model."
    );
  }

  const text = (choices[0]?.message?.content ?? "").trim();
  if (!text) {
    throw new ChatError("empty", "Model returned an empty reply — please retry.");
  }
  return text;
}
