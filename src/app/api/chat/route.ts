// src/app/api/chat/route.ts
import { config, isModeKey } from "@/lib/config";
import { conversations, sessionIdFromCookie } from "@/lib/conversationStore";
import { documentStore } from "@/lib/documentStore";
import { errorMessage, fail, ok, readJsonObject, stringField } from "@/lib/http";
import { chat, ChatError } from "@/lib/llmClient";

export async function POST(req: Request) {
  const parsed = await readJsonObject(req);
  if ("error" in parsed) return parsed.error;
  const { body } = parsed;

  // a key configured on the server stands in when the client sends none
  const apiKey = stringField(body, "api_key") || config.apiKey;
  const query = stringField(body, "query");
  const requestedMode = stringField(body, "mode");

  if (!apiKey) return fail("Missing API key");
  if (!query) return fail("Missing query");

  const mode = isModeKey(requestedMode) ? requestedMode : config.defaultMode;
  const session = sessionIdFromCookie(req.headers.get("cookie"));

  const turn = conversations.push(session, { role: "user", content: query });

  try {
    const reply = await chat({
      apiKey,
      messages: conversations.history(session),
      mode,
      knowledgeBase: documentStore.knowledgeBase,
    });

    conversations.push(session, { role: "assistant", content: reply });
    const historyLength = conversations.trim(session, config.historyLimit * 2);

    return ok({ reply, mode, history_length: historyLength });
  } catch (err) {
    conversations.rollback(session, turn);

    if (err instanceof ChatError) {
      console.warn(`[chat] ${err.kind}: ${err.message}`);
      return fail(err.message);
    }
    console.error("[chat] Unexpected error:", err);
    return fail(`Unexpected error: ${errorMessage(err)}`, 500);
  }
}
