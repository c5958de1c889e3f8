import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/lib/llmClient", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@/lib/llmClient")>()),
  chat: vi.fn(),
}));

import { POST } from "./route";
import { conversations } from "@/lib/conversationStore";
import { documentStore } from "@/lib/documentStore";
import { chat, ChatError } from "@/lib/llmClient";

const chatMock = vi.mocked(chat);

function chatRequest(body: string, cookie?: string) {
  return new Request("http://localhost/api/chat", {
    method: "POST",
    headers: cookie
      ? { "content-type": "application/json", cookie }
      : { "content-type": "application/json" },
    body,
  });
}

const ask = (payload: Record<string, unknown>, cookie?: string) =>
  POST(chatRequest(JSON.stringify(payload), cookie));

describe("POST /api/chat", () => {
  beforeEach(() => {
    conversations.clear();
    documentStore.clear();
    chatMock.mockReset();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("answers and records both turns", async () => {
    chatMock.mockResolvedValueOnce("Twenty days of leave.");

    const res = await ask({
      api_key: "test-key",
      query: " How much leave do I get? ",
      mode: "legal",
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      reply: "Twenty days of leave.",
      mode: "legal",
      history_length: 2,
    });
    expect(chatMock).toHaveBeenCalledWith({
      apiKey: "test-key",
      messages: [{ role: "user", content: "How much leave do I get?" }],
      mode: "legal",
      knowledgeBase: "",
    });
    expect(conversations.history("default")).toEqual([
      { role: "user", content: "How much leave do I get?" },
      { role: "assistant", content: "Twenty days of leave." },
    ]);
  });

  it("falls back to the default mode", async () => {
    chatMock.mockResolvedValueOnce("ok");

    const res = await ask({ api_key: "test-key", query: "hi", mode: "astrology" });

    expect(await res.json()).toMatchObject({ mode: "general" });
  });

  it("sends earlier turns with the new question", async () => {
    chatMock.mockResolvedValueOnce("first answer").mockResolvedValueOnce("second answer");

    await ask({ api_key: "test-key", query: "first" });
    await ask({ api_key: "test-key", query: "second" });

    expect(chatMock).toHaveBeenLastCalledWith(
      expect.objectContaining({
        messages: [
          { role: "user", content: "first" },
          { role: "assistant", content: "first answer" },
          { role: "user", content: "second" },
        ],
      })
    );
  });

  it("keeps only the most recent turns", async () => {
    chatMock.mockResolvedValue("ok");

    let last: unknown;
    for (let i = 0; i < 11; i++) {
      last = await (await ask({ api_key: "test-key", query: `q${i}` })).json();
    }

    expect(last).toMatchObject({ history_length: 20 });
    expect(conversations.history("default")[0]).toEqual({ role: "user", content: "q1" });
  });

  it("keeps sessions apart by cookie", async () => {
    chatMock.mockResolvedValueOnce("ok");

    await ask({ api_key: "test-key", query: "hi" }, "kbchat_session=abc");

    expect(conversations.history("abc")).toHaveLength(2);
    expect(conversations.history("default")).toEqual([]);
  });

  it("requires a key and a query", async () => {
    const noKey = await ask({ query: "hi" });
    expect(noKey.status).toBe(400);
    expect(await noKey.json()).toEqual({ ok: false, error: "Missing API key" });

    const noQuery = await ask({ api_key: "test-key", query: "   " });
    expect(await noQuery.json()).toEqual({ ok: false, error: "Missing query" });

    expect(chatMock).not.toHaveBeenCalled();
  });

  it("rejects bodies that are not JSON objects", async () => {
    expect(await (await POST(chatRequest(""))).json()).toEqual({
      ok: false,
      error: "Empty request body",
    });
    expect(await (await POST(chatRequest("[]"))).json()).toEqual({
      ok: false,
      error: "Invalid JSON: expected an object",
    });

    const broken = await POST(chatRequest("{oops"));
    const body: { error: string } = await broken.json();
    expect(broken.status).toBe(400);
    expect(body.error.startsWith("Invalid JSON: ")).toBe(true);
  });

  it("returns upstream failures and drops the unanswered turn", async () => {
    chatMock.mockRejectedValueOnce(
      new ChatError("rate_limit", "Rate limit reached. Wait a moment and retry.", 429)
    );

    const res = await ask({ api_key: "test-key", query: "hi" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      error: "Rate limit reached. Wait a moment and retry.",
    });
    expect(conversations.history("default")).toEqual([]);
  });

  it("drops only its own turn when an overlapping request fails", async () => {
    const pending: { reject?: (err: unknown) => void } = {};
    const firstStarted = new Promise<void>((started) => {
      chatMock.mockImplementation(({ messages }) => {
        if (messages.at(-1)?.content === "first") {
          started();
          return new Promise<string>((_resolve, reject) => {
            pending.reject = reject;
          });
        }
        return Promise.resolve("answer to second");
      });
    });

    const first = ask({ api_key: "test-key", query: "first" });
    await firstStarted;
    const second = await ask({ api_key: "test-key", query: "second" });
    pending.reject?.(
      new ChatError("timeout", "Request timed out. The model may be busy — try again.")
    );
    const failed = await first;

    expect(second.status).toBe(200);
    expect(failed.status).toBe(400);
    expect(conversations.history("default")).toEqual([
      { role: "user", content: "second" },
      { role: "assistant", content: "answer to second" },
    ]);
  });

  it("reports unexpected failures as server errors", async () => {
    chatMock.mockRejectedValueOnce(new Error("boom"));

    const res = await ask({ api_key: "test-key", query: "hi" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, error: "Unexpected error: boom" });
    expect(conversations.history("default")).toEqual([]);
  });
});
