// src/app/api/clear/route.ts
import { conversations, sessionIdFromCookie } from "@/lib/conversationStore";
import { ok } from "@/lib/http";

export async function POST(req: Request) {
  conversations.reset(sessionIdFromCookie(req.headers.get("cookie")));
  return ok({ message: "Conversation cleared" });
}
