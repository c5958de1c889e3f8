// src/lib/conversationStore.ts
import type { ChatTurn } from "@/lib/types";

export const SESSION_COOKIE = "kbchat_session";
export const DEFAULT_SESSION = "default";

export function sessionIdFromCookie(header: string | null): string {
  for (const part of (header ?? "").split(";")) {
    const trimmed = part.trim();
    if (trimmed.startsWith(`${SESSION_COOKIE}=`)) {
      return trimmed.slice(SESSION_COOKIE.length + 1) || DEFAULT_SESSION;
    }
  }
  return DEFAULT_SESSION;
}

export class ConversationStore {
  private sessions = new Map<string, ChatTurn[]>();

  history(session: string): ChatTurn[] {
    return (this.sessions.get(session) ?? []).slice();
  }

  /** Appends a copy of `turn` and returns the stored entry. */
  push(session: string, turn: ChatTurn): ChatTurn {
    const stored = { ...turn };
    const turns = this.sessions.get(session) ?? [];
    turns.push(stored);
    this.sessions.set(session, turns);
    return stored;
  }

  // other requests on the same session may have pushed since
  rollback(session: string, turn: ChatTurn): void {
    const turns = this.sessions.get(session);
    const index = turns?.lastIndexOf(turn) ?? -1;
    if (turns && index !== -1) turns.splice(index, 1);
  }

  trim(session: string, maxTurns: number): number {
    const turns = this.sessions.get(session) ?? [];
    const kept = turns.slice(-maxTurns);
    this.sessions.set(session, kept);
    return kept.length;
  }

  reset(session: string): void {
    this.sessions.set(session, []);
  }

  clear(): void {
    this.sessions.clear();
  }
}

declare global {
  var __knowledgeDeskConversations: ConversationStore | undefined;
}

export const conversations = (globalThis.__knowledgeDeskConversations ??=
  new ConversationStore());
