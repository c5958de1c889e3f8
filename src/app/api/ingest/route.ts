// src/app/api/ingest/route.ts
import { documentStore } from "@/lib/documentStore";
import { fail, ok } from "@/lib/http";

export async function POST() {
  const { ok: ingested, message } = documentStore.ingest();
  if (!ingested) return fail(message);

  console.log(`[ingest] ${message}, ~${documentStore.tokenCount} tokens`);
  return ok({ message, ingested: true, tokens: documentStore.tokenCount });
}
