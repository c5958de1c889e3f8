// src/app/api/documents/route.ts
import { documentStore } from "@/lib/documentStore";
import { ok } from "@/lib/http";

export async function GET() {
  return ok({
    documents: documentStore.toList(),
    ingested: documentStore.isIngested,
    count: documentStore.documents.length,
    tokens: documentStore.tokenCount,
  });
}
