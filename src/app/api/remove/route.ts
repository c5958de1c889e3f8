// src/app/api/remove/route.ts
import { documentStore } from "@/lib/documentStore";
import { fail, ok, readJsonObject, stringField } from "@/lib/http";

export async function POST(req: Request) {
  const parsed = await readJsonObject(req);
  if ("error" in parsed) return parsed.error;

  const name = stringField(parsed.body, "name");
  if (!name) {
    return fail("Missing 'name' field");
  }

  const { ok: removed, message } = documentStore.remove(name);
  if (!removed) return fail(message);

  console.log(`[remove] ${message}`);
  return ok({ message, documents: documentStore.toList() });
}
