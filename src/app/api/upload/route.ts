// src/app/api/upload/route.ts
import path from "path";
import { documentStore } from "@/lib/documentStore";
import { errorMessage, fail, ok } from "@/lib/http";
import type { UploadResult } from "@/lib/types";

export async function POST(req: Request) {
  const contentType = req.headers.get("content-type") ?? "";
  if (!contentType.includes("multipart/form-data")) {
    return fail("Expected multipart/form-data");
  }

  let formData: FormData;
  try {
    formData = await req.formData();
  } catch (err) {
    return fail(`Failed to parse upload: ${errorMessage(err)}`);
  }

  try {
    const results: UploadResult[] = [];

    for (const entry of formData.getAll("file")) {
      if (typeof entry === "string" || !entry.name) continue;

      const name = path.basename(entry.name);
      console.log(`[upload] ${name} (${entry.size} bytes)`);

      const buffer = Buffer.from(await entry.arrayBuffer());
      const result = await documentStore.add(name, buffer);
      if (!result.ok) console.warn(`[upload] ${result.message}`);

      results.push({ name, ok: result.ok, message: result.message });
    }

    if (results.length === 0) {
      return fail("No files received");
    }

    return ok({ results, documents: documentStore.toList() });
  } catch (err) {
    console.error("[upload] Unexpected error:", err);
    return fail(`Unexpected error: ${errorMessage(err)}`, 500);
  }
}
