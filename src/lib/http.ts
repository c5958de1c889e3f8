// src/lib/http.ts
import { NextResponse } from "next/server";

export type JsonObject = Record<string, unknown>;

export function ok<T extends JsonObject>(payload?: T) {
  return NextResponse.json({ ok: true, ...payload });
}

export function fail(message: string, status = 400) {
  return NextResponse.json({ ok: false, error: message }, { status });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON object body. Returns either the parsed object or the error
 * reply to send back.
 */
export async function readJsonObject(
  req: Request
): Promise<{ body: JsonObject } | { error: NextResponse }> {
  const raw = await req.text();
  if (!raw) return { error: fail("Empty request body") };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { error: fail(`Invalid JSON: ${errorMessage(err)}`) };
  }
  if (!isJsonObject(parsed)) {
    return { error: fail("Invalid JSON: expected an object") };
  }
  return { body: parsed };
}

export function stringField(body: JsonObject, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value.trim() : "";
}
