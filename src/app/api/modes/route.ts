// src/app/api/modes/route.ts
import { listModes } from "@/lib/config";
import { ok } from "@/lib/http";

export async function GET() {
  return ok({ modes: listModes() });
}
