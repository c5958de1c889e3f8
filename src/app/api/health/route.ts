// src/app/api/health/route.ts
import { config } from "@/lib/config";
import { ok } from "@/lib/http";

export async function GET() {
  return ok({
    model: config.model,
    status: "online",
    key_configured: Boolean(config.apiKey),
  });
}
