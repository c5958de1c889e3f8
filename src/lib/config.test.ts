import { afterEach, describe, expect, it, vi } from "vitest";
import { config, getMode, isModeKey, isSupportedExtension, listModes } from "./config";

describe("modes", () => {
  it("lists every mode with its label and chips only", () => {
    const modes = listModes();

    expect(Object.keys(modes)).toEqual(["general", "legal", "finance", "risk"]);
    expect(modes.legal.label).toBe("⚖️ Legal");
    expect(modes.legal.chips).toHaveLength(6);
    expect(modes.legal).not.toHaveProperty("instruction");
  });

  it("falls back to the default mode for unknown keys", () => {
    expect(config.defaultMode).toBe("general");
    expect(getMode("astrology")).toEqual(getMode("general"));
    expect(getMode("risk").instruction).toContain("MODE: Risk Intelligence Scanner.");
  });

  it("recognises defined mode keys", () => {
    expect(isModeKey("finance")).toBe(true);
    expect(isModeKey("toString")).toBe(false);
    expect(isModeKey("")).toBe(false);
  });
});

describe("isSupportedExtension", () => {
  it("accepts the document formats and nothing else", () => {
    for (const ext of [".pdf", ".txt", ".md", ".csv", ".json"]) {
      expect(isSupportedExtension(ext)).toBe(true);
    }
    expect(isSupportedExtension(".docx")).toBe(false);
    expect(isSupportedExtension("")).toBe(false);
  });
});

describe("environment overrides", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it("reads numeric and string settings from the environment", async () => {
    vi.stubEnv("LLM_MAX_TOKENS", "512");
    vi.stubEnv("LLM_TEMPERATURE", "0");
    vi.stubEnv("LLM_MODEL", "test/model");
    vi.resetModules();

    const { config: fresh } = await import("./config");

    expect(fresh.maxTokens).toBe(512);
    expect(fresh.temperature).toBe(0);
    expect(fresh.model).toBe("test/model");
  });

  it("ignores values that are not usable numbers", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("HISTORY_LIMIT", "lots");
    vi.stubEnv("MAX_DOC_CHARS", "-5");
    vi.resetModules();

    const { config: fresh } = await import("./config");

    expect(fresh.historyLimit).toBe(10);
    expect(fresh.maxDocChars).toBe(40_000);
    expect(warn).toHaveBeenCalledWith("[config] Ignoring HISTORY_LIMIT=lots, using 10");
  });
});
