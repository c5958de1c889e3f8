// src/lib/pdfHeuristic.ts
import { truncateChars } from "@/lib/text";

// Last-resort text recovery for PDFs the parser cannot read. Works on the raw
// bytes: text-showing operators first, then printable runs in content streams,
// then the whole file.

const MIN_USEFUL_CHARS = 50;
const MIN_STRUCTURED_CHARS = 80;

export function pdfFallbackNotice(filename: string, reason = ""): string {
  const note = reason ? ` (${reason})` : "";
  return (
    `[PDF: "${filename}" — text extraction was limited${note}. ` +
    `For best results, convert to .txt or .md before uploading.]`
  );
}

function textOperatorStrings(raw: string): string[] {
  const parts: string[] = [];

  for (const block of raw.matchAll(/BT([\s\S]*?)ET/g)) {
    const body = block[1];

    // literal strings: (Hello World)
    for (const m of body.matchAll(/\(([^)]{1,300})\)/g)) {
      const cleaned = m[1]
        .replaceAll("\\n", " ")
        .replaceAll("\\r", " ")
        .replaceAll("\\t", " ")
        .trim();
      if (cleaned.length > 2) parts.push(cleaned);
    }

    // hex strings: <48656c6c6f>
    for (const m of body.matchAll(/<([0-9a-fA-F]+)>/g)) {
      const hex = m[1];
      if (hex.length % 2 !== 0) continue;
      const printable = Buffer.from(hex, "hex")
        .toString("latin1")
        .replace(/[^\x20-\x7E]/g, "");
      if (printable.length > 2) parts.push(printable);
    }
  }

  return parts;
}

function streamRuns(raw: string): string[] {
  const parts: string[] = [];
  for (const stream of raw.matchAll(/stream\r?\n([\s\S]*?)\r?\nendstream/g)) {
    for (const run of stream[1].match(/[\x20-\x7E]{5,}/g) ?? []) {
      if (/[a-zA-Z]{3,}/.test(run)) parts.push(run);
    }
  }
  return parts;
}

function wholeFileRuns(raw: string): string[] {
  return (raw.match(/[\x20-\x7E]{6,}/g) ?? []).filter(
    (run) => /[a-zA-Z]{4,}/.test(run) && !/^[<>[\]()\\\/]{3,}/.test(run)
  );
}

export function extractTextHeuristic(
  data: Uint8Array,
  filename: string,
  maxChars: number = 40_000
): string {
  try {
    // latin1 keeps every byte value as one char
    const raw = Buffer.from(data).toString("latin1");

    let text = [...textOperatorStrings(raw), ...streamRuns(raw)].join(" ");
    if (text.trim().length < MIN_STRUCTURED_CHARS) {
      text = wholeFileRuns(raw).join(" ");
    }

    text = text.replace(/\s{3,}/g, " ").trim();
    if (text.length < MIN_USEFUL_CHARS) return pdfFallbackNotice(filename);

    return truncateChars(text, maxChars);
  } catch (err) {
    return pdfFallbackNotice(
      filename,
      err instanceof Error ? err.message : String(err)
    );
  }
}
