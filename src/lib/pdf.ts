// src/lib/pdf.ts
import pdf from "pdf-parse/lib/pdf-parse.js";
import { extractTextHeuristic } from "@/lib/pdfHeuristic";
import { truncateChars } from "@/lib/text";

export async function extractPdfText(
  fileBuffer: Buffer,
  filename: string,
  maxChars: number
): Promise<string> {
  try {
    const data = await pdf(fileBuffer);
    const text = (data.text || "").trim();
    if (text) return truncateChars(text, maxChars);
    console.warn(`[pdf] No text layer in ${filename}, scanning raw bytes`);
  } catch (err) {
    console.warn(
      `[pdf] Parser failed for ${filename}, scanning raw bytes:`,
      err instanceof Error ? err.message : err
    );
  }
  return extractTextHeuristic(fileBuffer, filename, maxChars);
}
