import { describe, expect, it } from "vitest";
import { extractTextHeuristic, pdfFallbackNotice } from "./pdfHeuristic";

const bytes = (s: string) => Buffer.from(s, "latin1");

const STRUCTURED =
  "%PDF-1.4\n1 0 obj\n<< /Length 44 >>\nstream\n" +
  "BT /F1 12 Tf 72 712 Td (Quarterly revenue grew by twelve percent) Tj ET\n" +
  "endstream";

const OPERATORS =
  "%PDF-1.4\nBT " +
  "(Line\\nbreak in the opening paragraph) Tj " +
  "(Payment\\tis due within thirty days of invoice) Tj " +
  "<48656c6c6f20576f726c6421> Tj " +
  "<4142434> Tj " +
  "<0102414243> Tj ET\n%%EOF";

const UNSTRUCTURED =
  "%PDF-1.4\n[[[(((Annual review\n" +
  "Employee handbook covering onboarding procedures and benefits\n%%EOF";

describe("pdfFallbackNotice", () => {
  it("names the file", () => {
    expect(pdfFallbackNotice("scan.pdf")).toBe(
      '[PDF: "scan.pdf" — text extraction was limited. For best results, convert to .txt or .md before uploading.]'
    );
  });

  it("includes the reason when given", () => {
    expect(pdfFallbackNotice("scan.pdf", "bad xref")).toContain(
      "text extraction was limited (bad xref)."
    );
  });
});

describe("extractTextHeuristic", () => {
  it("joins text operators with printable stream runs", () => {
    expect(extractTextHeuristic(bytes(STRUCTURED), "q3.pdf")).toBe(
      "Quarterly revenue grew by twelve percent " +
        "BT /F1 12 Tf 72 712 Td (Quarterly revenue grew by twelve percent) Tj ET"
    );
  });

  it("decodes literal and hex strings inside text blocks", () => {
    // odd-length hex is skipped; control bytes are dropped from the rest
    expect(extractTextHeuristic(bytes(OPERATORS), "invoice.pdf")).toBe(
      "Line break in the opening paragraph " +
        "Payment is due within thirty days of invoice " +
        "Hello World! ABC"
    );
  });

  it("falls back to printable runs across the whole file", () => {
    expect(extractTextHeuristic(bytes(UNSTRUCTURED), "handbook.pdf")).toBe(
      "Employee handbook covering onboarding procedures and benefits"
    );
  });

  it("cuts the text to the character limit", () => {
    expect(extractTextHeuristic(bytes(UNSTRUCTURED), "handbook.pdf", 8)).toBe(
      "Employee"
    );
  });

  it("returns the notice when nothing readable is found", () => {
    const data = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x00, 0xff, 0x10, 0x80]);

    expect(extractTextHeuristic(data, "image-only.pdf")).toBe(
      pdfFallbackNotice("image-only.pdf")
    );
  });
});
