// src/lib/documentStore.ts
import { encode } from "gpt-tokenizer";
import { config, isSupportedExtension } from "@/lib/config";
import { extractPdfText } from "@/lib/pdf";
import { truncateChars } from "@/lib/text";
import type { DocumentSummary } from "@/lib/types";

export type StoredDocument = {
  name: string;
  ext: string;
  size: number; // bytes
  content: string;
  ingested: boolean;
};

export type StoreResult = { ok: boolean; message: string };

type PdfExtractor = (
  data: Buffer,
  filename: string,
  maxChars: number
) => Promise<string>;

type DocumentStoreOptions = {
  extractPdf?: PdfExtractor;
  maxDocChars?: number;
};

const RULE = "━".repeat(50);
const PREVIEW_CHARS = 120;

export function sizeLabel(size: number): string {
  if (size < 1024) return `${size} B`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`;
  return `${(size / (1024 * 1024)).toFixed(1)} MB`;
}

export function fileExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : `.${name.slice(dot + 1).toLowerCase()}`;
}

export function toSummary(doc: StoredDocument): DocumentSummary {
  const preview = truncateChars(doc.content, PREVIEW_CHARS);
  return {
    name: doc.name,
    ext: doc.ext,
    size: doc.size,
    size_label: sizeLabel(doc.size),
    ingested: doc.ingested,
    preview: preview.length < doc.content.length ? preview + "…" : preview,
  };
}

/**
 * Flat in-memory store of uploaded documents, keyed by filename, plus the
 * knowledge base compiled from them on ingest.
 *
 * Uploading a new document marks the store as not ingested but keeps the
 * previous knowledge base until the next ingest. Removing a document drops it.
 */
export class DocumentStore {
  private docs: StoredDocument[] = [];
  private kb = "";
  private ingested = false;
  private tokens = 0;

  private readonly extractPdf: PdfExtractor;
  private readonly maxDocChars: number | undefined;

  constructor(options: DocumentStoreOptions = {}) {
    this.extractPdf = options.extractPdf ?? extractPdfText;
    this.maxDocChars = options.maxDocChars;
  }

  private get charLimit(): number {
    return this.maxDocChars ?? config.maxDocChars;
  }

  async add(name: string, data: Buffer): Promise<StoreResult> {
    const ext = fileExtension(name);

    if (!isSupportedExtension(ext)) {
      return { ok: false, message: `Unsupported file type: ${ext}` };
    }
    if (this.docs.some((d) => d.name === name)) {
      return { ok: false, message: `Already uploaded: ${name}` };
    }

    const content =
      ext === ".pdf"
        ? await this.extractPdf(data, name, this.charLimit)
        : truncateChars(data.toString("utf8"), this.charLimit);

    this.docs.push({ name, ext, size: data.length, content, ingested: false });
    this.ingested = false; // new upload needs a re-ingest

    return { ok: true, message: `Added: ${name}` };
  }

  remove(name: string): StoreResult {
    const before = this.docs.length;
    this.docs = this.docs.filter((d) => d.name !== name);
    if (this.docs.length === before) {
      return { ok: false, message: `Not found: ${name}` };
    }
    this.ingested = false;
    this.kb = "";
    this.tokens = 0;
    return { ok: true, message: `Removed: ${name}` };
  }

  ingest(): StoreResult {
    if (this.docs.length === 0) {
      return { ok: false, message: "No documents to ingest" };
    }

    const parts = this.docs.map((doc) => {
      const header = [
        RULE,
        `DOCUMENT : ${doc.name}`,
        `FORMAT   : ${doc.ext.toUpperCase()}   SIZE: ${sizeLabel(doc.size)}`,
        RULE,
        "",
      ].join("\n");
      return header + doc.content + "\n";
    });

    this.kb = parts.join("\n");
    this.tokens = encode(this.kb).length;
    this.ingested = true;
    for (const doc of this.docs) doc.ingested = true;

    const count = this.docs.length;
    return {
      ok: true,
      message: `${count} document${count !== 1 ? "s" : ""} ingested`,
    };
  }

  clear(): void {
    this.docs = [];
    this.kb = "";
    this.ingested = false;
    this.tokens = 0;
  }

  get knowledgeBase(): string {
    return this.kb;
  }

  get isIngested(): boolean {
    return this.ingested;
  }

  get tokenCount(): number {
    return this.tokens;
  }

  get documents(): StoredDocument[] {
    return this.docs.map((d) => ({ ...d }));
  }

  toList(): DocumentSummary[] {
    return this.docs.map(toSummary);
  }
}

declare global {
  // survives dev-server module reloads
  var __knowledgeDeskDocuments: DocumentStore | undefined;
}

export const documentStore = (globalThis.__knowledgeDeskDocuments ??=
  new DocumentStore());
