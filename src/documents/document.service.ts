import mammoth from "mammoth";
import pdfParse from "pdf-parse";
import type { Logger } from "../config/logger";
import { ExtractionError } from "../shared/errors";

export type DocumentType = "pdf" | "docx" | "unknown";

const DOCX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  detectDocumentType(fileName?: string, mimeType?: string): DocumentType {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }
    if (normalizedMime.includes(DOCX_MIME_TYPE) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }
    return "unknown";
  }

  async extractText(buffer: Buffer, fileName?: string, mimeType?: string): Promise<string> {
    const type = this.detectDocumentType(fileName, mimeType);
    if (type === "unknown") {
      throw new ExtractionError("Unsupported document type. Please upload PDF or DOCX.");
    }

    let text: string;
    try {
      text = type === "pdf" ? await readPdf(buffer) : await readDocx(buffer);
    } catch (error) {
      const reason = error instanceof Error ? error.message : "Unknown error";
      throw new ExtractionError(`${type.toUpperCase()} extraction failed: ${reason}`);
    }
    const compactText = text.replace(/\u0000/g, "").replace(/\s+/g, " ").trim();

    this.logger.info("document.text.extracted", {
      mimeType,
      fileName,
      documentType: type,
      chars: compactText.length,
    });

    if (!compactText) {
      throw new ExtractionError("Could not extract text from document.");
    }
    return compactText;
  }
}

async function readPdf(buffer: Buffer): Promise<string> {
  const result = await pdfParse(buffer);
  return result.text;
}

async function readDocx(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}
