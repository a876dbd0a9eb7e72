import type { Logger } from "../config/logger";
import { callJsonPromptSafe, type JsonLlmClient } from "../ai/llm.safe";
import { buildResumeExtractionV1Prompt } from "../ai/prompts/resume/resume-extraction.v1.prompt";
import type { DocumentService } from "../documents/document.service";
import { ExtractionError } from "../shared/errors";
import type { ResumeRecord } from "../shared/types/resume.types";
import { normalizeResumeRecord } from "./resume-normalizer";

export const MAX_EXTRACTION_ATTEMPTS = 3;

const RESUME_SCHEMA_HINT =
  '{"name": string, "email": string, "phone": string, "education": [{"degree": string, "institution": string, "year": string}], "skills": string[], "experience": [{"title": string, "company": string, "duration": string, "description": string}], "projects": [{"title": string, "tech": string[], "description": string}]}';

export interface ResumeExtractor {
  extractResume(buffer: Buffer, fileName?: string, mimeType?: string): Promise<ResumeRecord>;
}

export class ResumeExtractionService implements ResumeExtractor {
  constructor(
    private readonly documentService: DocumentService,
    private readonly llmClient: JsonLlmClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async extractResume(buffer: Buffer, fileName?: string, mimeType?: string): Promise<ResumeRecord> {
    const text = await this.documentService.extractText(buffer, fileName, mimeType);
    return this.extractFromText(text);
  }

  async extractFromText(resumeText: string): Promise<ResumeRecord> {
    const text = resumeText.trim();
    if (!text) {
      throw new ExtractionError("Could not extract text from document.");
    }

    let lastFailure = "";
    let lastRaw: string | undefined;
    for (let attempt = 1; attempt <= MAX_EXTRACTION_ATTEMPTS; attempt += 1) {
      const result = await callJsonPromptSafe({
        llmClient: this.llmClient,
        prompt: buildResumeExtractionV1Prompt(text),
        maxTokens: 1600,
        promptName: "resume_extraction_v1",
        schemaHint: RESUME_SCHEMA_HINT,
        logger: this.logger,
        timeoutMs: this.timeoutMs,
      });
      if (result.ok) {
        const resume = normalizeResumeRecord(result.data);
        this.logger.info("resume.extraction.completed", {
          attempt,
          projects: resume.projects.length,
          experience: resume.experience.length,
          skills: resume.skills.length,
        });
        return resume;
      }
      lastFailure = result.error_code;
      lastRaw = result.raw ?? lastRaw;
      this.logger.warn("resume.extraction.attempt_failed", {
        attempt,
        errorCode: result.error_code,
      });
    }

    throw new ExtractionError(
      `Failed to extract resume after ${MAX_EXTRACTION_ATTEMPTS} attempts (${lastFailure}).`,
      lastRaw,
    );
  }
}
