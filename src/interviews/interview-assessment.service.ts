import type { Logger } from "../config/logger";
import { callJsonPromptSafe, type JsonLlmClient } from "../ai/llm.safe";
import { buildInterviewAssessmentV1Prompt } from "../ai/prompts/interview/interview-assessment.v1.prompt";
import { GenerationOracleError, errorMessage } from "../shared/errors";
import type { ConversationSummary } from "../shared/types/interview.types";

export type AssessmentRecommendation = "hire" | "consider" | "not_recommended";

export interface InterviewAssessment {
  readonly overallScore: number;
  readonly strengths: ReadonlyArray<string>;
  readonly areasForImprovement: ReadonlyArray<string>;
  readonly technicalCompetency: number;
  readonly communicationSkills: number;
  readonly problemSolving: number;
  readonly enthusiasm: number;
  readonly detailedFeedback: string;
  readonly recommendation: AssessmentRecommendation;
  readonly keyTakeaways: ReadonlyArray<string>;
}

const DEFAULT_SCORE = 7;

export const FALLBACK_ASSESSMENT: InterviewAssessment = {
  overallScore: DEFAULT_SCORE,
  strengths: ["Participated in complete interview"],
  areasForImprovement: ["Assessment could not be generated"],
  technicalCompetency: DEFAULT_SCORE,
  communicationSkills: DEFAULT_SCORE,
  problemSolving: DEFAULT_SCORE,
  enthusiasm: DEFAULT_SCORE,
  detailedFeedback: "Interview completed successfully.",
  recommendation: "consider",
  keyTakeaways: ["Complete interview session"],
};

const ASSESSMENT_SCHEMA_HINT =
  '{"overall_score": number, "strengths": string[], "areas_for_improvement": string[], "technical_competency": number, "communication_skills": number, "problem_solving": number, "enthusiasm": number, "detailed_feedback": string, "recommendation": "hire"|"consider"|"not_recommended", "key_takeaways": string[]}';

export class InterviewAssessmentService {
  constructor(
    private readonly llmClient: JsonLlmClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async assess(summary: ConversationSummary): Promise<InterviewAssessment> {
    try {
      return await this.requestAssessment(summary);
    } catch (error) {
      this.logger.warn("interview.assessment.fallback", { error: errorMessage(error) });
      return FALLBACK_ASSESSMENT;
    }
  }

  private async requestAssessment(summary: ConversationSummary): Promise<InterviewAssessment> {
    const result = await callJsonPromptSafe({
      llmClient: this.llmClient,
      prompt: buildInterviewAssessmentV1Prompt(summary),
      maxTokens: 900,
      promptName: "interview_assessment_v1",
      schemaHint: ASSESSMENT_SCHEMA_HINT,
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) {
      throw new GenerationOracleError("assess_interview", result.error_code);
    }
    return normalizeAssessment(result.data);
  }
}

export function normalizeAssessment(raw: Record<string, unknown>): InterviewAssessment {
  return {
    overallScore: normalizeScore(raw.overall_score),
    strengths: toStringList(raw.strengths),
    areasForImprovement: toStringList(raw.areas_for_improvement),
    technicalCompetency: normalizeScore(raw.technical_competency),
    communicationSkills: normalizeScore(raw.communication_skills),
    problemSolving: normalizeScore(raw.problem_solving),
    enthusiasm: normalizeScore(raw.enthusiasm),
    detailedFeedback: typeof raw.detailed_feedback === "string" ? raw.detailed_feedback.trim() : "",
    recommendation: normalizeRecommendation(raw.recommendation),
    keyTakeaways: toStringList(raw.key_takeaways),
  };
}

function normalizeScore(value: unknown): number {
  const numeric = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    return DEFAULT_SCORE;
  }
  return Math.min(10, Math.max(1, Math.round(numeric)));
}

function normalizeRecommendation(value: unknown): AssessmentRecommendation {
  const normalized = typeof value === "string" ? value.trim().toLowerCase().replace(/[\s-]+/g, "_") : "";
  if (normalized === "hire" || normalized === "consider" || normalized === "not_recommended") {
    return normalized;
  }
  return "consider";
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter(Boolean);
}
