import type { Logger } from "../config/logger";
import { callJsonPromptSafe, callTextPromptSafe, type JsonLlmClient, type TextLlmClient } from "../ai/llm.safe";
import { buildAnswerAnalysisV1Prompt } from "../ai/prompts/interview/answer-analysis.v1.prompt";
import { buildEncouragementV1Prompt } from "../ai/prompts/interview/encouragement.v1.prompt";
import { buildFollowupQuestionV1Prompt } from "../ai/prompts/interview/followup-question.v1.prompt";
import { GenerationOracleError } from "../shared/errors";
import type { AnalysisResult, PlannedQuestion } from "../shared/types/interview.types";
import { getFallbackEncouragement } from "../shared/utils/encouragement.util";
import { defaultRandom, type RandomSource } from "../shared/utils/random";
import { getFallbackFollowup } from "./interview-messages";

export interface AnswerAnalyzer {
  analyzeAnswer(question: PlannedQuestion, answer: string): Promise<AnalysisResult>;
}

/**
 * Language-generation collaborator of an interview session. Implementations may throw;
 * the session turns every failure into a fallback and keeps going.
 */
export interface InterviewOracle extends AnswerAnalyzer {
  generateFollowup(question: PlannedQuestion, answer: string, analysis: AnalysisResult): Promise<string>;
  generateEncouragement(question: PlannedQuestion, answer: string): Promise<string>;
}

export const NO_FOLLOWUP: AnalysisResult = {
  needsFollowup: false,
  feedback: "",
  reason: "",
  missingPoints: [],
};

const ANALYSIS_SCHEMA_HINT =
  '{"needs_followup": boolean, "reason": string, "missing_points": string[], "feedback": string}';

export interface LlmInterviewOracleOptions {
  llmClient: JsonLlmClient & TextLlmClient;
  logger: Logger;
  timeoutMs?: number;
  analyzer?: AnswerAnalyzer;
}

export class LlmInterviewOracle implements InterviewOracle {
  private readonly llmClient: JsonLlmClient & TextLlmClient;
  private readonly logger: Logger;
  private readonly timeoutMs?: number;
  private readonly analyzer?: AnswerAnalyzer;

  constructor(options: LlmInterviewOracleOptions) {
    this.llmClient = options.llmClient;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
    this.analyzer = options.analyzer;
  }

  async analyzeAnswer(question: PlannedQuestion, answer: string): Promise<AnalysisResult> {
    if (this.analyzer) {
      return this.analyzer.analyzeAnswer(question, answer);
    }

    const result = await callJsonPromptSafe({
      llmClient: this.llmClient,
      prompt: buildAnswerAnalysisV1Prompt({ question, answer }),
      maxTokens: 400,
      promptName: "answer_analysis_v1",
      schemaHint: ANALYSIS_SCHEMA_HINT,
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) {
      throw new GenerationOracleError("analyze_answer", result.error_code);
    }

    const needsFollowup = result.data.needs_followup;
    if (typeof needsFollowup !== "boolean") {
      throw new GenerationOracleError("analyze_answer", "needs_followup is not a boolean");
    }
    return {
      needsFollowup,
      feedback: asTrimmedString(result.data.feedback),
      reason: asTrimmedString(result.data.reason),
      missingPoints: asStringList(result.data.missing_points),
    };
  }

  async generateFollowup(question: PlannedQuestion, answer: string, analysis: AnalysisResult): Promise<string> {
    const result = await callTextPromptSafe({
      llmClient: this.llmClient,
      prompt: buildFollowupQuestionV1Prompt({ question, answer, analysis }),
      maxTokens: 120,
      promptName: "followup_question_v1",
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) {
      throw new GenerationOracleError("generate_followup", result.error_code);
    }
    return result.text;
  }

  async generateEncouragement(question: PlannedQuestion, answer: string): Promise<string> {
    const result = await callTextPromptSafe({
      llmClient: this.llmClient,
      prompt: buildEncouragementV1Prompt({ question, answer }),
      maxTokens: 60,
      promptName: "encouragement_v1",
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) {
      throw new GenerationOracleError("generate_encouragement", result.error_code);
    }
    return result.text;
  }
}

/**
 * Offline oracle. Asks for a follow-up on longer experience answers and on detailed
 * project answers that talk about challenges; generation uses the fixed fallback lines.
 */
export class HeuristicAnswerAnalyzer implements InterviewOracle {
  constructor(private readonly random: RandomSource = defaultRandom) {}

  async analyzeAnswer(question: PlannedQuestion, answer: string): Promise<AnalysisResult> {
    const wordCount = countWords(answer);
    if (question.type === "project" && wordCount > 20 && answer.toLowerCase().includes("challenge")) {
      return {
        needsFollowup: true,
        feedback: "Great detail about the challenges you faced!",
        reason: "The answer mentions challenges worth exploring.",
        missingPoints: [],
      };
    }
    if (question.type === "experience" && wordCount > 15) {
      return {
        needsFollowup: true,
        feedback: "Interesting experience! I'd like to know more.",
        reason: "The experience deserves a concrete example.",
        missingPoints: [],
      };
    }
    return NO_FOLLOWUP;
  }

  async generateFollowup(question: PlannedQuestion): Promise<string> {
    return getFallbackFollowup(question.type);
  }

  async generateEncouragement(): Promise<string> {
    return getFallbackEncouragement(this.random);
  }
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

function asTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function asStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter(Boolean);
}
