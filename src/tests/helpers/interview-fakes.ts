import type { Logger, LogLevel } from "../../config/logger";
import type { InterviewOracle } from "../../interviews/interview-oracle";
import { QuestionBank } from "../../interviews/question-bank";
import type { AnalysisResult, PlannedQuestion } from "../../shared/types/interview.types";
import type { ResumeRecord } from "../../shared/types/resume.types";

export const NO_FOLLOWUP_ANALYSIS: AnalysisResult = {
  needsFollowup: false,
  feedback: "",
  reason: "",
  missingPoints: [],
};

export function buildResume(overrides: Partial<ResumeRecord> = {}): ResumeRecord {
  return {
    name: "Asha",
    email: "asha@example.com",
    phone: "555-0101",
    education: [{ degree: "B.Tech", institution: "State University", year: "2024" }],
    skills: ["Python", "SQL"],
    experience: [],
    projects: [],
    ...overrides,
  };
}

export function buildProjects(count: number): ResumeRecord["projects"] {
  return Array.from({ length: count }, (_, index) => ({
    title: `Project Title ${index + 1}`,
    tech: ["TypeScript"],
    description: "A small project.",
  }));
}

export function buildTestBank(): QuestionBank {
  return new QuestionBank({
    qa: {
      displayName: "QA Engineer",
      questions: ["T1", "T2", "T3", "T4", "T5"],
    },
  });
}

// Returns 0 on every draw, so samples keep catalogue order.
export const firstPick = (): number => 0;

export interface OracleCall {
  operation: "analyze" | "followup" | "encouragement";
  questionType: PlannedQuestion["type"];
  answer: string;
}

export class FakeOracle implements InterviewOracle {
  readonly calls: OracleCall[] = [];
  analyze: (question: PlannedQuestion, answer: string) => AnalysisResult | Promise<AnalysisResult> = () =>
    NO_FOLLOWUP_ANALYSIS;
  followupText: string | Error = "Could you walk me through one concrete example?";
  encouragementText: string | Error = "Nice answer!";

  async analyzeAnswer(question: PlannedQuestion, answer: string): Promise<AnalysisResult> {
    this.calls.push({ operation: "analyze", questionType: question.type, answer });
    return this.analyze(question, answer);
  }

  async generateFollowup(question: PlannedQuestion, answer: string): Promise<string> {
    this.calls.push({ operation: "followup", questionType: question.type, answer });
    if (this.followupText instanceof Error) {
      throw this.followupText;
    }
    return this.followupText;
  }

  async generateEncouragement(question: PlannedQuestion, answer: string): Promise<string> {
    this.calls.push({ operation: "encouragement", questionType: question.type, answer });
    if (this.encouragementText instanceof Error) {
      throw this.encouragementText;
    }
    return this.encouragementText;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    entries.push({ level, message, meta });
  };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export interface FakeLlmCall {
  kind: "json" | "text";
  prompt: string;
  maxTokens?: number;
  promptName?: string;
}

/** Scripted LLM client: each call consumes the next reply; an Error reply is thrown. */
export class FakeLlmClient {
  readonly calls: FakeLlmCall[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  getModelName(): string {
    return "fake-model";
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: { promptName?: string },
  ): Promise<string> {
    this.calls.push({ kind: "json", prompt, maxTokens, promptName: options?.promptName });
    return this.next();
  }

  async generateAssistantReply(
    prompt: string,
    maxTokens?: number,
    options?: { promptName?: string },
  ): Promise<string> {
    this.calls.push({ kind: "text", prompt, maxTokens, promptName: options?.promptName });
    return this.next();
  }

  private next(): string {
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error("FakeLlmClient has no scripted reply");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
