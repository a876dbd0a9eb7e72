import type { ResumeExperience, ResumeProject, ResumeRecord } from "./resume.types";

export type SessionState = "not_started" | "in_progress" | "role_based" | "completed";

export type PlannedQuestionType = "introduction" | "hobbies" | "project" | "experience" | "skills";

interface PlannedQuestionBase {
  readonly id: number;
  readonly text: string;
  readonly expectedDuration: string;
  readonly keyPoints: ReadonlyArray<string>;
}

export interface IntroductionQuestion extends PlannedQuestionBase {
  readonly type: "introduction";
  readonly candidateName: string;
}

export interface HobbiesQuestion extends PlannedQuestionBase {
  readonly type: "hobbies";
}

export interface ProjectQuestion extends PlannedQuestionBase {
  readonly type: "project";
  readonly project: ResumeProject;
}

export interface ExperienceQuestion extends PlannedQuestionBase {
  readonly type: "experience";
  readonly experience: ResumeExperience;
}

export interface SkillsQuestion extends PlannedQuestionBase {
  readonly type: "skills";
}

export type PlannedQuestion =
  | IntroductionQuestion
  | HobbiesQuestion
  | ProjectQuestion
  | ExperienceQuestion
  | SkillsQuestion;

export interface AnalysisResult {
  readonly needsFollowup: boolean;
  readonly feedback: string;
  readonly reason: string;
  readonly missingPoints: ReadonlyArray<string>;
}

export interface AnswerRecord {
  readonly questionText: string;
  readonly answerText: string;
  readonly timestamp: string;
}

export interface TechnicalAnswer {
  readonly question: string;
  readonly answer: string;
  readonly ordinal: number;
}

export interface QuestionStats {
  totalQuestions: number;
  questionsAsked: number;
  questionsAnswered: number;
  questionsSkipped: number;
  resumeQuestions: number;
  roleQuestions: number;
}

export interface SessionInfo {
  readonly totalPlannedQuestions: number;
  readonly currentQuestionOrdinal: number;
  readonly state: SessionState;
  readonly role: string | null;
  readonly stats: Readonly<QuestionStats>;
}

export interface InitializeResult {
  readonly status: "success";
  readonly question: string;
  readonly sessionInfo: SessionInfo;
}

export interface NextQuestionResult {
  readonly status: "success";
  readonly question: string;
  readonly isFollowup: boolean;
  readonly positiveResponse: string;
  readonly analysis: string;
  readonly sessionInfo: SessionInfo;
}

export interface CompletionResult {
  readonly status: "completed";
  readonly message: string;
  readonly sessionInfo: SessionInfo;
}

export type ProcessAnswerResult = NextQuestionResult | CompletionResult;

export interface ConversationSummary {
  readonly totalQuestionsAsked: number;
  readonly plannedQuestions: ReadonlyArray<PlannedQuestion>;
  readonly planSummary: PlanSummary;
  readonly conversationHistory: ReadonlyArray<AnswerRecord>;
  readonly technicalAnswers: ReadonlyArray<TechnicalAnswer>;
  readonly state: SessionState;
  readonly role: string | null;
  readonly resume: ResumeRecord | null;
}

export interface PlanSummary {
  readonly totalQuestions: number;
  readonly questionTypes: Readonly<Partial<Record<PlannedQuestionType, number>>>;
}
