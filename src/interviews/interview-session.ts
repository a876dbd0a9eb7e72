import { logContext, type Logger, type LogLevel } from "../config/logger";
import { SessionNotActiveError, UnknownRoleError, errorMessage } from "../shared/errors";
import type {
  AnalysisResult,
  AnswerRecord,
  CompletionResult,
  ConversationSummary,
  InitializeResult,
  NextQuestionResult,
  PlannedQuestion,
  ProcessAnswerResult,
  QuestionStats,
  SessionInfo,
  SessionState,
} from "../shared/types/interview.types";
import type { ResumeRecord } from "../shared/types/resume.types";
import { getFallbackEncouragement } from "../shared/utils/encouragement.util";
import { defaultRandom, type RandomSource } from "../shared/utils/random";
import { assertTransition } from "../state/state-machine";
import {
  buildCompletionMessage,
  getFallbackFollowup,
  isSkipRequest,
  SKIP_ACKNOWLEDGEMENT,
  SKIPPED_ANSWER,
  TECHNICAL_ANSWER_ACKNOWLEDGEMENT,
  TECHNICAL_PHASE_INTRO,
} from "./interview-messages";
import { NO_FOLLOWUP, type InterviewOracle } from "./interview-oracle";
import type { QuestionBank } from "./question-bank";
import { planResumeQuestions, summarizePlan } from "./resume-question-planner";
import { DEFAULT_TECHNICAL_QUESTION_COUNT, TechnicalPhase } from "./technical-phase";

export interface InterviewSessionOptions {
  id: string;
  role?: string | null;
  oracle: InterviewOracle;
  questionBank: QuestionBank;
  logger: Logger;
  random?: RandomSource;
  clock?: () => Date;
}

function emptyStats(): QuestionStats {
  return {
    totalQuestions: 0,
    questionsAsked: 0,
    questionsAnswered: 0,
    questionsSkipped: 0,
    resumeQuestions: 0,
    roleQuestions: 0,
  };
}

/**
 * One candidate's interview. Serves the résumé plan question by question, inserts at
 * most one generated follow-up per answer, then walks the technical phase when a role
 * was chosen. Oracle failures never stop the interview.
 */
export class InterviewSession {
  readonly id: string;
  readonly role: string | null;

  private readonly oracle: InterviewOracle;
  private readonly questionBank: QuestionBank;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly clock: () => Date;

  private currentState: SessionState = "not_started";
  private lastEncouragement: string | undefined;
  private transcriptSaved = false;
  private resume: ResumeRecord | null = null;
  private plan: PlannedQuestion[] = [];
  private planCursor = 0;
  private history: AnswerRecord[] = [];
  private phase: TechnicalPhase | null = null;
  private stats: QuestionStats = emptyStats();
  private startedAtValue: string | null = null;

  constructor(options: InterviewSessionOptions) {
    const role = options.role?.trim() || null;
    if (role !== null && !options.questionBank.has(role)) {
      throw new UnknownRoleError(role, options.questionBank.roles());
    }
    this.id = options.id;
    this.role = role;
    this.oracle = options.oracle;
    this.questionBank = options.questionBank;
    this.logger = options.logger;
    this.random = options.random ?? defaultRandom;
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): SessionState {
    return this.currentState;
  }

  get startedAt(): string | null {
    return this.startedAtValue;
  }

  /** Flags the transcript as saved; false when it already was since the last reset. */
  claimTranscriptSave(): boolean {
    if (this.transcriptSaved) {
      return false;
    }
    this.transcriptSaved = true;
    return true;
  }

  isActive(): boolean {
    return this.currentState === "in_progress" || this.currentState === "role_based";
  }

  initialize(resume: ResumeRecord): InitializeResult {
    this.transitionTo("in_progress");
    this.resume = resume;
    this.plan = planResumeQuestions(resume);
    this.planCursor = 0;
    this.history = [];
    this.phase = null;
    this.startedAtValue = this.clock().toISOString();

    const roleQuestions = this.role ? DEFAULT_TECHNICAL_QUESTION_COUNT : 0;
    this.stats = {
      ...emptyStats(),
      totalQuestions: this.plan.length + roleQuestions,
      resumeQuestions: this.plan.length,
      roleQuestions,
    };

    const first = this.plan[0];
    this.planCursor = 1;
    this.stats.questionsAsked = 1;

    this.log("info", "interview.session.initialized", "initialize", {
      plannedQuestions: this.plan.length,
      totalQuestions: this.stats.totalQuestions,
    });

    return {
      status: "success",
      question: first.text,
      sessionInfo: this.sessionInfo(),
    };
  }

  async processAnswer(answerText: string): Promise<ProcessAnswerResult> {
    if (!this.isActive()) {
      throw new SessionNotActiveError(this.currentState);
    }

    if (isSkipRequest(answerText)) {
      return this.handleSkip();
    }

    if (this.currentState === "role_based") {
      this.stats.questionsAnswered += 1;
      return this.handleTechnicalAnswer(answerText);
    }

    const question = this.currentPlannedQuestion();
    const receivedAt = this.clock().toISOString();

    // The session may be completed or reset while an oracle call is pending.
    const analysis = await this.analyze(question, answerText);
    this.assertStillActive();
    const positiveResponse = await this.encourage(question, answerText);
    this.assertStillActive();
    const followup = analysis.needsFollowup ? await this.followup(question, answerText, analysis) : null;
    this.assertStillActive();

    this.stats.questionsAnswered += 1;
    this.history.push({ questionText: question.text, answerText, timestamp: receivedAt });

    if (followup !== null) {
      this.stats.questionsAsked += 1;
      this.log("info", "interview.session.followup_asked", "followup", { questionId: question.id });
      return this.nextQuestionResult(followup, true, positiveResponse, analysis.feedback);
    }

    const next = this.advance();
    if (next === null) {
      return this.complete();
    }
    return this.nextQuestionResult(next, false, positiveResponse, analysis.feedback);
  }

  complete(): CompletionResult {
    if (this.currentState !== "completed") {
      this.transitionTo("completed");
      this.log("info", "interview.session.completed", "complete", { ...this.stats });
    }
    return {
      status: "completed",
      message: this.phase ? this.phase.completionMessage() : buildCompletionMessage(),
      sessionInfo: this.sessionInfo(),
    };
  }

  sessionInfo(): SessionInfo {
    const phaseProgress = this.phase?.progress();
    const currentQuestionOrdinal =
      this.currentState === "role_based" && phaseProgress
        ? this.plan.length + phaseProgress.currentOrdinal
        : this.planCursor;
    return {
      totalPlannedQuestions: this.plan.length + (phaseProgress?.total ?? 0),
      currentQuestionOrdinal,
      state: this.currentState,
      role: this.role,
      stats: { ...this.stats },
    };
  }

  conversationSummary(): ConversationSummary {
    return {
      totalQuestionsAsked: this.history.length,
      plannedQuestions: [...this.plan],
      planSummary: summarizePlan(this.plan),
      conversationHistory: [...this.history],
      technicalAnswers: this.phase ? this.phase.answers() : [],
      state: this.currentState,
      role: this.role,
      resume: this.resume,
    };
  }

  reset(): void {
    this.transitionTo("not_started");
    this.resume = null;
    this.plan = [];
    this.planCursor = 0;
    this.history = [];
    this.phase = null;
    this.stats = emptyStats();
    this.startedAtValue = null;
    this.lastEncouragement = undefined;
    this.transcriptSaved = false;
    this.log("info", "interview.session.reset", "reset");
  }

  private handleSkip(): ProcessAnswerResult {
    this.stats.questionsSkipped += 1;

    if (this.currentState === "role_based" && this.phase) {
      const hasMore = this.phase.submitAnswer(SKIPPED_ANSWER);
      const next = hasMore ? this.phase.current() : null;
      if (next === null) {
        return this.complete();
      }
      this.stats.questionsAsked += 1;
      return this.nextQuestionResult(next, false, SKIP_ACKNOWLEDGEMENT, "");
    }

    this.history.push({
      questionText: this.currentPlannedQuestion().text,
      answerText: SKIPPED_ANSWER,
      timestamp: this.clock().toISOString(),
    });
    const next = this.advance();
    if (next === null) {
      return this.complete();
    }
    return this.nextQuestionResult(next, false, SKIP_ACKNOWLEDGEMENT, "");
  }

  private handleTechnicalAnswer(answerText: string): ProcessAnswerResult {
    const phase = this.requirePhase();
    const hasMore = phase.submitAnswer(answerText);
    const next = hasMore ? phase.current() : null;
    if (next === null) {
      return this.complete();
    }
    this.stats.questionsAsked += 1;
    return this.nextQuestionResult(next, false, TECHNICAL_ANSWER_ACKNOWLEDGEMENT, "");
  }

  /** Moves to the next planned or technical question; null when nothing is left. */
  private advance(): string | null {
    if (this.planCursor < this.plan.length) {
      const question = this.plan[this.planCursor];
      this.planCursor += 1;
      this.stats.questionsAsked += 1;
      return question.text;
    }

    if (this.role && this.currentState === "in_progress") {
      this.transitionTo("role_based");
      const phase =
        this.phase ?? new TechnicalPhase(this.role, this.questionBank, DEFAULT_TECHNICAL_QUESTION_COUNT, this.random);
      this.phase = phase;
      this.log("info", "interview.session.technical_phase_started", "advance", {
        technicalQuestions: phase.total,
      });
      const first = phase.current();
      if (first !== null) {
        this.stats.questionsAsked += 1;
        return `${TECHNICAL_PHASE_INTRO}${first}`;
      }
    }

    if (this.currentState === "role_based" && this.phase) {
      const next = this.phase.current();
      if (next !== null) {
        this.stats.questionsAsked += 1;
        return next;
      }
      this.transitionTo("completed");
    }

    return null;
  }

  private async analyze(question: PlannedQuestion, answer: string): Promise<AnalysisResult> {
    try {
      return await this.oracle.analyzeAnswer(question, answer);
    } catch (error) {
      this.logFallback("analyze_answer", error);
      return NO_FOLLOWUP;
    }
  }

  private async followup(question: PlannedQuestion, answer: string, analysis: AnalysisResult): Promise<string> {
    try {
      const text = (await this.oracle.generateFollowup(question, answer, analysis)).trim();
      if (text) {
        return text;
      }
      this.logFallback("generate_followup", new Error("empty follow-up"));
    } catch (error) {
      this.logFallback("generate_followup", error);
    }
    return getFallbackFollowup(question.type);
  }

  private async encourage(question: PlannedQuestion, answer: string): Promise<string> {
    try {
      const text = (await this.oracle.generateEncouragement(question, answer)).trim();
      if (text) {
        this.lastEncouragement = text;
        return text;
      }
      this.logFallback("generate_encouragement", new Error("empty encouragement"));
    } catch (error) {
      this.logFallback("generate_encouragement", error);
    }
    const fallback = getFallbackEncouragement(this.random, this.lastEncouragement);
    this.lastEncouragement = fallback;
    return fallback;
  }

  private assertStillActive(): void {
    if (!this.isActive()) {
      throw new SessionNotActiveError(this.currentState);
    }
  }

  private nextQuestionResult(
    question: string,
    isFollowup: boolean,
    positiveResponse: string,
    analysis: string,
  ): NextQuestionResult {
    return {
      status: "success",
      question,
      isFollowup,
      positiveResponse,
      analysis,
      sessionInfo: this.sessionInfo(),
    };
  }

  private currentPlannedQuestion(): PlannedQuestion {
    return this.plan[Math.max(this.planCursor - 1, 0)];
  }

  private requirePhase(): TechnicalPhase {
    if (!this.phase) {
      throw new SessionNotActiveError(this.currentState);
    }
    return this.phase;
  }

  private transitionTo(next: SessionState): void {
    assertTransition(this.currentState, next);
    this.currentState = next;
  }

  private logFallback(operation: string, error: unknown): void {
    this.log("warn", "interview.oracle.fallback", operation, { error: errorMessage(error) });
  }

  private log(
    level: LogLevel,
    message: string,
    action: string,
    fields?: Record<string, unknown>,
  ): void {
    logContext(
      this.logger,
      level,
      message,
      { session_id: this.id, interview_state: this.currentState, role: this.role, action },
      fields,
    );
  }
}
