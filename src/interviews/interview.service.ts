import { randomUUID } from "node:crypto";
import type { Logger } from "../config/logger";
import { SessionBusyError, SessionNotFoundError, errorMessage } from "../shared/errors";
import type {
  CompletionResult,
  ConversationSummary,
  InitializeResult,
  ProcessAnswerResult,
  SessionInfo,
} from "../shared/types/interview.types";
import type { ResumeRecord } from "../shared/types/resume.types";
import type { RandomSource } from "../shared/utils/random";
import type { SessionStore } from "../state/session-store";
import type { TranscriptStore } from "../storage/interview-storage.service";
import type { InterviewAssessment } from "./interview-assessment.service";
import type { InterviewOracle } from "./interview-oracle";
import { InterviewSession } from "./interview-session";
import type { QuestionBank } from "./question-bank";

export interface InterviewAssessor {
  assess(summary: ConversationSummary): Promise<InterviewAssessment>;
}

export interface InterviewServiceDeps {
  questionBank: QuestionBank;
  oracle: InterviewOracle;
  assessor: InterviewAssessor;
  sessionStore: SessionStore;
  logger: Logger;
  transcriptStore?: TranscriptStore | null;
  random?: RandomSource;
  clock?: () => Date;
  createId?: () => string;
}

export interface StartInterviewResult extends InitializeResult {
  readonly sessionId: string;
}

export interface RoleDescriptor {
  readonly key: string;
  readonly displayName: string;
  readonly questionCount: number;
}

export class InterviewService {
  private readonly inFlight = new Set<string>();
  private readonly clock: () => Date;
  private readonly createId: () => string;

  constructor(private readonly deps: InterviewServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.createId = deps.createId ?? randomUUID;
  }

  listRoles(): RoleDescriptor[] {
    const bank = this.deps.questionBank;
    return bank.roles().map((key) => ({
      key,
      displayName: bank.displayName(key),
      questionCount: bank.questionCount(key),
    }));
  }

  start(resume: ResumeRecord, role?: string | null): StartInterviewResult {
    const session = new InterviewSession({
      id: this.createId(),
      role,
      oracle: this.deps.oracle,
      questionBank: this.deps.questionBank,
      logger: this.deps.logger,
      random: this.deps.random,
      clock: this.clock,
    });
    const result = session.initialize(resume);
    this.deps.sessionStore.set(session);
    return { sessionId: session.id, ...result };
  }

  async answer(sessionId: string, answerText: string): Promise<ProcessAnswerResult> {
    const session = this.require(sessionId);
    if (this.inFlight.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }

    this.inFlight.add(sessionId);
    try {
      const result = await session.processAnswer(answerText);
      if (result.status === "completed") {
        await this.persistTranscript(session);
      }
      return result;
    } finally {
      this.inFlight.delete(sessionId);
    }
  }

  info(sessionId: string): SessionInfo {
    return this.require(sessionId).sessionInfo();
  }

  async complete(sessionId: string): Promise<CompletionResult> {
    const session = this.requireIdle(sessionId);
    const result = session.complete();
    await this.persistTranscript(session);
    return result;
  }

  summary(sessionId: string): ConversationSummary {
    return this.require(sessionId).conversationSummary();
  }

  async assess(sessionId: string): Promise<InterviewAssessment> {
    const summary = this.require(sessionId).conversationSummary();
    return this.deps.assessor.assess(summary);
  }

  reset(sessionId: string): SessionInfo {
    const session = this.requireIdle(sessionId);
    session.reset();
    return session.sessionInfo();
  }

  delete(sessionId: string): void {
    this.requireIdle(sessionId);
    this.deps.sessionStore.delete(sessionId);
  }

  private require(sessionId: string): InterviewSession {
    const session = this.deps.sessionStore.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private requireIdle(sessionId: string): InterviewSession {
    const session = this.require(sessionId);
    if (this.inFlight.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    return session;
  }

  private async persistTranscript(session: InterviewSession): Promise<void> {
    const store = this.deps.transcriptStore;
    if (!store || !session.claimTranscriptSave()) {
      return;
    }

    const summary = session.conversationSummary();
    const completedAt = this.clock().toISOString();
    try {
      const filePath = await store.save({
        sessionId: session.id,
        role: session.role,
        startedAt: session.startedAt ?? completedAt,
        completedAt,
        resume: summary.resume,
        plan: summary.plannedQuestions,
        conversationHistory: summary.conversationHistory,
        technicalAnswers: summary.technicalAnswers,
        stats: { ...session.sessionInfo().stats },
      });
      this.deps.logger.info("interview.transcript.saved", { sessionId: session.id, filePath });
    } catch (error) {
      this.deps.logger.error("interview.transcript.save_failed", {
        sessionId: session.id,
        error: errorMessage(error),
      });
    }
  }
}
