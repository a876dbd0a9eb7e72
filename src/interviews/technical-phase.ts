import { PhaseAlreadyCompletedError } from "../shared/errors";
import type { TechnicalAnswer } from "../shared/types/interview.types";
import { defaultRandom, type RandomSource } from "../shared/utils/random";
import { buildCompletionMessage } from "./interview-messages";
import type { QuestionBank } from "./question-bank";

export const DEFAULT_TECHNICAL_QUESTION_COUNT = 4;

export interface TechnicalPhaseProgress {
  readonly currentOrdinal: number;
  readonly total: number;
  readonly completed: boolean;
  readonly role: string;
  readonly roleDisplayName: string;
}

export class TechnicalPhase {
  private readonly questions: ReadonlyArray<string>;
  private readonly recorded: TechnicalAnswer[] = [];
  private cursor = 0;
  private completed = false;

  constructor(
    readonly role: string,
    private readonly questionBank: QuestionBank,
    questionCount = DEFAULT_TECHNICAL_QUESTION_COUNT,
    random: RandomSource = defaultRandom,
  ) {
    this.questions = questionBank.sample(role, questionCount, random);
  }

  get total(): number {
    return this.questions.length;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  current(): string | null {
    return this.cursor < this.questions.length ? this.questions[this.cursor] : null;
  }

  /** Records the answer for the current question and reports whether another one follows. */
  submitAnswer(answer: string): boolean {
    if (this.completed || this.cursor >= this.questions.length) {
      throw new PhaseAlreadyCompletedError(this.role);
    }
    this.recorded.push({
      question: this.questions[this.cursor],
      answer: answer.trim(),
      ordinal: this.cursor + 1,
    });
    this.cursor += 1;
    if (this.cursor >= this.questions.length) {
      this.completed = true;
      return false;
    }
    return true;
  }

  progress(): TechnicalPhaseProgress {
    return {
      currentOrdinal: Math.min(this.cursor + 1, this.questions.length),
      total: this.questions.length,
      completed: this.completed,
      role: this.role,
      roleDisplayName: this.questionBank.displayName(this.role),
    };
  }

  answers(): ReadonlyArray<TechnicalAnswer> {
    return [...this.recorded];
  }

  completionMessage(): string {
    return buildCompletionMessage(
      `- ${this.questions.length} technical questions for ${this.questionBank.displayName(this.role)}`,
    );
  }
}
