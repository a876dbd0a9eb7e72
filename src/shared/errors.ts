import type { SessionState } from "./types/interview.types";

export type InterviewErrorCode =
  | "session_not_active"
  | "session_not_found"
  | "session_busy"
  | "unknown_role"
  | "phase_already_completed"
  | "invalid_transition"
  | "generation_oracle_failed"
  | "extraction_failed";

export class InterviewError extends Error {
  constructor(
    readonly code: InterviewErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class SessionNotActiveError extends InterviewError {
  constructor(readonly state: SessionState) {
    super("session_not_active", `Interview session not active (state: ${state}).`);
  }
}

export class SessionNotFoundError extends InterviewError {
  constructor(readonly sessionId: string) {
    super("session_not_found", `Interview session not found: ${sessionId}`);
  }
}

export class SessionBusyError extends InterviewError {
  constructor(readonly sessionId: string) {
    super("session_busy", `Interview session ${sessionId} is already processing an answer.`);
  }
}

export class UnknownRoleError extends InterviewError {
  constructor(
    readonly role: string,
    readonly availableRoles: ReadonlyArray<string>,
  ) {
    super("unknown_role", `Role '${role}' not found. Available roles: ${availableRoles.join(", ")}`);
  }
}

export class PhaseAlreadyCompletedError extends InterviewError {
  constructor(readonly role: string) {
    super("phase_already_completed", `Technical phase for ${role} is already completed.`);
  }
}

export class InvalidTransitionError extends InterviewError {
  constructor(
    readonly from: SessionState,
    readonly to: SessionState,
  ) {
    super("invalid_transition", `Invalid transition from ${from} to ${to}`);
  }
}

export class GenerationOracleError extends InterviewError {
  constructor(
    readonly operation: "analyze_answer" | "generate_followup" | "generate_encouragement" | "assess_interview",
    readonly reason: string,
  ) {
    super("generation_oracle_failed", `Language generation failed during ${operation}: ${reason}`);
  }
}

export class ExtractionError extends InterviewError {
  constructor(
    message: string,
    readonly rawResponse?: string,
  ) {
    super("extraction_failed", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
