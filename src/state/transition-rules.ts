import type { SessionState } from "../shared/types/interview.types";

// Every state may return to not_started through reset.
const transitionRules: Record<SessionState, SessionState[]> = {
  not_started: ["in_progress", "not_started"],
  in_progress: ["role_based", "completed", "not_started"],
  role_based: ["completed", "not_started"],
  completed: ["not_started"],
};

export function isAllowedTransition(from: SessionState, to: SessionState): boolean {
  return transitionRules[from].includes(to);
}
