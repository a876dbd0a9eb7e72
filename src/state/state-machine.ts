import { InvalidTransitionError } from "../shared/errors";
import type { SessionState } from "../shared/types/interview.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: SessionState, to: SessionState): void {
  if (!isAllowedTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
