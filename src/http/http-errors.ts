import type { Request, Response } from "express";
import type { Logger } from "../config/logger";
import { InterviewError, errorMessage, type InterviewErrorCode } from "../shared/errors";

const STATUS_BY_CODE: Record<InterviewErrorCode, number> = {
  session_not_active: 409,
  session_busy: 409,
  session_not_found: 404,
  unknown_role: 400,
  extraction_failed: 422,
  phase_already_completed: 409,
  invalid_transition: 409,
  generation_oracle_failed: 502,
};

export function statusForError(error: unknown): number {
  return error instanceof InterviewError ? STATUS_BY_CODE[error.code] : 500;
}

export function sendError(response: Response, logger: Logger, route: string, error: unknown): void {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error("http.request.failed", { route, status, error: errorMessage(error) });
  } else {
    logger.info("http.request.rejected", { route, status, error: errorMessage(error) });
  }

  const body: Record<string, unknown> = { ok: false, error: errorMessage(error) };
  if (error instanceof InterviewError) {
    body.code = error.code;
  }
  response.status(status).json(body);
}

export function sendBadRequest(response: Response, message: string): void {
  response.status(400).json({ ok: false, error: message });
}

type AsyncHandler = (request: Request, response: Response) => Promise<void> | void;

/** Express 4 does not catch rejected handlers; route failures through the typed mapping. */
export function handle(logger: Logger, route: string, handler: AsyncHandler) {
  return async (request: Request, response: Response): Promise<void> => {
    try {
      await handler(request, response);
    } catch (error) {
      sendError(response, logger, route, error);
    }
  };
}
