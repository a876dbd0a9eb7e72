import { Router } from "express";
import type { Logger } from "../config/logger";
import type { InterviewService } from "../interviews/interview.service";
import { normalizeResumeRecord } from "../resumes/resume-normalizer";
import { isRecord } from "../shared/utils/is-record";
import { handle, sendBadRequest } from "./http-errors";

interface InterviewsControllerDeps {
  interviewService: InterviewService;
  logger: Logger;
}

export function buildInterviewsController(deps: InterviewsControllerDeps): Router {
  const router = Router();
  const { interviewService, logger } = deps;

  router.get(
    "/roles",
    handle(logger, "GET /roles", (_request, response) => {
      response.status(200).json({ roles: interviewService.listRoles() });
    }),
  );

  router.post(
    "/interviews",
    handle(logger, "POST /interviews", (request, response) => {
      const body: unknown = request.body;
      if (!isRecord(body) || !isRecord(body.resume)) {
        sendBadRequest(response, "Request body must contain a resume object.");
        return;
      }
      const role = body.role;
      if (role !== undefined && role !== null && typeof role !== "string") {
        sendBadRequest(response, "role must be a string.");
        return;
      }

      const result = interviewService.start(normalizeResumeRecord(body.resume), role);
      logger.info("interview.session.created", {
        sessionId: result.sessionId,
        role: result.sessionInfo.role,
      });
      response.status(201).json({
        sessionId: result.sessionId,
        question: result.question,
        sessionInfo: result.sessionInfo,
      });
    }),
  );

  router.post(
    "/interviews/:id/answers",
    handle(logger, "POST /interviews/:id/answers", async (request, response) => {
      const body: unknown = request.body;
      if (!isRecord(body) || typeof body.answer !== "string") {
        sendBadRequest(response, "Request body must contain an answer string.");
        return;
      }
      const result = await interviewService.answer(request.params.id, body.answer);
      response.status(200).json(result);
    }),
  );

  router.get(
    "/interviews/:id",
    handle(logger, "GET /interviews/:id", (request, response) => {
      response.status(200).json(interviewService.info(request.params.id));
    }),
  );

  router.post(
    "/interviews/:id/complete",
    handle(logger, "POST /interviews/:id/complete", async (request, response) => {
      response.status(200).json(await interviewService.complete(request.params.id));
    }),
  );

  router.get(
    "/interviews/:id/summary",
    handle(logger, "GET /interviews/:id/summary", (request, response) => {
      response.status(200).json(interviewService.summary(request.params.id));
    }),
  );

  router.post(
    "/interviews/:id/assessment",
    handle(logger, "POST /interviews/:id/assessment", async (request, response) => {
      response.status(200).json(await interviewService.assess(request.params.id));
    }),
  );

  router.post(
    "/interviews/:id/reset",
    handle(logger, "POST /interviews/:id/reset", (request, response) => {
      response.status(200).json({ sessionInfo: interviewService.reset(request.params.id) });
    }),
  );

  router.delete(
    "/interviews/:id",
    handle(logger, "DELETE /interviews/:id", (request, response) => {
      interviewService.delete(request.params.id);
      response.status(204).end();
    }),
  );

  return router;
}
