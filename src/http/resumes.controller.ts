import { Router } from "express";
import type { Logger } from "../config/logger";
import type { ResumeExtractor } from "../resumes/resume-extraction.service";
import { handle, sendBadRequest } from "./http-errors";

interface ResumesControllerDeps {
  resumeExtractor: ResumeExtractor;
  logger: Logger;
}

export function buildResumesController(deps: ResumesControllerDeps): Router {
  const router = Router();

  router.post(
    "/resumes/extract",
    handle(deps.logger, "POST /resumes/extract", async (request, response) => {
      const body: unknown = request.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        sendBadRequest(response, "Request body must contain the resume document.");
        return;
      }

      const resume = await deps.resumeExtractor.extractResume(
        body,
        request.header("x-file-name"),
        request.header("content-type"),
      );
      response.status(200).json({ resume });
    }),
  );

  return router;
}
