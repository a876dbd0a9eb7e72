import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { EnvConfig } from "./config/env";
import { createLogger, type Logger } from "./config/logger";
import { LlmClient } from "./ai/llm.client";
import { DocumentService } from "./documents/document.service";
import { buildInterviewsController } from "./http/interviews.controller";
import { buildResumesController } from "./http/resumes.controller";
import { InterviewAssessmentService } from "./interviews/interview-assessment.service";
import { HeuristicAnswerAnalyzer, LlmInterviewOracle, type InterviewOracle } from "./interviews/interview-oracle";
import { InterviewService, type InterviewAssessor } from "./interviews/interview.service";
import { QuestionBank } from "./interviews/question-bank";
import { ResumeExtractionService, type ResumeExtractor } from "./resumes/resume-extraction.service";
import { errorMessage } from "./shared/errors";
import { isRecord } from "./shared/utils/is-record";
import { createSeededRandom, defaultRandom } from "./shared/utils/random";
import { SessionStore } from "./state/session-store";
import { InterviewStorageService } from "./storage/interview-storage.service";

export interface AppOverrides {
  logger?: Logger;
  oracle?: InterviewOracle;
  assessor?: InterviewAssessor;
  resumeExtractor?: ResumeExtractor;
  now?: () => number;
}

export interface CreatedApp {
  app: Express;
  logger: Logger;
  interviewService: InterviewService;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): CreatedApp {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const llmClient = new LlmClient({
    apiKey: env.llmApiKey,
    baseUrl: env.llmBaseUrl,
    model: env.llmChatModel,
    logger,
  });
  const random =
    env.questionSamplingSeed === undefined ? defaultRandom : createSeededRandom(env.questionSamplingSeed);

  const oracle =
    overrides.oracle ??
    new LlmInterviewOracle({
      llmClient,
      logger,
      timeoutMs: env.llmTimeoutMs,
      analyzer: env.answerAnalysisMode === "heuristic" ? new HeuristicAnswerAnalyzer(random) : undefined,
    });
  const assessor = overrides.assessor ?? new InterviewAssessmentService(llmClient, logger, env.llmTimeoutMs);
  const resumeExtractor =
    overrides.resumeExtractor ??
    new ResumeExtractionService(new DocumentService(logger), llmClient, logger, env.llmTimeoutMs);

  const interviewService = new InterviewService({
    questionBank: new QuestionBank(),
    oracle,
    assessor,
    sessionStore: new SessionStore(env.sessionTtlMinutes, overrides.now),
    transcriptStore: env.interviewStorageDir ? new InterviewStorageService(env.interviewStorageDir) : null,
    logger,
    random,
  });

  const app = express();
  app.use("/resumes/extract", express.raw({ type: () => true, limit: env.uploadMaxBytes }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(buildResumesController({ resumeExtractor, logger }));
  app.use(buildInterviewsController({ interviewService, logger }));

  app.use((request: Request, response: Response) => {
    response.status(404).json({ ok: false, error: `Route not found: ${request.method} ${request.path}` });
  });

  // Body parser failures (malformed JSON, oversized uploads) arrive here.
  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    const status = isRecord(error) && typeof error.status === "number" ? error.status : 500;
    logger.warn("http.request.unparsed", { route: request.path, status, error: errorMessage(error) });
    response.status(status).json({ ok: false, error: errorMessage(error) });
  });

  logger.info("app.configured", {
    chatModel: env.llmChatModel,
    answerAnalysisMode: env.answerAnalysisMode,
    sessionTtlMinutes: env.sessionTtlMinutes,
    transcriptsEnabled: Boolean(env.interviewStorageDir),
  });

  return { app, logger, interviewService };
}
