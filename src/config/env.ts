import dotenv from "dotenv";
import type { LogLevel } from "./logger";

dotenv.config();

export type AnswerAnalysisMode = "llm" | "heuristic";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  llmApiKey: string;
  llmBaseUrl: string;
  llmChatModel: string;
  llmTimeoutMs: number;
  answerAnalysisMode: AnswerAnalysisMode;
  sessionTtlMinutes: number;
  interviewStorageDir?: string;
  questionSamplingSeed?: number;
  uploadMaxBytes: number;
}

type EnvSource = Record<string, string | undefined>;

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const llmTimeoutRaw = source.LLM_TIMEOUT_MS ?? "25000";
  const llmTimeoutMs = Number(llmTimeoutRaw);
  const sessionTtlRaw = source.SESSION_TTL_MINUTES ?? "120";
  const sessionTtlMinutes = Number(sessionTtlRaw);
  const uploadMaxBytesRaw = source.UPLOAD_MAX_BYTES ?? String(5 * 1024 * 1024);
  const uploadMaxBytes = Number(uploadMaxBytesRaw);
  const samplingSeedRaw = getOptionalTrimmed(source, "QUESTION_SAMPLING_SEED");
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());
  const answerAnalysisMode = parseAnalysisMode(
    (source.ANSWER_ANALYSIS_MODE ?? "llm").trim().toLowerCase(),
  );

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${llmTimeoutRaw}`);
  }
  if (!Number.isFinite(sessionTtlMinutes) || sessionTtlMinutes < 5) {
    throw new Error(`Invalid SESSION_TTL_MINUTES value: ${sessionTtlRaw}`);
  }
  if (!Number.isInteger(uploadMaxBytes) || uploadMaxBytes < 1024) {
    throw new Error(`Invalid UPLOAD_MAX_BYTES value: ${uploadMaxBytesRaw}`);
  }

  let questionSamplingSeed: number | undefined;
  if (samplingSeedRaw !== undefined) {
    questionSamplingSeed = Number(samplingSeedRaw);
    if (!Number.isInteger(questionSamplingSeed)) {
      throw new Error(`Invalid QUESTION_SAMPLING_SEED value: ${samplingSeedRaw}`);
    }
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    llmApiKey: getRequiredString(source, "LLM_API_KEY"),
    llmBaseUrl: (getOptionalTrimmed(source, "LLM_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    llmChatModel: getOptionalTrimmed(source, "LLM_CHAT_MODEL") ?? "gpt-4o-mini",
    llmTimeoutMs,
    answerAnalysisMode,
    sessionTtlMinutes,
    interviewStorageDir: getOptionalTrimmed(source, "INTERVIEW_STORAGE_DIR"),
    questionSamplingSeed,
    uploadMaxBytes,
  };
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}

function parseAnalysisMode(value: string): AnswerAnalysisMode {
  if (value === "llm" || value === "heuristic") {
    return value;
  }
  throw new Error(`Invalid ANSWER_ANALYSIS_MODE value: ${value}`);
}
