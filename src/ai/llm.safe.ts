import type { Logger } from "../config/logger";
import { isRecord } from "../shared/utils/is-record";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

export interface JsonLlmClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: { promptName?: string }): Promise<string>;
  getModelName?(): string;
}

export interface TextLlmClient {
  generateAssistantReply(prompt: string, maxTokens?: number, options?: { promptName?: string }): Promise<string>;
  getModelName?(): string;
}

export interface JsonSafeCallArgs {
  llmClient: JsonLlmClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  logger?: Logger;
  timeoutMs?: number;
}

export interface TextSafeCallArgs {
  llmClient: TextLlmClient;
  prompt: string;
  maxTokens?: number;
  promptName: string;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeCallErrorCode =
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "empty_output";

export type SafeJsonResult =
  | {
      ok: true;
      data: Record<string, unknown>;
    }
  | {
      ok: false;
      error_code: SafeCallErrorCode;
      raw?: string;
    };

export type SafeTextResult =
  | { ok: true; text: string }
  | { ok: false; error_code: "timeout" | "transient_failure" | "llm_failure" | "empty_output" };

const DEFAULT_TIMEOUT_MS = 25_000;

export async function callJsonPromptSafe(args: JsonSafeCallArgs): Promise<SafeJsonResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const initial = await attemptWithRetry(
    args.logger,
    args.promptName,
    args.llmClient.getModelName?.(),
    () => withTimeout(args.llmClient.generateStructuredJson(args.prompt, args.maxTokens, { promptName: args.promptName }), timeoutMs),
  );
  if (!initial.ok) {
    return initial;
  }

  const parsed = tryParseJsonObject(initial.value);
  if (parsed.ok) {
    return { ok: true, data: parsed.data };
  }

  const repairPromptName = `${args.promptName}_json_repair`;
  const repairPrompt = buildJsonRepairV1Prompt({
    schemaHint: args.schemaHint,
    raw: initial.value,
  });
  const repairMaxTokens = Math.max(240, Math.min(2400, args.maxTokens));
  const repaired = await attemptWithRetry(
    args.logger,
    repairPromptName,
    args.llmClient.getModelName?.(),
    () =>
      withTimeout(
        args.llmClient.generateStructuredJson(repairPrompt, repairMaxTokens, { promptName: repairPromptName }),
        timeoutMs,
      ),
  );
  if (!repaired.ok) {
    return repaired;
  }
  const repairedParsed = tryParseJsonObject(repaired.value);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.value };
  }
  return { ok: true, data: repairedParsed.data };
}

export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const result = await attemptWithRetry(args.logger, args.promptName, args.llmClient.getModelName?.(), () =>
    withTimeout(
      args.llmClient.generateAssistantReply(args.prompt, args.maxTokens ?? 180, {
        promptName: args.promptName,
      }),
      timeoutMs,
    ),
  );
  if (!result.ok) {
    return result;
  }
  const text = stripWrappingQuotes(result.value.trim());
  if (!text) {
    return { ok: false, error_code: "empty_output" };
  }
  return { ok: true, text };
}

async function attemptWithRetry(
  logger: Logger | undefined,
  promptName: string,
  modelName: string | undefined,
  attempt: () => Promise<string>,
): Promise<{ ok: true; value: string } | { ok: false; error_code: "timeout" | "transient_failure" | "llm_failure" }> {
  try {
    return { ok: true, value: await attempt() };
  } catch (error) {
    if (!isTransientError(error)) {
      return { ok: false, error_code: isTimeoutError(error) ? "timeout" : "llm_failure" };
    }
  }

  logger?.warn("llm.safe.retry.once", { promptName, modelName });
  try {
    return { ok: true, value: await attempt() };
  } catch (error) {
    return {
      ok: false,
      error_code: isTimeoutError(error)
        ? "timeout"
        : isTransientError(error)
          ? "transient_failure"
          : "llm_failure",
    };
  }
}

export function tryParseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    if (!isRecord(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

function stripWrappingQuotes(text: string): string {
  return text.replace(/^["'“”]+/, "").replace(/["'“”]+$/, "").trim();
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
