import fetch from "node-fetch";
import type { Logger } from "../config/logger";
import { INTERVIEWER_SYSTEM_PROMPT } from "./system/interviewer.system";

export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens: number;
  response_format?: { type: "json_object" };
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export interface LlmCallOptions {
  promptName?: string;
}

export interface LlmClientOptions {
  apiKey: string;
  logger: Logger;
  model?: string;
  baseUrl?: string;
}

export class LlmClient {
  private readonly apiKey: string;
  private readonly logger: Logger;
  private readonly chatModel: string;
  private readonly baseUrl: string;

  constructor(options: LlmClientOptions) {
    if (!options.apiKey.trim()) {
      throw new Error("LLM API key is empty.");
    }
    this.apiKey = options.apiKey;
    this.logger = options.logger;
    this.chatModel = options.model || DEFAULT_CHAT_MODEL;
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  getModelName(): string {
    return this.chatModel;
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    return this.complete(this.buildJsonRequestBody(prompt, maxTokens), prompt, maxTokens, {
      promptName: options?.promptName ?? "structured_json",
    });
  }

  async generateAssistantReply(
    prompt: string,
    maxTokens = 180,
    options?: LlmCallOptions,
  ): Promise<string> {
    const content = await this.complete(
      this.buildRequestBody(prompt, maxTokens, 0.7),
      prompt,
      maxTokens,
      { promptName: options?.promptName ?? "assistant_reply" },
    );
    return content.trim();
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    return {
      ...this.buildRequestBody(prompt, maxTokens, 0.2),
      response_format: { type: "json_object" },
    };
  }

  private buildRequestBody(
    prompt: string,
    maxTokens: number,
    temperature: number,
  ): ChatCompletionsRequestBody {
    return {
      model: this.chatModel,
      temperature,
      max_tokens: maxTokens,
      messages: [
        {
          role: "system",
          content: INTERVIEWER_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
  }

  private async complete(
    requestBody: ChatCompletionsRequestBody,
    prompt: string,
    maxTokens: number,
    options: Required<LlmCallOptions>,
  ): Promise<string> {
    const startedAt = Date.now();
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`LLM API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = body.choices?.[0]?.message?.content;
      if (!content) {
        throw new Error("LLM response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        promptName: options.promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName: options.promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}
