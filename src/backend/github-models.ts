import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import { BackendError, BackendNotAvailableError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { TokenResolver } from "./token.js";
import {
  type AIBackend,
  type AskOptions,
  type ChatMessage,
  DEFAULT_TIMEOUT_MS,
  type RequestOptions,
} from "./types.js";

const log = createChildLogger("github-models");

export const GITHUB_MODELS_URL = "https://models.github.ai/inference/chat/completions";

/** Longest slice of a response body or transport error shown to the user */
export const DIAGNOSTIC_LIMIT = 300;

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    )
    .min(1),
});

export interface GitHubModelsOptions {
  model: string;
  tokens: TokenResolver;
  /** Injected in tests with an in-process adapter */
  http?: AxiosInstance;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Chat completions through the GitHub Models inference API.
 * One POST per call, no retry.
 */
export class GitHubModelsBackend implements AIBackend {
  readonly model: string;
  private readonly tokens: TokenResolver;
  private readonly http: AxiosInstance;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(opts: GitHubModelsOptions) {
    this.model = opts.model;
    this.tokens = opts.tokens;
    this.http = opts.http ?? axios.create();
    this.temperature = opts.temperature ?? 0.4;
    this.maxTokens = opts.maxTokens ?? 2048;
  }

  get name(): string {
    return `GitHub Models API (${this.model})`;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.tokens.resolve()) !== null;
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    const messages: ChatMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });
    return this.askMessages(messages, { timeoutMs: options.timeoutMs });
  }

  async askMessages(messages: ChatMessage[], options: RequestOptions = {}): Promise<string> {
    const token = await this.tokens.resolve();
    if (!token) {
      throw new BackendNotAvailableError("No GitHub token available");
    }

    const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    log.debug({ model: this.model, messages: messages.length, timeout }, "Sending chat completion");

    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.post<unknown>(
        GITHUB_MODELS_URL,
        {
          messages,
          model: this.model,
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        {
          headers: {
            Authorization: `Bearer ${token}`,
            "Content-Type": "application/json",
          },
          timeout,
          // Status is checked below so the body can go into the diagnostic
          validateStatus: () => true,
        },
      );
    } catch (err) {
      throw new BackendError(
        `GitHub Models API request failed: ${errorMessage(err).slice(0, DIAGNOSTIC_LIMIT)}`,
        err,
      );
    }

    if (res.status !== 200) {
      log.debug({ status: res.status }, "Chat completion rejected");
      throw new BackendError(
        `GitHub Models API HTTP ${res.status}: ${bodyText(res.data).slice(0, DIAGNOSTIC_LIMIT)}`,
      );
    }

    return parseCompletion(res.data);
  }
}

/** Extract the assistant text from a 200 response body. */
export function parseCompletion(data: unknown): string {
  if (isRecord(data) && "error" in data) {
    const apiError = data.error;
    const message =
      isRecord(apiError) && typeof apiError.message === "string"
        ? apiError.message
        : JSON.stringify(apiError);
    throw new BackendError(`GitHub Models API error: ${message}`);
  }

  const result = CompletionSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const reason = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unexpected body";
    throw new BackendError(`Failed to parse API response: ${reason}`, result.error);
  }

  return result.data.choices[0].message.content.trim();
}

function bodyText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
