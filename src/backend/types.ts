export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface RequestOptions {
  /** Per-call timeout, default 120s */
  timeoutMs?: number;
}

export interface AskOptions extends RequestOptions {
  systemPrompt?: string;
}

/**
 * A chat-completion service devexplain can delegate explanations to.
 * One implementation today (GitHub Models); selection goes through BackendSelector.
 */
export interface AIBackend {
  /** Display name, including the model id */
  readonly name: string;
  readonly model: string;

  /** True when a credential can be resolved. Does not contact the service. */
  isAvailable(): Promise<boolean>;

  /** Send one user prompt, optionally preceded by a system prompt. */
  ask(prompt: string, options?: AskOptions): Promise<string>;

  /** Send an ordered conversation and return the assistant reply. */
  askMessages(messages: ChatMessage[], options?: RequestOptions): Promise<string>;
}

export const DEFAULT_TIMEOUT_MS = 120_000;
