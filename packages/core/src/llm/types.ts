/**
 * Core types for the request layer.
 */

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface ChatRequest {
  provider: string;
  model: string;
  messages: ChatMessage[];
  /** Per-attempt timeout. */
  timeoutMs?: number;
  maxRetries?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
  signal?: AbortSignal;
}

export interface ChatResult {
  content: string;
  reasoning?: string;
}

/**
 * The request function used by the CLI and the batch dispatcher. Throws
 * LlmError (with structured errorInfo) when the backend fails.
 */
export type ChatFn = (request: ChatRequest) => Promise<ChatResult>;
