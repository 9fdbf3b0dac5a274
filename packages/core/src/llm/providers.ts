import { requireSecret } from "../config/secrets.js";
import { LlmError, NotFoundError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import {
  coerceContent,
  extractReasoning,
  isRecord,
  jsonSnippet,
} from "./response.js";
import { fetchWithRetry } from "./retry.js";
import type { ChatMessage, ChatRequest, ChatResult } from "./types.js";

/**
 * AI provider abstraction over OpenAI-compatible and Anthropic chat APIs.
 * API keys come from env vars; ollama needs none.
 */

const log = createLogger("llm");

const ANTHROPIC_VERSION = "2023-06-01";
const ANTHROPIC_MAX_TOKENS = 4096;

export interface ProviderDefinition {
  kind: "openai" | "anthropic";
  baseUrl: string;
  apiKeyEnvVar?: string;
  /** Whether the API accepts `top_k`. */
  supportsTopK?: boolean;
}

export interface AIProvider {
  readonly name: string;
  readonly apiKeyEnvVar?: string;
  complete(request: ChatRequest): Promise<ChatResult>;
}

const PROVIDERS: Record<string, ProviderDefinition> = {
  openai: {
    kind: "openai",
    baseUrl: "https://api.openai.com/v1",
    apiKeyEnvVar: "OPENAI_API_KEY",
  },
  openrouter: {
    kind: "openai",
    baseUrl: "https://openrouter.ai/api/v1",
    apiKeyEnvVar: "OPENROUTER_API_KEY",
    supportsTopK: true,
  },
  groq: {
    kind: "openai",
    baseUrl: "https://api.groq.com/openai/v1",
    apiKeyEnvVar: "GROQ_API_KEY",
  },
  deepseek: {
    kind: "openai",
    baseUrl: "https://api.deepseek.com/v1",
    apiKeyEnvVar: "DEEPSEEK_API_KEY",
  },
  ollama: {
    kind: "openai",
    baseUrl: "http://localhost:11434/v1",
    supportsTopK: true,
  },
  anthropic: {
    kind: "anthropic",
    baseUrl: "https://api.anthropic.com/v1",
    apiKeyEnvVar: "ANTHROPIC_API_KEY",
    supportsTopK: true,
  },
};

export function listProviders(): string[] {
  return Object.keys(PROVIDERS).sort();
}

export function isKnownProvider(name: string): boolean {
  return Object.hasOwn(PROVIDERS, name);
}

export function getProvider(name: string): AIProvider {
  const definition = isKnownProvider(name) ? PROVIDERS[name] : undefined;
  if (!definition) {
    throw new NotFoundError(`Unknown provider: '${name}'`);
  }
  return definition.kind === "anthropic"
    ? createAnthropicProvider(name, definition)
    : createOpenAICompatibleProvider(name, definition);
}

/**
 * Fail early (ConfigError) when the provider's API key is not set.
 */
export function assertCredentials(provider: AIProvider): void {
  if (provider.apiKeyEnvVar) {
    requireSecret(provider.apiKeyEnvVar, `API key for provider '${provider.name}'`);
  }
}

function apiKeyFor(name: string, definition: ProviderDefinition): string | undefined {
  if (!definition.apiKeyEnvVar) return undefined;
  return requireSecret(definition.apiKeyEnvVar, `API key for provider '${name}'`);
}

function samplingFields(
  name: string,
  definition: ProviderDefinition,
  request: ChatRequest,
): Record<string, number> {
  const fields: Record<string, number> = {};
  if (request.temperature !== undefined) fields.temperature = request.temperature;
  if (request.topP !== undefined) fields.top_p = request.topP;
  if (request.topK !== undefined) {
    if (definition.supportsTopK) {
      fields.top_k = request.topK;
    } else {
      log.warn(`Provider '${name}' does not accept top_k; ignoring it`);
    }
  }
  return fields;
}

function post(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  request: ChatRequest,
): Promise<Response> {
  return fetchWithRetry(
    url,
    {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    },
    {
      ...(request.timeoutMs !== undefined && { timeoutMs: request.timeoutMs }),
      ...(request.maxRetries !== undefined && { maxRetries: request.maxRetries }),
      ...(request.signal && { signal: request.signal }),
    },
  );
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new LlmError(
      "LLM response is not valid JSON",
      { type: "invalid_response", raw_response_snippet: jsonSnippet(text) },
      err,
    );
  }
}

function missingContent(data: unknown): LlmError {
  return new LlmError("LLM response missing content", {
    type: "missing_content",
    raw_provider_response_snippet: jsonSnippet(data),
  });
}

function createOpenAICompatibleProvider(
  name: string,
  definition: ProviderDefinition,
): AIProvider {
  return {
    name,
    ...(definition.apiKeyEnvVar !== undefined && { apiKeyEnvVar: definition.apiKeyEnvVar }),
    async complete(request: ChatRequest): Promise<ChatResult> {
      const apiKey = apiKeyFor(name, definition);

      const body = {
        model: request.model,
        messages: request.messages.map((m: ChatMessage) => ({
          role: m.role,
          content: m.content,
        })),
        ...samplingFields(name, definition, request),
      };

      const response = await post(
        `${definition.baseUrl}/chat/completions`,
        apiKey ? { Authorization: `Bearer ${apiKey}` } : {},
        body,
        request,
      );
      const data = await readJson(response);

      const choices = isRecord(data) ? data.choices : undefined;
      const choice: unknown = Array.isArray(choices) ? choices[0] : undefined;
      const message = isRecord(choice) ? choice.message : undefined;
      const content = coerceContent(
        isRecord(message) ? message.content : undefined,
      );
      if (content === undefined) throw missingContent(data);

      const reasoning = extractReasoning(data);
      return { content, ...(reasoning !== undefined && { reasoning }) };
    },
  };
}

function createAnthropicProvider(
  name: string,
  definition: ProviderDefinition,
): AIProvider {
  return {
    name,
    ...(definition.apiKeyEnvVar !== undefined && { apiKeyEnvVar: definition.apiKeyEnvVar }),
    async complete(request: ChatRequest): Promise<ChatResult> {
      const apiKey = apiKeyFor(name, definition) ?? "";

      const systemMessages = request.messages.filter((m) => m.role === "system");
      const nonSystemMessages = request.messages.filter((m) => m.role !== "system");

      const body = {
        model: request.model,
        max_tokens: ANTHROPIC_MAX_TOKENS,
        ...(systemMessages.length > 0 && {
          system: systemMessages.map((m) => m.content).join("\n\n"),
        }),
        messages: nonSystemMessages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
        ...samplingFields(name, definition, request),
      };

      const response = await post(
        `${definition.baseUrl}/messages`,
        { "x-api-key": apiKey, "anthropic-version": ANTHROPIC_VERSION },
        body,
        request,
      );
      const data = await readJson(response);

      const blocks = isRecord(data) && Array.isArray(data.content)
        ? data.content.filter(isRecord)
        : [];
      const content = coerceContent(blocks.filter((b) => b.type === "text"));
      if (content === undefined) throw missingContent(data);

      const thinking = blocks
        .filter((b) => b.type === "thinking")
        .map((b) => b.thinking)
        .filter((t): t is string => typeof t === "string" && t.trim() !== "");
      const reasoning =
        thinking.length > 0 ? thinking.join("\n") : extractReasoning(data);
      return { content, ...(reasoning !== undefined && { reasoning }) };
    },
  };
}
