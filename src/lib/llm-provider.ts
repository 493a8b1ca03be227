import Anthropic from '@anthropic-ai/sdk';
import type { AnthropicConfig } from './anthropic.js';
import { LLMHttpError } from './errors.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
  timeout_ms?: number;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResponse {
  text: string;
  usage: ChatUsage;
}

const DEFAULT_TIMEOUT_MS = 120_000;

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
    if (!timeoutController.signal.aborted) {
      timeoutController.abort();
    }
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  /** Chat model used when the run does not name one. */
  readonly defaultModel?: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel: string;
  private apiKey: string;
  private client: Anthropic | null = null;

  constructor(config: AnthropicConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.model;
  }

  // Created on first call.
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = this.getClient();
    const response = await anthropic.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages,
        ...(params.temperature !== undefined && { temperature: params.temperature }),
      },
      {
        signal: params.signal,
        timeout: params.timeout_ms ?? DEFAULT_TIMEOUT_MS,
        // Retries are owned by the chunk dispatcher.
        maxRetries: 0,
      },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text: text.trim(),
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

export interface OpenAIConfig {
  apiKey: string;
  baseUrl: string;
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const body = buildChatRequestBody(params);
    const { signal: combinedSignal, cleanup: cleanupCombinedSignal } = createCombinedAbortSignal(
      params.signal,
      params.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    );
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: combinedSignal,
      });

      if (!response.ok) {
        throw await toHttpError('OpenAI', response);
      }

      const data = await response.json() as OpenAIChatResponse;
      return parseChatResponse(data);
    } finally {
      cleanupCombinedSignal();
    }
  }
}

// ─── OpenAI wire helpers ─────────────────────────────────────────────

/**
 * Chat-completions request body; the system prompt becomes the first message.
 * Also used verbatim as the `body` of each batch request line.
 */
export function buildChatRequestBody(params: Omit<ChatParams, 'signal' | 'timeout_ms'>): OpenAIChatRequest {
  const body: OpenAIChatRequest = {
    model: params.model,
    max_tokens: params.max_tokens,
    messages: [
      { role: 'system', content: params.system },
      ...params.messages.map((m) => ({ role: m.role, content: m.content })),
    ],
  };
  if (params.temperature !== undefined) {
    body.temperature = params.temperature;
  }
  return body;
}

export function parseChatResponse(data: OpenAIChatResponse): ChatResponse {
  const text = data.choices?.[0]?.message?.content ?? '';
  return {
    text: text.trim(),
    usage: {
      input_tokens: data.usage?.prompt_tokens ?? 0,
      output_tokens: data.usage?.completion_tokens ?? 0,
    },
  };
}

/** Turn a non-2xx fetch response into an LLMHttpError, keeping its headers. */
export async function toHttpError(provider: string, response: Response): Promise<LLMHttpError> {
  const errText = await response.text().catch(() => '');
  let detail = errText;
  try {
    const parsed = JSON.parse(errText) as { error?: { message?: unknown } };
    if (typeof parsed.error?.message === 'string') detail = parsed.error.message;
  } catch {
    // body was not JSON; keep the raw text
  }
  return new LLMHttpError(provider, response.status, detail, response.headers);
}

// ─── OpenAI-compatible type definitions ──────────────────────────────

export interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OpenAIChatRequest {
  model: string;
  max_tokens: number;
  messages: OpenAIMessage[];
  temperature?: number;
}

export interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}
