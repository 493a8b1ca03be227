import type { ChatMessage, ChatUsage, LLMProvider } from '../lib/llm-provider.js';

export interface AskOptions {
  maxTokens: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Conversation state for one streaming run.
 *
 * The log is append-only: a user turn and its assistant reply are appended
 * together after a successful exchange, so a failed call leaves no orphan
 * user message behind. Owned by a single run; never shared.
 */
export class ChatSession {
  readonly system: string;
  readonly model: string;
  private readonly log: ChatMessage[] = [];
  private readonly usage: ChatUsage = { input_tokens: 0, output_tokens: 0 };

  private constructor(system: string, model: string) {
    this.system = system;
    this.model = model;
  }

  static create(system: string, model: string): ChatSession {
    return new ChatSession(system, model);
  }

  get turns(): readonly ChatMessage[] {
    return this.log;
  }

  get totalUsage(): Readonly<ChatUsage> {
    return this.usage;
  }

  async ask(provider: LLMProvider, userMessage: string, options: AskOptions): Promise<string> {
    const userTurn: ChatMessage = { role: 'user', content: userMessage };
    const response = await provider.chat({
      model: this.model,
      system: this.system,
      messages: [...this.log, userTurn],
      max_tokens: options.maxTokens,
      timeout_ms: options.timeoutMs,
      signal: options.signal,
    });

    this.log.push(userTurn, { role: 'assistant', content: response.text });
    this.usage.input_tokens += response.usage.input_tokens;
    this.usage.output_tokens += response.usage.output_tokens;
    return response.text;
  }
}
