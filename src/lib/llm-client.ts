import Anthropic from '@anthropic-ai/sdk';
import { ParseError, ProviderError } from './errors.js';
import { logger } from './logger.js';

// ── Request / response shapes ──

export interface FileAttachment {
  kind: 'pdf';
  filename: string;
  data: Buffer;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  text: string;
}

export interface LlmRequest {
  model: string;
  system?: string;
  messages: ChatMessage[];
  /** Attached to the first user message, ahead of its text. */
  attachments?: FileAttachment[];
  maxTokens?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LlmResponse {
  text: string;
  model: string;
  usage: TokenUsage;
  /** The reply stopped at the output token limit. */
  truncated: boolean;
  raw: unknown;
}

/**
 * The only capability the engine needs from a model provider. Implementations
 * throw `ProviderError` for transport/HTTP failures and `ParseError` when the
 * response cannot be read.
 */
export interface LlmExecutor {
  execute(request: LlmRequest): Promise<LlmResponse>;
}

// ── Anthropic implementation ──

const DEFAULT_MAX_TOKENS = 8192;
const REQUEST_TIMEOUT_MS = 10 * 60 * 1000;

export class AnthropicExecutor implements LlmExecutor {
  private client: Anthropic;

  constructor(apiKey: string) {
    // Retries belong to the job worker, so the SDK must not retry on its own.
    this.client = new Anthropic({ apiKey, maxRetries: 0, timeout: REQUEST_TIMEOUT_MS });
  }

  async execute(request: LlmRequest): Promise<LlmResponse> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: request.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(request.system ? { system: request.system } : {}),
        messages: toMessageParams(request),
      });
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new ProviderError('anthropic', error.message, error.status ?? undefined);
      }
      throw new ProviderError('anthropic', String(error));
    }

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    if (!text) {
      throw new ParseError(`empty completion from ${response.model} (stop reason: ${response.stop_reason ?? 'unknown'})`);
    }

    const usage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    logger.debug({ model: response.model, ...usage }, 'LLM call completed');

    return { text, model: response.model, usage, truncated: response.stop_reason === 'max_tokens', raw: response };
  }
}

function toMessageParams(request: LlmRequest): Anthropic.MessageParam[] {
  const attachments = request.attachments ?? [];
  let attached = attachments.length === 0;

  return request.messages.map((message) => {
    if (attached || message.role !== 'user') {
      return { role: message.role, content: message.text };
    }
    attached = true;

    const blocks: Anthropic.ContentBlockParam[] = attachments.map(toContentBlock);
    blocks.push({ type: 'text', text: message.text });
    return { role: 'user', content: blocks };
  });
}

function toContentBlock(attachment: FileAttachment): Anthropic.ContentBlockParam {
  return {
    type: 'document',
    source: { type: 'base64', media_type: 'application/pdf', data: attachment.data.toString('base64') },
    title: attachment.filename,
  };
}

// ── Response helpers ──

/** Parses a JSON object out of a completion, tolerating markdown code fences. */
export function extractJsonObject(text: string): Record<string, unknown> {
  const stripped = text
    .trim()
    .replace(/^```(?:json)?\s*\n?/i, '')
    .replace(/\n?```\s*$/i, '');

  let value: unknown;
  try {
    value = JSON.parse(stripped);
  } catch (error) {
    throw new ParseError(`response is not valid JSON (${String(error)})`);
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ParseError('expected a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}
