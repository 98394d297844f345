/**
 * OpenRouter gateway.
 * Talks to OpenRouter's OpenAI-compatible chat completions endpoint through
 * the openai SDK. SDK retries are off: retrying is the dispatch pool's job.
 */

import OpenAI from 'openai';
import type {
  ExecuteOptions,
  GatewayRequest,
  GatewayResult,
  ILLMGateway,
  RawError,
} from './ILLMGateway.js';
import { toRawError } from './ILLMGateway.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/** The slice of the SDK the gateway calls. */
export interface ChatCompletionClient {
  create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { timeout?: number; signal?: AbortSignal; maxRetries?: number }
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface OpenRouterGatewayOptions {
  apiKey: string;
  baseURL?: string;
  /** Sent as HTTP-Referer; OpenRouter uses it for app attribution. */
  appUrl?: string;
  /** Sent as X-Title. */
  appName?: string;
  /** Injected for tests. Default: an openai client built from the options above. */
  client?: ChatCompletionClient;
}

export class OpenRouterGateway implements ILLMGateway {
  private readonly completions: ChatCompletionClient;

  constructor(opts: OpenRouterGatewayOptions) {
    if (opts.client) {
      this.completions = opts.client;
    } else {
      const headers: Record<string, string> = {};
      if (opts.appUrl) headers['HTTP-Referer'] = opts.appUrl;
      if (opts.appName) headers['X-Title'] = opts.appName;
      const client = new OpenAI({
        apiKey: opts.apiKey,
        baseURL: opts.baseURL ?? OPENROUTER_BASE_URL,
        defaultHeaders: headers,
        maxRetries: 0,
      });
      this.completions = client.chat.completions;
    }
  }

  async execute(request: GatewayRequest, options: ExecuteOptions): Promise<GatewayResult> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.completions.create(
        {
          model: request.model,
          messages: request.messages,
          ...(request.temperature !== undefined && { temperature: request.temperature }),
          ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
        },
        { timeout: options.timeoutMs, signal: options.signal, maxRetries: 0 }
      );
    } catch (err) {
      return { ok: false, error: mapSdkError(err) };
    }

    const choice = completion.choices[0];
    const content = choice?.message?.content ?? '';
    if (content.trim() === '') {
      return {
        ok: false,
        error: {
          kind: 'empty-response',
          code: 'empty_response',
          message: `Model ${request.model} returned no content`,
        },
      };
    }

    return {
      ok: true,
      response: {
        content,
        model: completion.model || null,
        finishReason: choice?.finish_reason ?? null,
      },
    };
  }
}

/** Map an openai SDK exception onto the gateway's RawError. */
export function mapSdkError(err: unknown): RawError {
  if (err instanceof OpenAI.APIUserAbortError) {
    return { kind: 'aborted', message: err.message };
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return { kind: 'timeout', message: err.message };
  }
  if (err instanceof OpenAI.APIConnectionError) {
    const code = causeCode(err);
    return { kind: 'connection', message: err.message, ...(code && { code }) };
  }
  if (err instanceof OpenAI.APIError) {
    const retryAfterMs = parseRetryAfter(err.headers);
    return {
      kind: 'http',
      message: err.message,
      ...(err.status !== undefined && { status: err.status }),
      ...(typeof err.code === 'string' && { code: err.code }),
      ...(retryAfterMs !== undefined && { retryAfterMs }),
    };
  }
  return toRawError(err);
}

function causeCode(err: Error): string | undefined {
  const cause: unknown = err.cause;
  return cause instanceof Error ? toRawError(cause).code : undefined;
}

/** Retry-After is either delta-seconds or an HTTP date; retry-after-ms wins when present. */
export function parseRetryAfter(
  headers: Record<string, string | null | undefined> | undefined,
  now: number = Date.now()
): number | undefined {
  if (!headers) return undefined;

  const ms = headers['retry-after-ms'];
  if (ms) {
    const parsed = Number(ms);
    if (Number.isFinite(parsed) && parsed >= 0) return parsed;
  }

  const value = headers['retry-after'];
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : undefined;

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
