/**
 * LLM gateway interface.
 * Executes one prepared request against a model provider. Transport failures
 * come back as RawError values; implementations never throw for them.
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GatewayRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface RawResponse {
  content: string;
  /** Model that actually served the request, when the provider reports it. */
  model: string | null;
  finishReason: string | null;
}

export type RawErrorKind =
  | 'http'
  | 'timeout'
  | 'connection'
  | 'empty-response'
  | 'aborted'
  | 'unexpected';

/** Transport-level error normalized at the gateway boundary. */
export interface RawError {
  kind: RawErrorKind;
  /** HTTP status when the provider answered. */
  status?: number;
  /** Provider or socket error code, e.g. "model_not_found" or "ECONNRESET". */
  code?: string;
  message: string;
  /** Server-suggested wait before retrying (from Retry-After). */
  retryAfterMs?: number;
}

export type GatewayResult =
  | { ok: true; response: RawResponse }
  | { ok: false; error: RawError };

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ILLMGateway {
  execute(request: GatewayRequest, options: ExecuteOptions): Promise<GatewayResult>;
}

/** Normalize anything thrown across the gateway boundary. */
export function toRawError(err: unknown): RawError {
  if (err instanceof Error) {
    const code = readStringProp(err, 'code');
    return {
      kind: err.name === 'AbortError' ? 'aborted' : 'unexpected',
      message: err.message,
      ...(code && { code }),
    };
  }
  return { kind: 'unexpected', message: String(err) };
}

function readStringProp(obj: object, key: string): string | undefined {
  const entry = Object.entries(obj).find(([k]) => k === key);
  const value: unknown = entry?.[1];
  return typeof value === 'string' ? value : undefined;
}
