/**
 * Scripted mock for ILLMGateway.
 * A handler decides each call's outcome; every call is recorded.
 */

import type {
  ExecuteOptions,
  GatewayRequest,
  GatewayResult,
  ILLMGateway,
  RawError,
} from '../../src/providers/ILLMGateway.js';

export interface GatewayCall {
  request: GatewayRequest;
  options: ExecuteOptions;
  /** The question text, read from the last user message. */
  question: string;
}

export type GatewayHandler = (call: GatewayCall, index: number) => GatewayResult | Promise<GatewayResult>;

export class MockLLMGateway implements ILLMGateway {
  public readonly calls: GatewayCall[] = [];
  public inFlight = 0;
  public maxInFlight = 0;

  constructor(private handler: GatewayHandler = () => ok('42')) {}

  async execute(request: GatewayRequest, options: ExecuteOptions): Promise<GatewayResult> {
    const last = request.messages[request.messages.length - 1];
    const call: GatewayCall = { request, options, question: last?.content ?? '' };
    const index = this.calls.length;
    this.calls.push(call);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.handler(call, index);
    } finally {
      this.inFlight--;
    }
  }

  // ── Test Helpers ──

  setHandler(handler: GatewayHandler): void {
    this.handler = handler;
  }

  callsFor(text: string): GatewayCall[] {
    return this.calls.filter((c) => c.question.includes(text));
  }
}

export function ok(content: string): GatewayResult {
  return { ok: true, response: { content, model: null, finishReason: 'stop' } };
}

export function fail(error: RawError): GatewayResult {
  return { ok: false, error };
}

export function httpError(status: number, message = `HTTP ${status}`, code?: string): GatewayResult {
  return fail({ kind: 'http', status, message, ...(code && { code }) });
}

/** A promise the test settles by hand. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
