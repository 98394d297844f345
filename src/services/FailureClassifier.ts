/**
 * Maps a raw transport/response error to a FailureReason.
 * Pure: the same RawError always yields the same reason. First matching rule wins.
 */

import type { RawError } from '../providers/ILLMGateway.js';
import type { FailureReason } from '../types/models.js';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT']);
const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
]);
const INVALID_MODEL_PATTERN = /(model_not_found|invalid[ _]model|not a valid model|unknown model|no endpoints found)/i;

export class FailureClassifier {
  classify(error: RawError): FailureReason {
    const status = error.status;
    const code = error.code ?? '';
    const message = error.message.toLowerCase();

    if (
      error.kind === 'timeout' ||
      status === 408 ||
      status === 504 ||
      TIMEOUT_CODES.has(code)
    ) {
      return 'timeout';
    }

    if (status === 429 || message.includes('rate limit') || code === 'rate_limit_exceeded') {
      return 'rate-limited';
    }

    if (status === 401 || status === 402 || status === 403) {
      return 'authentication';
    }

    if (
      status === 404 ||
      status === 422 ||
      (status === 400 && (INVALID_MODEL_PATTERN.test(code) || INVALID_MODEL_PATTERN.test(message)))
    ) {
      return 'invalid-configuration';
    }

    if (
      error.kind === 'connection' ||
      status === 500 ||
      status === 502 ||
      status === 503 ||
      NETWORK_CODES.has(code)
    ) {
      return 'transient-network';
    }

    if (error.kind === 'empty-response') {
      return 'malformed-response';
    }

    return 'unknown';
  }
}
