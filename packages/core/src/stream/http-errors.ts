import { networkError, type NetworkError } from '@loomwork/shared';

const STATUS_MESSAGES: Record<number, string> = {
  401: 'Invalid API key. Please check your API key in Settings.',
  402: 'Insufficient credits. Please add credits to your account.',
  429: 'Rate limit exceeded. Please try again later.',
  503: 'Service temporarily unavailable. Please try again later.',
};

const MODEL_NOT_FOUND =
  'Model not found. The selected model may not be available. Please try a different model.';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The `error.message` of a provider error body, if the body has one. */
export function parseErrorBodyMessage(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || !isRecord(parsed.error)) return undefined;
  const message = parsed.error.message;
  return typeof message === 'string' && message.length > 0 ? message : undefined;
}

/** Rewrite a raw provider message into something a user can act on. */
export function humanizeProviderMessage(raw: string): string {
  const lower = raw.toLowerCase();
  if (lower.includes('does not exist') || lower.includes('not found')) {
    return MODEL_NOT_FOUND;
  }
  if (lower.includes('api key')) {
    return STATUS_MESSAGES[401];
  }
  return raw;
}

/** Map a failed HTTP response to a user-facing NetworkError. */
export function mapHttpError(status: number, body: string): NetworkError {
  const known = STATUS_MESSAGES[status];
  if (known) {
    return networkError(known, status);
  }
  const raw = parseErrorBodyMessage(body);
  if (raw) {
    return networkError(humanizeProviderMessage(raw), status);
  }
  return networkError(`Request failed with status ${status}`, status);
}

/** Map a transport-level failure (DNS, reset, timeout) to a NetworkError. */
export function mapTransportError(error: unknown): NetworkError {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return networkError('Request timed out. The model took too long to respond.');
    }
    return networkError(error.message || 'Network error');
  }
  return networkError(String(error));
}
