export interface ProviderRetryContext {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface ProviderRetryOptions {
  attempts?: number;
  delayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (context: ProviderRetryContext) => void;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const clampNumber = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const readField = (value: unknown, key: string): unknown =>
  value !== null && typeof value === 'object' && key in value ? Reflect.get(value, key) : undefined;

const coerceStatusCode = (value: unknown): number | null => {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/** Status codes reported on the error, its cause, or its response. */
export const collectStatusCodes = (error: unknown): number[] => {
  const cause = readField(error, 'cause');
  const response = readField(error, 'response');
  const nestedError = readField(error, 'error');
  const candidates = [
    readField(error, 'status'),
    readField(error, 'statusCode'),
    readField(error, 'code'),
    readField(cause, 'status'),
    readField(cause, 'statusCode'),
    readField(response, 'status'),
    readField(nestedError, 'code'),
  ];
  const codes: number[] = [];
  for (const candidate of candidates) {
    const status = coerceStatusCode(candidate);
    if (status !== null) codes.push(status);
  }
  return codes;
};

export const isRateLimitError = (error: unknown): boolean => {
  if (collectStatusCodes(error).includes(429)) return true;
  const message = readField(error, 'message');
  if (typeof message !== 'string') return false;
  const lowered = message.toLowerCase();
  return lowered.includes('rate limit') || lowered.includes('too many requests');
};

export async function withProviderRetry<T>(
  operation: () => Promise<T>,
  options: ProviderRetryOptions = {},
): Promise<T> {
  const maxAttempts = clampNumber(options.attempts ?? 2, 1, 10);
  const delayMs = clampNumber(options.delayMs ?? 2_000, 0, 60_000);
  const isRetryable = options.isRetryable ?? isRateLimitError;
  const sleep = options.sleep ?? defaultSleep;

  let attempt = 0;
  while (true) {
    try {
      return await operation();
    } catch (error) {
      attempt += 1;
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      options.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await sleep(delayMs);
    }
  }
}
