export type ProxyErrorCode =
  | 'completion_failed'
  | 'gateway_unavailable'
  | 'no_session'
  | 'send_failed';

export class ProxyError extends Error {
  constructor(
    readonly code: ProxyErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProxyError';
  }
}

export class CompletionError extends ProxyError {
  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super('completion_failed', message, options);
    this.name = 'CompletionError';
  }
}

export type DispatchErrorCode = Extract<
  ProxyErrorCode,
  'gateway_unavailable' | 'no_session' | 'send_failed'
>;

export class DispatchError extends ProxyError {
  constructor(code: DispatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'DispatchError';
  }
}
