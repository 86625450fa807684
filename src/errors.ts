export type CuOptErrorCode =
  | 'CONNECTIVITY'
  | 'TIMEOUT'
  | 'MALFORMED_RESPONSE'
  | 'NETWORK_ERROR'
  | `HTTP_${number}`;

export class CuOptError extends Error {
  code: CuOptErrorCode;
  statusCode?: number;
  responseTimeMs: number;

  constructor(message: string, code: CuOptErrorCode, responseTimeMs: number = 0, statusCode?: number) {
    super(message);
    this.name = 'CuOptError';
    this.code = code;
    this.statusCode = statusCode;
    this.responseTimeMs = responseTimeMs;
  }
}

/** Preflight failed. The only error that aborts a run. */
export class ConnectivityError extends CuOptError {
  constructor(message: string, responseTimeMs: number = 0, statusCode?: number) {
    super(message, 'CONNECTIVITY', responseTimeMs, statusCode);
    this.name = 'ConnectivityError';
  }
}

export class RequestError extends CuOptError {
  constructor(message: string, responseTimeMs: number, statusCode?: number) {
    super(message, statusCode !== undefined ? `HTTP_${statusCode}` : 'NETWORK_ERROR', responseTimeMs, statusCode);
    this.name = 'RequestError';
  }
}

export class TimeoutError extends CuOptError {
  timeoutMs: number;

  constructor(timeoutMs: number, responseTimeMs: number) {
    super('timeout', 'TIMEOUT', responseTimeMs);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedResponseError extends CuOptError {
  constructor(message: string, responseTimeMs: number, statusCode: number) {
    super(message, 'MALFORMED_RESPONSE', responseTimeMs, statusCode);
    this.name = 'MalformedResponseError';
  }
}
