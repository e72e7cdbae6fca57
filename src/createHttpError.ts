import * as http from 'node:http';

export class HttpError extends Error {
  public readonly statusCode: number;

  public readonly headers: Record<string, string>;

  constructor(statusCode: number, message?: string, headers: Record<string, string> = {}) {
    super(message || http.STATUS_CODES[statusCode] || 'Unknown Error');
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.headers = headers;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

export default function createHttpError(
  statusCode: number = 500,
  message?: string,
  headers?: Record<string, string>,
): HttpError {
  if (
    !Number.isInteger(statusCode) ||
    statusCode < 400 ||
    statusCode > 599
  ) {
    throw new TypeError(
      `statusCode must be an integer between 400 and 599, got ${statusCode}`,
    );
  }

  return new HttpError(statusCode, message, headers);
}

// 416 carries the unsatisfied Content-Range form so callers can echo it back
export const createRangeNotSatisfiable = (contentSize: number, message?: string) =>
  createHttpError(416, message, { 'content-range': `bytes */${contentSize}` });
