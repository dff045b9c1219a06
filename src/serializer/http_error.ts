import { STATUS_CODES } from "node:http";

export type HttpErrorKind =
  | "bad_request"
  | "unauthenticated"
  | "not_found"
  | "internal";

export type HttpErrorBody = {
  status: number;
  title: string;
  details?: string;
};

/**
 * An error as it is written into a response envelope: it is a regular
 * `Error` whose message is suitable for display, and it knows the HTTP
 * status it should be answered with.
 */
export interface HTTPError extends Error {
  readonly kind: HttpErrorKind;
  statusCode(): number;
  toJSON(): HttpErrorBody;
}

const statusText = (status: number): string =>
  STATUS_CODES[status] ?? STATUS_CODES[500] ?? "Internal Server Error";

export const kindForStatus = (status: number): HttpErrorKind => {
  switch (status) {
    case 400:
      return "bad_request";
    case 401:
      return "unauthenticated";
    case 404:
      return "not_found";
    default:
      return "internal";
  }
};

export class HttpError extends Error implements HTTPError {
  public readonly status: number;
  public readonly title: string;
  public readonly details?: string;

  constructor(status: number, title: string, details?: string, options?: { cause?: unknown }) {
    super(title || statusText(status), options);
    this.name = "HttpError";
    this.status = status;
    this.title = title;
    this.details = details;
  }

  get kind(): HttpErrorKind {
    return kindForStatus(this.status);
  }

  statusCode(): number {
    return this.status;
  }

  toJSON(): HttpErrorBody {
    return {
      status: this.status,
      title: this.title,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export function newHTTPError(statusCode: number, ...msg: string[]): HTTPError {
  return new HttpError(statusCode, msg.join(" "));
}

export const badRequest = (title: string, details?: string): HTTPError =>
  new HttpError(400, title, details);

export const unauthenticated = (title = "user is not authenticated"): HTTPError =>
  new HttpError(401, title);

export const notFound = (title: string): HTTPError => new HttpError(404, title);

const causeMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

// Wraps an unexpected collaborator fault; the cause message is kept in the title.
export const internalError = (context: string, cause: unknown): HTTPError =>
  new HttpError(500, `${context}: ${causeMessage(cause)}`, undefined, { cause });

export const isHTTPError = (value: unknown): value is HTTPError =>
  value instanceof HttpError;

export const asHTTPError = (value: unknown): HTTPError =>
  isHTTPError(value) ? value : new HttpError(500, causeMessage(value), undefined, { cause: value });
