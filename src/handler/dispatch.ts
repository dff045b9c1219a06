import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import {
  asHTTPError,
  badRequest,
  internalError,
  isHTTPError,
  type HTTPError,
} from "../serializer/http_error";
import {
  isEmptyResponse,
  newErrorResponse,
  type Response,
} from "../serializer/serializers";

/**
 * A request handler in envelope form: it resolves with the envelope to send,
 * or rejects with the error to report. It never writes to the reply itself.
 */
export type RequestProcessFunc = (req: FastifyRequest) => Promise<Response>;

const ParamsSchema = z.record(z.string());
const INTEGER = /^[+-]?\d+$/;

export function urlParamInt(req: FastifyRequest, name: string): number {
  const params = ParamsSchema.safeParse(req.params ?? {});
  const raw = params.success ? params.data[name] : undefined;

  if (raw === undefined || !INTEGER.test(raw)) {
    throw badRequest(`wrong format in parameter ${name}; received ${raw ?? "nothing"}`);
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw badRequest(`wrong format in parameter ${name}; received ${raw}`);
  }
  return value;
}

/**
 * Hands every request body to the handlers as raw text, whatever its content
 * type, so that malformed JSON is reported in the response envelope rather
 * than by the framework. Scoped to the plugin it is called in.
 */
export function useRawBodies(app: FastifyInstance): void {
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string" }, (_req, body, done) => {
    done(null, body);
  });
}

/**
 * Answers errors raised by the framework itself (body too large, aborted
 * upload, ...) in the envelope's failure shape. Client-side faults become
 * bad requests. Scoped to the plugin it is called in.
 */
export function useEnvelopeErrors(app: FastifyInstance): void {
  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode;
    const httpError = !isHTTPError(err) && status !== undefined && status >= 400 && status < 500
      ? badRequest("unreadable request body", err.message)
      : asHTTPError(err);
    return sendFailure(req, reply, httpError);
  });
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export function readJsonBody<T extends z.ZodTypeAny>(req: FastifyRequest, schema: T): z.output<T> {
  const raw = typeof req.body === "string" ? req.body : "";

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw badRequest("malformed request body", err instanceof Error ? err.message : String(err));
  }

  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    throw badRequest("invalid request body", formatIssues(parsed.error));
  }
  return parsed.data;
}

export const withContext = <T>(context: string, pending: Promise<T>): Promise<T> =>
  pending.catch((err: unknown) => {
    throw isHTTPError(err) ? err : internalError(context, err);
  });

function sendFailure(req: FastifyRequest, reply: FastifyReply, httpError: HTTPError) {
  const status = httpError.statusCode();
  const context = {
    evt: "api.request_failed",
    kind: httpError.kind,
    status,
    method: req.method,
    url: req.url,
  };
  if (status >= 500) {
    req.log.error({ ...context, err: httpError }, "api.request_failed");
  } else {
    req.log.info(context, "api.request_failed");
  }
  return reply.code(status).send(newErrorResponse(httpError));
}

export const toRouteHandler = (handle: RequestProcessFunc) =>
  async (req: FastifyRequest, reply: FastifyReply) => {
    let response: Response;
    try {
      response = await handle(req);
    } catch (err) {
      return sendFailure(req, reply, asHTTPError(err));
    }

    if (isEmptyResponse(response) || response.status === 204) {
      return reply.code(204).send();
    }
    return reply.code(response.status).send(response);
  };
