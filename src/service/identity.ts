import type { FastifyRequest } from "fastify";

import { unauthenticated } from "../serializer/http_error";

export interface IdentityResolver {
  // Throws an `unauthenticated` HTTPError when the request carries no user.
  getUserId(req: FastifyRequest): number;
}

export const USER_ID_HEADER = "x-user-id";

const POSITIVE_INT = /^[1-9]\d*$/;

const readHeader = (value: string | string[] | undefined): string | null => {
  if (Array.isArray(value)) {
    return value[0]?.trim() ?? null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  return null;
};

/**
 * Reads the caller id set by the authenticating proxy in front of the API.
 */
export class HeaderIdentityResolver implements IdentityResolver {
  constructor(private readonly header: string = USER_ID_HEADER) {}

  getUserId(req: FastifyRequest): number {
    const raw = readHeader(req.headers[this.header]);
    if (!raw || !POSITIVE_INT.test(raw)) {
      throw unauthenticated();
    }

    const userId = Number(raw);
    if (!Number.isSafeInteger(userId)) {
      throw unauthenticated();
    }
    return userId;
  }
}
