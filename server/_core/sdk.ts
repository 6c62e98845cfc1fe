import { COOKIE_NAME, ONE_YEAR_MS } from "@shared/const";
import { ForbiddenError } from "@shared/_core/errors";
import { parse as parseCookieHeader } from "cookie";
import type { Request } from "express";
import { SignJWT, jwtVerify } from "jose";
import type { SafeUser } from "../../drizzle/schema";
import type { UserRepository } from "../db";
import { errorMeta, logger } from "./logger";

const log = logger.child({ component: "auth" });

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.length > 0;

export type SessionPayload = {
  userId: string;
  name: string;
};

/**
 * Signs and verifies the session cookie (an HS256 JWT) and resolves the
 * signed-in user for a request.
 */
export class SessionManager {
  private readonly secret: Uint8Array;

  constructor(
    secretKey: string,
    private readonly users: Pick<UserRepository, "getUser">
  ) {
    if (!secretKey) {
      throw new Error("A secret key is required to sign sessions");
    }
    this.secret = new TextEncoder().encode(secretKey);
  }

  private parseCookies(cookieHeader: string | undefined) {
    if (!cookieHeader) return new Map<string, string>();
    const parsed = parseCookieHeader(cookieHeader);
    const entries = Object.entries(parsed).filter(
      (entry): entry is [string, string] => typeof entry[1] === "string"
    );
    return new Map(entries);
  }

  async createSessionToken(
    userId: string,
    options: { expiresInMs?: number; name?: string } = {}
  ): Promise<string> {
    const issuedAt = Date.now();
    const expiresInMs = options.expiresInMs ?? ONE_YEAR_MS;
    const expirationSeconds = Math.floor((issuedAt + expiresInMs) / 1000);

    return new SignJWT({ userId, name: options.name ?? "" })
      .setProtectedHeader({ alg: "HS256", typ: "JWT" })
      .setIssuedAt(Math.floor(issuedAt / 1000))
      .setExpirationTime(expirationSeconds)
      .sign(this.secret);
  }

  async verifySession(cookieValue: string | undefined | null): Promise<SessionPayload | null> {
    if (!cookieValue) {
      return null;
    }

    try {
      const { payload } = await jwtVerify(cookieValue, this.secret, {
        algorithms: ["HS256"],
      });
      const { userId, name } = payload;

      // `name` may legitimately be empty, so only require a string.
      if (!isNonEmptyString(userId) || typeof name !== "string") {
        log.warn("Session payload missing required fields");
        return null;
      }

      return { userId, name };
    } catch (error) {
      log.warn("Session verification failed", errorMeta(error));
      return null;
    }
  }

  async authenticateRequest(req: Pick<Request, "headers">): Promise<SafeUser> {
    const cookies = this.parseCookies(req.headers.cookie);
    const session = await this.verifySession(cookies.get(COOKIE_NAME));

    if (!session) {
      throw ForbiddenError("Invalid session cookie");
    }

    const user = await this.users.getUser(session.userId);

    if (!user || !user.isActive) {
      throw ForbiddenError("User not found");
    }

    return user;
  }
}
