import { HttpError } from "@shared/_core/errors";
import type { Request, Response } from "express";
import type { SafeUser } from "../../drizzle/schema";
import type { CookieRequest } from "./cookies";
import { errorMeta, logger } from "./logger";
import type { AppServices } from "./services";

export type TrpcContext = {
  req: CookieRequest;
  res: Pick<Response, "cookie" | "clearCookie">;
  user: SafeUser | null;
  services: AppServices;
};

export function createContextFactory(services: AppServices) {
  return async ({ req, res }: { req: Request; res: Response }): Promise<TrpcContext> => {
    let user: SafeUser | null = null;
    try {
      user = await services.sessions.authenticateRequest(req);
    } catch (error) {
      // An HttpError just means "not signed in"; anything else is worth a look.
      if (!(error instanceof HttpError)) {
        logger.warn("Session lookup failed", errorMeta(error));
      }
    }
    return { req, res, user, services };
  };
}
