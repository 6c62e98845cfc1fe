import express, { type Express } from "express";
import rateLimit from "express-rate-limit";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { UPLOAD_URL_PREFIX } from "@shared/const";
import { appRouter } from "../routers";
import { createContextFactory } from "./context";
import { errorMeta, logger } from "./logger";
import type { AppServices } from "./services";

export function createApp(services: AppServices): Express {
  const { config } = services;
  const app = express();
  const isDevelopment = config.environment === "development";

  // Behind a proxy, x-forwarded-proto decides whether the session cookie is secure.
  app.set("trust proxy", 1);

  // General API rate limiter - 300 requests per 15 minutes per IP
  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 300,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later." },
    skip: () => isDevelopment,
  });

  // Stricter rate limiter for photo uploads - 30 per 15 minutes per IP
  const uploadLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 30,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Upload limit exceeded. Please try again in 15 minutes." },
    skip: () => isDevelopment,
  });

  // A 10 MB photo base64-encodes to ~13.4 MB of JSON.
  app.use(express.json({ limit: "15mb" }));
  app.use(express.urlencoded({ limit: "1mb", extended: true }));

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", message: "Webinar desk is running" });
  });

  // Local uploads are served straight from disk; remote photos live at bucket URLs.
  if (services.storageMode === "local") {
    app.use(UPLOAD_URL_PREFIX, express.static(config.uploadDir, { fallthrough: false, index: false }));
  }

  app.use("/api/trpc", generalLimiter);
  app.use("/api/trpc/registrants.uploadPhoto", uploadLimiter);
  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: createContextFactory(services),
      onError: ({ path, error }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          logger.error("tRPC handler failed", { path, ...errorMeta(error) });
        }
      },
    })
  );

  return app;
}
