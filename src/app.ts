/**
 * Express Application Setup
 *
 * Middleware stack:
 * 1. Request logging
 * 2. Health check (no auth)
 * 3. Mail routes (auth + rate limiting, then JSON body)
 * 4. 404 handler
 * 5. Error handler
 */

import express, { Express, Request, Response, NextFunction } from "express";
import { HttpError, MethodNotAllowedError, RelayError, ValidationError } from "./errors.js";
import { createMailRouter } from "./routes/mail.js";
import { MailRelay } from "./services/mailRelay.js";
import { RateLimiter } from "./services/rateLimiter.js";

export interface AppDeps {
  limiter: RateLimiter;
  relay: MailRelay;
  bodyLimit?: string;
  nodeEnv?: string;
}

/**
 * body-parser errors carry a `type` string and an HTTP `status`.
 */
function bodyParserError(err: unknown): { type: string; status: number; message: string } | null {
  if (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  ) {
    return { type: err.type, status: err.status, message: err.message };
  }
  return null;
}

function toHttpError(err: unknown): HttpError | null {
  if (err instanceof HttpError) {
    return err;
  }

  const parserError = bodyParserError(err);
  if (!parserError) {
    return null;
  }
  if (parserError.type === "entity.parse.failed") {
    return new ValidationError("Invalid request body");
  }
  if (parserError.status >= 400 && parserError.status < 500) {
    return new HttpError(parserError.status, parserError.message);
  }
  return null;
}

export function createApp({ limiter, relay, bodyLimit, nodeEnv = "development" }: AppDeps): Express {
  const app = express();

  // Middleware: Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  /**
   * Health check (no auth required)
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).type("text/plain").send("OK");
  });

  /**
   * Mail routes — Basic auth + rate limiting
   * - POST /mail/send
   */
  app.use("/mail", createMailRouter({ limiter, relay, bodyLimit }));

  /**
   * 404 handler
   */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  /**
   * Error handler (must be last)
   */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const httpError = toHttpError(err);

    if (!httpError) {
      console.error("[ERROR]", err);
      res.status(500).json({
        error: "Internal server error",
        message: nodeEnv === "development" && err instanceof Error ? err.message : undefined,
      });
      return;
    }

    if (httpError instanceof RelayError) {
      console.error(`[ERROR] Failed to send email: ${httpError.details}`);
      res.status(httpError.status).json({ error: httpError.message, details: httpError.details });
      return;
    }

    if (httpError instanceof MethodNotAllowedError) {
      res.set("Allow", httpError.allowed.join(", "));
    } else if (httpError.status === 401) {
      console.warn(`[Auth] ${httpError.message}`);
      res.set("WWW-Authenticate", 'Basic realm="mail"');
    }

    res.status(httpError.status).json({ error: httpError.message });
  });

  return app;
}
