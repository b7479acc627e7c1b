/**
 * Mail Routes — POST /mail/send
 *
 * Relays one message per request through the SMTP server, authenticated as
 * the caller.
 *
 * Order of checks (first failure wins):
 * 1. Method (405)
 * 2. Basic credentials (401)
 * 3. Rate limit (429)
 * 4. Body shape and required fields (400)
 * 5. Relay (500 with the relay's error text)
 */

import express, { Router, Request, Response, NextFunction } from "express";
import { AuthenticationError, MethodNotAllowedError, ValidationError } from "../errors.js";
import { basicAuth } from "../middleware/basicAuth.js";
import { rateLimit } from "../middleware/rateLimit.js";
import { buildMessage, EmailRequest } from "../services/message.js";
import { MailRelay } from "../services/mailRelay.js";
import { RateLimiter } from "../services/rateLimiter.js";

export interface MailRouterDeps {
  limiter: RateLimiter;
  relay: MailRelay;
  bodyLimit?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError("Invalid request body");
  }
  return value;
}

/**
 * Check the decoded JSON against the EmailRequest shape, then the required
 * fields. Absent and null fields count as missing, wrong types as malformed.
 */
export function parseEmailRequest(decoded: unknown): EmailRequest {
  // A JSON null decodes to an empty request
  const body = decoded === null ? {} : decoded;
  if (!isRecord(body)) {
    throw new ValidationError("Invalid request body");
  }

  const rawTo = body.to;
  let to: string[] = [];
  if (rawTo !== undefined && rawTo !== null) {
    if (!Array.isArray(rawTo) || !rawTo.every((r): r is string => typeof r === "string")) {
      throw new ValidationError("Invalid request body");
    }
    to = rawTo;
  }

  const subject = optionalString(body.subject) ?? "";
  const content = optionalString(body.content) ?? "";
  const title = optionalString(body.title);

  const missing: string[] = [];
  if (to.length === 0) missing.push("to");
  if (!subject) missing.push("subject");
  if (!content) missing.push("content");

  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(", ")}`);
  }

  return title ? { to, subject, content, title } : { to, subject, content };
}

export function createMailRouter({ limiter, relay, bodyLimit = "1mb" }: MailRouterDeps): Router {
  const router = Router();

  /**
   * POST /mail/send
   *
   * Request body:
   * {
   *   "to": ["bob@example.com"],
   *   "subject": "Hi",
   *   "content": "<p>hello</p>",
   *   "title": "Alice from Support"   // optional
   * }
   *
   * Response: 200
   * { "status": "success", "message": "Email sent successfully" }
   */
  router.post(
    "/send",
    basicAuth,
    rateLimit(limiter),
    // Parsed after auth so credential errors win over body errors.
    // Any Content-Type is read as JSON, and any JSON value is let through
    // to parseEmailRequest.
    express.json({ limit: bodyLimit, type: () => true, strict: false }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const credentials = req.credentials;
        if (!credentials) {
          throw new AuthenticationError();
        }

        const emailReq = parseEmailRequest(req.body);
        const { raw, html } = buildMessage(credentials.username, emailReq);

        await relay.send({
          username: credentials.username,
          password: credentials.password,
          from: credentials.username,
          to: emailReq.to,
          raw,
        });

        console.log(
          `[Mail] Sent from ${credentials.username} to ${emailReq.to.join(", ")} (HTML: ${html})`
        );

        res.status(200).json({
          status: "success",
          message: "Email sent successfully",
        });
      } catch (err) {
        next(err);
      }
    }
  );

  router.all("/send", (_req: Request, _res: Response, next: NextFunction) => {
    next(new MethodNotAllowedError(["POST"]));
  });

  return router;
}
