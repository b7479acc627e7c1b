/**
 * Rate Limiting Middleware
 *
 * Enforces the per-username token bucket before any body parsing or relay
 * work. The token is spent at admission, whatever happens to the send.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { AuthenticationError, RateLimitError } from "../errors.js";
import { RateLimiter } from "../services/rateLimiter.js";
import type { Credentials } from "./basicAuth.js";

export function rateLimit(limiter: RateLimiter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const credentials: Credentials | undefined = req.credentials;
    if (!credentials) {
      return next(new AuthenticationError());
    }
    const { username } = credentials;

    const decision = limiter.consume(username);

    res.set("X-RateLimit-Limit", decision.limit.toString());
    res.set("X-RateLimit-Remaining", decision.remaining.toString());

    if (!decision.allowed) {
      console.warn(`[RateLimit] ${username} exceeded ${limiter.policy.maxPerSec}/s`);
      return next(new RateLimitError());
    }

    next();
  };
}
