/**
 * Basic Authentication Middleware
 *
 * Extracts username/password from the Authorization header and attaches
 * them to the request. Credentials are not checked here: the SMTP relay
 * verifies them when the message is sent.
 *
 * Validation flow:
 * 1. Header must start with "Basic "
 * 2. Payload must be standard, padded base64
 * 3. Decoded payload is split on the first colon
 */

import { Request, Response, NextFunction } from "express";
import { AuthenticationError } from "../errors.js";

export interface Credentials {
  username: string;
  password: string;
}

declare global {
  namespace Express {
    interface Request {
      credentials?: Credentials;
    }
  }
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function parseBasicAuth(header: string | undefined): Credentials {
  if (!header || !header.startsWith("Basic ")) {
    throw new AuthenticationError("Authentication required");
  }

  // Buffer.from silently skips bad characters, so check the alphabet first
  const encoded = header.slice("Basic ".length);
  if (!BASE64.test(encoded)) {
    throw new AuthenticationError("Invalid authentication format");
  }

  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const colon = decoded.indexOf(":");
  if (colon === -1) {
    throw new AuthenticationError("Invalid authentication format");
  }

  return {
    username: decoded.slice(0, colon),
    password: decoded.slice(colon + 1),
  };
}

export function basicAuth(req: Request, res: Response, next: NextFunction) {
  try {
    req.credentials = parseBasicAuth(req.headers.authorization);
    next();
  } catch (err) {
    next(err);
  }
}
