/**
 * HTTP Error Types
 *
 * Thrown (or passed to next()) by middleware and routes, mapped to
 * JSON responses by the error handler in app.ts.
 */

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = "Authentication required") {
    super(401, message);
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(public readonly allowed: string[]) {
    super(405, "Method not allowed");
  }
}

export class RateLimitError extends HttpError {
  constructor() {
    super(429, "Rate limit exceeded");
  }
}

/** Downstream SMTP failure; `details` is the relay's own error text. */
export class RelayError extends HttpError {
  constructor(public readonly details: string) {
    super(500, "Failed to send email");
  }
}
