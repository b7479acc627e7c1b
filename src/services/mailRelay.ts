/**
 * SMTP Relay
 *
 * Hands an assembled message to the mail transfer agent, authenticating
 * as the caller. One connection per send: credentials differ per request and
 * nothing is pooled or retried.
 *
 * A message goes to all of its recipients or to none. SMTPConnection moves on
 * to DATA as long as one RCPT TO was accepted, so the body is held back until
 * the relay has answered every recipient, and the connection is dropped before
 * the terminating dot if any of them was refused.
 */

import { Readable } from "node:stream";
import SMTPConnection from "nodemailer/lib/smtp-connection";
import { RelayError } from "../errors.js";

export interface OutboundMail {
  username: string;
  password: string;
  /** Envelope sender (MAIL FROM) */
  from: string;
  /** Envelope recipients (RCPT TO) */
  to: string[];
  /** Complete message: headers, blank line, body */
  raw: string;
}

export interface MailRelay {
  send(mail: OutboundMail): Promise<void>;
}

export interface SmtpRelayOptions {
  host: string;
  port: number;
  secure: boolean;
  timeoutMs: number;
}

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "::1"]);

export function isLoopback(host: string): boolean {
  const name = host.toLowerCase();
  return LOOPBACK_HOSTS.has(name) || name.startsWith("127.");
}

export function connectionOptions({ host, port, secure, timeoutMs }: SmtpRelayOptions): SMTPConnection.Options {
  return {
    host,
    port,
    secure,
    // Passwords only go out unencrypted to a relay on this machine
    requireTLS: !secure && !isLoopback(host),
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function noop() {}

/**
 * Reads the SMTP transaction log to learn which RCPT TO commands the relay
 * refused. Responses arrive in command order, pipelined or not.
 */
class RecipientLog {
  readonly rejected: string[] = [];
  private readonly pending: string[] = [];

  readonly logger = {
    level: noop,
    trace: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    debug: (entry: unknown, message: unknown) => this.record(entry, message),
  };

  private record(entry: unknown, message: unknown) {
    if (typeof entry !== "object" || entry === null || !("tnx" in entry) || typeof message !== "string") {
      return;
    }

    if (entry.tnx === "client") {
      const rcpt = /^RCPT TO:<([^>]*)>/i.exec(message);
      if (rcpt) {
        this.pending.push(rcpt[1]);
      }
      return;
    }

    if (entry.tnx === "server") {
      const recipient = this.pending.shift();
      // Multi-line replies carry the final status on the last line
      const status = message.split("\n").pop() ?? "";
      if (recipient !== undefined && !status.startsWith("2")) {
        this.rejected.push(recipient);
      }
    }
  }
}

export class SmtpRelay implements MailRelay {
  constructor(private readonly options: SmtpRelayOptions) {}

  async send(mail: OutboundMail): Promise<void> {
    const recipients = new RecipientLog();
    const connection = new SMTPConnection({
      ...connectionOptions(this.options),
      logger: recipients.logger,
      debug: true,
    });

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const fail = (err: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        connection.close();
        reject(err instanceof RelayError ? err : new RelayError(describeError(err)));
      };

      // Pulled only once the relay has answered DATA with 354
      const body = new Readable({
        read() {
          if (recipients.rejected.length > 0) {
            fail(new RelayError(`Recipients rejected: ${recipients.rejected.join(", ")}`));
            return;
          }
          this.push(mail.raw);
          this.push(null);
        },
      });

      connection.on("error", fail);
      connection.on("end", () => fail(new Error("Connection closed unexpectedly")));

      connection.connect((connectError?: Error | null) => {
        if (connectError) {
          fail(connectError);
          return;
        }

        connection.login({ user: mail.username, pass: mail.password }, (loginError?: Error | null) => {
          if (loginError) {
            fail(loginError);
            return;
          }

          connection.send({ from: mail.from, to: mail.to }, body, (sendError: Error | null) => {
            if (sendError) {
              fail(sendError);
              return;
            }
            if (settled) {
              return;
            }
            settled = true;
            connection.quit();
            resolve();
          });
        });
      });
    });
  }
}
