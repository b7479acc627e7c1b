/**
 * Message Assembly
 *
 * Builds the raw message handed to the SMTP relay from a validated
 * EmailRequest and the caller's username.
 */

export interface EmailRequest {
  to: string[];
  subject: string;
  content: string;
  /** Display name shown next to the sender address */
  title?: string;
}

// Heuristic only: exotic markup without any of these is sent as plain text
const HTML_PATTERN = /<html|<body|<div|<p>|<table|<a\s+href|<img|<span|<h[1-6]|<!DOCTYPE html>/i;

export function isHtml(content: string): boolean {
  return HTML_PATTERN.test(content);
}

function isWordChar(ch: string): boolean {
  if (/\s/u.test(ch)) {
    return false;
  }
  if (ch.charCodeAt(0) < 0x80) {
    return /[A-Za-z0-9_]/.test(ch);
  }
  return true;
}

// Digraph letters whose title case differs from their upper case
const TITLE_CASE_DIGRAPHS: Record<string, string> = {
  "\u01C4": "\u01C5",
  "\u01C5": "\u01C5",
  "\u01C6": "\u01C5",
  "\u01C7": "\u01C8",
  "\u01C8": "\u01C8",
  "\u01C9": "\u01C8",
  "\u01CA": "\u01CB",
  "\u01CB": "\u01CB",
  "\u01CC": "\u01CB",
  "\u01F1": "\u01F2",
  "\u01F2": "\u01F2",
  "\u01F3": "\u01F2",
};

/** Title case of a single code point; characters that would expand (ß -> SS) stay as they are. */
function toTitle(ch: string): string {
  const digraph = TITLE_CASE_DIGRAPHS[ch];
  if (digraph !== undefined) {
    return digraph;
  }
  const upper = ch.toUpperCase();
  return [...upper].length === 1 ? upper : ch;
}

/**
 * Title-case the first letter of every word. A word starts after whitespace
 * or any ASCII character other than a letter, digit or underscore, so
 * "john.doe" becomes "John.Doe". The rest of each word is left as is.
 */
export function titleCase(value: string): string {
  let result = "";
  let atBoundary = true;

  for (const ch of value) {
    result += atBoundary ? toTitle(ch) : ch;
    atBoundary = !isWordChar(ch);
  }
  return result;
}

function headerValue(value: string): string {
  return value.replace(/[\r\n]/g, "");
}

/**
 * The From header value for a sender.
 *
 * - explicit title: "Title" <username>
 * - email-shaped username: "Local" <username>, local part title-cased
 * - otherwise the bare username
 */
export function displayTitle(username: string, title?: string): string {
  if (title) {
    return `"${title}" <${username}>`;
  }

  const at = username.indexOf("@");
  if (at !== -1) {
    return `"${titleCase(username.slice(0, at))}" <${username}>`;
  }

  return username;
}

export function buildMessage(username: string, request: EmailRequest): { raw: string; html: boolean } {
  const html = isHtml(request.content);

  const headers = [
    `From: ${headerValue(displayTitle(username, request.title))}`,
    `To: ${headerValue(request.to.join(", "))}`,
    `Subject: ${headerValue(request.subject)}`,
  ];

  if (html) {
    headers.push("MIME-Version: 1.0", "Content-Type: text/html; charset=UTF-8");
  } else {
    headers.push("Content-Type: text/plain; charset=UTF-8");
  }

  return { raw: `${headers.join("\r\n")}\r\n\r\n${request.content}`, html };
}
