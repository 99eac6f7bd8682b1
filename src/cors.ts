import type { FastifyReply } from 'fastify';

import { asciiLowerEqualsSpan } from './ascii.js';

export const MAX_CORS_REQUEST_HEADERS_LEN = 4096;

export const CORS_ALLOW_ORIGIN = '*';
export const CORS_ALLOW_METHODS = 'GET, POST, OPTIONS';

function isAsciiWhitespace(code: number): boolean {
  return code <= 0x20;
}

// RFC 7230 tchar.
const TCHAR_PUNCTUATION = "!#$%&'*+-.^_`|~";

function isHttpTokenChar(code: number): boolean {
  if (code >= 0x30 && code <= 0x39) return true;
  if (code >= 0x41 && code <= 0x5a) return true;
  if (code >= 0x61 && code <= 0x7a) return true;
  return TCHAR_PUNCTUATION.includes(String.fromCharCode(code));
}

function isValidCorsHeaderNameList(s: string): boolean {
  for (let i = 0; i < s.length; i += 1) {
    const c = s.charCodeAt(i);
    if (c === 0x2c /* ',' */ || isAsciiWhitespace(c) || isHttpTokenChar(c)) continue;
    return false;
  }
  return true;
}

function corsHeaderListHasToken(s: string, lowerToken: string): boolean {
  let i = 0;
  while (i < s.length) {
    while (i < s.length && (isAsciiWhitespace(s.charCodeAt(i)) || s.charCodeAt(i) === 0x2c)) i += 1;
    if (i >= s.length) break;
    const start = i;
    while (i < s.length && isHttpTokenChar(s.charCodeAt(i))) i += 1;
    if (asciiLowerEqualsSpan(s, start, i, lowerToken)) return true;
    while (i < s.length && s.charCodeAt(i) !== 0x2c) i += 1;
  }
  return false;
}

function sanitizeCorsRequestHeaders(value: unknown): string | undefined {
  let raw: string;
  if (typeof value === 'string') raw = value;
  else if (Array.isArray(value) && value.length === 1 && typeof value[0] === 'string') raw = value[0];
  else return undefined;

  const trimmed = raw.trim();
  if (trimmed === '') return undefined;
  if (trimmed.length > MAX_CORS_REQUEST_HEADERS_LEN) return undefined;
  if (!isValidCorsHeaderNameList(trimmed)) return undefined;
  return trimmed;
}

/** `Access-Control-Allow-Headers`: always Content-Type, plus whatever a preflight asked for. */
export function corsAllowHeadersValue(requestHeaders: unknown): string {
  const requested = sanitizeCorsRequestHeaders(requestHeaders);
  if (!requested) return 'Content-Type';
  return corsHeaderListHasToken(requested, 'content-type') ? requested : `Content-Type, ${requested}`;
}

export function applyPermissiveCors(reply: FastifyReply, requestHeaders?: unknown): void {
  reply.header('access-control-allow-origin', CORS_ALLOW_ORIGIN);
  reply.header('access-control-allow-methods', CORS_ALLOW_METHODS);
  reply.header('access-control-allow-headers', corsAllowHeadersValue(requestHeaders));
}
