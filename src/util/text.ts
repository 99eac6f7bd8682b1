const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8");

function coerceString(input: unknown): string {
  try {
    return String(input ?? "");
  } catch {
    return "";
  }
}

function isForbiddenInOneLine(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029 || /\s/u.test(ch);
}

/**
 * Collapses whitespace and control characters to single spaces and truncates to `maxBytes` of
 * UTF-8 without splitting a code point. Used for anything echoed into logs or HTTP responses.
 */
export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return "";

  const buf = new Uint8Array(maxBytes);
  let written = 0;
  let pendingSpace = false;
  for (const ch of coerceString(input)) {
    if (isForbiddenInOneLine(ch)) {
      pendingSpace = written > 0;
      continue;
    }

    if (pendingSpace) {
      const spaceRes = textEncoder.encodeInto(" ", buf.subarray(written));
      if (spaceRes.written === 0) break;
      written += spaceRes.written;
      pendingSpace = false;
      if (written >= maxBytes) break;
    }

    const res = textEncoder.encodeInto(ch, buf.subarray(written));
    if (res.written === 0) break;
    written += res.written;
    if (written >= maxBytes) break;
  }
  return written === 0 ? "" : textDecoder.decode(buf.subarray(0, written));
}

function errorMessageInput(err: unknown): string {
  if (err === null) return "null";
  if (typeof err === "string") return err;
  if (typeof err !== "object" && typeof err !== "function") return String(err);
  try {
    if ("message" in err && typeof err.message === "string") return err.message;
  } catch {
    // ignore getters throwing
  }
  // Avoid calling toString() on arbitrary objects (can throw / be expensive).
  return "Error";
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = "Error"): string {
  return formatOneLineUtf8(errorMessageInput(err), maxBytes) || fallback || "Error";
}
