function lowerAsciiCode(code: number): number {
  return code >= 0x41 && code <= 0x5a ? code + 0x20 : code;
}

export function asciiLowerEqualsSpan(s: string, start: number, end: number, lower: string): boolean {
  if (end - start !== lower.length) return false;
  for (let i = 0; i < lower.length; i += 1) {
    if (lowerAsciiCode(s.charCodeAt(start + i)) !== lower.charCodeAt(i)) return false;
  }
  return true;
}

export function asciiLowerEquals(s: string, lower: string): boolean {
  return asciiLowerEqualsSpan(s, 0, s.length, lower);
}
