const DATA_URI_RE = /^data:([^;,]+);base64,(.+)$/s;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export type DataUri = { mime: string; base64: string };

export function parseDataUri(uri: string): DataUri | null {
  const m = DATA_URI_RE.exec(uri);
  if (!m) return null;
  return { mime: m[1], base64: m[2] };
}

/** Buffer.from() silently skips junk, so validate the alphabet and padding first. */
export function decodeBase64Strict(b64: string): Buffer {
  const compact = b64.replace(/\s+/g, "");
  if (compact.length % 4 !== 0) throw new Error("Incorrect padding");
  if (!BASE64_RE.test(compact)) throw new Error("Invalid base64-encoded string");
  return Buffer.from(compact, "base64");
}
