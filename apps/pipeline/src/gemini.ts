import { GeminiApiError, GeminiConfigError } from "./errors.js";
import type { FetchLike } from "./types.js";

export type ChatOptions = {
  timeoutMs?: number;
  maxOutputTokens?: number;
};

/** Anything that can answer a system/user prompt pair with plain text. */
export interface TextGenerator {
  chat(systemPrompt: string, userPrompt: string, opts?: ChatOptions): Promise<string>;
}

export type GeminiOptions = {
  apiKey?: string;
  model: string;
  apiBase: string;
  fetchImpl?: FetchLike;
};

const TEMPERATURE = 0.2;
const MIN_LEAF_LENGTH = 10;
const PRIORITY_KEYS = ["text", "parts", "content", "output"] as const;

// Decoded view of candidates[0].content
export type GeminiContent =
  | { kind: "parts"; parts: string[] }
  | { kind: "text"; text: string }
  | { kind: "unknown" };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// empty arrays and strings do not count as an answer
function isFilled(v: unknown): boolean {
  if (Array.isArray(v) || typeof v === "string") return v.length > 0;
  return Boolean(v);
}

function partToText(p: unknown): string {
  if (typeof p === "string") return p;
  if (isRecord(p) && typeof p.text === "string") return p.text;
  return JSON.stringify(p);
}

export function decodeContent(body: unknown): GeminiContent {
  if (!isRecord(body) || !Array.isArray(body.candidates) || body.candidates.length === 0) {
    return { kind: "unknown" };
  }
  const first: unknown = body.candidates[0];
  if (!isRecord(first)) return { kind: "unknown" };
  const content = first.content;

  if (typeof content === "string") {
    return content.trim() ? { kind: "text", text: content } : { kind: "unknown" };
  }
  if (!isRecord(content)) return { kind: "unknown" };

  const parts = [content.parts, content.text, content.output].find(isFilled);
  if (Array.isArray(parts) && parts.length > 0) {
    return { kind: "parts", parts: parts.map(partToText) };
  }
  if (typeof parts === "string" && parts.trim()) {
    return { kind: "text", text: parts };
  }
  return { kind: "unknown" };
}

/** Depth-first search for the first string leaf long enough to be an answer. */
export function findStringLeaf(node: unknown): string | undefined {
  if (typeof node === "string") {
    const s = node.trim();
    return s.length >= MIN_LEAF_LENGTH ? s : undefined;
  }
  if (Array.isArray(node)) {
    for (const el of node) {
      const hit = findStringLeaf(el);
      if (hit) return hit;
    }
    return undefined;
  }
  if (isRecord(node)) {
    for (const key of PRIORITY_KEYS) {
      if (key in node) {
        const hit = findStringLeaf(node[key]);
        if (hit) return hit;
      }
    }
    for (const value of Object.values(node)) {
      const hit = findStringLeaf(value);
      if (hit) return hit;
    }
  }
  return undefined;
}

/**
 * Best-effort plain text from a generateContent response. Falls back to the
 * pretty-printed body when no usable string exists anywhere in it.
 */
export function extractText(body: unknown): string {
  const decoded = decodeContent(body);
  let text = "";
  if (decoded.kind === "parts") text = decoded.parts.join("\n").trim();
  else if (decoded.kind === "text") text = decoded.text.trim();
  if (text) return text;

  return findStringLeaf(body) ?? JSON.stringify(body, null, 2);
}

export class GeminiClient implements TextGenerator {
  private readonly apiBase: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: GeminiOptions) {
    this.apiBase = opts.apiBase.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async chat(systemPrompt: string, userPrompt: string, opts: ChatOptions = {}): Promise<string> {
    if (!this.opts.apiKey) throw new GeminiConfigError();

    const { timeoutMs = 60_000, maxOutputTokens = 1500 } = opts;
    const url = `${this.apiBase}/models/${this.opts.model}:generateContent`;
    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": this.opts.apiKey,
      },
      body: JSON.stringify({
        contents: [{ role: "user", parts: [{ text: `${systemPrompt}\n\n${userPrompt}` }] }],
        generationConfig: { maxOutputTokens, temperature: TEMPERATURE },
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    const raw = await res.text();
    if (!res.ok) throw new GeminiApiError(res.status, raw);

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      // 2xx but not JSON: hand the text back as-is, callers fall back downstream
      return raw;
    }
    return extractText(body);
  }
}
