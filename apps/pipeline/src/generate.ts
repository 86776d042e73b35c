import type { TextGenerator } from "./gemini.js";
import { FALLBACK_CSS, FALLBACK_INDEX, FALLBACK_JS } from "./templates.js";
import { GENERATED_FILE_NAMES } from "./types.js";
import type { GeneratedFileName, GeneratedFiles } from "./types.js";

const MARKER_RE = /---(index\.html|styles\.css|script\.js)---/;
const FENCE_OPEN_RE = /^```(?:\w+)?\s*/;
const FENCE_CLOSE_RE = /\s*```$/;
const OBJECT_RE = /\{[\s\S]*\}/;

const FALLBACK_TEXT: Record<GeneratedFileName, string> = {
  "index.html": FALLBACK_INDEX,
  "styles.css": FALLBACK_CSS,
  "script.js": FALLBACK_JS,
};

const SYSTEM_PROMPT =
  "You are a senior front-end engineer. Given a short brief, produce a minimal but complete " +
  "front-end project. Output exactly three sections in plain text using these delimiters:\n" +
  "---index.html---\n(HTML content)\n---styles.css---\n(CSS content)\n---script.js---\n(JS content)\n\n" +
  "Do NOT output JSON, do NOT wrap in markdown fences. Keep files small and self-contained.";

function isGeneratedFileName(name: string): name is GeneratedFileName {
  return GENERATED_FILE_NAMES.some((n) => n === name);
}

/** Fills every key missing from `partial` with its fallback content. */
function withDefaults(partial: Partial<Record<GeneratedFileName, string>>): GeneratedFiles {
  const pick = (name: GeneratedFileName) => Buffer.from(partial[name] || FALLBACK_TEXT[name], "utf-8");
  return {
    "index.html": pick("index.html"),
    "styles.css": pick("styles.css"),
    "script.js": pick("script.js"),
  };
}

export function fallbackFiles(): GeneratedFiles {
  return withDefaults({});
}

function parseMarkers(raw: string): GeneratedFiles | null {
  // split() keeps the captured file name at every odd index
  const segments = raw.split(MARKER_RE);
  const fragments = new Map<GeneratedFileName, string[]>();

  for (let i = 1; i < segments.length; i += 2) {
    const name = segments[i];
    if (!isGeneratedFileName(name)) continue;
    const list = fragments.get(name) ?? [];
    const body = (segments[i + 1] ?? "").trim();
    if (body) list.push(body);
    fragments.set(name, list);
  }

  const joined: Partial<Record<GeneratedFileName, string>> = {};
  for (const [name, list] of fragments) joined[name] = list.join("\n");

  if (!joined["index.html"]) return null;
  return withDefaults(joined);
}

function parseJsonObject(raw: string): GeneratedFiles | null {
  const txt = raw.trim().replace(FENCE_OPEN_RE, "").replace(FENCE_CLOSE_RE, "");
  const m = OBJECT_RE.exec(txt);
  if (!m) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(m[0]);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;

  const out: Partial<Record<GeneratedFileName, string>> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isGeneratedFileName(key) && typeof value === "string" && value) out[key] = value;
  }
  if (Object.keys(out).length === 0) return null;
  return withDefaults(out);
}

/**
 * Turns raw model output into the three site files. Tries the marker format,
 * then a JSON object, then the fallback templates; never throws.
 */
export function parseGeneratedFiles(raw: string): GeneratedFiles {
  return parseMarkers(raw) ?? parseJsonObject(raw) ?? fallbackFiles();
}

export async function generateProjectFromBrief(
  llm: TextGenerator,
  brief: string,
  taskName: string,
  timeoutMs = 60_000
): Promise<GeneratedFiles> {
  const userPrompt = `Task: ${taskName}\nBrief: ${brief}\nProduce the files as described.`;
  const raw = await llm.chat(SYSTEM_PROMPT, userPrompt, { timeoutMs, maxOutputTokens: 2000 });
  return parseGeneratedFiles(raw);
}
