import { Router } from 'express';
import { errorMessage } from '@pagesmith/pipeline';
import type { FetchLike, TextGenerator } from '@pagesmith/pipeline';

export const UNREADABLE = 'ERROR:UNREADABLE';

const SYSTEM_PROMPT =
  `You are an assistant that extracts short textual captchas from base64 images. Reply only with the text or ${UNREADABLE}.`;

function userPrompt(b64: string): string {
  return (
    `Below is a base64-encoded image. Try to read any textual characters. If unreadable, reply EXACTLY: ${UNREADABLE}.\n\n` +
    `IMAGE_BASE64_START\n${b64}\nIMAGE_BASE64_END\n\nReply ONLY with the extracted text.`
  );
}

/**
 * GET /solve?url=<image>
 * Fetches the image and asks the LLM to transcribe any short text in it.
 */
export function solveRouter(llm: TextGenerator, fetchImpl: FetchLike): Router {
  const router = Router();

  router.get('/solve', async (req, res) => {
    const url = typeof req.query.url === 'string' ? req.query.url : '';
    if (!url) return res.status(400).json({ detail: 'url query parameter is required' });

    let image: Buffer;
    try {
      const r = await fetchImpl(url, { signal: AbortSignal.timeout(30_000) });
      if (r.status !== 200) {
        return res.status(400).json({ detail: `Failed to fetch url: ${r.status}` });
      }
      image = Buffer.from(await r.arrayBuffer());
    } catch (err: unknown) {
      return res.status(400).json({ detail: `fetch error: ${errorMessage(err)}` });
    }

    try {
      const solved = await llm.chat(SYSTEM_PROMPT, userPrompt(image.toString('base64')), {
        timeoutMs: 40_000,
        maxOutputTokens: 128,
      });
      return res.json({ solved_text: solved.trim() || UNREADABLE });
    } catch (err: unknown) {
      console.error('GET /solve error', err);
      return res.status(500).json({ detail: `LLM error: ${errorMessage(err)}` });
    }
  });

  return router;
}
