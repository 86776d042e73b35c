import { z } from 'zod';
import type { Attachment, TaskRequest } from '@pagesmith/pipeline';

const AttachmentSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
  data: z.string().optional(),
});

// null and "" mean "not supplied"
const blank = (v: unknown) => (v === null || v === '' ? undefined : v);
const optionalText = z.preprocess(blank, z.string().optional());

// Wire shape of POST /upload-task
export const TaskBodySchema = z.object({
  email: optionalText,
  task: z.preprocess(blank, z.coerce.string().default('task')),
  round: z.preprocess((v) => (v === 0 ? undefined : blank(v)), z.coerce.number().int().min(1).default(1)),
  nonce: z.preprocess(blank, z.coerce.string().optional()),
  brief: z.preprocess((v) => (v === null ? undefined : v), z.string().default('')),
  evaluation_url: optionalText,
  attachments: z.preprocess((v) => (Array.isArray(v) ? v : undefined), z.array(z.unknown()).default([])),
});

export type TaskBody = z.infer<typeof TaskBodySchema>;

function toAttachment(raw: unknown): Attachment | null {
  const parsed = AttachmentSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { name, url, data } = parsed.data;
  return { name: name || 'sample.png', uri: url || data || '' };
}

export function toTaskRequest(body: TaskBody, now: Date = new Date()): TaskRequest {
  return {
    email: body.email,
    task: body.task,
    round: body.round,
    nonce: body.nonce ?? String(Math.floor(now.getTime() / 1000)),
    brief: body.brief,
    evaluationUrl: body.evaluation_url,
    attachments: body.attachments.map(toAttachment).filter((a): a is Attachment => a !== null),
  };
}
