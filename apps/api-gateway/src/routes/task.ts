import { Router } from 'express';
import { errorMessage, runTask } from '@pagesmith/pipeline';
import type { FailedReport, PipelineDeps } from '@pagesmith/pipeline';
import { verifySubmissionSecret } from '../secret.js';
import { TaskBodySchema, toTaskRequest } from '../types.js';

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function failed(message: string): FailedReport {
  return { status: 'failed', errors: [message] };
}

/**
 * POST /upload-task
 * Runs the whole publish pipeline and answers with its report.
 */
export function taskRouter(deps: PipelineDeps, submissionSecret: string | undefined): Router {
  const router = Router();

  router.post('/upload-task', async (req, res) => {
    const body: unknown = req.body;
    if (!isPlainObject(body)) {
      return res.status(200).json(failed('body must be a JSON object'));
    }
    if (!verifySubmissionSecret(body, submissionSecret)) {
      return res.status(401).json(failed('secret mismatch'));
    }

    try {
      const task = toTaskRequest(TaskBodySchema.parse(body));
      const report = await runTask(task, deps);
      return res.status(200).json(report);
    } catch (err: unknown) {
      console.error('POST /upload-task error', err);
      return res.status(200).json(failed(errorMessage(err)));
    }
  });

  return router;
}
