import express from 'express';
import bodyParser from 'body-parser';
import { GeminiClient, GitHubClient } from '@pagesmith/pipeline';
import type { FetchLike, PipelineDeps, TextGenerator } from '@pagesmith/pipeline';
import type { AppConfig } from './config.js';
import { solveRouter } from './routes/solve.js';
import { taskRouter } from './routes/task.js';

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Authorization, Content-Type',
  'Access-Control-Max-Age': '86400',
};

export type AppDeps = {
  config: AppConfig;
  fetchImpl?: FetchLike;   // every outbound call, including GitHub and Gemini
  llm?: TextGenerator;
  github?: GitHubClient;
};

export function createApp({ config, fetchImpl = fetch, llm, github }: AppDeps) {
  const gemini = llm ?? new GeminiClient({ ...config.gemini, fetchImpl });
  const pipeline: PipelineDeps = {
    llm: gemini,
    github: github ?? new GitHubClient({ ...config.github, fetchImpl }),
    fetchImpl,
    timeouts: { callbackMs: config.evaluationTimeoutMs },
  };

  const app = express();
  // any origin may call the API; preflights end here
  app.use((req, res, next) => {
    res.set(CORS_HEADERS);
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });
  // non-object JSON gets a structured answer from the route, not a parser error
  app.use(bodyParser.json({ limit: '10mb', strict: false }));

  app.get('/', (_req, res) =>
    res.json({ status: 'ready', note: 'POST application/json to /upload-task with the task JSON body.' })
  );
  app.get('/healthz', (_req, res) => res.json({ ok: true }));

  app.use(taskRouter(pipeline, config.submissionSecret));
  app.use(solveRouter(gemini, fetchImpl));

  return app;
}
