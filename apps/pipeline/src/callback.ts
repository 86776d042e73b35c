import type { FetchLike, PublishedFile, ReportChecks, TaskReport, TaskRequest } from "./types.js";

export type FinalReport = {
  email: string | null;
  task: string;
  round: number;
  repo: string | null;
  pages_url: string | null;
  checks: ReportChecks;
  errors: string[];
  llm_files: PublishedFile[];
  attachments_uploaded: PublishedFile[];
  timestamp: number;
};

/** Condensed report sent to the evaluator; internal bookkeeping stays out. */
export function buildFinalReport(task: TaskRequest, report: TaskReport, now: Date): FinalReport {
  return {
    email: task.email ?? null,
    task: task.task,
    round: task.round,
    repo: report.repo,
    pages_url: report.pages_url,
    checks: { ...report.checks },
    errors: [...report.errors],
    llm_files: [...report.llm_files],
    attachments_uploaded: [...report.attachments_uploaded],
    timestamp: Math.floor(now.getTime() / 1000),
  };
}

export async function postEvaluation(
  fetchImpl: FetchLike,
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<{ ok: boolean; status: number }> {
  const res = await fetchImpl(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(timeoutMs),
  });
  return { ok: res.ok, status: res.status };
}
