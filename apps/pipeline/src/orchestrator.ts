import { v4 as uuidv4 } from "uuid";
import { decodeBase64Strict, parseDataUri } from "./attachments.js";
import { buildFinalReport, postEvaluation } from "./callback.js";
import { attempt } from "./errors.js";
import type { TextGenerator } from "./gemini.js";
import { generateProjectFromBrief } from "./generate.js";
import type { GitHubClient } from "./github.js";
import { MAIN_BRANCH, PAGES_BRANCH, branchForRound, pagesUrlFor, repoNameFor } from "./naming.js";
import { FALLBACK_INDEX, mitLicense } from "./templates.js";
import type { FetchLike, GeneratedFiles, RepoHandle, StepResult, TaskReport, TaskRequest } from "./types.js";

export type PipelineTimeouts = {
  generationMs: number;
  readmeMs: number;
  callbackMs: number;
};

export const DEFAULT_TIMEOUTS: PipelineTimeouts = {
  generationMs: 60_000,
  readmeMs: 60_000,
  callbackMs: 5_000,
};

export type PipelineDeps = {
  llm: TextGenerator;
  github: GitHubClient;
  fetchImpl?: FetchLike;           // evaluation callback
  timeouts?: Partial<PipelineTimeouts>;
  now?: () => Date;
  newId?: () => string;
};

// Everything a stage needs for one run
type RunContext = {
  task: TaskRequest;
  repo: RepoHandle;
  report: TaskReport;
  github: GitHubClient;
  llm: TextGenerator;
  fetchImpl: FetchLike;
  timeouts: PipelineTimeouts;
  now: () => Date;
};

const README_SYSTEM = "You are an assistant that writes concise README files for small demo repos.";

function fail(report: TaskReport, tag: string, detail?: string) {
  report.errors.push(detail === undefined ? tag : `${tag}:${detail}`);
}

/** Folds a stage result into the report; returns the value on success. */
function record<T>(report: TaskReport, tag: string, res: StepResult<T>): T | undefined {
  if (res.ok) return res.value;
  fail(report, tag, res.error);
  return undefined;
}

function finish(report: TaskReport): TaskReport {
  report.status = report.errors.length === 0 ? "done" : "done_with_errors";
  return report;
}

/* ---------- 2) LICENSE + attachments ---------- */

async function bootstrapContent(ctx: RunContext): Promise<void> {
  const { github, repo, report, task } = ctx;

  const license = mitLicense(ctx.now().getUTCFullYear(), repo.owner);
  record(
    report,
    "license_failed",
    await attempt(() => github.putFile(repo.owner, repo.name, "LICENSE", Buffer.from(license, "utf-8"), "Add LICENSE", MAIN_BRANCH))
  );

  let pagesReady: StepResult<unknown> | undefined;

  for (const att of task.attachments) {
    if (!att.uri.startsWith("data:")) {
      console.log("attachment skipped (not a data uri)", report.id, att.name);
      continue;
    }
    const parsed = parseDataUri(att.uri);
    if (!parsed) {
      fail(report, "attachment_malformed", att.name);
      continue;
    }
    const decoded = await attempt(async () => decodeBase64Strict(parsed.base64));
    if (!decoded.ok) {
      fail(report, "attachment_base64_decode_failed", `${att.name}:${decoded.error}`);
      continue;
    }
    const bytes = decoded.value;

    const main = await attempt(() => github.putFile(repo.owner, repo.name, att.name, bytes, `Add ${att.name}`, MAIN_BRANCH));
    if (main.ok) report.attachments_uploaded.push({ name: att.name, branch: MAIN_BRANCH });
    else fail(report, `attachment_main_failed:${att.name}`, main.error);

    // gh-pages branches from main, so it can only exist once main has a commit
    pagesReady ??= await attempt(() => github.ensureBranch(repo.owner, repo.name, PAGES_BRANCH, MAIN_BRANCH));
    const pages = pagesReady.ok
      ? await attempt(() => github.putFile(repo.owner, repo.name, att.name, bytes, `Add ${att.name} for pages`, PAGES_BRANCH))
      : pagesReady;
    if (pages.ok) report.attachments_uploaded.push({ name: att.name, branch: PAGES_BRANCH });
    else fail(report, `attachment_pages_failed:${att.name}`, pages.error);
  }
}

/* ---------- 3) generated files on the round branch ---------- */

async function publishRoundContent(ctx: RunContext, targetBranch: string): Promise<GeneratedFiles | undefined> {
  const { github, repo, report, task } = ctx;

  const generated = record(
    report,
    "llm_generation_failed",
    await attempt(() =>
      generateProjectFromBrief(ctx.llm, task.brief || `Task: ${task.task}`, task.task, ctx.timeouts.generationMs)
    )
  );
  if (!generated) return undefined;

  if (targetBranch !== MAIN_BRANCH) {
    record(
      report,
      "round_branch_failed",
      await attempt(() => github.ensureBranch(repo.owner, repo.name, targetBranch, MAIN_BRANCH))
    );
  }

  for (const [fname, content] of Object.entries(generated)) {
    const res = await attempt(() =>
      github.putFile(repo.owner, repo.name, fname, content, `Add ${fname} from LLM`, targetBranch)
    );
    if (res.ok) report.llm_files.push({ name: fname, branch: targetBranch });
    else fail(report, `llm_file_upload_failed:${fname}`, res.error);
  }
  return generated;
}

/* ---------- 4) gh-pages ---------- */

async function publishPages(ctx: RunContext, targetBranch: string, generated?: GeneratedFiles): Promise<void> {
  const { github, repo, report } = ctx;

  const mainRef = await attempt(() => github.getRef(repo.owner, repo.name, MAIN_BRANCH));
  if (!mainRef.ok || !mainRef.value) {
    fail(report, "gh_pages_failed", "main_missing");
    report.checks.pages_created = false;
    return;
  }
  const mainSha = mainRef.value.sha;

  const pagesRef = await attempt(() => github.getRef(repo.owner, repo.name, PAGES_BRANCH));
  if (!pagesRef.ok || !pagesRef.value) {
    record(
      report,
      "gh_pages_ref_create_failed",
      await attempt(() => github.createRef(repo.owner, repo.name, PAGES_BRANCH, mainSha))
    );
  }

  // an unreadable round-branch index counts as absent
  const remote = await attempt(() => github.getFile(repo.owner, repo.name, "index.html", targetBranch));
  if (!remote.ok) console.warn("index.html read failed", report.id, targetBranch, remote.error);
  let content = remote.ok ? remote.value?.content : undefined;
  if (!content || content.length === 0) {
    content = generated?.["index.html"] ?? Buffer.from(FALLBACK_INDEX, "utf-8");
  }
  const page = content;

  const published = await attempt(() =>
    github.putFile(repo.owner, repo.name, "index.html", page, "Add index.html for gh-pages", PAGES_BRANCH)
  );

  if (published.ok) {
    report.pages_url = pagesUrlFor(repo.owner, repo.name);
    report.checks.pages_created = true;
  } else {
    fail(report, "gh_pages_failed", published.error);
    report.checks.pages_created = false;
  }
}

/* ---------- 5) README ---------- */

async function refreshReadme(ctx: RunContext): Promise<void> {
  const { github, repo, report, task } = ctx;
  const user = `Write a short professional README describing: ${task.brief}\nInclude usage instructions and files created.`;

  const text = await attempt(() => ctx.llm.chat(README_SYSTEM, user, { timeoutMs: ctx.timeouts.readmeMs, maxOutputTokens: 800 }));
  if (!text.ok) {
    fail(report, "readme_generation_failed", text.error);
    report.checks.readme_generated = false;
    return;
  }
  if (!text.value.trim()) {
    console.warn("empty README from LLM", report.id);
    report.checks.readme_generated = false;
    return;
  }

  const upload = await attempt(() =>
    github.putFile(repo.owner, repo.name, "README.md", Buffer.from(text.value, "utf-8"), "Update README via LLM", MAIN_BRANCH)
  );
  report.checks.readme_generated = upload.ok;
  if (!upload.ok) fail(report, "readme_upload_failed", upload.error);
}

/* ---------- 6) evaluation callback ---------- */

async function notifyEvaluator(ctx: RunContext): Promise<void> {
  const { report, task } = ctx;
  if (!task.evaluationUrl) return;
  const url = task.evaluationUrl;

  const res = await attempt(() =>
    postEvaluation(ctx.fetchImpl, url, buildFinalReport(task, report, ctx.now()), ctx.timeouts.callbackMs)
  );
  if (res.ok) {
    report.evaluation_posted = res.value.ok;
    report.evaluation_status_code = res.value.status;
  } else {
    fail(report, "evaluation_post_failed", res.error);
    report.evaluation_posted = false;
  }
}

/**
 * Runs one task submission end to end. Only a failure to resolve the
 * repository stops the run; every later failure is recorded in `errors`
 * and the next stage still runs.
 */
export async function runTask(task: TaskRequest, deps: PipelineDeps): Promise<TaskReport> {
  const report: TaskReport = {
    id: (deps.newId ?? uuidv4)(),
    status: "pending",
    repo: null,
    pages_url: null,
    errors: [],
    llm_files: [],
    attachments_uploaded: [],
    checks: {},
  };
  const fetchImpl = deps.fetchImpl ?? fetch;
  const timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
  const now = deps.now ?? (() => new Date());
  const repoName = repoNameFor(task.task, task.nonce);

  // 1) reuse or create the repository
  const resolved = await attempt(() => deps.github.ensureRepo(repoName, task.brief));
  if (!resolved.ok) {
    fail(report, "repo_create_failed", resolved.error);
    console.error("repo resolution failed", report.id, repoName, resolved.error);
    finish(report);
    if (task.evaluationUrl) {
      const url = task.evaluationUrl;
      const cb = await attempt(() =>
        postEvaluation(fetchImpl, url, { status: "repo_create_failed", details: report }, timeouts.callbackMs)
      );
      if (!cb.ok) console.warn("early evaluation callback failed", report.id, cb.error);
    }
    return report;
  }

  const { repo, created } = resolved.value;
  report.repo = repo.htmlUrl;
  console.log(created ? "repo created" : "repo reused", report.id, `${repo.owner}/${repo.name}`);

  const ctx: RunContext = { task, repo, report, github: deps.github, llm: deps.llm, fetchImpl, timeouts, now };
  const targetBranch = branchForRound(task.round);

  await bootstrapContent(ctx);
  const generated = await publishRoundContent(ctx, targetBranch);
  await publishPages(ctx, targetBranch, generated);
  await refreshReadme(ctx);
  await notifyEvaluator(ctx);

  finish(report);
  console.log(
    "task processed",
    report.id,
    `${repo.owner}/${repo.name}`,
    `round:${task.round}`,
    report.status,
    `(${report.errors.length} errors)`
  );
  return report;
}
