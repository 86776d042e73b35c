export type Attachment = {
  name: string;
  uri: string; // data:<mime>;base64,<payload>
};

export type TaskRequest = {
  email?: string;
  task: string;
  round: number;     // >= 1
  nonce: string;
  brief: string;
  evaluationUrl?: string;
  attachments: Attachment[];
};

export const GENERATED_FILE_NAMES = ["index.html", "styles.css", "script.js"] as const;

export type GeneratedFileName = (typeof GENERATED_FILE_NAMES)[number];

export type GeneratedFiles = Record<GeneratedFileName, Buffer>;

export type RepoHandle = {
  owner: string;
  name: string;
  htmlUrl: string;
  defaultBranch: "main";
};

export type PublishedFile = { name: string; branch: string };

export type ReportChecks = {
  pages_created?: boolean;
  readme_generated?: boolean;
};

export type TaskReport = {
  id: string;
  status: "pending" | "done" | "done_with_errors";
  repo: string | null;
  pages_url: string | null;
  errors: string[];
  llm_files: PublishedFile[];
  attachments_uploaded: PublishedFile[];
  checks: ReportChecks;
  evaluation_posted?: boolean;
  evaluation_status_code?: number;
};

export type FailedReport = {
  status: "failed";
  errors: string[];
};

/** Narrow shape every outbound call goes through; global fetch satisfies it. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Outcome of one pipeline stage. */
export type StepResult<T> = { ok: true; value: T } | { ok: false; error: string };
