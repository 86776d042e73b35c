export { decodeBase64Strict, parseDataUri } from "./attachments.js";
export type { DataUri } from "./attachments.js";
export { buildFinalReport, postEvaluation } from "./callback.js";
export type { FinalReport } from "./callback.js";
export { GeminiApiError, GeminiConfigError, GitHubApiError, attempt, errorMessage } from "./errors.js";
export { GeminiClient, decodeContent, extractText, findStringLeaf } from "./gemini.js";
export type { ChatOptions, GeminiContent, GeminiOptions, TextGenerator } from "./gemini.js";
export { fallbackFiles, generateProjectFromBrief, parseGeneratedFiles } from "./generate.js";
export { GitHubClient } from "./github.js";
export type { GitHubOptions, RemoteFile } from "./github.js";
export { MAIN_BRANCH, PAGES_BRANCH, branchForRound, pagesUrlFor, repoNameFor } from "./naming.js";
export { DEFAULT_TIMEOUTS, runTask } from "./orchestrator.js";
export type { PipelineDeps, PipelineTimeouts } from "./orchestrator.js";
export { FALLBACK_CSS, FALLBACK_INDEX, FALLBACK_JS, mitLicense } from "./templates.js";
export { GENERATED_FILE_NAMES } from "./types.js";
export type {
  Attachment,
  FailedReport,
  FetchLike,
  GeneratedFileName,
  GeneratedFiles,
  PublishedFile,
  RepoHandle,
  ReportChecks,
  StepResult,
  TaskReport,
  TaskRequest,
} from "./types.js";
