import { describe, it, expect, beforeEach } from "vitest";
import { GeminiClient } from "../src/gemini.js";
import { GitHubClient } from "../src/github.js";
import { runTask } from "../src/orchestrator.js";
import type { PipelineDeps } from "../src/orchestrator.js";
import { FALLBACK_CSS, FALLBACK_INDEX, FALLBACK_JS } from "../src/templates.js";
import type { TaskRequest } from "../src/types.js";
import { FakeRemote, GEMINI_API, README_OUTPUT } from "./fake-remote.js";

const NOW = new Date("2026-03-01T00:00:00Z");

function task(overrides: Partial<TaskRequest> = {}): TaskRequest {
  return { task: "landing", nonce: "42", round: 1, brief: "a signup form", attachments: [], ...overrides };
}

function depsFor(remote: FakeRemote, id = "run-1"): PipelineDeps {
  return {
    llm: new GeminiClient({ apiKey: "test-key", model: "test-model", apiBase: GEMINI_API, fetchImpl: remote.fetch }),
    github: new GitHubClient({ token: "test-token", fetchImpl: remote.fetch }),
    fetchImpl: remote.fetch,
    now: () => NOW,
    newId: () => id,
  };
}

const MAIN_FILES = [
  { name: "index.html", branch: "main" },
  { name: "styles.css", branch: "main" },
  { name: "script.js", branch: "main" },
];

describe("runTask", () => {
  let remote: FakeRemote;

  beforeEach(() => {
    remote = new FakeRemote();
  });

  it("publishes a first round end to end", async () => {
    const report = await runTask(task(), depsFor(remote));

    expect(report).toEqual({
      id: "run-1",
      status: "done",
      repo: "https://github.com/octo/landing-42",
      pages_url: "https://octo.github.io/landing-42/",
      errors: [],
      llm_files: MAIN_FILES,
      attachments_uploaded: [],
      checks: { pages_created: true, readme_generated: true },
    });
    expect(remote.file("octo", "landing-42", "gh-pages", "index.html")?.toString()).toBe("<h1>Signup</h1>");
    expect(remote.file("octo", "landing-42", "main", "styles.css")?.toString()).toBe("h1 { color: teal; }");
    expect(remote.file("octo", "landing-42", "main", "README.md")?.toString()).toBe(README_OUTPUT);
    expect(remote.file("octo", "landing-42", "main", "LICENSE")?.toString()).toContain("Copyright (c) 2026 octo");
  });

  it("publishes the fallback site when the model answers with garbage", async () => {
    remote.gemini = () => ({ status: 200, body: "garbage" });

    const report = await runTask(task(), depsFor(remote));

    expect(report.errors).toEqual([]);
    expect(report.status).toBe("done");
    expect(report.llm_files).toEqual(MAIN_FILES);
    expect(report.checks.pages_created).toBe(true);
    expect(remote.file("octo", "landing-42", "main", "index.html")?.toString()).toBe(FALLBACK_INDEX);
    expect(remote.file("octo", "landing-42", "main", "styles.css")?.toString()).toBe(FALLBACK_CSS);
    expect(remote.file("octo", "landing-42", "main", "script.js")?.toString()).toBe(FALLBACK_JS);
    expect(remote.file("octo", "landing-42", "gh-pages", "index.html")?.toString()).toBe(FALLBACK_INDEX);
  });

  it("skips the README upload on an empty answer", async () => {
    remote.gemini = () => ({ status: 200, body: "" });

    const report = await runTask(task(), depsFor(remote));

    expect(report.status).toBe("done");
    expect(report.checks).toEqual({ pages_created: true, readme_generated: false });
    expect(remote.file("octo", "landing-42", "main", "README.md")).toBeUndefined();
  });

  it("makes no callback without an evaluation url", async () => {
    const report = await runTask(task(), depsFor(remote));
    expect(remote.callbacks).toHaveLength(0);
    expect("evaluation_posted" in report).toBe(false);
    expect("evaluation_status_code" in report).toBe(false);
  });

  it("posts the condensed report to the evaluation url", async () => {
    const report = await runTask(
      task({ email: "dev@example.com", evaluationUrl: "https://eval.test/notify" }),
      depsFor(remote)
    );

    expect(report.evaluation_posted).toBe(true);
    expect(report.evaluation_status_code).toBe(200);
    expect(remote.callbacks).toHaveLength(1);
    expect(remote.callbacks[0].url).toBe("https://eval.test/notify");
    expect(remote.callbacks[0].body).toEqual({
      email: "dev@example.com",
      task: "landing",
      round: 1,
      repo: "https://github.com/octo/landing-42",
      pages_url: "https://octo.github.io/landing-42/",
      checks: { pages_created: true, readme_generated: true },
      errors: [],
      llm_files: MAIN_FILES,
      attachments_uploaded: [],
      timestamp: 1772323200,
    });
  });

  it("records a rejected callback without failing the run", async () => {
    remote.callbackStatus = 500;
    const report = await runTask(task({ evaluationUrl: "https://eval.test/notify" }), depsFor(remote));
    expect(report.evaluation_posted).toBe(false);
    expect(report.evaluation_status_code).toBe(500);
    expect(report.status).toBe("done");
  });

  it("stops early when the repository cannot be created", async () => {
    remote.failOn("POST", /\/user\/repos$/, 403);

    const report = await runTask(task({ evaluationUrl: "https://eval.test/notify" }), depsFor(remote));

    const expected = {
      id: "run-1",
      status: "done_with_errors",
      repo: null,
      pages_url: null,
      errors: ['repo_create_failed:Failed to create repo as octo: 403 {"message":"forbidden"}'],
      llm_files: [],
      attachments_uploaded: [],
      checks: {},
    };
    expect(report).toEqual(expected);
    expect(remote.callbacks.map((c) => c.body)).toEqual([{ status: "repo_create_failed", details: expected }]);
    expect(remote.count("PUT", /contents/)).toBe(0);
    expect(remote.prompts).toHaveLength(0);
  });

  it("reuses the repository and publishes later rounds to their own branch", async () => {
    await runTask(task(), depsFor(remote, "run-1"));
    remote.gemini = (prompt) => ({
      status: 200,
      body: JSON.stringify({
        candidates: [{ content: { parts: [{ text: prompt.includes("README") ? "# Round two readme" : "---index.html---\n<h1>Round two</h1>" }] } }],
      }),
    });

    const report = await runTask(task({ round: 2 }), depsFor(remote, "run-2"));

    expect(report.errors).toEqual([]);
    expect(report.repo).toBe("https://github.com/octo/landing-42");
    expect(report.llm_files).toEqual([
      { name: "index.html", branch: "round-2" },
      { name: "styles.css", branch: "round-2" },
      { name: "script.js", branch: "round-2" },
    ]);
    expect(remote.count("POST", /\/user\/repos$/)).toBe(1);
    expect(remote.file("octo", "landing-42", "round-2", "index.html")?.toString()).toBe("<h1>Round two</h1>");
    expect(remote.file("octo", "landing-42", "round-2", "styles.css")?.toString()).toBe(FALLBACK_CSS);
    expect(remote.file("octo", "landing-42", "main", "index.html")?.toString()).toBe("<h1>Signup</h1>");
    expect(remote.file("octo", "landing-42", "gh-pages", "index.html")?.toString()).toBe("<h1>Round two</h1>");
  });

  it("keeps going past broken attachments", async () => {
    const report = await runTask(
      task({
        attachments: [
          { name: "raw.png", uri: "data:image/png,abc" },
          { name: "bad.png", uri: "data:image/png;base64,@@@@" },
          { name: "remote.png", uri: "https://cdn.test/remote.png" },
          { name: "logo.png", uri: "data:image/png;base64,aGVsbG8=" },
        ],
      }),
      depsFor(remote)
    );

    expect(report.errors).toEqual([
      "attachment_malformed:raw.png",
      "attachment_base64_decode_failed:bad.png:Invalid base64-encoded string",
    ]);
    expect(report.status).toBe("done_with_errors");
    expect(report.attachments_uploaded).toEqual([
      { name: "logo.png", branch: "main" },
      { name: "logo.png", branch: "gh-pages" },
    ]);
    expect(remote.file("octo", "landing-42", "gh-pages", "logo.png")?.toString()).toBe("hello");
    expect(report.checks.pages_created).toBe(true);
  });

  it("publishes the fallback page when generation fails", async () => {
    remote.gemini = () => ({ status: 500, body: "boom" });

    const report = await runTask(task(), depsFor(remote));

    expect(report.errors).toEqual([
      "llm_generation_failed:Gemini API error 500: boom",
      "readme_generation_failed:Gemini API error 500: boom",
    ]);
    expect(report.llm_files).toEqual([]);
    expect(report.checks).toEqual({ pages_created: true, readme_generated: false });
    expect(remote.file("octo", "landing-42", "gh-pages", "index.html")?.toString()).toBe(FALLBACK_INDEX);
  });

  it("records every failed write and still finishes", async () => {
    remote.failOn("PUT", /\/contents\//, 500);

    const report = await runTask(task(), depsFor(remote));

    expect(report.errors.map((e) => e.split(":")[0])).toEqual([
      "license_failed",
      "llm_file_upload_failed",
      "llm_file_upload_failed",
      "llm_file_upload_failed",
      "gh_pages_failed",
      "readme_upload_failed",
    ]);
    expect(report.errors[1]).toBe(
      'llm_file_upload_failed:index.html:Failed to create/update file index.html on branch main: 500 {"message":"forbidden"}'
    );
    expect(report.errors[4]).toBe("gh_pages_failed:main_missing");
    expect(report.status).toBe("done_with_errors");
    expect(report.pages_url).toBeNull();
    expect(report.checks).toEqual({ pages_created: false, readme_generated: false });
  });

  it("records a round branch that cannot be created and still tries the uploads", async () => {
    await runTask(task(), depsFor(remote, "run-1"));
    remote.requests = [];
    remote.failOn("POST", /\/git\/refs$/, 422);

    const report = await runTask(task({ round: 2 }), depsFor(remote, "run-2"));

    const missing = (name: string) =>
      `llm_file_upload_failed:${name}:Failed to create/update file ${name} on branch round-2: 404 {"message":"Branch round-2 not found"}`;
    expect(report.errors).toEqual([
      'round_branch_failed:Failed to create ref round-2: 422 {"message":"forbidden"}',
      missing("index.html"),
      missing("styles.css"),
      missing("script.js"),
    ]);
    expect(remote.writesTo("round-2")).toEqual(["index.html", "styles.css", "script.js"]);
    expect(report.llm_files).toEqual([]);
    expect(report.checks.pages_created).toBe(true);
    expect(remote.file("octo", "landing-42", "gh-pages", "index.html")?.toString()).toBe("<h1>Signup</h1>");
  });

  it("records a gh-pages ref that cannot be created and still tries the page write", async () => {
    remote.failOn("POST", /\/git\/refs$/, 422);

    const report = await runTask(task(), depsFor(remote));

    expect(report.errors).toEqual([
      'gh_pages_ref_create_failed:Failed to create ref gh-pages: 422 {"message":"forbidden"}',
      'gh_pages_failed:Failed to create/update file index.html on branch gh-pages: 404 {"message":"Branch gh-pages not found"}',
    ]);
    expect(remote.writesTo("gh-pages")).toEqual(["index.html"]);
    expect(report.checks.pages_created).toBe(false);
    expect(report.pages_url).toBeNull();
    expect(report.status).toBe("done_with_errors");
  });

  it("publishes the generated page when the round index cannot be read", async () => {
    // the first read of main's index.html belongs to the round upload
    remote.throwOn("GET", /\/contents\/index\.html\?ref=main$/, 1);

    const report = await runTask(task(), depsFor(remote));

    expect(report.errors).toEqual([]);
    expect(report.checks.pages_created).toBe(true);
    expect(report.pages_url).toBe("https://octo.github.io/landing-42/");
    expect(remote.count("GET", /\/contents\/index\.html\?ref=main$/)).toBe(2);
    expect(remote.file("octo", "landing-42", "gh-pages", "index.html")?.toString()).toBe("<h1>Signup</h1>");
  });

  it("turns a GitHub request that never answers into a recorded error", async () => {
    remote.stallOn("PUT", /\/contents\/README\.md$/);
    const deps: PipelineDeps = {
      ...depsFor(remote),
      github: new GitHubClient({ token: "test-token", timeoutMs: 20, fetchImpl: remote.fetch }),
    };

    const report = await runTask(task({ evaluationUrl: "https://eval.test/notify" }), deps);

    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatch(/^readme_upload_failed:.*timeout/i);
    expect(report.checks).toEqual({ pages_created: true, readme_generated: false });
    expect(report.status).toBe("done_with_errors");
    expect(remote.callbacks).toHaveLength(1);
  });
});
