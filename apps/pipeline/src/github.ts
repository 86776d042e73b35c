// github.ts
import { GitHubApiError } from "./errors.js";
import type { FetchLike, RepoHandle } from "./types.js";

export type GitHubOptions = {
  token?: string;
  owner?: string;    // org or user that should own created repos
  apiBase?: string;
  timeoutMs?: number; // per request
  fetchImpl?: FetchLike;
};

type GitHubRepo = {
  name: string;
  html_url: string;
  owner: { login: string };
};

type GitHubRef = {
  ref: string;
  object: { sha: string };
};

type GitHubContent = {
  sha: string;
  content?: string;
  encoding?: string;
};

export type RemoteFile = { sha: string; content: Buffer };

const DEFAULT_API = "https://api.github.com";
const DEFAULT_TIMEOUT_MS = 10_000;

function toHandle(repo: GitHubRepo): RepoHandle {
  return { owner: repo.owner.login, name: repo.name, htmlUrl: repo.html_url, defaultBranch: "main" };
}

function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

export class GitHubClient {
  private readonly apiBase: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(private readonly opts: GitHubOptions) {
    this.apiBase = (opts.apiBase ?? DEFAULT_API).replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Raw request; callers decide which statuses count as failure. */
  async ghFetch(method: string, path: string, body?: unknown): Promise<Response> {
    if (!this.opts.token) throw new Error("GITHUB_TOKEN not set");
    return this.fetchImpl(`${this.apiBase}${path}`, {
      method,
      headers: {
        "Accept": "application/vnd.github+json",
        "User-Agent": "pagesmith",
        Authorization: `Bearer ${this.opts.token}`,
        "X-GitHub-Api-Version": "2022-11-28",
        ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  private async ghJson<T>(method: string, path: string, what: string, body?: unknown): Promise<T> {
    const res = await this.ghFetch(method, path, body);
    if (!res.ok) throw new GitHubApiError(what, res.status, await res.text());
    return (await res.json()) as T;
  }

  async getAuthenticatedLogin(): Promise<string | undefined> {
    const res = await this.ghFetch("GET", "/user");
    if (!res.ok) return undefined;
    const me = (await res.json()) as { login?: string };
    return me.login;
  }

  /** Configured owner, else whoever the token belongs to. */
  async resolveOwner(): Promise<string | undefined> {
    return this.opts.owner || (await this.getAuthenticatedLogin());
  }

  async getRepo(owner: string, name: string): Promise<RepoHandle | null> {
    const res = await this.ghFetch("GET", `/repos/${owner}/${name}`);
    if (res.status !== 200) return null;
    return toHandle((await res.json()) as GitHubRepo);
  }

  async createRepo(name: string, description = ""): Promise<RepoHandle> {
    const payload = { name, description, private: false, auto_init: false };

    // prefer the org endpoint when an owner is configured
    if (this.opts.owner) {
      const r = await this.ghFetch("POST", `/orgs/${this.opts.owner}/repos`, payload);
      if (r.status === 201) return toHandle((await r.json()) as GitHubRepo);
      console.warn("org repo create failed, trying user endpoint", this.opts.owner, r.status);
    }

    const r2 = await this.ghFetch("POST", "/user/repos", payload);
    if (r2.status === 201) return toHandle((await r2.json()) as GitHubRepo);

    const text = await r2.text();
    const login = (await this.getAuthenticatedLogin()) ?? "unknown";
    throw new GitHubApiError(`Failed to create repo as ${login}`, r2.status, text);
  }

  /** Create-or-fetch by name under the resolved owner. */
  async ensureRepo(name: string, description = ""): Promise<{ repo: RepoHandle; created: boolean }> {
    try {
      const owner = await this.resolveOwner();
      if (owner) {
        const existing = await this.getRepo(owner, name);
        if (existing) return { repo: existing, created: false };
      }
    } catch (err: unknown) {
      // lookup is advisory; creation below reports the real failure
      console.warn("repo lookup failed", name, err instanceof Error ? err.message : err);
    }
    return { repo: await this.createRepo(name, description), created: true };
  }

  async getRef(owner: string, repo: string, branch: string): Promise<{ sha: string } | null> {
    const res = await this.ghFetch("GET", `/repos/${owner}/${repo}/git/refs/heads/${branch}`);
    if (res.status === 404) return null;
    if (!res.ok) throw new GitHubApiError(`Failed to get ref ${branch}`, res.status, await res.text());
    const ref = (await res.json()) as GitHubRef;
    return { sha: ref.object.sha };
  }

  async createRef(owner: string, repo: string, branch: string, sha: string): Promise<void> {
    await this.ghJson<GitHubRef>("POST", `/repos/${owner}/${repo}/git/refs`, `Failed to create ref ${branch}`, {
      ref: `refs/heads/${branch}`,
      sha,
    });
  }

  /** Makes sure `branch` exists, branching from `fromBranch`'s head when it does not. */
  async ensureBranch(owner: string, repo: string, branch: string, fromBranch = "main"): Promise<"exists" | "created"> {
    if (await this.getRef(owner, repo, branch)) return "exists";
    const base = await this.getRef(owner, repo, fromBranch);
    if (!base) throw new Error(`${fromBranch} missing`);
    await this.createRef(owner, repo, branch, base.sha);
    return "created";
  }

  async getFile(owner: string, repo: string, path: string, ref: string): Promise<RemoteFile | null> {
    const res = await this.ghFetch(
      "GET",
      `/repos/${owner}/${repo}/contents/${encodePath(path)}?ref=${encodeURIComponent(ref)}`
    );
    if (res.status !== 200) return null;
    const cont = (await res.json()) as GitHubContent;
    const content = cont.content && cont.encoding === "base64" ? Buffer.from(cont.content, "base64") : Buffer.alloc(0);
    return { sha: cont.sha, content };
  }

  /**
   * Create or update `path` on `branch`. The current blob SHA is sent along
   * when the file already exists so the write is an update.
   */
  async putFile(
    owner: string,
    repo: string,
    path: string,
    content: Buffer,
    message: string,
    branch = "main"
  ): Promise<void> {
    const existing = await this.getFile(owner, repo, path, branch);
    const payload = {
      message,
      content: content.toString("base64"),
      branch,
      ...(existing ? { sha: existing.sha } : {}),
    };
    await this.ghJson<unknown>(
      "PUT",
      `/repos/${owner}/${repo}/contents/${encodePath(path)}`,
      `Failed to create/update file ${path} on branch ${branch}`,
      payload
    );
  }
}
