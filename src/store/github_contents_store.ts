import { EventStoreWriteError } from "../errors";
import type { EventStore, PutObjectArgs } from "./event_store";

export type GitHubContentsStoreOptions = {
  token: string;
  repo: string;
  branch?: string | null;
  apiBase?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const DEFAULT_API_BASE = "https://api.github.com";

/**
 * Creates one file per event through the GitHub contents API.
 * Paths are unique per event id, so no blob sha is sent and an existing file fails the write.
 */
export class GitHubContentsStore implements EventStore {
  readonly kind = "github" as const;
  readonly enabled = true;
  readonly repo: string;
  private readonly token: string;
  private readonly branch: string | null;
  private readonly apiBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: GitHubContentsStoreOptions) {
    this.token = opts.token;
    this.repo = opts.repo;
    this.branch = opts.branch ?? null;
    this.apiBase = (opts.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  contentsUrl(path: string): string {
    const encodedPath = path.split("/").map(encodeURIComponent).join("/");
    return `${this.apiBase}/repos/${this.repo}/contents/${encodedPath}`;
  }

  async put(args: PutObjectArgs): Promise<void> {
    const body: Record<string, string> = {
      message: args.message,
      content: Buffer.from(args.body, "utf8").toString("base64"),
    };
    if (this.branch) body.branch = this.branch;

    let res: Response;
    try {
      res = await this.fetchImpl(this.contentsUrl(args.path), {
        method: "PUT",
        headers: {
          authorization: `Bearer ${this.token}`,
          accept: "application/vnd.github+json",
          "content-type": "application/json",
          "x-github-api-version": "2022-11-28",
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error && error.name === "TimeoutError" ? "timeout" : "network_error";
      throw new EventStoreWriteError(`github ${reason}`, { store: this.kind });
    }

    if (!res.ok) {
      throw new EventStoreWriteError(`github status ${res.status}`, { store: this.kind, statusCode: res.status });
    }
  }
}
