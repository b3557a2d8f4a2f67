import { z } from 'zod';
import { ConditionalWriteResult, VersionedContent, VersionedStore } from './storage';
import { StoreUnavailableError, VersionConflictError } from '../core/errors';

const GITHUB_API = 'https://api.github.com';

const contentsSchema = z.object({
  sha: z.string(),
  content: z.string().optional(),
  encoding: z.string().optional()
});

const putResponseSchema = z.object({
  content: z.object({ sha: z.string() })
});

export interface GitHubStoreOptions {
  token: string;
  repo: string; // owner/name
  path: string;
  branch?: string;
  timeoutMs?: number;
}

/**
 * A file in a GitHub repository through the contents API. The blob sha is the
 * version token: a PUT carrying a stale sha is rejected with 409, which is how
 * the chat bot, the cron poller and hand edits detect each other.
 */
export class GitHubVersionedStore implements VersionedStore {
  readonly label: string;
  private readonly options: GitHubStoreOptions;

  constructor(options: GitHubStoreOptions) {
    if (!/^[\w.-]+\/[\w.-]+$/.test(options.repo)) {
      throw new Error(`GITHUB_REPO must look like owner/name, got "${options.repo}"`);
    }
    this.options = options;
    this.label = `github:${options.repo}/${options.path}`;
  }

  private url(withRef: boolean) {
    const encodedPath = this.options.path.split('/').map(encodeURIComponent).join('/');
    const url = new URL(`${GITHUB_API}/repos/${this.options.repo}/contents/${encodedPath}`);
    if (withRef && this.options.branch) url.searchParams.set('ref', this.options.branch);
    return url.toString();
  }

  private headers() {
    return {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.options.token}`,
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'fund-rebalance-ledger'
    };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(this.options.timeoutMs ?? 10000) });
    } catch (err) {
      throw new StoreUnavailableError(this.label, err instanceof Error ? err.message : String(err));
    }
  }

  private async fail(resp: Response, action: string): Promise<never> {
    const text = await resp.text();
    if (resp.status >= 500 || resp.status === 429) {
      throw new StoreUnavailableError(this.label, `${action} returned ${resp.status}`);
    }
    throw new Error(`GitHub ${action} failed ${resp.status}: ${text.slice(0, 300)}`);
  }

  async read(): Promise<VersionedContent> {
    const resp = await this.send(this.url(true), { method: 'GET', headers: this.headers() });
    if (resp.status === 404) return { content: '', version: '' };
    if (!resp.ok) return this.fail(resp, 'read');
    const parsed = contentsSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new Error(`GitHub read returned an unexpected payload for ${this.label}`);
    }
    const { sha, content = '', encoding = 'base64' } = parsed.data;
    const text = encoding === 'base64' ? Buffer.from(content.replace(/\n/g, ''), 'base64').toString('utf-8') : content;
    return { content: text, version: sha };
  }

  async conditionalWrite(content: string, expectedVersion: string, message?: string): Promise<ConditionalWriteResult> {
    const body: Record<string, string> = {
      message: message || `[ledger] update ${this.options.path}`,
      content: Buffer.from(content, 'utf-8').toString('base64')
    };
    if (expectedVersion) body.sha = expectedVersion;
    if (this.options.branch) body.branch = this.options.branch;
    const resp = await this.send(this.url(false), {
      method: 'PUT',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    });
    // 409: sha no longer matches; 422: file appeared although we expected none
    if (resp.status === 409 || resp.status === 422) {
      return { ok: false, conflict: new VersionConflictError(expectedVersion) };
    }
    if (!resp.ok) return this.fail(resp, 'write');
    const parsed = putResponseSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new Error(`GitHub write returned an unexpected payload for ${this.label}`);
    }
    return { ok: true, version: parsed.data.content.sha };
  }
}
