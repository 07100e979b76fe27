import { z } from 'zod';
import { RemoteRequestFailedError, RemoteUnavailableError } from './errors';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const contentsSchema = z.object({
  sha: z.string(),
  content: z.string().optional(),
  encoding: z.string().optional(),
});

export type RemoteContents = z.infer<typeof contentsSchema>;

export interface ContentsClientOptions {
  token: string;
  owner: string;
  repo: string;
  apiUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export interface PutContentsRequest {
  message: string;
  content: string;
  branch: string;
  sha?: string;
}

interface RawResponse {
  status: number;
  body: string;
}

/**
 * Encode a repository path segment by segment so "/" separators survive
 */
export function encodeContentPath(path: string): string {
  return path
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

/**
 * Minimal client for the GitHub repository contents endpoints
 */
export class ContentsClient {
  private readonly options: ContentsClientOptions;
  private readonly fetchImpl: FetchLike;

  constructor(options: ContentsClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  private url(path: string): string {
    const { apiUrl, owner, repo } = this.options;
    return `${apiUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/contents/${encodeContentPath(path)}`;
  }

  private headers(): Record<string, string> {
    return {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.options.token}`,
      'User-Agent': 'tasksafe',
      'X-GitHub-Api-Version': '2022-11-28',
    };
  }

  private async request(url: string, init: RequestInit): Promise<RawResponse> {
    try {
      const response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      const name = (error as Error).name;
      if (name === 'TimeoutError' || name === 'AbortError') {
        throw new RemoteUnavailableError(
          `Remote store did not respond within ${this.options.timeoutMs}ms`
        );
      }
      throw new RemoteUnavailableError(`Remote store unreachable: ${(error as Error).message}`);
    }
  }

  /**
   * Fetch the object at a path. Any status other than 200 is an error.
   */
  async getContents(path: string, branch: string): Promise<RemoteContents> {
    const url = `${this.url(path)}?ref=${encodeURIComponent(branch)}`;
    const { status, body } = await this.request(url, { method: 'GET', headers: this.headers() });

    if (status !== 200) {
      throw new RemoteRequestFailedError(status, body);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new RemoteRequestFailedError(status, body);
    }

    const result = contentsSchema.safeParse(parsed);
    if (!result.success) {
      throw new RemoteRequestFailedError(status, body);
    }
    return result.data;
  }

  /**
   * Current version token for a path, or null when the object cannot be read
   */
  async getVersionToken(path: string, branch: string): Promise<string | null> {
    try {
      const contents = await this.getContents(path, branch);
      return contents.sha;
    } catch (error) {
      if (error instanceof RemoteRequestFailedError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Create or update the object at a path. 200 and 201 are success.
   */
  async putContents(path: string, request: PutContentsRequest): Promise<number> {
    const payload: PutContentsRequest = {
      message: request.message,
      content: request.content,
      branch: request.branch,
    };
    if (request.sha) {
      payload.sha = request.sha;
    }

    const { status, body } = await this.request(this.url(path), {
      method: 'PUT',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    if (status !== 200 && status !== 201) {
      throw new RemoteRequestFailedError(status, body);
    }
    return status;
  }
}
