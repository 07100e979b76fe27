import { createHash } from 'crypto';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { AskOptions, ValueProvider } from '../src/lib/prompt';
import type { FetchLike } from '../src/lib/remote';

/**
 * Answers prompts from a fixed list and records what was asked
 */
export class ScriptedProvider implements ValueProvider {
  readonly asked: Array<{ question: string; secret: boolean }> = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string, options: AskOptions = {}): Promise<string> {
    this.asked.push({ question, secret: options.secret === true });
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${question}`);
    }
    return answer;
  }

  get remaining(): number {
    return this.answers.length;
  }
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Record<string, unknown>;
}

interface StoredObject {
  content: string;
  sha: string;
}

/**
 * In-process stand-in for the GitHub contents endpoints
 */
export class FakeContentsApi {
  readonly requests: RecordedRequest[] = [];
  readonly objects = new Map<string, StoredObject>();
  private failures = new Map<string, { status: number; body: string }>();

  constructor(readonly owner = 'octo', readonly repo = 'backups-repo') {}

  /**
   * Make PUT requests for a path answer with the given status
   */
  failPut(path: string, status: number, body: string): void {
    this.failures.set(path, { status, body });
  }

  seed(path: string, branch: string, raw: Buffer): string {
    const sha = createHash('sha1').update(raw).digest('hex');
    this.objects.set(`${branch}:${path}`, { content: wrap(raw.toString('base64')), sha });
    return sha;
  }

  stored(path: string, branch = 'main'): StoredObject | undefined {
    return this.objects.get(`${branch}:${path}`);
  }

  readonly fetch: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    const prefix = `/repos/${this.owner}/${this.repo}/contents/`;
    const method = init.method ?? 'GET';
    const headers = toRecord(init.headers);
    const body = typeof init.body === 'string' ? (JSON.parse(init.body) as Record<string, unknown>) : undefined;
    this.requests.push({ method, url, headers, body });

    if (!parsed.pathname.startsWith(prefix)) {
      return json(404, { message: 'Not Found' });
    }
    const path = decodeURIComponent(parsed.pathname.slice(prefix.length));

    if (method === 'GET') {
      const branch = parsed.searchParams.get('ref') ?? 'main';
      const object = this.objects.get(`${branch}:${path}`);
      if (!object) {
        return json(404, { message: 'Not Found' });
      }
      return json(200, { path, sha: object.sha, content: object.content, encoding: 'base64' });
    }

    if (method === 'PUT' && body) {
      const failure = this.failures.get(path);
      if (failure) {
        return new Response(failure.body, { status: failure.status });
      }

      const branch = typeof body.branch === 'string' ? body.branch : 'main';
      const content = typeof body.content === 'string' ? body.content : '';
      const key = `${branch}:${path}`;
      const existing = this.objects.get(key);

      if (existing && body.sha !== existing.sha) {
        return json(409, { message: `${path} does not match ${String(body.sha)}` });
      }
      if (!existing && body.sha !== undefined) {
        return json(422, { message: 'sha was supplied for a new file' });
      }

      const sha = createHash('sha1').update(Buffer.from(content, 'base64')).digest('hex');
      this.objects.set(key, { content, sha });
      return json(existing ? 200 : 201, { content: { path, sha } });
    }

    return json(405, { message: 'Method Not Allowed' });
  };
}

function json(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function toRecord(headers: RequestInit['headers']): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Wrap base64 at 60 columns the way the contents API returns it
 */
function wrap(base64: string): string {
  return (base64.match(/.{1,60}/g) ?? []).join('\n') + '\n';
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tasksafe-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
