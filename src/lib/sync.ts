import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import type { FileMapping, SyncConfig, SyncResult } from '../types';
import { FILE_MAPPINGS } from './config';
import { decodeBase64, open, seal } from './crypto';
import {
  FormatError,
  LocalFileMissingError,
  MissingCredentialError,
  RemoteRequestFailedError,
} from './errors';
import { ContentsClient, type FetchLike, type RemoteContents } from './remote';

export interface SyncContext {
  config: SyncConfig;
  client: ContentsClient;
}

export interface PushOptions {
  message: string;
  branch?: string;
  optional?: boolean;
}

export interface PullOptions {
  branch?: string;
  optional?: boolean;
}

/**
 * Wire a contents client to the given settings
 */
export function createSyncContext(config: SyncConfig, fetch?: FetchLike): SyncContext {
  const client = new ContentsClient({
    token: config.token,
    owner: config.owner,
    repo: config.repo,
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
    fetch,
  });
  return { config, client };
}

function requireCredentials(config: SyncConfig): void {
  if (!config.token) {
    throw new MissingCredentialError('GITHUB_TOKEN');
  }
  if (!config.owner) {
    throw new MissingCredentialError('GITHUB_OWNER');
  }
  if (!config.repo) {
    throw new MissingCredentialError('GITHUB_REPO');
  }
}

function resolveLocal(config: SyncConfig, localPath: string): string {
  return resolve(config.dataDir, localPath);
}

function failed(localPath: string, remotePath: string, error: unknown): SyncResult {
  return {
    localPath,
    remotePath,
    status: 'failed',
    message: error instanceof Error ? error.message : String(error),
    errorName: error instanceof Error ? error.name : undefined,
  };
}

async function pushOrThrow(
  ctx: SyncContext,
  localPath: string,
  remotePath: string,
  options: PushOptions
): Promise<SyncResult> {
  const { config, client } = ctx;
  requireCredentials(config);

  let data: Buffer;
  try {
    data = await readFile(resolveLocal(config, localPath));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
    if (options.optional) {
      return { localPath, remotePath, status: 'skipped', message: 'not found locally' };
    }
    throw new LocalFileMissingError(localPath);
  }

  const payload = config.passphrase ? seal(data, config.passphrase) : data;
  const branch = options.branch ?? config.branch;

  // Fetched right before the write; a concurrent writer in between is not detected.
  const sha = await client.getVersionToken(remotePath, branch);

  await client.putContents(remotePath, {
    message: options.message,
    content: payload.toString('base64'),
    branch,
    sha: sha ?? undefined,
  });

  return { localPath, remotePath, status: sha ? 'updated' : 'created' };
}

async function pullOrThrow(
  ctx: SyncContext,
  remotePath: string,
  localPath: string,
  options: PullOptions
): Promise<SyncResult> {
  const { config, client } = ctx;
  requireCredentials(config);

  let contents: RemoteContents;
  try {
    contents = await client.getContents(remotePath, options.branch ?? config.branch);
  } catch (error) {
    if (options.optional && error instanceof RemoteRequestFailedError && error.status === 404) {
      return { localPath, remotePath, status: 'skipped', message: 'no remote backup' };
    }
    throw error;
  }

  if (contents.content === undefined || contents.encoding === 'none') {
    throw new FormatError(`Remote object "${remotePath}" has no inline content`);
  }

  let data = decodeBase64(contents.content);
  if (config.passphrase) {
    data = open(data, config.passphrase);
  }

  await writeFile(resolveLocal(config, localPath), data);
  return { localPath, remotePath, status: 'restored' };
}

/**
 * Upload one local file. Errors come back as a failed result.
 */
export async function push(
  ctx: SyncContext,
  localPath: string,
  remotePath: string,
  options: PushOptions
): Promise<SyncResult> {
  try {
    return await pushOrThrow(ctx, localPath, remotePath, options);
  } catch (error) {
    return failed(localPath, remotePath, error);
  }
}

/**
 * Download one remote object over the local file. Errors come back as a failed result.
 */
export async function pull(
  ctx: SyncContext,
  remotePath: string,
  localPath: string,
  options: PullOptions = {}
): Promise<SyncResult> {
  try {
    return await pullOrThrow(ctx, remotePath, localPath, options);
  } catch (error) {
    return failed(localPath, remotePath, error);
  }
}

export async function backupAll(
  ctx: SyncContext,
  mappings: readonly FileMapping[] = FILE_MAPPINGS
): Promise<SyncResult[]> {
  const results: SyncResult[] = [];
  for (const mapping of mappings) {
    results.push(
      await push(ctx, mapping.localPath, mapping.remotePath, {
        message: `Backup ${mapping.localPath}`,
        optional: !mapping.required,
      })
    );
  }
  return results;
}

export async function restoreAll(
  ctx: SyncContext,
  mappings: readonly FileMapping[] = FILE_MAPPINGS
): Promise<SyncResult[]> {
  const results: SyncResult[] = [];
  for (const mapping of mappings) {
    results.push(await pull(ctx, mapping.remotePath, mapping.localPath, { optional: !mapping.required }));
  }
  return results;
}

/**
 * True when a pull failed because the payload could not be opened
 */
export function isDecryptFailure(result: SyncResult): boolean {
  return (
    result.status === 'failed' &&
    (result.errorName === 'AuthenticationError' || result.errorName === 'FormatError')
  );
}

/**
 * One status line per result
 */
export function formatResult(result: SyncResult): string {
  switch (result.status) {
    case 'created':
    case 'updated':
      return `✓ ${result.localPath} → ${result.remotePath} (${result.status})`;
    case 'restored':
      return `✓ ${result.remotePath} → ${result.localPath} (restored)`;
    case 'skipped':
      return `- ${result.localPath}: skipped (${result.message ?? 'nothing to do'})`;
    case 'failed':
      return `✗ ${result.localPath}: ${result.message ?? 'failed'}`;
  }
}
