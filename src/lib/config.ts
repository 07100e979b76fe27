import { access } from 'fs/promises';
import { join } from 'path';
import {
  TOKEN_KEY,
  PASSPHRASE_KEY,
  OWNER_KEY,
  REPO_KEY,
  type FileMapping,
  type RequiredKey,
  type SecretBundle,
  type SyncConfig,
} from '../types';

const STORE_FILE = '.tasksafe';

export const BACKUP_PREFIX = 'backups';
export const DEFAULT_BRANCH = 'main';
export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Local files owned by the task manager and where their backups live
 */
export const FILE_MAPPINGS: readonly FileMapping[] = [
  { localPath: 'tasks.json', remotePath: `${BACKUP_PREFIX}/tasks.json`, required: true },
  { localPath: 'tasks_export.csv', remotePath: `${BACKUP_PREFIX}/tasks_export.csv`, required: false },
  { localPath: 'task_log.txt', remotePath: `${BACKUP_PREFIX}/task_log.txt`, required: false },
];

/**
 * Values the secret store must hold, in the order they are asked for
 */
export const REQUIRED_KEYS: readonly RequiredKey[] = [
  { name: TOKEN_KEY, prompt: 'GitHub token: ', allowBlank: false, secret: true },
  { name: PASSPHRASE_KEY, prompt: 'Backup passphrase (leave blank to store backups unencrypted): ', allowBlank: true, secret: true },
  { name: OWNER_KEY, prompt: 'GitHub owner: ', allowBlank: false, secret: false },
  { name: REPO_KEY, prompt: 'GitHub repository: ', allowBlank: false, secret: false },
];

/**
 * Get the path to the encrypted store in the data directory
 */
export function getStorePath(dataDir: string = process.cwd()): string {
  return join(dataDir, STORE_FILE);
}

/**
 * Check if a file exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the mapping for a local file name or remote path
 */
export function findMapping(file: string): FileMapping | null {
  const normalized = normalizeFilePath(file);
  return (
    FILE_MAPPINGS.find(m => m.localPath === normalized || m.remotePath === normalized) ?? null
  );
}

/**
 * Normalize file path (remove leading ./)
 */
export function normalizeFilePath(filepath: string): string {
  if (filepath.startsWith('./')) {
    return filepath.slice(2);
  }
  return filepath;
}

export interface SyncOptions {
  dataDir?: string;
  branch?: string;
  apiUrl?: string;
  timeoutMs?: number;
}

/**
 * Build the synchronizer settings from an unlocked bundle.
 * An empty backup passphrase means backups are not encrypted.
 */
export function toSyncConfig(bundle: SecretBundle, options: SyncOptions = {}): SyncConfig {
  const passphrase = bundle[PASSPHRASE_KEY];

  return {
    token: bundle[TOKEN_KEY] ?? '',
    passphrase: passphrase ? passphrase : undefined,
    owner: bundle[OWNER_KEY] ?? '',
    repo: bundle[REPO_KEY] ?? '',
    branch: options.branch ?? DEFAULT_BRANCH,
    apiUrl: (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, ''),
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    dataDir: options.dataDir ?? process.cwd(),
  };
}
