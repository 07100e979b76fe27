import type { TaskSafeError } from './lib/errors';

/**
 * Envelope layout: salt(16) | nonce(12) | ciphertext | tag(16)
 */
export const SALT_SIZE = 16;
export const NONCE_SIZE = 12;
export const TAG_SIZE = 16;
export const HEADER_SIZE = SALT_SIZE + NONCE_SIZE; // 28 bytes

/**
 * PBKDF2-HMAC-SHA256 parameters
 */
export const KEY_SIZE = 32; // 256 bits
export const PBKDF2_ITERATIONS = 100_000;
export const PBKDF2_DIGEST = 'sha256';

/**
 * Names of the values kept in the secret store
 */
export const TOKEN_KEY = 'GITHUB_TOKEN';
export const PASSPHRASE_KEY = 'BACKUP_PASSPHRASE';
export const OWNER_KEY = 'GITHUB_OWNER';
export const REPO_KEY = 'GITHUB_REPO';

/**
 * Decrypted contents of the secret store
 */
export type SecretBundle = Record<string, string>;

/**
 * A value the secret store must hold before anything else can run
 */
export interface RequiredKey {
  name: string;
  prompt: string;
  allowBlank: boolean;
  secret: boolean;
}

/**
 * Settings the synchronizer runs with, built once after the store is unlocked
 */
export interface SyncConfig {
  token: string;
  passphrase?: string;
  owner: string;
  repo: string;
  branch: string;
  apiUrl: string;
  timeoutMs: number;
  dataDir: string;
}

/**
 * A local file and where its backup lives in the remote repository
 */
export interface FileMapping {
  localPath: string;
  remotePath: string;
  required: boolean;
}

export type SyncStatus = 'created' | 'updated' | 'restored' | 'skipped' | 'failed';

/**
 * Outcome of one push or pull
 */
export interface SyncResult {
  localPath: string;
  remotePath: string;
  status: SyncStatus;
  message?: string;
  errorName?: string;
}

/**
 * Success or failure handed back to the entry point, which decides whether to exit
 */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: TaskSafeError };
