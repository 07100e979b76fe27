import { InvalidArgumentError } from 'commander';
import type { SyncOptions } from '../lib/config';

/**
 * Options shared by every command
 */
export type GlobalOptions = {
  dir: string;
  branch: string;
  timeout: number;
  apiUrl: string;
};

export function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive integer (milliseconds).');
  }
  return parsed;
}

export function toSyncOptions(options: GlobalOptions): SyncOptions {
  return {
    dataDir: options.dir,
    branch: options.branch,
    timeoutMs: options.timeout,
    apiUrl: options.apiUrl,
  };
}
