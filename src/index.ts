export * from './types';
export * from './lib/errors';
export { deriveKey, seal, open, decodeBase64, type Passphrase } from './lib/crypto';
export {
  FILE_MAPPINGS,
  REQUIRED_KEYS,
  BACKUP_PREFIX,
  DEFAULT_BRANCH,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  findMapping,
  getStorePath,
  toSyncConfig,
  type SyncOptions,
} from './lib/config';
export {
  createTerminalProvider,
  type AskOptions,
  type TerminalProvider,
  type ValueProvider,
} from './lib/prompt';
export {
  ensureRequiredKeys,
  loadBundle,
  parseBundle,
  persistBundle,
  serializeBundle,
  unlockSecretStore,
  type EnsuredBundle,
  type LoadedBundle,
  type UnlockOptions,
  type UnlockedStore,
} from './lib/store';
export { ContentsClient, encodeContentPath, type FetchLike, type RemoteContents } from './lib/remote';
export {
  backupAll,
  createSyncContext,
  formatResult,
  isDecryptFailure,
  pull,
  push,
  restoreAll,
  type PullOptions,
  type PushOptions,
  type SyncContext,
} from './lib/sync';
