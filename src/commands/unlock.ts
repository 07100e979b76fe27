import { toSyncConfig } from '../lib/config';
import { createTerminalProvider } from '../lib/prompt';
import { unlockSecretStore } from '../lib/store';
import type { SyncConfig } from '../types';
import { toSyncOptions, type GlobalOptions } from './options';

/**
 * Unlock the store or stop the process. Nothing else can run without it.
 */
export async function unlockOrExit(options: GlobalOptions): Promise<SyncConfig> {
  const provider = createTerminalProvider();
  const unlocked = await unlockSecretStore(provider, { dataDir: options.dir }).finally(() => {
    provider.close();
  });

  if (!unlocked.ok) {
    console.error(`Error: ${unlocked.error.message}`);
    process.exit(1);
  }

  if (unlocked.value.created) {
    console.log('✓ Created encrypted settings store');
  } else if (unlocked.value.persisted) {
    console.log('✓ Updated encrypted settings store');
  }

  return toSyncConfig(unlocked.value.bundle, toSyncOptions(options));
}
