import { FILE_MAPPINGS, findMapping } from '../lib/config';
import { backupAll, createSyncContext, formatResult } from '../lib/sync';
import type { GlobalOptions } from './options';
import { unlockOrExit } from './unlock';

export async function backupCommand(file: string | undefined, options: GlobalOptions): Promise<void> {
  const mapping = file ? findMapping(file) : null;
  if (file && !mapping) {
    console.error(`Error: "${file}" is not a backed up file.`);
    console.error(`Known files: ${FILE_MAPPINGS.map(m => m.localPath).join(', ')}`);
    process.exit(1);
  }

  const config = await unlockOrExit(options);
  const ctx = createSyncContext(config);

  if (!config.passphrase) {
    console.log('⚠ No backup passphrase set: files are uploaded unencrypted');
  }
  console.log(`Backing up to ${config.owner}/${config.repo} (${config.branch})...`);

  const results = await backupAll(ctx, mapping ? [mapping] : FILE_MAPPINGS);
  for (const result of results) {
    console.log(formatResult(result));
  }

  if (results.some(r => r.status === 'failed')) {
    process.exitCode = 1;
  }
}
