import { FILE_MAPPINGS, findMapping } from '../lib/config';
import { createSyncContext, formatResult, isDecryptFailure, restoreAll } from '../lib/sync';
import type { GlobalOptions } from './options';
import { unlockOrExit } from './unlock';

export async function restoreCommand(file: string | undefined, options: GlobalOptions): Promise<void> {
  const mapping = file ? findMapping(file) : null;
  if (file && !mapping) {
    console.error(`Error: "${file}" is not a backed up file.`);
    console.error(`Known files: ${FILE_MAPPINGS.map(m => m.localPath).join(', ')}`);
    process.exit(1);
  }

  const config = await unlockOrExit(options);
  const ctx = createSyncContext(config);

  console.log(`Restoring from ${config.owner}/${config.repo} (${config.branch})...`);
  console.log('Local files are replaced by the remote copies.');

  const results = await restoreAll(ctx, mapping ? [mapping] : FILE_MAPPINGS);
  for (const result of results) {
    console.log(formatResult(result));
  }

  if (results.some(isDecryptFailure)) {
    console.log('');
    console.log('A restore that fails to decrypt usually means the backup passphrase differs');
    console.log('from the one used for the upload, or the backup was uploaded unencrypted.');
  }

  if (results.some(r => r.status === 'failed')) {
    process.exitCode = 1;
  }
}
