import { join } from 'path';
import { FILE_MAPPINGS, fileExists, getStorePath } from '../lib/config';
import type { GlobalOptions } from './options';

export async function statusCommand(options: GlobalOptions): Promise<void> {
  console.log('tasksafe status\n');

  console.log('1. Settings store:');
  const storePath = getStorePath(options.dir);
  const hasStore = await fileExists(storePath);
  console.log(`   ${hasStore ? '✓' : '✗'} ${storePath}: ${hasStore ? 'present (encrypted)' : 'not created'}`);

  console.log('\n2. Local files:');
  for (const mapping of FILE_MAPPINGS) {
    const exists = await fileExists(join(options.dir, mapping.localPath));
    const marker = exists ? '✓' : mapping.required ? '✗' : '-';
    const note = exists ? 'present' : mapping.required ? 'missing' : 'missing (optional)';
    console.log(`   ${marker} ${mapping.localPath} → ${mapping.remotePath}: ${note}`);
  }

  console.log('\n3. Remote:');
  console.log(`   - Branch: ${options.branch}`);
  console.log(`   - API: ${options.apiUrl}`);

  if (!hasStore) {
    console.log('\n⚠ Run: tasksafe setup');
  }
}
