import { getStorePath } from '../lib/config';
import type { GlobalOptions } from './options';
import { unlockOrExit } from './unlock';

export async function setupCommand(options: GlobalOptions): Promise<void> {
  const config = await unlockOrExit(options);

  console.log(`
Settings stored in ${getStorePath(options.dir)}

  Repository:  ${config.owner}/${config.repo}
  Branch:      ${config.branch}
  Encryption:  ${config.passphrase ? 'enabled' : 'disabled (backups are uploaded as plain text)'}

Next steps:
  tasksafe backup     Upload tasks.json and friends
  tasksafe restore    Replace local files with the remote copies`);
}
