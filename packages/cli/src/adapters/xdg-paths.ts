import { join } from 'node:path';
import { homedir } from 'node:os';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_CONFIG_HOME
    ? join(env.XDG_CONFIG_HOME, 'crosstalk')
    : join(homedir(), '.config', 'crosstalk');
}
