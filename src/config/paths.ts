/**
 * State directory for config, credentials and the metrics database.
 * `$DELIVERYLENS_HOME` wins over `~/.deliverylens`.
 */

import { chmodSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const HOME_ENV = 'DELIVERYLENS_HOME';

const STATE_FILES = {
  config: 'config.json',
  credentials: 'credentials.json',
  metrics: 'metrics.db',
} as const;

export type StateFile = keyof typeof STATE_FILES;

export function stateDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[HOME_ENV] || join(homedir(), '.deliverylens');
}

export function statePath(file: StateFile): string {
  return join(stateDir(), STATE_FILES[file]);
}

/** Creates the state directory if needed; it is always left at mode 700. */
export function ensureStateDir(): string {
  const dir = stateDir();
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  chmodSync(dir, 0o700);
  return dir;
}
