import { join } from 'node:path';
import { homedir } from 'node:os';

export const APP_DIR_NAME = 'taskdeck';
export const TASK_FILE_NAME = 'tasks.json';
export const TASK_FILE_ENV = 'TASKDECK_FILE';

/** Returns the platform-appropriate default task file path */
export function getDefaultTaskFilePath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR_NAME);
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR_NAME);
  }

  return join(dir, TASK_FILE_NAME);
}

/**
 * Resolve which task file to use.
 * Priority: explicit path > TASKDECK_FILE > platform default.
 */
export function resolveTaskFilePath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicitPath?.trim()) return explicitPath;
  const fromEnv = env[TASK_FILE_ENV];
  if (fromEnv?.trim()) return fromEnv;
  return getDefaultTaskFilePath(process.platform, env);
}
