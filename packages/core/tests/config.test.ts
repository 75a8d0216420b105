import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { getDefaultTaskFilePath, resolveTaskFilePath } from '../src/config.js';

describe('getDefaultTaskFilePath', () => {
  it('uses XDG_DATA_HOME on linux', () => {
    expect(getDefaultTaskFilePath('linux', { XDG_DATA_HOME: '/data' })).toBe('/data/taskdeck/tasks.json');
  });

  it('falls back to ~/.local/share on linux', () => {
    expect(getDefaultTaskFilePath('linux', {}))
      .toBe(join(homedir(), '.local', 'share', 'taskdeck', 'tasks.json'));
  });

  it('uses Application Support on macOS', () => {
    expect(getDefaultTaskFilePath('darwin', {}))
      .toBe(join(homedir(), 'Library', 'Application Support', 'taskdeck', 'tasks.json'));
  });

  it('uses APPDATA on windows', () => {
    expect(getDefaultTaskFilePath('win32', { APPDATA: '/appdata' })).toBe(join('/appdata', 'taskdeck', 'tasks.json'));
  });
});

describe('resolveTaskFilePath', () => {
  it('prefers an explicit path', () => {
    expect(resolveTaskFilePath('mine.json', { TASKDECK_FILE: 'env.json' })).toBe('mine.json');
  });

  it('then the environment variable', () => {
    expect(resolveTaskFilePath(undefined, { TASKDECK_FILE: 'env.json' })).toBe('env.json');
    expect(resolveTaskFilePath('  ', { TASKDECK_FILE: 'env.json' })).toBe('env.json');
  });

  it('then the platform default', () => {
    const env = { XDG_DATA_HOME: '/data', APPDATA: '/appdata' };
    expect(resolveTaskFilePath(undefined, env)).toBe(getDefaultTaskFilePath(process.platform, env));
  });
});
