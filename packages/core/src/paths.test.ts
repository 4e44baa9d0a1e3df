import { homedir } from 'node:os';
import { vol } from 'memfs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  configDir,
  configFile,
  expandPath,
  findLocalConfigDirs,
  getDisplayPath,
  runtimeDir
} from './paths.js';

vi.mock('node:fs', async () => {
  const memfs = await import('memfs');
  return { ...memfs.fs, default: memfs.fs };
});
vi.mock('node:os');

describe('paths', () => {
  beforeEach(() => {
    vol.reset();
    vi.mocked(homedir).mockReturnValue('/home/user');
  });

  describe('expandPath', () => {
    it('expands the home directory', () => {
      expect(expandPath('~/flavors')).toBe('/home/user/flavors');
      expect(expandPath('~')).toBe('/home/user');
    });

    it('resolves relative paths against cwd', () => {
      expect(expandPath('icons', '/work')).toBe('/work/icons');
      expect(expandPath('/abs/../icons', '/work')).toBe('/icons');
    });
  });

  describe('configDir', () => {
    it('prefers TINCT_CONFIG_DIR', () => {
      expect(configDir({ TINCT_CONFIG_DIR: '~/tinct', XDG_CONFIG_HOME: '/xdg' })).toBe(
        '/home/user/tinct'
      );
    });

    it('uses XDG_CONFIG_HOME next', () => {
      expect(configDir({ XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/tinct');
    });

    it('falls back to ~/.config/tinct', () => {
      expect(configDir({})).toBe('/home/user/.config/tinct');
      expect(configFile({})).toBe('/home/user/.config/tinct/config.toml');
    });
  });

  describe('runtimeDir', () => {
    it('prefers TINCT_RUNTIME', () => {
      expect(runtimeDir('/opt/tinct/runtime', { TINCT_RUNTIME: '/rt' })).toBe('/rt');
    });

    it('uses a runtime directory inside the config dir when present', () => {
      vol.fromJSON({ '/home/user/.config/tinct/runtime/icons/mono.toml': '' });

      expect(runtimeDir('/opt/tinct/runtime', {})).toBe('/home/user/.config/tinct/runtime');
    });

    it('falls back to the shipped directory', () => {
      expect(runtimeDir('/opt/tinct/runtime', {})).toBe('/opt/tinct/runtime');
    });
  });

  describe('findLocalConfigDirs', () => {
    it('collects .tinct directories up to the repository root', () => {
      vol.fromJSON({
        '/repo/.git/HEAD': '',
        '/repo/.tinct/config.toml': '',
        '/repo/sub/.tinct/config.toml': '',
        '/repo/sub/deep/file.txt': '',
        '/.tinct/config.toml': ''
      });

      expect(findLocalConfigDirs('/repo/sub/deep')).toEqual(['/repo/sub/.tinct', '/repo/.tinct']);
    });

    it('walks to the filesystem root outside a repository', () => {
      vol.fromJSON({ '/a/.tinct/config.toml': '', '/a/b/file.txt': '' });

      expect(findLocalConfigDirs('/a/b')).toEqual(['/a/.tinct']);
    });
  });

  describe('getDisplayPath', () => {
    it('abbreviates the home directory', () => {
      expect(getDisplayPath('/home/user/.config/tinct')).toBe('~/.config/tinct');
      expect(getDisplayPath('/home/username')).toBe('/home/username');
      expect(getDisplayPath('/etc/tinct')).toBe('/etc/tinct');
    });
  });
});
