/**
 * Tests for Themes Command
 */

import { Command } from 'commander';
import { vol } from 'memfs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createTestContext,
  TEST_CONFIG_DIR,
  TEST_RUNTIME_DIR,
  type TestContextOptions
} from '../testing.js';
import { setupThemesCommand } from './themes.js';

vi.mock('node:fs', async () => {
  const memfs = await import('memfs');
  return { ...memfs.fs, default: memfs.fs };
});

function setup(options: TestContextOptions = {}) {
  const test = createTestContext(options);
  const program = new Command();
  program.exitOverride();
  setupThemesCommand(program, () => test.ctx);
  const run = (...args: string[]) => program.parseAsync(['themes', ...args], { from: 'user' });
  return { ...test, run };
}

describe('setupThemesCommand', () => {
  beforeEach(() => {
    vol.reset();
  });

  it('lists themes and marks the configured one', async () => {
    vol.fromJSON({ [`${TEST_CONFIG_DIR}/themes/warm.toml`]: 'inherits = "default"' });
    const { run, output } = setup();

    await run('list');

    expect(output).toEqual(['* default', '  warm']);
  });

  it('notes themes that fail to resolve', async () => {
    vol.fromJSON({ [`${TEST_CONFIG_DIR}/themes/warm.toml`]: 'inherits = "gone"' });
    const { run, output } = setup();

    await run('list');

    expect(output).toEqual([
      '* default',
      `  warm (error: Flavor "gone" not found at ${TEST_RUNTIME_DIR}/themes/gone.toml)`
    ]);
  });

  it('shows the configured theme', async () => {
    const { run, output } = setup();

    await run('show');

    expect(output).toEqual([
      'Theme: default',
      '',
      '  error    fg=red',
      '  hint     fg=cyan',
      '  info     fg=blue bold',
      '  warning  fg=yellow'
    ]);
  });

  it('shows a named theme with inherited scopes', async () => {
    vol.fromJSON({
      [`${TEST_CONFIG_DIR}/themes/warm.toml`]: [
        'inherits = "default"',
        'error = "accent"',
        '[palette]',
        'accent = "#ff8800"'
      ].join('\n')
    });
    const { run, output } = setup({ supportsTrueColor: true });

    await run('show', 'warm');

    expect(output[0]).toBe('Theme: warm');
    expect(output[2]).toBe('  error    \u001B[38;2;255;136;0mfg=#ff8800\u001B[39m');
    expect(output[3]).toBe('  hint     \u001B[36mfg=cyan\u001B[39m');
  });

  it('fails for an unknown theme', async () => {
    const { run } = setup();

    await expect(run('show', 'nope')).rejects.toThrow('Flavor "nope" not found');
  });
});
