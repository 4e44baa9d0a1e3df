import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createContext, createStderrLogger } from './context.js';

// Nothing exists under these paths, so only the built-in flavors are found
const env = {
  TINCT_CONFIG_DIR: '/nonexistent/tinct/config',
  TINCT_RUNTIME: '/nonexistent/tinct/runtime'
};
const cwd = '/nonexistent/tinct/project';

describe('createContext', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses defaults and the built-in flavors', () => {
    const ctx = createContext({}, env, cwd);

    expect(ctx.config).toEqual({ icons: 'default', theme: 'default' });
    expect(ctx.configSources).toEqual([]);
    expect(ctx.logger.level).toBe('info');
    expect(ctx.icons.names()).toEqual(['default']);
    expect(ctx.themes.names()).toEqual(['default']);
    expect(ctx.supportsTrueColor).toBe(false);
  });

  it('materializes the built-in icon flavor with the built-in theme', () => {
    const ctx = createContext({}, env, cwd);

    const flavor = ctx.icons.materialize('default', ctx.themes.default(), true);

    expect(flavor.name).toBe('default');
    expect(flavor.diagnostic.error.style).toEqual({
      kind: 'derived',
      style: { fg: { kind: 'rgb', r: 0xf3, g: 0x8b, b: 0xa8 } }
    });
    expect(flavor.mimeType.rs?.style?.kind).toBe('explicit');
  });

  it('maps --quiet and --verbose to log levels', () => {
    expect(createContext({ quiet: true }, env, cwd).logger.level).toBe('error');
    expect(createContext({ verbose: true }, env, cwd).logger.level).toBe('debug');
  });

  it('reads the log level from TINCT_LOG_LEVEL', () => {
    expect(createContext({}, { ...env, TINCT_LOG_LEVEL: 'warn' }, cwd).logger.level).toBe('warn');
  });

  it('enables 24-bit color from COLORTERM', () => {
    const ctx = createContext({}, { ...env, COLORTERM: 'truecolor' }, cwd);

    expect(ctx.supportsTrueColor).toBe(true);
  });
});

describe('createStderrLogger', () => {
  it('writes prefixed lines to stderr', () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    createStderrLogger({}, 'warn').warn('careful');
    createStderrLogger({}, 'warn').info('hidden');

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(consoleErrorSpy.mock.calls[0]?.[0]).toMatch(/^\[.+\] \[WARN\] \[tinct\] careful$/);
    consoleErrorSpy.mockRestore();
  });
});
