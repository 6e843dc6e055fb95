import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadEnv } from './env-loader.js';
import { existsSync, readFileSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('loadEnv', () => {
  const mockExistsSync = vi.mocked(existsSync);
  const mockReadFileSync = vi.mocked(readFileSync);
  const mockDotenvConfig = vi.mocked(dotenvConfig);

  beforeEach(() => {
    vi.clearAllMocks();
    mockDotenvConfig.mockReturnValue({ parsed: undefined });
    mockReadFileSync.mockReturnValue('{"name":"pkg"}');
  });

  it('returns an empty list when no .env files exist', () => {
    mockExistsSync.mockReturnValue(false);

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toEqual([]);
    expect(mockDotenvConfig).not.toHaveBeenCalled();
  });

  it('loads .env from the package.json that declares workspaces', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('{"name":"root","workspaces":["core"]}');
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    const result = loadEnv(import.meta.url);

    expect(result.loaded.length).toBeGreaterThan(0);
    expect(mockDotenvConfig.mock.calls[0]?.[0]).not.toHaveProperty('override');
  });

  it('falls back to the cwd .env without overriding', () => {
    mockExistsSync.mockImplementation((path) => typeof path === 'string' && path.endsWith('.env'));
    mockDotenvConfig.mockReturnValue({ parsed: { FALLBACK: 'value' } });

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toHaveLength(1);
    expect(mockDotenvConfig).toHaveBeenCalledWith(expect.objectContaining({ override: false }));
  });

  it('reports each loaded file through the logger', () => {
    const debug = vi.fn();
    mockExistsSync.mockImplementation((path) => typeof path === 'string' && path.endsWith('.env'));
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv(import.meta.url, { logger: { debug } });

    expect(debug).toHaveBeenCalledWith('env.loaded', expect.objectContaining({ fallback: true }));
  });
});
