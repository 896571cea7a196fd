import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  chmodSync: vi.fn(),
}));

vi.mock('./paths.js', () => ({
  statePath: vi.fn(() => '/mock/.deliverylens/credentials.json'),
  ensureStateDir: vi.fn(() => '/mock/.deliverylens'),
  stateDir: vi.fn(() => '/mock/.deliverylens'),
}));

import {
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  mergeCredentials,
  resolveGitHubCredentials,
  resolveLlmCredentials,
  writeCredentials,
} from './credentials.js';
import { existsSync, readFileSync, writeFileSync, chmodSync } from 'node:fs';

describe('credentials', () => {
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    vi.clearAllMocks();
    // Save and clear env vars
    for (const key of ['GITHUB_TOKEN', 'LLM_API_KEY', 'LLM_BASE_URL', 'LLM_MODEL']) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    vi.mocked(existsSync).mockReturnValue(false);
  });

  afterEach(() => {
    // Restore env vars
    for (const [key, value] of Object.entries(savedEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('resolveGitHubCredentials', () => {
    it('returns null when no credentials available', () => {
      expect(resolveGitHubCredentials()).toBeNull();
    });

    it('resolves from GITHUB_TOKEN env var', () => {
      process.env['GITHUB_TOKEN'] = 'test-token';
      expect(resolveGitHubCredentials()).toEqual({ token: 'test-token' });
    });

    it('resolves from credentials file when env var not set', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'file-token' } }));

      expect(resolveGitHubCredentials()).toEqual({ token: 'file-token' });
    });

    it('env var takes precedence over file', () => {
      process.env['GITHUB_TOKEN'] = 'env-token';
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'file-token' } }));

      expect(resolveGitHubCredentials()).toEqual({ token: 'env-token' });
    });

    it('ignores a credentials file that fails validation', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: '' } }));

      expect(resolveGitHubCredentials()).toBeNull();
    });
  });

  describe('resolveLlmCredentials', () => {
    it('returns null without an API key', () => {
      process.env['LLM_MODEL'] = 'some-model';
      expect(resolveLlmCredentials()).toBeNull();
    });

    it('resolves from env vars with defaults for URL and model', () => {
      process.env['LLM_API_KEY'] = 'test-secret';

      expect(resolveLlmCredentials()).toEqual({
        apiKey: 'test-secret',
        baseUrl: DEFAULT_LLM_BASE_URL,
        model: DEFAULT_LLM_MODEL,
      });
    });

    it('honors LLM_BASE_URL and LLM_MODEL', () => {
      process.env['LLM_API_KEY'] = 'test-secret';
      process.env['LLM_BASE_URL'] = 'http://localhost:11434/v1';
      process.env['LLM_MODEL'] = 'llama3';

      expect(resolveLlmCredentials()).toEqual({
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:11434/v1',
        model: 'llama3',
      });
    });

    it('resolves from credentials file, filling defaults', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ llm: { apiKey: 'file-secret' } }));

      expect(resolveLlmCredentials()).toEqual({
        apiKey: 'file-secret',
        baseUrl: DEFAULT_LLM_BASE_URL,
        model: DEFAULT_LLM_MODEL,
      });
    });
  });

  describe('writeCredentials', () => {
    it('writes file with 600 permissions', () => {
      writeCredentials({ github: { token: 'test' } });

      expect(writeFileSync).toHaveBeenCalledWith(
        '/mock/.deliverylens/credentials.json',
        expect.stringContaining('"token": "test"'),
        'utf-8'
      );
      expect(chmodSync).toHaveBeenCalledWith('/mock/.deliverylens/credentials.json', 0o600);
    });
  });

  describe('mergeCredentials', () => {
    it('keeps sections that are not replaced', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'old-token' } }));

      mergeCredentials({ llm: { apiKey: 'test-secret', baseUrl: DEFAULT_LLM_BASE_URL, model: 'gpt-4o' } });

      const written = vi.mocked(writeFileSync).mock.calls[0]?.[1];
      expect(typeof written === 'string' ? JSON.parse(written) : null).toEqual({
        github: { token: 'old-token' },
        llm: { apiKey: 'test-secret', baseUrl: DEFAULT_LLM_BASE_URL, model: 'gpt-4o' },
      });
    });

    it('replaces a section that is given', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'old-token' } }));

      mergeCredentials({ github: { token: 'new-token' } });

      const written = vi.mocked(writeFileSync).mock.calls[0]?.[1];
      expect(typeof written === 'string' ? JSON.parse(written) : null).toEqual({
        github: { token: 'new-token' },
      });
    });
  });
});
