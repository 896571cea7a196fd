import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  chmodSync: vi.fn(),
}));

vi.mock('./paths.js', () => ({
  statePath: vi.fn(() => '/mock/.deliverylens/config.json'),
  ensureStateDir: vi.fn(() => '/mock/.deliverylens'),
  stateDir: vi.fn(() => '/mock/.deliverylens'),
}));

import {
  readProjectConfig,
  writeProjectConfig,
  projectConfigExists,
  createDefaultConfig,
} from './project-config.js';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { ProjectConfig } from './types.js';

const validConfig: ProjectConfig = {
  version: 1,
  orgId: 'acme',
  repos: ['acme/web', 'acme/api'],
  settings: {
    lookbackDays: 7,
    analysisDays: 30,
    thresholds: { failurePolicy: 'self-labeled', incidentLabels: ['sev1'] },
  },
};

describe('project-config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('readProjectConfig', () => {
    it('returns null when file does not exist', () => {
      vi.mocked(existsSync).mockReturnValue(false);
      expect(readProjectConfig()).toBeNull();
    });

    it('reads and validates valid config', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify(validConfig));

      expect(readProjectConfig()).toEqual(validConfig);
    });

    it('fills default settings', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ version: 1, orgId: 'acme' }));

      expect(readProjectConfig()).toEqual({
        version: 1,
        orgId: 'acme',
        repos: [],
        settings: { lookbackDays: 7, analysisDays: 30 },
      });
    });

    it('throws on invalid JSON', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue('not json');

      expect(() => readProjectConfig()).toThrow();
    });

    it('throws on a repository that is not owner/name', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ ...validConfig, repos: ['web'] }));

      expect(() => readProjectConfig()).toThrow('repos must be owner/name');
    });

    it('throws on an unknown failure policy', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({ ...validConfig, settings: { thresholds: { failurePolicy: 'guess' } } })
      );

      expect(() => readProjectConfig()).toThrow();
    });
  });

  describe('writeProjectConfig', () => {
    it('writes formatted JSON', () => {
      writeProjectConfig(validConfig);

      expect(writeFileSync).toHaveBeenCalledWith(
        '/mock/.deliverylens/config.json',
        JSON.stringify(validConfig, null, 2) + '\n',
        'utf-8'
      );
    });

    it('refuses to write an invalid config', () => {
      expect(() => writeProjectConfig({ ...validConfig, orgId: '' })).toThrow();
      expect(writeFileSync).not.toHaveBeenCalled();
    });
  });

  describe('projectConfigExists', () => {
    it('reflects the config file', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      expect(projectConfigExists()).toBe(true);
    });
  });

  describe('createDefaultConfig', () => {
    it('scaffolds an org with default windows', () => {
      expect(createDefaultConfig('acme', ['acme/web'])).toEqual({
        version: 1,
        orgId: 'acme',
        repos: ['acme/web'],
        settings: { lookbackDays: 7, analysisDays: 30 },
      });
    });
  });
});
