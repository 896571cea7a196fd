/**
 * Project Configuration Manager
 *
 * Reads and writes ~/.deliverylens/config.json.
 * Validates with Zod on read; serializes on write.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { ProjectConfig } from './types.js';
import { ensureStateDir, statePath } from './paths.js';

// ─── Zod Schemas ─────────────────────────────────────────────

export const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

const ThresholdConfigSchema = z
  .object({
    failurePolicy: z.enum(['nearest-preceding', 'self-labeled']).optional(),
    failureWindowHours: z.number().positive().optional(),
    incidentLabels: z.array(z.string().min(1)).optional(),
    revertKeywords: z.array(z.string().min(1)).optional(),
    deployElitePerDay: z.number().positive().optional(),
    deployHighPerDay: z.number().positive().optional(),
    deployMediumPerDay: z.number().positive().optional(),
    leadTimeEliteMinutes: z.number().positive().optional(),
    leadTimeHighMinutes: z.number().positive().optional(),
    leadTimeMediumMinutes: z.number().positive().optional(),
    cfrElite: z.number().min(0).max(1).optional(),
    cfrHigh: z.number().min(0).max(1).optional(),
    cfrMedium: z.number().min(0).max(1).optional(),
    mttrEliteMinutes: z.number().positive().optional(),
    mttrHighMinutes: z.number().positive().optional(),
    mttrMediumMinutes: z.number().positive().optional(),
    busFactorShare: z.number().min(0).max(1).optional(),
    busFactorMinCommits: z.number().int().nonnegative().optional(),
    highCfrThreshold: z.number().min(0).max(1).optional(),
    slowLeadTimeMinutes: z.number().positive().optional(),
    topContributorLimit: z.number().int().positive().optional(),
    correlationMinSamples: z.number().int().min(2).optional(),
    correlationInsightThreshold: z.number().min(0).max(1).optional(),
    annualRevenue: z.number().nonnegative().optional(),
    avgIncidentCost: z.number().nonnegative().optional(),
    engineerHourlyRate: z.number().nonnegative().optional(),
  })
  .optional();

const SettingsSchema = z.object({
  lookbackDays: z.number().int().positive().default(7),
  analysisDays: z.number().int().positive().default(30),
  thresholds: ThresholdConfigSchema,
});

const ProjectConfigSchema = z.object({
  version: z.literal(1),
  orgId: z.string().min(1),
  repos: z.array(z.string().regex(REPO_PATTERN, 'repos must be owner/name')).default([]),
  settings: SettingsSchema.default({}),
});

export { ProjectConfigSchema };

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate config from ~/.deliverylens/config.json.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readProjectConfig(): ProjectConfig | null {
  const filePath = statePath('config');
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return ProjectConfigSchema.parse(parsed);
}

/**
 * Write config to ~/.deliverylens/config.json.
 * Validates before writing to prevent corrupt configs.
 */
export function writeProjectConfig(config: ProjectConfig): void {
  ProjectConfigSchema.parse(config);
  ensureStateDir();
  writeFileSync(statePath('config'), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function projectConfigExists(): boolean {
  return existsSync(statePath('config'));
}

/**
 * Create a default config scaffold for an org and its repositories.
 */
export function createDefaultConfig(orgId: string, repos: string[]): ProjectConfig {
  return {
    version: 1,
    orgId,
    repos,
    settings: {
      lookbackDays: 7,
      analysisDays: 30,
    },
  };
}
