/**
 * Credentials Resolver
 *
 * Resolves API credentials in order:
 * 1. Environment variables (GITHUB_TOKEN, LLM_API_KEY, LLM_BASE_URL, LLM_MODEL)
 * 2. ~/.deliverylens/credentials.json
 * 3. Returns null if neither found
 *
 * Credentials file is stored with 600 permissions (owner read/write only).
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import type { CredentialsConfig, GitHubCredentials, LlmCredentials } from './types.js';
import { ensureStateDir, statePath } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

export const DEFAULT_LLM_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';

const CredentialsSchema = z.object({
  github: z
    .object({
      token: z.string().min(1),
    })
    .optional(),
  llm: z
    .object({
      apiKey: z.string().min(1),
      baseUrl: z.string().url().default(DEFAULT_LLM_BASE_URL),
      model: z.string().min(1).default(DEFAULT_LLM_MODEL),
    })
    .optional(),
});

// ─── Environment Variable Names ──────────────────────────────

const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';
const ENV_LLM_API_KEY = 'LLM_API_KEY';
const ENV_LLM_BASE_URL = 'LLM_BASE_URL';
const ENV_LLM_MODEL = 'LLM_MODEL';

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve GitHub credentials.
 * Checks env var first, then credentials file.
 */
export function resolveGitHubCredentials(): GitHubCredentials | null {
  const envToken = process.env[ENV_GITHUB_TOKEN];
  if (envToken) {
    return { token: envToken };
  }

  const fileConfig = readCredentialsFile();
  if (fileConfig?.github?.token) {
    return fileConfig.github;
  }

  return null;
}

/**
 * Resolve LLM credentials. The API key decides: without one, chat stays on templates.
 */
export function resolveLlmCredentials(): LlmCredentials | null {
  const envKey = process.env[ENV_LLM_API_KEY];
  if (envKey) {
    return {
      apiKey: envKey,
      baseUrl: process.env[ENV_LLM_BASE_URL] || DEFAULT_LLM_BASE_URL,
      model: process.env[ENV_LLM_MODEL] || DEFAULT_LLM_MODEL,
    };
  }

  const fileConfig = readCredentialsFile();
  return fileConfig?.llm ?? null;
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from ~/.deliverylens/credentials.json.
 * Returns null if the file doesn't exist or fails validation.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = statePath('credentials');
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}

/**
 * Write credentials to ~/.deliverylens/credentials.json with 600 permissions.
 */
export function writeCredentials(config: CredentialsConfig): void {
  ensureStateDir();
  const filePath = statePath('credentials');
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}

/**
 * Merge new credentials into the existing file. Sections not given are kept.
 */
export function mergeCredentials(newCreds: CredentialsConfig): void {
  const existing = readCredentialsFile() ?? {};
  const merged: CredentialsConfig = { ...existing };

  if (newCreds.github) {
    merged.github = newCreds.github;
  }
  if (newCreds.llm) {
    merged.llm = newCreds.llm;
  }

  writeCredentials(merged);
}
