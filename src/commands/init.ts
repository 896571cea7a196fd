/**
 * deliverylens init: Interactive Setup Command
 *
 * 1. Detect or prompt for a GitHub token
 * 2. Validate it against the live API
 * 3. Optionally configure an LLM endpoint for chat
 * 4. Prompt for the organization and its repositories
 * 5. Save configuration
 */

import {
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  mergeCredentials,
  resolveGitHubCredentials,
  resolveLlmCredentials,
} from '../config/credentials.js';
import {
  createDefaultConfig,
  projectConfigExists,
  readProjectConfig,
  writeProjectConfig,
} from '../config/project-config.js';
import { stateDir } from '../config/paths.js';
import { GitHubClient, GitHubClientError } from '../clients/github-client.js';
import type { CredentialsConfig, GitHubCredentials, LlmCredentials, ProjectConfig } from '../config/types.js';
import { SetupPrompt, say } from './prompt.js';

const MAX_AUTH_RETRIES = 3;
const TOTAL_STEPS = 4;

type CredSource = 'env' | 'file' | 'prompt';

// ─── Entry Point ──────────────────────────────────────────────

export async function runInit(): Promise<void> {
  say.title('deliverylens init');
  say.info('Interactive setup for DORA metrics tracking.\n');

  const prompt = new SetupPrompt();

  try {
    // Step 1: GitHub credentials
    say.step(1, TOTAL_STEPS, 'GitHub credentials');
    const { creds: ghCreds, source: ghSource } = await resolveOrPromptGitHub(prompt);
    const ghUser = await validateGitHub(prompt, ghCreds, ghSource);

    // Step 2: LLM (optional)
    say.step(2, TOTAL_STEPS, 'Chat model (optional)');
    const llm = await resolveOrPromptLlm(prompt);

    // Step 3: Organization + repositories
    say.step(3, TOTAL_STEPS, 'Organization');
    const existing = projectConfigExists() ? readProjectConfig() : null;
    const config = await askProjectConfig(prompt, existing, ghUser.login);

    // Step 4: Persist
    say.step(4, TOTAL_STEPS, 'Saving configuration');
    const credsToSave: CredentialsConfig = {};
    if (ghSource === 'prompt') credsToSave.github = ghCreds;
    if (llm?.source === 'prompt') credsToSave.llm = llm.creds;
    if (credsToSave.github || credsToSave.llm) {
      mergeCredentials(credsToSave);
      say.ok(`Credentials saved to ${stateDir()}/credentials.json`);
    }

    writeProjectConfig(config);
    say.ok(`Config saved to ${stateDir()}/config.json`);

    printSummary(config, llm !== null);
  } finally {
    prompt.close();
  }
}

// ─── Project Input ───────────────────────────────────────────

async function askProjectConfig(
  prompt: SetupPrompt,
  existing: ProjectConfig | null,
  login: string
): Promise<ProjectConfig> {
  if (existing) {
    say.info(`Existing config: ${existing.orgId} (${existing.repos.length} repos)`);
  }

  const orgId = await prompt.text('Organization id', existing?.orgId ?? (login !== 'unknown' ? login : ''));
  const repos = await prompt.repos('Repositories (owner/name, comma-separated)', existing?.repos);

  const config = existing ?? createDefaultConfig(orgId, repos);
  return { ...config, orgId, repos };
}

// ─── Credential Resolution ────────────────────────────────────

interface ResolvedCreds<T> {
  creds: T;
  source: CredSource;
}

async function resolveOrPromptGitHub(prompt: SetupPrompt): Promise<ResolvedCreds<GitHubCredentials>> {
  const envToken = process.env['GITHUB_TOKEN'];
  if (envToken) {
    say.ok('Found GITHUB_TOKEN in environment.');
    return { creds: { token: envToken }, source: 'env' };
  }

  const fileCreds = resolveGitHubCredentials();
  if (fileCreds) {
    say.ok('Found GitHub token in credentials file.');
    return { creds: fileCreds, source: 'file' };
  }

  say.info('No GitHub token found. Create one at https://github.com/settings/tokens');
  say.info('Required scopes: repo');
  const token = await prompt.secret('GitHub personal access token');

  if (!token) {
    throw new Error('GitHub token is required.');
  }

  return { creds: { token }, source: 'prompt' };
}

async function resolveOrPromptLlm(prompt: SetupPrompt): Promise<ResolvedCreds<LlmCredentials> | null> {
  const resolved = resolveLlmCredentials();
  if (resolved) {
    const source: CredSource = process.env['LLM_API_KEY'] ? 'env' : 'file';
    say.ok(`Using ${resolved.model} at ${resolved.baseUrl}.`);
    return { creds: resolved, source };
  }

  const wanted = await prompt.confirm('Configure an OpenAI-compatible model for chat answers?', false);
  if (!wanted) {
    say.info('Chat will answer from templates.');
    return null;
  }

  const baseUrl = await prompt.text('API base URL', DEFAULT_LLM_BASE_URL, (v) =>
    URL.canParse(v) ? null : 'Must be a valid URL'
  );
  const model = await prompt.text('Model', DEFAULT_LLM_MODEL);
  const apiKey = await prompt.secret('API key');
  if (!apiKey) {
    say.warn('No API key entered. Chat will answer from templates.');
    return null;
  }

  return { creds: { apiKey, baseUrl, model }, source: 'prompt' };
}

// ─── Credential Validation ───────────────────────────────────

async function validateGitHub(
  prompt: SetupPrompt,
  creds: GitHubCredentials,
  source: CredSource
): Promise<{ login: string; name: string | null }> {
  for (let attempt = 1; attempt <= MAX_AUTH_RETRIES; attempt++) {
    try {
      const client = new GitHubClient(creds.token);
      const user = await client.getAuthenticatedUser();
      say.ok(`GitHub: authenticated as @${user.login}${user.name ? ` (${user.name})` : ''}`);
      return user;
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 401) {
        if (source !== 'prompt' || attempt >= MAX_AUTH_RETRIES) {
          throw new Error(`GitHub authentication failed (${error.statusCode}). Check your token.`);
        }
        say.warn(`Invalid token (attempt ${attempt}/${MAX_AUTH_RETRIES}). Try again.`);
        const token = await prompt.secret('GitHub personal access token');
        if (!token) throw new Error('GitHub token is required.');
        creds.token = token;
        continue;
      }
      // Network error: offer to skip validation
      const skip = await prompt.confirm(
        `GitHub API unreachable: ${error instanceof Error ? error.message : 'unknown error'}. Skip validation?`,
        false
      );
      if (skip) {
        say.warn('Skipping GitHub validation. Credentials saved as-is.');
        return { login: 'unknown', name: null };
      }
      throw error;
    }
  }

  throw new Error('GitHub authentication failed after maximum retries.');
}

// ─── Summary ─────────────────────────────────────────────────

function printSummary(config: ProjectConfig, llm: boolean): void {
  say.title('Setup complete');
  console.log(`  Organization: ${config.orgId}`);
  console.log(`  Repositories: ${config.repos.join(', ') || 'none'}`);
  console.log(`  Chat:         ${llm ? 'LLM' : 'templates'}`);
  console.log('');
  console.log('  Next steps:');
  console.log('    deliverylens ingest       Pull the last 7 days of activity');
  console.log('    deliverylens metrics      Show DORA metrics per repository');
  console.log('');
}
