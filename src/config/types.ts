/**
 * Configuration Types
 *
 * Defines the shape of the project config and credentials.
 * These are the canonical types. Zod schemas in project-config.ts and
 * credentials.ts validate against these.
 */

import type { ThresholdConfig } from './thresholds.js';

/** Ingestion and analysis settings. */
export interface DeliverylensSettings {
  /** Days of history each ingestion run recomputes */
  lookbackDays: number;
  /** Default window for metrics, classification and correlation queries */
  analysisDays: number;
  thresholds?: ThresholdConfig;
}

/** Root project configuration, stored in ~/.deliverylens/config.json */
export interface ProjectConfig {
  version: 1;
  /** Organization the repos roll up into and business metrics belong to */
  orgId: string;
  /** Repositories in owner/name form */
  repos: string[];
  settings: DeliverylensSettings;
}

/** GitHub credentials. */
export interface GitHubCredentials {
  token: string;
}

/** OpenAI-compatible chat completion endpoint. */
export interface LlmCredentials {
  apiKey: string;
  baseUrl: string;
  model: string;
}

/** Root credentials, stored in ~/.deliverylens/credentials.json */
export interface CredentialsConfig {
  github?: GitHubCredentials;
  llm?: LlmCredentials;
}
