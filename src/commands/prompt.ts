/**
 * Terminal prompts for `deliverylens init`.
 *
 * SetupPrompt owns one readline interface. Secrets are read with echo muted
 * through a gated output stream rather than by toggling raw mode by hand.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { Writable } from 'node:stream';
import { REPO_PATTERN } from '../config/project-config.js';

/** Returns a complaint about the answer, or null to accept it. */
export type AnswerCheck = (answer: string) => string | null;

export class SetupPrompt {
  private muted = false;
  private rl: Interface;

  constructor() {
    const output = new Writable({
      write: (chunk: Buffer | string, _encoding, done) => {
        if (!this.muted) stdout.write(chunk);
        done();
      },
    });
    this.rl = createInterface({ input: stdin, output, terminal: stdin.isTTY });
    this.rl.on('SIGINT', () => {
      this.rl.close();
      stdout.write('\nSetup cancelled.\n');
      process.exit(130);
    });
  }

  /** Re-asks until `check` passes. An empty answer takes `fallback`. */
  async text(label: string, fallback = '', check: AnswerCheck = nonEmpty): Promise<string> {
    const hint = fallback ? ` [${fallback}]` : '';
    for (;;) {
      const answer = (await this.rl.question(`${label}${hint}: `)).trim() || fallback;
      const complaint = check(answer);
      if (complaint === null) return answer;
      say.warn(complaint);
    }
  }

  async secret(label: string): Promise<string> {
    stdout.write(`${label}: `);
    this.muted = true;
    try {
      return (await this.rl.question('')).trim();
    } finally {
      this.muted = false;
      stdout.write('\n');
    }
  }

  async confirm(label: string, fallback: boolean): Promise<boolean> {
    const answer = (await this.rl.question(`${label} ${fallback ? '[Y/n]' : '[y/N]'}: `)).trim().toLowerCase();
    return answer ? answer === 'y' || answer === 'yes' : fallback;
  }

  /** Comma-separated owner/name list. */
  async repos(label: string, fallback: readonly string[] = []): Promise<string[]> {
    const answer = await this.text(label, fallback.join(', '), checkRepoList);
    return splitList(answer);
  }

  close(): void {
    this.rl.close();
  }
}

function nonEmpty(answer: string): string | null {
  return answer ? null : 'A value is required.';
}

export function splitList(answer: string): string[] {
  return answer
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function checkRepoList(answer: string): string | null {
  const repos = splitList(answer);
  if (repos.length === 0) return 'Enter at least one repository.';
  const invalid = repos.filter((repo) => !REPO_PATTERN.test(repo));
  return invalid.length > 0 ? `Expected owner/name: ${invalid.join(', ')}` : null;
}

const tint = (code: number) => (text: string) => `\x1b[${code}m${text}\x1b[0m`;
const bold = tint(1);
const dim = tint(2);

/** Setup output goes to stdout; the CLI has no JSON-RPC channel to protect. */
export const say = {
  title(text: string): void {
    console.log(`\n${bold(tint(36)(text))}\n${dim('─'.repeat(text.length))}`);
  },
  step(step: number, total: number, text: string): void {
    console.log(`\n${bold(`[${step}/${total}]`)} ${text}`);
  },
  ok(text: string): void {
    console.log(`${tint(32)('[ok]')} ${text}`);
  },
  warn(text: string): void {
    console.log(`${tint(33)('[!]')} ${text}`);
  },
  info(text: string): void {
    console.log(`${dim('[i]')} ${text}`);
  },
};
