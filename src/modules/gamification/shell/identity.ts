/**
 * Gamification Module - Username Resolution
 *
 * Resolves the local user's GitHub username: the configured value, else
 * `git config user.name`, else the OS account name.
 */

import { execFileSync } from 'node:child_process';
import os from 'node:os';

import type { Logger } from 'pino';

export interface ResolveUsernameDeps {
  logger: Logger;
  /** Configured username (GITHUB_USERNAME) */
  configured?: string | undefined;
  /** Reads `git config user.name`; injectable for tests */
  readGitUserName?: () => string | null;
  /** Reads the OS account name; injectable for tests */
  readOsUserName?: () => string | null;
}

export const readGitUserName = (): string | null => {
  try {
    const output = execFileSync('git', ['config', 'user.name'], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
      timeout: 2000,
    });
    const name = output.trim();
    return name !== '' ? name : null;
  } catch {
    // git missing or no user.name set
    return null;
  }
};

export const readOsUserName = (): string | null => {
  try {
    const name = os.userInfo().username.trim();
    return name !== '' ? name : null;
  } catch {
    // no passwd entry for the current uid
    return null;
  }
};

const FALLBACK_USERNAME = 'unknown';

export function resolveGithubUsername(deps: ResolveUsernameDeps): string {
  const log = deps.logger.child({ module: 'identity' });

  const configured = deps.configured?.trim() ?? '';
  if (configured !== '') {
    return configured;
  }

  const fromGit = (deps.readGitUserName ?? readGitUserName)();
  if (fromGit !== null) {
    log.debug({ username: fromGit }, 'Using git user.name as GitHub username');
    return fromGit;
  }

  const fromOs = (deps.readOsUserName ?? readOsUserName)();
  if (fromOs !== null) {
    log.debug({ username: fromOs }, 'Using OS account name as GitHub username');
    return fromOs;
  }

  log.warn('Could not determine a username, using fallback');
  return FALLBACK_USERNAME;
}
