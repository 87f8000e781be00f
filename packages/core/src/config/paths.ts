/**
 * @schoolbell/core - Path resolution and directory management
 *
 * Resolves SCHOOLBELL_HOME and ensures the home and log directories exist.
 */

import { mkdirSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the Schoolbell home directory.
 * Priority: SCHOOLBELL_HOME env var > ~/.schoolbell
 */
export function resolveSchoolbellHome(): string {
  const fromEnv = process.env['SCHOOLBELL_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.schoolbell');
}

/** Resolved path map */
export interface SchoolbellPaths {
  home: string;
  config: string; // schoolbell.json
  logs: string;
}

/**
 * Build the full set of Schoolbell paths.
 * Does NOT create directories -- call `ensureDirectories` for that.
 */
export function buildPaths(): SchoolbellPaths {
  const home = resolveSchoolbellHome();

  return {
    home,
    config: join(home, 'schoolbell.json'),
    logs: join(home, 'logs'),
  };
}

/**
 * Ensure the home and log directories exist.
 */
export function ensureDirectories(paths?: SchoolbellPaths): SchoolbellPaths {
  const p = paths ?? buildPaths();

  for (const dir of [p.home, p.logs]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return p;
}
