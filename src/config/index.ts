// Session settings from .herald.json, HERALD_* variables and CLI flags, later sources winning.

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { HeraldError } from '../errors/index.js';
import { SessionSettingsSchema } from '../types/config.js';
import type { SessionSettings } from '../types/config.js';
import { isPlainObject } from '../utils/index.js';

export const CONFIG_FILENAME = '.herald.json';
export const ENV_PREFIX = 'HERALD_';

// HERALD_NOTIFY_IF_NO_TTY names the setting notifyIfNoTty.
function settingName(variable: string): string {
  const [head = '', ...rest] = variable.slice(ENV_PREFIX.length).toLowerCase().split('_');
  return head + rest.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join('');
}

// Environment values are text; booleans and counts are recognized so the
// schema sees the same types a JSON file would give it.
function parseEnvValue(text: string): string | number | boolean {
  switch (text) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      return /^\d+$/.test(text) ? Number(text) : text;
  }
}

function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(env)
      .filter(
        (entry): entry is [string, string] =>
          entry[0].startsWith(ENV_PREFIX) && entry[1] !== undefined,
      )
      .map(([variable, text]) => [settingName(variable), parseEnvValue(text)]),
  );
}

/**
 * Read the settings file from projectDir.
 * A missing file yields an empty object; malformed JSON is an error.
 */
async function loadConfigFile(projectDir: string): Promise<Record<string, unknown>> {
  const configPath = join(projectDir, CONFIG_FILENAME);
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new HeraldError('malformed JSON.', { culprit: configPath });
  }
  if (!isPlainObject(parsed)) {
    throw new HeraldError('expected a JSON object.', { culprit: configPath });
  }
  return parsed;
}

/**
 * Load session settings with precedence: CLI flags > env vars > config file > Zod defaults.
 *
 * @param projectDir - Directory containing .herald.json
 * @param cliFlags - Flag overrides; validated with everything else
 * @param env - Environment to read HERALD_* variables from
 */
export async function loadConfig(
  projectDir: string,
  cliFlags: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<SessionSettings> {
  const fileConfig = await loadConfigFile(projectDir);
  const envConfig = settingsFromEnv(env);

  const merged = { ...fileConfig, ...envConfig, ...cliFlags };
  const result = SessionSettingsSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new HeraldError(`Config validation failed:\n${issues}`);
  }

  return result.data;
}
