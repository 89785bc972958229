/**
 * Procfile / .env loader
 *
 * Procfile: one `name: command-line` entry per line.
 * .env:     one `KEY=VALUE` entry per line.
 * In both, everything from the first `#` onward is a comment.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, ErrorCode } from '../errors';
import { getSupervisorLogger } from '../supervisor/supervisor-logger';
import type { EnvironmentOverride, ProcessDefinition } from '../supervisor/types';

export const DEFAULT_PROCFILE = 'Procfile';
export const DEFAULT_ENV_FILE = '.env';

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function stripComment(line: string): string {
  const hash = line.indexOf('#');
  return hash === -1 ? line : line.slice(0, hash);
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Parse Procfile text into definitions, in file order
 */
export function parseProcfile(text: string): ProcessDefinition[] {
  const definitions: ProcessDefinition[] = [];
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = stripComment(lines[i].replace(/\r$/, ''));
    if (line.trim() === '') {
      continue;
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new ConfigurationError(
        ErrorCode.E104_CONFIGURATION_INVALID,
        `Procfile line ${i + 1} has no "name:" separator`,
        { line: i + 1 }
      );
    }

    const name = line.slice(0, colon);
    const colonSpace = line.indexOf(': ');
    const commandLine = colonSpace === -1 ? line.slice(colon + 1) : line.slice(colonSpace + 2);

    definitions.push(Object.freeze({ name, commandLine }));
  }

  return definitions;
}

/**
 * Parse .env text into overrides, in file order
 */
export function parseEnvFile(text: string): EnvironmentOverride[] {
  const overrides: EnvironmentOverride[] = [];

  for (const raw of text.split('\n')) {
    const line = stripComment(raw).trim();
    const eq = line.indexOf('=');
    if (eq === -1) {
      continue;
    }

    const key = line.slice(0, eq).trim();
    if (!ENV_KEY_PATTERN.test(key)) {
      getSupervisorLogger().log('warn', 'CONFIG', `Skipping invalid environment key: ${key}`, {
        details: { line },
      });
      continue;
    }

    overrides.push({ key, value: unquote(line.slice(eq + 1).trim()) });
  }

  return overrides;
}

/**
 * Apply overrides on top of a base environment. Later entries win.
 */
export function applyOverrides(
  base: NodeJS.ProcessEnv,
  overrides: readonly EnvironmentOverride[]
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  for (const { key, value } of overrides) {
    env[key] = value;
  }
  return env;
}

export function loadDefinitions(dir: string, fileName: string = DEFAULT_PROCFILE): ProcessDefinition[] {
  const filePath = path.resolve(dir, fileName);

  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(ErrorCode.E101_PROCFILE_NOT_FOUND, filePath, { path: filePath });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      ErrorCode.E102_PROCFILE_UNREADABLE,
      `${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const definitions = parseProcfile(content);
  getSupervisorLogger().log('debug', 'CONFIG', `Loaded ${definitions.length} definition(s)`, {
    details: { path: filePath, names: definitions.map((d) => d.name) },
  });
  return definitions;
}

/**
 * The env file is optional: a missing file yields no overrides
 */
export function loadOverrides(dir: string, fileName: string = DEFAULT_ENV_FILE): EnvironmentOverride[] {
  const filePath = path.resolve(dir, fileName);

  if (!fs.existsSync(filePath)) {
    return [];
  }

  try {
    return parseEnvFile(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      ErrorCode.E103_ENV_FILE_UNREADABLE,
      `${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
