/**
 * procmux settings
 *
 * Layers, later wins:
 * 1. DEFAULT_SETTINGS
 * 2. procmux.yaml in the working directory (optional)
 * 3. Environment: PROCMUX_SELECTIVE_KILL, PROCMUX_DEBUG, NO_COLOR
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigurationError, ErrorCode } from '../errors';
import { DEFAULT_SHELL } from '../supervisor/child-worker';
import type { TerminationMode } from '../supervisor/types';
import { DEFAULT_ENV_FILE, DEFAULT_PROCFILE } from './procfile';

export const SETTINGS_FILE = 'procmux.yaml';

export const SELECTIVE_KILL_ENV = 'PROCMUX_SELECTIVE_KILL';
export const DEBUG_ENV = 'PROCMUX_DEBUG';

export interface ProcmuxSettings {
  procfile: string;
  envFile: string;
  shell: string;
  killMode: TerminationMode;
  /** SIGKILL escalation after SIGTERM; 0 = wait indefinitely */
  killTimeoutMs: number;
  color: boolean;
  debug: boolean;
}

export const DEFAULT_SETTINGS: Readonly<ProcmuxSettings> = Object.freeze({
  procfile: DEFAULT_PROCFILE,
  envFile: DEFAULT_ENV_FILE,
  shell: DEFAULT_SHELL,
  killMode: 'whole-group',
  killTimeoutMs: 0,
  color: true,
  debug: false,
});

const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Empty/unset is false; 0/false/no/off (any case) are false; anything else is true
 */
export function isTruthyFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized !== '' && !FALSE_VALUES.has(normalized);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(key: string, expected: string, filePath: string): ConfigurationError {
  return new ConfigurationError(
    ErrorCode.E104_CONFIGURATION_INVALID,
    `${filePath}: "${key}" must be ${expected}`,
    { key, path: filePath }
  );
}

/**
 * Validate the parsed YAML document; unknown keys are ignored
 */
export function parseSettingsDocument(document: unknown, filePath: string): Partial<ProcmuxSettings> {
  if (document === null || document === undefined) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigurationError(ErrorCode.E104_CONFIGURATION_INVALID, `${filePath}: expected a mapping`);
  }

  const result: Partial<ProcmuxSettings> = {};

  for (const key of ['procfile', 'envFile', 'shell'] as const) {
    const value = document[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      throw invalid(key, 'a non-empty string', filePath);
    }
    result[key] = value;
  }

  if (document.killMode !== undefined) {
    if (document.killMode !== 'whole-group' && document.killMode !== 'selective') {
      throw invalid('killMode', "'whole-group' or 'selective'", filePath);
    }
    result.killMode = document.killMode;
  }

  if (document.killTimeoutMs !== undefined) {
    const value = document.killTimeoutMs;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw invalid('killTimeoutMs', 'a non-negative integer', filePath);
    }
    result.killTimeoutMs = value;
  }

  for (const key of ['color', 'debug'] as const) {
    const value = document[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw invalid(key, 'a boolean', filePath);
    }
    result[key] = value;
  }

  return result;
}

export function loadSettingsFile(dir: string): Partial<ProcmuxSettings> {
  const filePath = path.join(dir, SETTINGS_FILE);
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let document: unknown;
  try {
    document = yaml.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      ErrorCode.E104_CONFIGURATION_INVALID,
      `${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseSettingsDocument(document, filePath);
}

export function applyEnvironment(settings: ProcmuxSettings, env: NodeJS.ProcessEnv): ProcmuxSettings {
  const result = { ...settings };
  if (isTruthyFlag(env[SELECTIVE_KILL_ENV])) {
    result.killMode = 'selective';
  }
  if (isTruthyFlag(env[DEBUG_ENV])) {
    result.debug = true;
  }
  if (env.NO_COLOR) {
    result.color = false;
  }
  return result;
}

export function resolveSettings(dir: string, env: NodeJS.ProcessEnv): ProcmuxSettings {
  return applyEnvironment({ ...DEFAULT_SETTINGS, ...loadSettingsFile(dir) }, env);
}
