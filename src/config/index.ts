export {
  DEFAULT_ENV_FILE,
  DEFAULT_PROCFILE,
  applyOverrides,
  loadDefinitions,
  loadOverrides,
  parseEnvFile,
  parseProcfile,
} from './procfile';

export {
  DEFAULT_SETTINGS,
  SETTINGS_FILE,
  SELECTIVE_KILL_ENV,
  DEBUG_ENV,
  applyEnvironment,
  isTruthyFlag,
  loadSettingsFile,
  parseSettingsDocument,
  resolveSettings,
  type ProcmuxSettings,
} from './settings';
