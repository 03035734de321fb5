import { LogLevelSchema, type SettingsLayer } from './settings-schema.js';

export type EnvSource = Record<string, string | undefined>;

export const parseBooleanEnv = (value: unknown): boolean => {
  if (typeof value !== 'string') {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
};

/**
 * Build environment-derived overrides. Values that do not parse are skipped.
 */
export function buildEnvOverrides(env: EnvSource = process.env): SettingsLayer {
  const render: NonNullable<SettingsLayer['render']> = {};
  if (env.SSHCONF_INDENT !== undefined) {
    // Allow a literal "\t" since tabs are awkward to export.
    render.indent = env.SSHCONF_INDENT.replace(/\\t/g, '\t');
  }
  if (env.SSHCONF_BLANK_LINES !== undefined) {
    const blankLines = Number(env.SSHCONF_BLANK_LINES);
    if (Number.isInteger(blankLines) && blankLines >= 0) {
      render.blankLines = blankLines;
    }
  }

  const logging: NonNullable<SettingsLayer['logging']> = {};
  const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL);
  if (logLevel.success) logging.logLevel = logLevel.data;
  if (env.DISABLE_LOGGING !== undefined) logging.disableLogging = parseBooleanEnv(env.DISABLE_LOGGING);
  if (env.DEBUG_LOGGING !== undefined) logging.debugLogging = parseBooleanEnv(env.DEBUG_LOGGING);

  const config: NonNullable<SettingsLayer['config']> = {};
  if (env.SSHCONF_CONFIG) config.path = env.SSHCONF_CONFIG;

  return { render, logging, config };
}

// Test runners set different variables; any of them keeps logs off disk.
export const isTestEnvironment = (env: EnvSource = process.env): boolean => {
  return (
    env.NODE_ENV === 'test' ||
    env.AVA_PATH !== undefined ||
    env.VITEST !== undefined ||
    env.JEST_WORKER_ID !== undefined ||
    env.SSHCONF_TEST_MODE === 'true'
  );
};
