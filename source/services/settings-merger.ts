import { SettingsSchema, type SettingsData, type SettingsLayer } from './settings-schema.js';
import type { ILoggingService } from './service-interfaces.js';

/**
 * Merge settings layers, later layers winning per key, and fill in defaults.
 * Typical order: settings file, env, cli.
 */
export function mergeSettings(
  layers: SettingsLayer[],
  opts?: { loggingService?: Pick<ILoggingService, 'warn'> },
): SettingsData {
  const merged: SettingsLayer = {};
  for (const layer of layers) {
    merged.render = { ...merged.render, ...layer.render };
    merged.logging = { ...merged.logging, ...layer.logging };
    merged.config = { ...merged.config, ...layer.config };
  }

  const validated = SettingsSchema.safeParse(merged);
  if (validated.success) {
    return validated.data;
  }

  opts?.loggingService?.warn('Merged settings failed validation, using defaults', {
    errors: validated.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
  return SettingsSchema.parse({});
}
