import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { RenderOptionsSchema } from '../lib/serializer.js';

export const defaultConfigPath = (): string => path.join(os.homedir(), '.ssh', 'config');

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const RenderSettingsSchema = RenderOptionsSchema;

export const LoggingSettingsSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  disableLogging: z.boolean().default(false),
  // Echo logger-internal failures to stderr.
  debugLogging: z.boolean().default(false),
  console: z.boolean().default(false),
});

export const ConfigSettingsSchema = z.object({
  path: z.string().min(1).default(defaultConfigPath),
});

export const SettingsSchema = z.object({
  render: RenderSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
  config: ConfigSettingsSchema.default({}),
});

/**
 * One source of overrides (settings file, environment or CLI). Every field is
 * optional and nothing is defaulted.
 */
export const SettingsLayerSchema = z
  .object({
    render: RenderSettingsSchema.partial().optional(),
    logging: LoggingSettingsSchema.partial().optional(),
    config: ConfigSettingsSchema.partial().optional(),
  })
  .strict();

export type SettingsData = z.infer<typeof SettingsSchema>;
export type SettingsLayer = z.infer<typeof SettingsLayerSchema>;
export type SettingSection = keyof SettingsData;
export type LoggingSettings = SettingsData['logging'];
