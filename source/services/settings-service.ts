import fs from 'node:fs';
import path from 'node:path';
import envPaths from 'env-paths';
import { buildEnvOverrides, type EnvSource } from './settings-env.js';
import { mergeSettings } from './settings-merger.js';
import { SettingsLayerSchema, type SettingsData, type SettingsLayer, type SettingSection } from './settings-schema.js';
import { noopLogger, type ILoggingService, type ISettingsService } from './service-interfaces.js';
import { isMissingFileError } from '../utils/error-helpers.js';

export const SETTINGS_FILE_NAME = 'settings.json';

export interface SettingsServiceOptions {
  settingsDir?: string;
  env?: EnvSource;
  cli?: SettingsLayer;
  loggingService?: ILoggingService;
}

/**
 * Resolved application settings.
 *
 * Precedence: cli > env > settings file > defaults. The settings file lives
 * in the XDG config directory and is only read, never written.
 */
export class SettingsService implements ISettingsService {
  private readonly settings: SettingsData;
  private readonly settingsFile: string;
  private readonly logger: ILoggingService;

  constructor(options: SettingsServiceOptions = {}) {
    this.logger = options.loggingService ?? noopLogger;
    const settingsDir = options.settingsDir ?? envPaths('sshconf').config;
    this.settingsFile = path.join(settingsDir, SETTINGS_FILE_NAME);

    this.settings = mergeSettings([this.loadFromFile(), buildEnvOverrides(options.env), options.cli ?? {}], {
      loggingService: this.logger,
    });
  }

  get<S extends SettingSection>(section: S): SettingsData[S] {
    return this.settings[section];
  }

  getAll(): SettingsData {
    return this.settings;
  }

  getSettingsFile(): string {
    return this.settingsFile;
  }

  private loadFromFile(): SettingsLayer {
    let raw: string;
    try {
      raw = fs.readFileSync(this.settingsFile, 'utf-8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn('Failed to read settings file', {
          path: this.settingsFile,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Settings file is not valid JSON, ignoring it', {
        path: this.settingsFile,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    const validated = SettingsLayerSchema.safeParse(parsed);
    if (!validated.success) {
      this.logger.warn('Settings file failed validation, ignoring it', {
        path: this.settingsFile,
        errors: validated.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      return {};
    }
    return validated.data;
  }
}
