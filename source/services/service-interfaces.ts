import type { SettingSection, SettingsData } from './settings-schema.js';

export type LogMeta = Record<string, unknown>;

export interface ILoggingService {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  setCorrelationId(id: string | undefined): void;
  getCorrelationId(): string | undefined;
  clearCorrelationId(): void;
}

export interface ISettingsService {
  get<S extends SettingSection>(section: S): SettingsData[S];
}

/**
 * Logger that drops everything. Used when no logger is injected.
 */
export const noopLogger: ILoggingService = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  setCorrelationId: () => {},
  getCorrelationId: () => undefined,
  clearCorrelationId: () => {},
};
