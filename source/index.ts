import { parseSshConfig } from './lib/parser.js';
import { render, type RenderOptions } from './lib/serializer.js';
import type { SshConfig } from './lib/ssh-config.js';
import { ConfigFileService } from './services/file-service.js';
import type { ILoggingService } from './services/service-interfaces.js';

export { SshConfigParser, parseSshConfig } from './lib/parser.js';
export { render, RenderOptionsSchema, type RenderOptions } from './lib/serializer.js';
export { HostBlock, SshConfig } from './lib/ssh-config.js';
export { HostList, HostPattern } from './lib/host-pattern.js';
export { KeywordSet, type KeywordEntries } from './lib/keyword-set.js';
export { canonicalKeyword, isKnownKeyword, listKeywords } from './lib/keyword-table.js';
export {
  InvalidArgumentError,
  InvalidKeywordError,
  KeyNotFoundError,
  ParserError,
  SshConfigError,
  type SshConfigErrorCode,
} from './lib/errors.js';
export { globMatch } from './utils/glob-match.js';
export type { ILoggingService } from './services/service-interfaces.js';

export interface IoOptions {
  loggingService?: ILoggingService;
}

export function parse(text: string, options: IoOptions = {}): SshConfig {
  return parseSshConfig(text, options);
}

export const loads = parse;

export function dumps(config: SshConfig, options: RenderOptions = {}): string {
  return render(config, options);
}

export async function load(filePath: string, options: IoOptions = {}): Promise<SshConfig> {
  return new ConfigFileService(options).readConfigFile(filePath);
}

export async function dump(
  config: SshConfig,
  filePath: string,
  options: RenderOptions & IoOptions = {},
): Promise<void> {
  const { loggingService, ...renderOptions } = options;
  await new ConfigFileService({ loggingService }).writeConfigFile(filePath, config, renderOptions);
}
