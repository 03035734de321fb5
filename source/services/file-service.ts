import path from 'node:path';
import { promises as fs } from 'node:fs';
import { SshConfigParser } from '../lib/parser.js';
import { render, type RenderOptions } from '../lib/serializer.js';
import type { SshConfig } from '../lib/ssh-config.js';
import { isMissingFileError } from '../utils/error-helpers.js';
import { noopLogger, type ILoggingService } from './service-interfaces.js';

export interface ReadConfigOptions {
  // Treat a missing file as an empty config instead of failing.
  allowMissing?: boolean;
}

/**
 * Reads and writes ssh_config files through the parser and serializer.
 */
export class ConfigFileService {
  private readonly logger: ILoggingService;

  constructor(deps: { loggingService?: ILoggingService } = {}) {
    this.logger = deps.loggingService ?? noopLogger;
  }

  async readText(filePath: string, options: ReadConfigOptions = {}): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      if (options.allowMissing && isMissingFileError(error)) {
        this.logger.debug('SSH config file not found, using empty config', { path: filePath });
        return '';
      }
      throw error;
    }
  }

  async readConfigFile(filePath: string, options: ReadConfigOptions = {}): Promise<SshConfig> {
    const text = await this.readText(filePath, options);
    const config = new SshConfigParser({ loggingService: this.logger }).parse(text);
    this.logger.info('Loaded SSH config', { path: filePath, blocks: config.size });
    return config;
  }

  /**
   * Write a config atomically: render to a temp file beside the target and
   * rename it into place. New directories get 0700, the file 0600.
   */
  async writeConfigFile(filePath: string, config: SshConfig, options: RenderOptions = {}): Promise<void> {
    const content = render(config, options);

    await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });

    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmpPath, content, { encoding: 'utf8', mode: 0o600 });
      await fs.rename(tmpPath, filePath);
    } catch (error: unknown) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }

    this.logger.info('Wrote SSH config', { path: filePath, blocks: config.size });
  }
}
