import { listKeywords } from './lib/keyword-table.js';
import { render } from './lib/serializer.js';
import { SshConfig } from './lib/ssh-config.js';
import type { ConfigFileService } from './services/file-service.js';
import type { ILoggingService, ISettingsService } from './services/service-interfaces.js';
import { formatErrorMessage } from './utils/error-helpers.js';

export const COMMANDS = ['query', 'hosts', 'format', 'check', 'keywords'] as const;
export type CommandName = (typeof COMMANDS)[number];

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CommandInput {
  command: string | undefined;
  args: string[];
  write?: boolean;
}

export interface CommandContext {
  fileService: ConfigFileService;
  settings: ISettingsService;
  loggingService: ILoggingService;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

const isCommandName = (value: string): value is CommandName => COMMANDS.some(command => command === value);

class UsageError extends Error {}

const requireHostname = (command: CommandName, args: string[]): string => {
  const [hostname] = args;
  if (!hostname) {
    throw new UsageError(`${command} requires a hostname`);
  }
  return hostname;
};

/**
 * Run one CLI command and return its exit code. Output goes to the given
 * streams so the command can run without a process around it.
 */
export async function runCommand(input: CommandInput, context: CommandContext): Promise<number> {
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;
  const logger = context.loggingService;

  try {
    const { command } = input;
    if (!command) {
      throw new UsageError(`missing command (expected one of: ${COMMANDS.join(', ')})`);
    }
    if (!isCommandName(command)) {
      throw new UsageError(`unknown command "${command}"`);
    }

    logger.debug('Running command', { command, args: input.args });
    stdout.write(await execute(command, input, context));
    return EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      stderr.write(`error: ${error.message}\n`);
      return EXIT_USAGE;
    }
    logger.error('Command failed', { command: input.command, error: formatErrorMessage(error) });
    stderr.write(`error: ${formatErrorMessage(error)}\n`);
    return EXIT_FAILURE;
  }
}

async function execute(command: CommandName, input: CommandInput, context: CommandContext): Promise<string> {
  const { fileService, settings } = context;
  const configPath = settings.get('config').path;
  const renderOptions = settings.get('render');

  switch (command) {
    case 'keywords':
      return listKeywords().map(keyword => `${keyword}\n`).join('');

    case 'query': {
      const hostname = requireHostname(command, input.args);
      const config = await fileService.readConfigFile(configPath, { allowMissing: true });
      let text = '';
      for (const [keyword, value] of config.getConfigForHost(hostname)) {
        text += `${keyword} ${value}\n`;
      }
      return text;
    }

    case 'hosts': {
      const hostname = requireHostname(command, input.args);
      const config = await fileService.readConfigFile(configPath, { allowMissing: true });
      return render(new SshConfig(config.getMatchingHosts(hostname)), renderOptions);
    }

    case 'format': {
      const config = await fileService.readConfigFile(configPath);
      if (input.write) {
        await fileService.writeConfigFile(configPath, config, renderOptions);
        return `Formatted ${configPath}\n`;
      }
      return render(config, renderOptions);
    }

    case 'check': {
      const config = await fileService.readConfigFile(configPath);
      return `OK: ${config.size} host block${config.size === 1 ? '' : 's'} in ${configPath}\n`;
    }
  }
}
