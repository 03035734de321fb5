#!/usr/bin/env node
import { randomUUID } from 'node:crypto';
import meow from 'meow';
import { EXIT_USAGE, runCommand } from './commands.js';
import { ConfigFileService } from './services/file-service.js';
import { LoggingService, loggingConfigFromSettings } from './services/logging-service.js';
import { buildEnvOverrides } from './services/settings-env.js';
import { mergeSettings } from './services/settings-merger.js';
import { SettingsLayerSchema, type SettingsLayer } from './services/settings-schema.js';
import { SettingsService } from './services/settings-service.js';

const cli = meow(
  `
		Usage
		  $ sshconf <command> [hostname]

		Commands
		  query <host>  Print the keywords that apply to a host
		  hosts <host>  Print the Host blocks that match a host
		  format        Re-render the config file
		  check         Parse the config file and report the block count
		  keywords      List recognized keywords

		Options
		  -f, --file         Config file to read (default ~/.ssh/config)
		  --indent           Indent string for keyword lines (default four spaces)
		  --blank-lines      Blank lines between Host blocks (default 1)
		  -w, --write        With format, rewrite the file in place
		  -v, --verbose      Log to stderr at debug level

		Examples
		  $ sshconf query github.com
		  $ sshconf format --indent "	" --write
	`,
  {
    importMeta: import.meta,
    flags: {
      file: { type: 'string', shortFlag: 'f' },
      indent: { type: 'string' },
      blankLines: { type: 'number' },
      write: { type: 'boolean', shortFlag: 'w', default: false },
      verbose: { type: 'boolean', shortFlag: 'v', default: false },
    },
  },
);

const buildCliOverrides = (): SettingsLayer => {
  const { file, indent, blankLines, verbose } = cli.flags;

  const render: NonNullable<SettingsLayer['render']> = {};
  if (indent !== undefined) render.indent = indent;
  if (blankLines !== undefined) render.blankLines = blankLines;

  const logging: NonNullable<SettingsLayer['logging']> = {};
  if (verbose) {
    logging.console = true;
    logging.logLevel = 'debug';
  }

  return { render, logging, config: file ? { path: file } : {} };
};

async function main(): Promise<number> {
  const cliLayer = SettingsLayerSchema.safeParse(buildCliOverrides());
  if (!cliLayer.success) {
    const issue = cliLayer.error.issues[0];
    process.stderr.write(`error: invalid option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? ''}\n`);
    return EXIT_USAGE;
  }

  // Reading the settings file may log, so a console-only logger built from
  // env and cli values covers that step. The real logger is built from the
  // fully merged settings.
  const early = mergeSettings([buildEnvOverrides(), cliLayer.data]).logging;
  const bootstrapLogger = new LoggingService({ ...early, disableLogging: true });
  const settings = new SettingsService({ cli: cliLayer.data, loggingService: bootstrapLogger });

  const loggingService = new LoggingService(loggingConfigFromSettings(settings.get('logging')));
  loggingService.setCorrelationId(randomUUID());

  const [command, ...args] = cli.input;
  return runCommand(
    { command, args, write: cli.flags.write },
    {
      fileService: new ConfigFileService({ loggingService }),
      settings,
      loggingService,
    },
  );
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
