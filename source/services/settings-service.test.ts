import test from 'ava';
import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { mergeSettings } from './settings-merger.js';
import { defaultConfigPath } from './settings-schema.js';
import { SettingsService, SETTINGS_FILE_NAME } from './settings-service.js';
import { noopLogger, type ILoggingService, type LogMeta } from './service-interfaces.js';

const makeSettingsDir = async (contents?: string): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sshconf-settings-'));
  if (contents !== undefined) {
    await fs.writeFile(path.join(dir, SETTINGS_FILE_NAME), contents, 'utf8');
  }
  return dir;
};

const recordingLogger = (): { logger: ILoggingService; warnings: string[] } => {
  const warnings: string[] = [];
  return {
    warnings,
    logger: {
      ...noopLogger,
      warn: (message: string, _meta?: LogMeta) => {
        warnings.push(message);
      },
    },
  };
};

test('mergeSettings fills defaults', t => {
  const settings = mergeSettings([]);
  t.deepEqual(settings.render, { indent: '    ', blankLines: 1 });
  t.is(settings.logging.logLevel, 'info');
  t.is(settings.config.path, defaultConfigPath());
});

test('mergeSettings: later layers win per key', t => {
  const settings = mergeSettings([
    { render: { indent: '  ', blankLines: 2 } },
    { render: { blankLines: 0 } },
  ]);
  t.deepEqual(settings.render, { indent: '  ', blankLines: 0 });
});

test('mergeSettings falls back to defaults on invalid values', t => {
  const { logger, warnings } = recordingLogger();
  const settings = mergeSettings([{ render: { indent: 'xx' } }], { loggingService: logger });
  t.is(settings.render.indent, '    ');
  t.deepEqual(warnings, ['Merged settings failed validation, using defaults']);
});

test('SettingsService: cli > env > file > defaults', async t => {
  const dir = await makeSettingsDir(
    JSON.stringify({ render: { indent: '\t', blankLines: 3 }, config: { path: '/from/file' } }),
  );
  t.teardown(() => fs.rm(dir, { recursive: true, force: true }));

  const settings = new SettingsService({
    settingsDir: dir,
    env: { SSHCONF_BLANK_LINES: '2', SSHCONF_CONFIG: '/from/env' },
    cli: { config: { path: '/from/cli' } },
  });

  t.deepEqual(settings.get('render'), { indent: '\t', blankLines: 2 });
  t.is(settings.get('config').path, '/from/cli');
});

test('SettingsService: a missing settings file is not an error', async t => {
  const dir = await makeSettingsDir();
  t.teardown(() => fs.rm(dir, { recursive: true, force: true }));
  const { logger, warnings } = recordingLogger();

  const settings = new SettingsService({ settingsDir: dir, env: {}, loggingService: logger });

  t.is(settings.get('render').blankLines, 1);
  t.deepEqual(warnings, []);
  t.is(settings.getSettingsFile(), path.join(dir, SETTINGS_FILE_NAME));
});

test('SettingsService: ignores a settings file that is not JSON', async t => {
  const dir = await makeSettingsDir('{ not json');
  t.teardown(() => fs.rm(dir, { recursive: true, force: true }));
  const { logger, warnings } = recordingLogger();

  const settings = new SettingsService({ settingsDir: dir, env: {}, loggingService: logger });

  t.is(settings.get('render').indent, '    ');
  t.deepEqual(warnings, ['Settings file is not valid JSON, ignoring it']);
});

test('SettingsService: ignores a settings file with unknown sections', async t => {
  const dir = await makeSettingsDir(JSON.stringify({ agent: { model: 'x' } }));
  t.teardown(() => fs.rm(dir, { recursive: true, force: true }));
  const { logger, warnings } = recordingLogger();

  new SettingsService({ settingsDir: dir, env: {}, loggingService: logger });

  t.deepEqual(warnings, ['Settings file failed validation, ignoring it']);
});
