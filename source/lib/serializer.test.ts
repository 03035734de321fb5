import test from 'ava';
import { InvalidArgumentError } from './errors.js';
import { HostList } from './host-pattern.js';
import { KeywordSet } from './keyword-set.js';
import { parseSshConfig } from './parser.js';
import { render } from './serializer.js';
import { HostBlock, SshConfig } from './ssh-config.js';

const lines = (...rows: string[]): string => rows.map(row => `${row}\n`).join('');

const MESSY = lines(
  'ConnectTimeout 30',
  'Host myhost.com !insecure.com',
  'PreferredAuthentications publickey',
  'User alice',
  ' ForwardAgent no',
  '',
  '',
  '',
  'Host myhost.net myhost.org',
  '    User bob',
  '    Port 23',
  'Host *',
  'User nouser',
  '        ForwardX11 no',
  '',
);

test('render normalizes layout with default options', t => {
  t.is(
    render(parseSshConfig(MESSY)),
    lines(
      'Host *',
      '    ConnectTimeout 30',
      '',
      'Host myhost.com !insecure.com',
      '    PreferredAuthentications publickey',
      '    User alice',
      '    ForwardAgent no',
      '',
      'Host myhost.net myhost.org',
      '    User bob',
      '    Port 23',
      '',
      'Host *',
      '    User nouser',
      '    ForwardX11 no',
    ),
  );
});

test('render without separator lines', t => {
  t.is(
    render(parseSshConfig(MESSY), { blankLines: 0 }),
    lines(
      'Host *',
      '    ConnectTimeout 30',
      'Host myhost.com !insecure.com',
      '    PreferredAuthentications publickey',
      '    User alice',
      '    ForwardAgent no',
      'Host myhost.net myhost.org',
      '    User bob',
      '    Port 23',
      'Host *',
      '    User nouser',
      '    ForwardX11 no',
    ),
  );
});

test('render with tab indent and two separator lines', t => {
  const config = parseSshConfig('Host a\nUser alice\nHost b\nPort 22\n');
  t.is(render(config, { indent: '\t', blankLines: 2 }), 'Host a\n\tUser alice\n\n\nHost b\n\tPort 22\n');
});

test('a canonical file renders byte-identical', t => {
  const text = lines(
    'Host myhost.com',
    '    PreferredAuthentications publickey',
    '    User myuser',
    '    ForwardAgent no',
    '',
    'Host myhost.net myhost.org',
    '    User bob',
    '    Port 23',
  );
  t.is(render(parseSshConfig(text)), text);
});

test('parse after render yields an equal config', t => {
  const config = parseSshConfig(MESSY);
  t.true(parseSshConfig(render(config)).equals(config));
  t.true(parseSshConfig(render(config, { indent: '', blankLines: 0 })).equals(config));
});

test('keywords render with canonical case', t => {
  const config = parseSshConfig('host a\nidentityfile ~/.ssh/id_a\n');
  t.is(render(config), 'Host a\n    IdentityFile ~/.ssh/id_a\n');
});

test('programmatically appended blocks render after parsed ones', t => {
  const config = parseSshConfig(
    'Host myhost.com\n    PreferredAuthentications publickey\n    User myuser\n    ForwardAgent no',
  );
  config.append(
    new HostBlock(
      new HostList(['myhost.net', 'myhost.org']),
      new KeywordSet([
        ['User', 'bob'],
        ['Port', '23'],
      ]),
    ),
  );
  t.is(
    render(config),
    lines(
      'Host myhost.com',
      '    PreferredAuthentications publickey',
      '    User myuser',
      '    ForwardAgent no',
      '',
      'Host myhost.net myhost.org',
      '    User bob',
      '    Port 23',
    ),
  );
});

test('an empty config renders as an empty string', t => {
  t.is(render(new SshConfig()), '');
});

test('invalid options are rejected', t => {
  const config = parseSshConfig('Host a\nUser alice\n');
  t.throws(() => render(config, { blankLines: -1 }), { instanceOf: InvalidArgumentError });
  t.throws(() => render(config, { indent: '--' }), { instanceOf: InvalidArgumentError });
});

test('a block without patterns cannot be rendered', t => {
  const config = new SshConfig([new HostBlock(new HostList([]), new KeywordSet())]);
  t.throws(() => render(config), { instanceOf: InvalidArgumentError });
});
