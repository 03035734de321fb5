import test from 'ava';
import { InvalidKeywordError, KeyNotFoundError } from './errors.js';
import { KeywordSet } from './keyword-set.js';
import { canonicalKeyword, isKnownKeyword, listKeywords } from './keyword-table.js';

test('keyword table maps lowercase names to canonical spelling', t => {
  t.is(canonicalKeyword('identityfile'), 'IdentityFile');
  t.is(canonicalKeyword('PROXYJUMP'), 'ProxyJump');
  t.is(canonicalKeyword('nope'), undefined);
  t.true(isKnownKeyword('gssapiauthentication'));
});

test('keyword table does not list block keywords', t => {
  t.false(isKnownKeyword('Host'));
  t.false(isKnownKeyword('Match'));
});

test('every canonical keyword lowercased resolves to itself', t => {
  const keywords = listKeywords();
  t.true(keywords.length > 90);
  for (const keyword of keywords) {
    t.is(canonicalKeyword(keyword.toLowerCase()), keyword);
  }
});

test('normalize rejects unknown keywords', t => {
  const error = t.throws(() => KeywordSet.normalize('invalidkey'), { instanceOf: InvalidKeywordError });
  t.is(error?.keyword, 'invalidkey');
});

test('set rejects unknown keywords', t => {
  const kw = new KeywordSet();
  t.throws(() => kw.set('invalidkey', 'data'), { instanceOf: InvalidKeywordError });
  t.is(kw.size, 0);
});

test('Host and Match cannot be stored in a keyword set', t => {
  const kw = new KeywordSet();
  t.throws(() => kw.set('Host', 'myhost.org'), { instanceOf: InvalidKeywordError });
  t.throws(() => kw.set('match', 'host myhost.org'), { instanceOf: InvalidKeywordError });
});

test('lookups are case-insensitive', t => {
  const kw = KeywordSet.fromObject({ user: 'alice' });
  for (const key of ['User', 'USER', 'user']) {
    t.true(kw.has(key));
    t.is(kw.get(key), 'alice');
  }
  t.deepEqual(Array.from(kw.keys()), ['User']);
});

test('get throws KeyNotFoundError for absent keywords', t => {
  const kw = new KeywordSet();
  const error = t.throws(() => kw.get('port'), { instanceOf: KeyNotFoundError });
  t.is(error?.keyword, 'Port');
  t.is(kw.find('port'), undefined);
});

test('set overwrites an existing value', t => {
  const kw = new KeywordSet([['User', 'alice']]);
  kw.set('USER', 'bob');
  t.is(kw.get('user'), 'bob');
  t.is(kw.size, 1);
});

test('iteration follows insertion order', t => {
  const kw = new KeywordSet([
    ['port', '22'],
    ['hostname', 'example.com'],
    ['user', 'alice'],
  ]);
  t.deepEqual(Array.from(kw), [
    ['Port', '22'],
    ['Hostname', 'example.com'],
    ['User', 'alice'],
  ]);
});

test('mergeMissing only fills absent keywords', t => {
  const kw = new KeywordSet([['User', 'alice']]);
  kw.mergeMissing(
    new KeywordSet([
      ['user', 'bob'],
      ['Port', '22'],
    ]),
  );
  t.deepEqual(kw.toObject(), { User: 'alice', Port: '22' });
  t.deepEqual(Array.from(kw.keys()), ['User', 'Port']);
});

test('delete removes a keyword', t => {
  const kw = new KeywordSet([['User', 'alice']]);
  t.true(kw.delete('user'));
  t.false(kw.has('User'));
  t.false(kw.delete('user'));
});

test('equals compares entries and order', t => {
  const a = new KeywordSet([
    ['User', 'alice'],
    ['Port', '22'],
  ]);
  t.true(a.equals(new KeywordSet([['user', 'alice'], ['port', '22']])));
  t.false(a.equals(new KeywordSet([['Port', '22'], ['User', 'alice']])));
  t.false(a.equals(new KeywordSet([['User', 'alice']])));
});
