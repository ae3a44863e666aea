import test from 'node:test';
import assert from 'node:assert';
import { getLang, initI18n, langFromArgv, t } from './i18n.js';

test('i18n', async t2 => {
  t2.after(() => initI18n('fr'));

  await t2.test('french messages are built in', () => {
    initI18n('fr');
    assert.strictEqual(getLang(), 'fr');
    assert.strictEqual(t('peer.added', { name: 'phone', addresses: '10.50.0.2/32' }), 'Peer "phone" ajouté (10.50.0.2/32)');
  });

  await t2.test('english messages come from the locale file', () => {
    initI18n('en');
    assert.strictEqual(getLang(), 'en');
    assert.strictEqual(t('peer.added', { name: 'phone', addresses: '10.50.0.2/32' }), 'Peer "phone" added (10.50.0.2/32)');
    assert.strictEqual(t('peer.ago', { value: '5m' }), '5m ago');
  });

  await t2.test('unknown language and unknown key', () => {
    initI18n('xx');
    assert.strictEqual(t('cli.error'), 'Erreur:');
    assert.strictEqual(t('missing.key'), 'missing.key');
  });
});

test('Language from the command line', () => {
  assert.strictEqual(langFromArgv(['--lang', 'en', 'list-peers']), 'en');
  assert.strictEqual(langFromArgv(['list-peers', '--lang=en']), 'en');
  assert.strictEqual(langFromArgv(['list-peers', '-c', '/tmp/wgkeep.yml']), undefined);

  initI18n(langFromArgv(['--lang', 'en', '--help']));
  assert.strictEqual(t('cli.description'), 'Peer management for a WireGuard server');
  initI18n('fr');
});
