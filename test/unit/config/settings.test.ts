import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  DEFAULT_SETTINGS,
  SETTINGS_FILE,
  applyEnvironment,
  isTruthyFlag,
  loadSettingsFile,
  parseSettingsDocument,
  resolveSettings,
} from '../../../src/config/settings';
import { ConfigurationError, ErrorCode } from '../../../src/errors';

function invalidWith(message: string) {
  return (err: unknown) =>
    err instanceof ConfigurationError &&
    err.code === ErrorCode.E104_CONFIGURATION_INVALID &&
    err.message === `[E104] Configuration is invalid: ${message}`;
}

describe('Settings', () => {
  describe('isTruthyFlag()', () => {
    it('should treat unset, empty and negative words as false', () => {
      for (const value of [undefined, '', '  ', '0', 'false', 'FALSE', 'no', ' off ']) {
        assert.equal(isTruthyFlag(value), false, `expected ${String(value)} to be false`);
      }
    });

    it('should treat anything else as true', () => {
      for (const value of ['1', 'true', 'yes', 'on', 'selective']) {
        assert.equal(isTruthyFlag(value), true, `expected ${value} to be true`);
      }
    });
  });

  describe('parseSettingsDocument()', () => {
    it('should accept an empty document', () => {
      assert.deepEqual(parseSettingsDocument(null, 'procmux.yaml'), {});
      assert.deepEqual(parseSettingsDocument(undefined, 'procmux.yaml'), {});
    });

    it('should keep known keys and ignore unknown ones', () => {
      const settings = parseSettingsDocument(
        { procfile: 'Procfile.dev', killMode: 'selective', killTimeoutMs: 0, debug: true, extra: 1 },
        'procmux.yaml'
      );

      assert.deepEqual(settings, {
        procfile: 'Procfile.dev',
        killMode: 'selective',
        killTimeoutMs: 0,
        debug: true,
      });
    });

    it('should reject a document that is not a mapping', () => {
      assert.throws(() => parseSettingsDocument(['a'], 'p.yaml'), invalidWith('p.yaml: expected a mapping'));
      assert.throws(() => parseSettingsDocument('text', 'p.yaml'), invalidWith('p.yaml: expected a mapping'));
    });

    it('should reject an empty string value', () => {
      assert.throws(
        () => parseSettingsDocument({ shell: '' }, 'p.yaml'),
        invalidWith('p.yaml: "shell" must be a non-empty string')
      );
    });

    it('should reject an unknown kill mode', () => {
      assert.throws(
        () => parseSettingsDocument({ killMode: 'everything' }, 'p.yaml'),
        invalidWith(`p.yaml: "killMode" must be 'whole-group' or 'selective'`)
      );
    });

    it('should reject a negative or fractional kill timeout', () => {
      const expected = invalidWith('p.yaml: "killTimeoutMs" must be a non-negative integer');
      assert.throws(() => parseSettingsDocument({ killTimeoutMs: -1 }, 'p.yaml'), expected);
      assert.throws(() => parseSettingsDocument({ killTimeoutMs: 1.5 }, 'p.yaml'), expected);
      assert.throws(() => parseSettingsDocument({ killTimeoutMs: '5' }, 'p.yaml'), expected);
    });

    it('should reject a non-boolean flag', () => {
      assert.throws(
        () => parseSettingsDocument({ color: 'yes' }, 'p.yaml'),
        invalidWith('p.yaml: "color" must be a boolean')
      );
    });
  });

  describe('applyEnvironment()', () => {
    it('should switch to selective mode from the toggle', () => {
      assert.equal(applyEnvironment(DEFAULT_SETTINGS, { PROCMUX_SELECTIVE_KILL: '1' }).killMode, 'selective');
      assert.equal(applyEnvironment(DEFAULT_SETTINGS, { PROCMUX_SELECTIVE_KILL: '' }).killMode, 'whole-group');
      assert.equal(applyEnvironment(DEFAULT_SETTINGS, { PROCMUX_SELECTIVE_KILL: 'off' }).killMode, 'whole-group');
    });

    it('should enable debug and disable color', () => {
      const settings = applyEnvironment(DEFAULT_SETTINGS, { PROCMUX_DEBUG: 'true', NO_COLOR: '1' });

      assert.equal(settings.debug, true);
      assert.equal(settings.color, false);
    });

    it('should ignore an empty NO_COLOR', () => {
      assert.equal(applyEnvironment(DEFAULT_SETTINGS, { NO_COLOR: '' }).color, true);
    });

    it('should not touch the input settings', () => {
      applyEnvironment(DEFAULT_SETTINGS, { PROCMUX_SELECTIVE_KILL: '1' });

      assert.equal(DEFAULT_SETTINGS.killMode, 'whole-group');
    });
  });

  describe('loading from disk', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'procmux-settings-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should use the defaults without a settings file', () => {
      assert.deepEqual(loadSettingsFile(tempDir), {});
      assert.deepEqual(resolveSettings(tempDir, {}), {
        procfile: 'Procfile',
        envFile: '.env',
        shell: '/bin/sh',
        killMode: 'whole-group',
        killTimeoutMs: 0,
        color: true,
        debug: false,
      });
    });

    it('should layer the settings file and then the environment', () => {
      fs.writeFileSync(
        path.join(tempDir, SETTINGS_FILE),
        'shell: /bin/bash\nkillTimeoutMs: 500\ncolor: false\n'
      );

      const settings = resolveSettings(tempDir, { PROCMUX_SELECTIVE_KILL: 'yes' });

      assert.deepEqual(settings, {
        procfile: 'Procfile',
        envFile: '.env',
        shell: '/bin/bash',
        killMode: 'selective',
        killTimeoutMs: 500,
        color: false,
        debug: false,
      });
    });

    it('should accept an empty settings file', () => {
      fs.writeFileSync(path.join(tempDir, SETTINGS_FILE), '');

      assert.deepEqual(loadSettingsFile(tempDir), {});
    });

    it('should report invalid values with the file path', () => {
      const filePath = path.join(tempDir, SETTINGS_FILE);
      fs.writeFileSync(filePath, 'killMode: everything\n');

      assert.throws(
        () => loadSettingsFile(tempDir),
        invalidWith(`${filePath}: "killMode" must be 'whole-group' or 'selective'`)
      );
    });

    it('should report malformed YAML as a configuration error', () => {
      fs.writeFileSync(path.join(tempDir, SETTINGS_FILE), 'shell: [unclosed\n');

      assert.throws(
        () => loadSettingsFile(tempDir),
        (err: unknown) => err instanceof ConfigurationError && err.code === ErrorCode.E104_CONFIGURATION_INVALID
      );
    });
  });
});
