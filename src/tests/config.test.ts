import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { resolveConfig } from '../config.js';
import { ConfigError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

describe('resolveConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'docgen-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function writeConfig(content: unknown, name = 'docgen.config.json'): void {
    fs.writeFileSync(path.join(cwd, name), typeof content === 'string' ? content : JSON.stringify(content));
  }

  it('should use defaults without a config file', async () => {
    const config = await resolveConfig({ cwd, env: {} });

    assert.deepStrictEqual(config, {
      stackDir: path.join(cwd, 'stack'),
      outputDir: path.join(cwd, 'docs'),
      html: false
    });
  });

  it('should read the config file', async () => {
    writeConfig({ stackDir: 'elements', html: true });

    const config = await resolveConfig({ cwd, env: {} });

    assert.strictEqual(config.stackDir, path.join(cwd, 'elements'));
    assert.strictEqual(config.outputDir, path.join(cwd, 'docs'));
    assert.strictEqual(config.html, true);
  });

  it('should prefer flags over the environment over the file', async () => {
    writeConfig({ stackDir: 'from-file', outputDir: 'from-file' });

    const config = await resolveConfig({
      cwd,
      env: { DOCGEN_STACK_DIR: 'from-env', DOCGEN_OUTPUT_DIR: 'from-env' },
      overrides: { outputDir: 'from-flag' }
    });

    assert.strictEqual(config.stackDir, path.join(cwd, 'from-env'));
    assert.strictEqual(config.outputDir, path.join(cwd, 'from-flag'));
  });

  it('should read the file named by DOCGEN_CONFIG', async () => {
    writeConfig({ outputDir: 'custom-docs' }, 'other.json');

    const config = await resolveConfig({ cwd, env: { DOCGEN_CONFIG: 'other.json' } });

    assert.strictEqual(config.outputDir, path.join(cwd, 'custom-docs'));
  });

  it('should reject unknown keys', async () => {
    writeConfig({ stackDir: 'stack', colour: 'blue' });

    await assert.rejects(resolveConfig({ cwd, env: {} }), ConfigError);
  });

  it('should reject values of the wrong type', async () => {
    writeConfig({ html: 'yes' });

    await assert.rejects(resolveConfig({ cwd, env: {} }), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.strictEqual(err.configPath, path.join(cwd, 'docgen.config.json'));
      assert.ok(err.message.includes('html: '));
      return true;
    });
  });

  it('should reject a file that is not JSON', async () => {
    writeConfig('{ not json');

    await assert.rejects(resolveConfig({ cwd, env: {} }), ConfigError);
  });
});
