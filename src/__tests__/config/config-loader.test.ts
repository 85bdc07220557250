/**
 * Tests for ConfigLoader.
 *
 * File loading and error reporting. Validation rules are covered in
 * config-validator.test.ts.
 */

import * as path from 'node:path';
import { CONFIG_FILE_NAME, ConfigLoader } from '../../config/config-loader.js';
import { defaultConfig } from '../../config/i-config.js';
import { makeTempDir, writeFile } from '../test-helpers.js';

describe('ConfigLoader', () => {
  let tempDir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir: tempDir, cleanup } = makeTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('should return defaults when no config file exists', async () => {
    const config = await new ConfigLoader(tempDir).load();

    expect(config).toEqual(defaultConfig);
  });

  it('should discover the config file in the working directory', async () => {
    writeFile(tempDir, CONFIG_FILE_NAME, { headerColor: 'green' });

    const config = await new ConfigLoader(tempDir).load();

    expect(config.headerColor).toBe('green');
    expect(config.defaultWidth).toBe(120);
  });

  it('should resolve an explicit path against the working directory', async () => {
    writeFile(tempDir, 'custom.json', { refreshInterval: 500 });

    const config = await new ConfigLoader(tempDir).load('custom.json');

    expect(config.refreshInterval).toBe(500);
  });

  it('should reject an empty path', async () => {
    await expect(new ConfigLoader(tempDir).load('')).rejects.toThrow(
      'Config file path cannot be empty.'
    );
  });

  it('should report malformed JSON with suggestions', async () => {
    const configPath = writeFile(tempDir, 'broken.json', '{ "headerColor": ');

    const error = await new ConfigLoader(tempDir)
      .load('broken.json')
      .then(
        () => undefined,
        (err: unknown) => err
      );

    expect(error).toBeInstanceOf(Error);
    const message = error instanceof Error ? error.message : '';
    expect(message.startsWith('Configuration file is not valid JSON\n')).toBe(true);
    expect(message).toContain(`Config file: ${configPath}`);
    expect(message).toContain(`Validate the file with: jq . ${configPath}`);
  });

  it('should report a missing explicit file as a read error', async () => {
    const missing = path.join(tempDir, 'missing.json');

    await expect(new ConfigLoader(tempDir).load(missing)).rejects.toThrow(
      'Configuration file could not be read'
    );
  });

  it('should reject a config that is not an object', async () => {
    const configPath = writeFile(tempDir, 'list.json', ['processes']);

    await expect(new ConfigLoader(tempDir).load(configPath)).rejects.toThrow(
      `Configuration must be a JSON object. Config file: ${configPath}`
    );
  });

  it('should surface validation errors', async () => {
    writeFile(tempDir, CONFIG_FILE_NAME, { refreshInterval: 10 });

    await expect(new ConfigLoader(tempDir).load()).rejects.toThrow(
      'refreshInterval must be at least 100 milliseconds. Got: 10'
    );
  });
});
