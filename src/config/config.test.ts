import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_OUTPUT_TEMPLATE } from '../utils/output-path';
import { loadConfig, missingGatewayKeys } from './config';

describe('loadConfig', () => {
  let dir: string;
  let warnings: string[];
  const warn = (message: string) => warnings.push(message);

  const writeConfig = (contents: string): string => {
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(configPath, contents);
    return configPath;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'spotify-ogg-dl-config-'));
    warnings = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults when there is no config file', () => {
    const config = loadConfig(path.join(dir, 'missing.json'), warn);

    expect(config.outputTemplate).toBe(DEFAULT_OUTPUT_TEMPLATE);
    expect(config.requestsPerMinute).toBe(120);
    expect(config.requestTimeoutMs).toBe(30000);
    expect(config.logLevel).toBe('info');
    expect(missingGatewayKeys(config)).toEqual(['apiBaseUrl', 'authUrl']);
    expect(warnings).toEqual([]);
  });

  it('overrides defaults with file values', () => {
    const configPath = writeConfig(
      JSON.stringify({ outputTemplate: 'music/{name}.{ext}', requestsPerMinute: 30, logLevel: 'debug' })
    );

    const config = loadConfig(configPath, warn);

    expect(config.outputTemplate).toBe('music/{name}.{ext}');
    expect(config.requestsPerMinute).toBe(30);
    expect(config.logLevel).toBe('debug');
    expect(config.requestTimeoutMs).toBe(30000);
    expect(warnings).toEqual([]);
  });

  it('ignores unknown keys and values of the wrong type', () => {
    const configPath = writeConfig(
      JSON.stringify({ outputTemplate: 42, requestsPerMinute: 0, colour: 'blue', authUrl: 'https://auth.test' })
    );

    const config = loadConfig(configPath, warn);

    expect(config.outputTemplate).toBe(DEFAULT_OUTPUT_TEMPLATE);
    expect(config.requestsPerMinute).toBe(120);
    expect(config.authUrl).toBe('https://auth.test');
    expect(missingGatewayKeys(config)).toEqual(['apiBaseUrl']);
    expect(warnings).toEqual([
      `Ignoring config key "outputTemplate" in ${configPath}`,
      `Ignoring config key "requestsPerMinute" in ${configPath}`,
      `Ignoring config key "colour" in ${configPath}`
    ]);
  });

  it('falls back to defaults on invalid JSON', () => {
    const configPath = writeConfig('{ not json');

    expect(loadConfig(configPath, warn).outputTemplate).toBe(DEFAULT_OUTPUT_TEMPLATE);
    expect(warnings).toEqual([`Error loading config from ${configPath}, using defaults`]);
  });

  it('falls back to defaults when the file is not an object', () => {
    const configPath = writeConfig('["a"]');

    loadConfig(configPath, warn);

    expect(warnings).toEqual([`Config file ${configPath} must contain a JSON object, using defaults`]);
  });
});
