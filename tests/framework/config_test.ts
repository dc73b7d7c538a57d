/**
 * Config Tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, expect, test } from 'vitest';

import {
  Config,
  ConfigError,
  DEFAULT_CONFIG,
  createLogger,
  loadConfig,
  parseArgs,
  parseConfigObject,
  parseEnv,
} from '../../framework/config/config.ts';

let tmpDir = '';

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ferry-config-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(name: string, content: unknown): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, JSON.stringify(content));
  return file;
}

test('Config - defaults', () => {
  const config = new Config();

  expect(config.all()).toEqual({
    port: 8080,
    host: '127.0.0.1',
    env: 'development',
    debug: false,
    logLevel: 'info',
    logFormat: 'pretty',
    publicDir: './public',
  });
});

test('Config - get and set', () => {
  const config = new Config({ port: 3000 });
  config.set('host', '0.0.0.0');

  expect(config.get('port')).toBe(3000);
  expect(config.get('host')).toBe('0.0.0.0');
  expect(DEFAULT_CONFIG.host).toBe('127.0.0.1');
});

test('Config - debug forces debug logging', () => {
  expect(new Config({ logLevel: 'warn' }).effectiveLogLevel).toBe('warn');
  expect(new Config({ logLevel: 'warn', debug: true }).effectiveLogLevel).toBe('debug');
});

test('parseEnv - reads known variables', () => {
  expect(
    parseEnv({
      PORT: '9090',
      HOST: '0.0.0.0',
      NODE_ENV: 'production',
      DEBUG: '1',
      LOG_LEVEL: 'error',
      LOG_FORMAT: 'json',
      PUBLIC_DIR: '/srv/www',
    })
  ).toEqual({
    port: 9090,
    host: '0.0.0.0',
    env: 'production',
    debug: true,
    logLevel: 'error',
    logFormat: 'json',
    publicDir: '/srv/www',
  });
});

test('parseEnv - ignores unset variables', () => {
  expect(parseEnv({})).toEqual({});
  expect(parseEnv({ DEBUG: 'no' })).toEqual({ debug: false });
});

test('parseEnv - invalid values raise ConfigError', () => {
  expect(() => parseEnv({ PORT: 'eighty' })).toThrow(ConfigError);
  expect(() => parseEnv({ PORT: '70000' })).toThrow('Invalid configuration for "PORT"');
  expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(
    'Invalid configuration for "logLevel": unknown level "verbose"'
  );
  expect(() => parseEnv({ LOG_FORMAT: 'xml' })).toThrow(ConfigError);
});

test('parseArgs - debug flags and port', () => {
  expect(parseArgs(['-debug'])).toEqual({ debug: true });
  expect(parseArgs(['--debug', '--port', '3001'])).toEqual({ debug: true, port: 3001 });
  expect(parseArgs(['serve', '--verbose'])).toEqual({});
  expect(() => parseArgs(['--port'])).toThrow(ConfigError);
});

test('parseConfigObject - validates field types', () => {
  expect(parseConfigObject({ port: 8081, debug: true }, 'app.json')).toEqual({
    port: 8081,
    debug: true,
  });
  expect(() => parseConfigObject({ port: '8081x' }, 'app.json')).toThrow(ConfigError);
  expect(() => parseConfigObject({ debug: 'yes' }, 'app.json')).toThrow(
    'Invalid configuration for "debug": expected a boolean'
  );
  expect(() => parseConfigObject([], 'app.json')).toThrow(
    'Invalid configuration for "app.json": expected a JSON object'
  );
});

test('loadConfig - file, then environment, then flags', async () => {
  const configPath = writeConfig('app.json', {
    port: 7000,
    host: '0.0.0.0',
    logLevel: 'warn',
    publicDir: './assets',
  });

  const config = await loadConfig({
    configPath,
    env: { PORT: '7001', LOG_LEVEL: 'error' },
    argv: ['--port', '7002'],
  });

  expect(config.get('port')).toBe(7002);
  expect(config.get('host')).toBe('0.0.0.0');
  expect(config.get('logLevel')).toBe('error');
  expect(config.get('publicDir')).toBe('./assets');
  expect(config.get('logFormat')).toBe('pretty');
});

test('loadConfig - missing explicit file rejects', async () => {
  await expect(
    loadConfig({ configPath: path.join(tmpDir, 'absent.json'), env: {}, argv: [] })
  ).rejects.toThrow(/ENOENT/);
});

test('loadConfig - invalid file content rejects with ConfigError', async () => {
  const configPath = writeConfig('bad.json', { logFormat: 'yaml' });

  await expect(loadConfig({ configPath, env: {}, argv: [] })).rejects.toBeInstanceOf(ConfigError);
});

test('createLogger - follows the effective level', () => {
  const logger = createLogger(new Config({ debug: true, logLevel: 'error' }));

  expect(logger.getLevel()).toBe('debug');
});
