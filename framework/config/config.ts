/**
 * Configuration Management
 *
 * Loads server configuration from defaults, a JSON config file, environment
 * variables and command-line flags, in that order of precedence.
 */

import { promises as fsp } from 'node:fs';

import { Logger, isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface ServerConfig {
  port: number;
  host: string;
  env: string;
  debug: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** Directory served under /static by the example app */
  publicDir: string;
}

export const DEFAULT_CONFIG: Readonly<ServerConfig> = {
  port: 8080,
  host: '127.0.0.1',
  env: 'development',
  debug: false,
  logLevel: 'info',
  logFormat: 'pretty',
  publicDir: './public',
};

/** Key under which a shared JSON file holds this server's settings */
export const CONFIG_FILE_KEY = 'ferry';

const DEFAULT_CONFIG_PATHS = ['./config/app.json', './config.json'];

/**
 * Raised for a configuration value that cannot be used
 */
export class ConfigError extends Error {
  constructor(readonly key: string, message: string) {
    super(`Invalid configuration for "${key}": ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration holder
 */
export class Config {
  private config: ServerConfig;

  constructor(options: Partial<ServerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options };
  }

  get<K extends keyof ServerConfig>(key: K): ServerConfig[K] {
    return this.config[key];
  }

  set<K extends keyof ServerConfig>(key: K, value: ServerConfig[K]): void {
    this.config[key] = value;
  }

  all(): ServerConfig {
    return { ...this.config };
  }

  /**
   * Effective log level: debug mode always logs at debug
   */
  get effectiveLogLevel(): LogLevel {
    return this.config.debug ? 'debug' : this.config.logLevel;
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; a missing explicit file is an error */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  argv?: readonly string[];
}

/**
 * Load configuration from file, environment and command line
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const fileConfig = await readConfigFile(options.configPath);
  const envConfig = parseEnv(options.env ?? process.env);
  const argConfig = parseArgs(options.argv ?? process.argv.slice(2));

  return new Config({ ...fileConfig, ...envConfig, ...argConfig });
}

/**
 * Build the logger a configuration asks for
 */
export function createLogger(config: Config): Logger {
  return new Logger({
    level: config.effectiveLogLevel,
    format: config.get('logFormat'),
    context: { service: 'ferry', env: config.get('env') },
  });
}

async function readConfigFile(configPath?: string): Promise<Partial<ServerConfig>> {
  if (configPath) {
    const content = await fsp.readFile(configPath, 'utf8');
    return parseConfigObject(JSON.parse(content), configPath);
  }

  for (const candidate of DEFAULT_CONFIG_PATHS) {
    let content: string;
    try {
      content = await fsp.readFile(candidate, 'utf8');
    } catch {
      continue;
    }
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed) && isRecord(parsed[CONFIG_FILE_KEY])) {
      return parseConfigObject(parsed[CONFIG_FILE_KEY], candidate);
    }
  }

  return {};
}

/**
 * Validate a parsed JSON object field by field
 */
export function parseConfigObject(value: unknown, source: string): Partial<ServerConfig> {
  if (!isRecord(value)) {
    throw new ConfigError(source, 'expected a JSON object');
  }

  const result: Partial<ServerConfig> = {};

  if (value.port !== undefined) {
    result.port = validatePort(value.port, 'port');
  }
  if (value.host !== undefined) {
    result.host = expectString(value.host, 'host');
  }
  if (value.env !== undefined) {
    result.env = expectString(value.env, 'env');
  }
  if (value.debug !== undefined) {
    if (typeof value.debug !== 'boolean') {
      throw new ConfigError('debug', 'expected a boolean');
    }
    result.debug = value.debug;
  }
  if (value.logLevel !== undefined) {
    result.logLevel = validateLogLevel(expectString(value.logLevel, 'logLevel'));
  }
  if (value.logFormat !== undefined) {
    result.logFormat = validateLogFormat(expectString(value.logFormat, 'logFormat'));
  }
  if (value.publicDir !== undefined) {
    result.publicDir = expectString(value.publicDir, 'publicDir');
  }

  return result;
}

/**
 * Read PORT, HOST, NODE_ENV, DEBUG, LOG_LEVEL, LOG_FORMAT and PUBLIC_DIR
 */
export function parseEnv(env: NodeJS.ProcessEnv): Partial<ServerConfig> {
  const result: Partial<ServerConfig> = {};

  if (env.PORT) result.port = validatePort(env.PORT, 'PORT');
  if (env.HOST) result.host = env.HOST;
  if (env.NODE_ENV) result.env = env.NODE_ENV;
  if (env.DEBUG) result.debug = env.DEBUG === 'true' || env.DEBUG === '1';
  if (env.LOG_LEVEL) result.logLevel = validateLogLevel(env.LOG_LEVEL);
  if (env.LOG_FORMAT) result.logFormat = validateLogFormat(env.LOG_FORMAT);
  if (env.PUBLIC_DIR) result.publicDir = env.PUBLIC_DIR;

  return result;
}

/**
 * Command-line flags: `-debug`/`--debug` and `--port <n>`
 */
export function parseArgs(argv: readonly string[]): Partial<ServerConfig> {
  const result: Partial<ServerConfig> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '-debug' || arg === '--debug') {
      result.debug = true;
    } else if (arg === '--port') {
      result.port = validatePort(argv[index + 1], '--port');
      index += 1;
    }
  }

  return result;
}

function validatePort(value: unknown, key: string): number {
  const port = typeof value === 'string' ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(key, `expected a port number, got ${JSON.stringify(value)}`);
  }
  return port;
}

function validateLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigError('logLevel', `unknown level "${value}"`);
  }
  return value;
}

function validateLogFormat(value: string): LogFormat {
  if (value !== 'json' && value !== 'pretty') {
    throw new ConfigError('logFormat', `expected "json" or "pretty", got "${value}"`);
  }
  return value;
}

function expectString(value: unknown, key: string): string {
  if (typeof value !== 'string') {
    throw new ConfigError(key, 'expected a string');
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
