/**
 * Configuration Management Module
 *
 * Layered configuration for the launcher and the bulk-download driver:
 * built-in defaults, then an optional YAML file, then environment variables.
 * Command-line flags are applied on top by each CLI.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { env } from './env';
import { LogLevel, parseLogLevel } from '../utils/logger';
import { OpsError, OpsErrorType, toError } from '../utils/error-handler';
import { isValidTimeZone } from '../utils/time';

export interface LaunchConfig {
  appModule: string;
  appDir: string;
  host: string;
  port: number;
  dataDir: string;
  stateDir: string;
  reload: boolean;
  kill: boolean;
  serverCommand: string;
  venvDir: string;
}

export interface DownloadConfig {
  baseUrl: string;
  dataDir: string;
  startHour: number;
  endHour: number;
  windOnly: boolean;
  /** null 表示由 API 处理全部城市 */
  cities: string[] | null;
  sleepBetween: number; // seconds
  yearsBack: number;
  clean: boolean;
  cleanEach: boolean;
  assumeYes: boolean;
  daemon: boolean;
  lockDir: string;
  logFile?: string;
  requestTimeout: number; // milliseconds, 0 = no timeout
  timezone?: string;
  dryRun: boolean;
}

export interface OpsConfig {
  launcher: LaunchConfig;
  download: DownloadConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_PATH = path.join('config', 'ops.yaml');

export function defaultConfig(): OpsConfig {
  return {
    launcher: {
      appModule: 'api.dataAPI:app',
      appDir: './src',
      host: '0.0.0.0',
      port: 8000,
      dataDir: 'data/raw',
      stateDir: 'data/state',
      reload: true,
      kill: false,
      serverCommand: 'uvicorn',
      venvDir: '.venv'
    },
    download: {
      baseUrl: 'http://localhost:8000',
      dataDir: 'data/raw',
      startHour: 0,
      endHour: 23,
      windOnly: false,
      cities: null,
      sleepBetween: 0.5,
      yearsBack: 10,
      clean: false,
      cleanEach: false,
      assumeYes: false,
      daemon: false,
      lockDir: path.join(os.tmpdir(), 'download_last_10y.lock'),
      requestTimeout: 0,
      dryRun: false
    },
    logLevel: LogLevel.INFO
  };
}

export class ConfigManager {
  private config: OpsConfig;
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath || env.get('OPS_CONFIG') || DEFAULT_CONFIG_PATH;
    this.config = defaultConfig();
    this.loadConfig();
  }

  getLaunchConfig(): LaunchConfig {
    return { ...this.config.launcher };
  }

  getDownloadConfig(): DownloadConfig {
    const download = this.config.download;
    return { ...download, cities: download.cities ? [...download.cities] : null };
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel;
  }

  /**
   * Load configuration from file and environment variables
   */
  private loadConfig(): void {
    const fileConfig = this.loadFileConfig();
    if (fileConfig) {
      this.applyFileConfig(fileConfig);
    }
    this.applyEnvironmentOverrides();
  }

  /**
   * Load configuration from YAML file; a missing file is not an error
   */
  private loadFileConfig(): Record<string, unknown> | null {
    if (!fs.existsSync(this.configPath)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new OpsError(
        `Failed to parse configuration file ${this.configPath}: ${toError(error).message}`,
        OpsErrorType.CONFIGURATION_ERROR,
        'config',
        'loadFileConfig'
      );
    }

    if (parsed === undefined || parsed === null) {
      return null;
    }
    if (!isRecord(parsed)) {
      throw configError(`Configuration file ${this.configPath} must contain a mapping`);
    }
    return parsed;
  }

  private applyFileConfig(fileConfig: Record<string, unknown>): void {
    const launcher = optionalSection(fileConfig, 'launcher');
    const download = optionalSection(fileConfig, 'download');
    const l = this.config.launcher;
    const d = this.config.download;

    if (launcher) {
      l.appModule = readString(launcher, 'appModule', l.appModule);
      l.appDir = readString(launcher, 'appDir', l.appDir);
      l.host = readString(launcher, 'host', l.host);
      l.port = readNumber(launcher, 'port', l.port);
      l.dataDir = readString(launcher, 'dataDir', l.dataDir);
      l.stateDir = readString(launcher, 'stateDir', l.stateDir);
      l.reload = readBoolean(launcher, 'reload', l.reload);
      l.kill = readBoolean(launcher, 'kill', l.kill);
      l.serverCommand = readString(launcher, 'serverCommand', l.serverCommand);
      l.venvDir = readString(launcher, 'venvDir', l.venvDir);
    }

    if (download) {
      d.baseUrl = readString(download, 'baseUrl', d.baseUrl);
      d.dataDir = readString(download, 'dataDir', d.dataDir);
      d.startHour = readNumber(download, 'startHour', d.startHour);
      d.endHour = readNumber(download, 'endHour', d.endHour);
      d.windOnly = readBoolean(download, 'windOnly', d.windOnly);
      d.cities = readCities(download, d.cities);
      d.sleepBetween = readNumber(download, 'sleepBetween', d.sleepBetween);
      d.yearsBack = readNumber(download, 'yearsBack', d.yearsBack);
      d.lockDir = readString(download, 'lockDir', d.lockDir);
      d.logFile = readString(download, 'logFile', d.logFile ?? '') || undefined;
      d.requestTimeout = readNumber(download, 'requestTimeout', d.requestTimeout);
      d.timezone = readString(download, 'timezone', d.timezone ?? '') || undefined;
    }

    const level = fileConfig.logLevel;
    if (level !== undefined) {
      const parsed = typeof level === 'string' ? parseLogLevel(level) : undefined;
      if (!parsed) {
        throw configError(`Invalid logLevel in configuration file: ${String(level)}`);
      }
      this.config.logLevel = parsed;
    }
  }

  /**
   * Apply environment variable overrides
   */
  private applyEnvironmentOverrides(): void {
    const l = this.config.launcher;
    const d = this.config.download;

    l.appModule = env.get('APP_MODULE', l.appModule) ?? l.appModule;
    l.appDir = env.get('APP_DIR', l.appDir) ?? l.appDir;
    l.host = env.get('HOST', l.host) ?? l.host;
    l.port = readEnvNumber('PORT', l.port);
    l.stateDir = env.get('STATE_DIR', l.stateDir) ?? l.stateDir;
    l.reload = env.getBoolean('RELOAD', l.reload) ?? l.reload;
    l.serverCommand = env.get('SERVER_COMMAND', l.serverCommand) ?? l.serverCommand;
    l.venvDir = env.get('VENV_DIR', l.venvDir) ?? l.venvDir;

    const dataDir = env.get('DATA_DIR');
    if (dataDir) {
      l.dataDir = dataDir;
      d.dataDir = dataDir;
    }

    d.baseUrl = env.get('BASE_URL', d.baseUrl) ?? d.baseUrl;
    d.startHour = readEnvNumber('START_HOUR', d.startHour);
    d.endHour = readEnvNumber('END_HOUR', d.endHour);
    d.windOnly = env.getBoolean('WIND_ONLY', d.windOnly) ?? d.windOnly;
    d.sleepBetween = readEnvNumber('SLEEP_BETWEEN', d.sleepBetween);
    d.yearsBack = readEnvNumber('YEARS_BACK', d.yearsBack);
    d.lockDir = env.get('LOCK_DIR', d.lockDir) ?? d.lockDir;
    d.logFile = env.get('LOG_FILE', d.logFile);
    d.requestTimeout = readEnvNumber('REQUEST_TIMEOUT', d.requestTimeout);
    d.timezone = env.get('DAEMON_TIMEZONE', d.timezone);

    const cities = env.getArray('CITIES');
    if (cities) {
      d.cities = cities.length > 0 ? cities : null;
    }

    const logLevel = env.get('LOG_LEVEL');
    if (logLevel) {
      const parsed = parseLogLevel(logLevel);
      if (!parsed) {
        throw configError(`Invalid LOG_LEVEL: ${logLevel}`);
      }
      this.config.logLevel = parsed;
    }
  }
}

export function validateLaunchConfig(config: LaunchConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`Port must be an integer between 1 and 65535, got ${config.port}`);
  }
  if (!config.host) {
    errors.push('Host is required');
  }
  if (!config.appModule) {
    errors.push('App module is required');
  }
  if (!config.serverCommand) {
    errors.push('Server command is required');
  }

  return errors;
}

export function validateDownloadConfig(config: DownloadConfig): string[] {
  const errors: string[] = [];

  for (const [name, hour] of [['Start hour', config.startHour], ['End hour', config.endHour]] as const) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      errors.push(`${name} must be an integer between 0 and 23, got ${hour}`);
    }
  }
  if (config.startHour > config.endHour) {
    errors.push(`Start hour (${config.startHour}) must not be after end hour (${config.endHour})`);
  }
  if (!Number.isInteger(config.yearsBack) || config.yearsBack < 1) {
    errors.push(`Years back must be a positive integer, got ${config.yearsBack}`);
  }
  if (!Number.isFinite(config.sleepBetween) || config.sleepBetween < 0) {
    errors.push(`Sleep between blocks must be a non-negative number of seconds, got ${config.sleepBetween}`);
  }
  if (!Number.isFinite(config.requestTimeout) || config.requestTimeout < 0) {
    errors.push(`Request timeout must be a non-negative number of milliseconds, got ${config.requestTimeout}`);
  }
  if (!/^https?:\/\//.test(config.baseUrl)) {
    errors.push(`Base URL must start with http:// or https://, got ${config.baseUrl}`);
  }
  if (!config.lockDir) {
    errors.push('Lock directory is required');
  }
  if (config.timezone !== undefined && !isValidTimeZone(config.timezone)) {
    errors.push(`Timezone must be an IANA time zone name, got ${config.timezone}`);
  }

  return errors;
}

/**
 * 校验失败时抛出配置错误
 */
export function assertValid(errors: string[], component: string): void {
  if (errors.length > 0) {
    throw new OpsError(
      errors.join('; '),
      OpsErrorType.CONFIGURATION_ERROR,
      component,
      'validate',
      { errors }
    );
  }
}

function configError(message: string): OpsError {
  return new OpsError(message, OpsErrorType.CONFIGURATION_ERROR, 'config', 'loadConfig');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalSection(source: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw configError(`Configuration section "${key}" must be a mapping`);
  }
  return value;
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw configError(`Configuration key "${key}" must be a string`);
  }
  return value;
}

function readNumber(section: Record<string, unknown>, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number') {
    throw configError(`Configuration key "${key}" must be a number`);
  }
  return value;
}

function readBoolean(section: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw configError(`Configuration key "${key}" must be a boolean`);
  }
  return value;
}

function readCities(section: Record<string, unknown>, fallback: string[] | null): string[] | null {
  const value = section.cities;
  if (value === undefined) {
    return fallback;
  }
  if (value === null) {
    return null;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw configError('Configuration key "cities" must be a list of strings');
  }
  return value.length > 0 ? value : null;
}

function readEnvNumber(key: string, fallback: number): number {
  try {
    return env.getNumber(key, fallback) ?? fallback;
  } catch (error) {
    throw configError(toError(error).message);
  }
}
