import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';
import type { BridgeConfig, ExportConfig, JiraConfig } from '../types/index.js';

export const CONFIG_FILE_NAME = 'worklog-bridge.config.json';

const DEFAULT_CONFIG: BridgeConfig = {
  jira: {
    server: '',
    email: '',
    apiToken: '',
    apiVersion: 'latest',
    pageSize: 100,
    maxRetries: 3,
    retryDelayMs: 1000,
  },
  export: {
    templateOutput: 'worklog.xlsx',
    summaryOutput: 'worklog_summary.xlsx',
    indentUnit: '  ',
    connector: '└─ ',
  },
};

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function pickOptionalString(
  source: Record<string, unknown>,
  key: string,
  fallback: string | undefined
): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function envNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function mergeJira(defaults: JiraConfig, source: unknown): JiraConfig {
  if (!isRecord(source)) return defaults;
  return {
    server: pickString(source, 'server', defaults.server),
    email: pickString(source, 'email', defaults.email),
    apiToken: pickString(source, 'apiToken', defaults.apiToken),
    apiVersion: pickString(source, 'apiVersion', defaults.apiVersion),
    epicLinkField: pickOptionalString(source, 'epicLinkField', defaults.epicLinkField),
    pageSize: pickNumber(source, 'pageSize', defaults.pageSize),
    maxRetries: pickNumber(source, 'maxRetries', defaults.maxRetries),
    retryDelayMs: pickNumber(source, 'retryDelayMs', defaults.retryDelayMs),
  };
}

function mergeExport(defaults: ExportConfig, source: unknown): ExportConfig {
  if (!isRecord(source)) return defaults;
  return {
    templateOutput: pickString(source, 'templateOutput', defaults.templateOutput),
    summaryOutput: pickString(source, 'summaryOutput', defaults.summaryOutput),
    indentUnit: pickString(source, 'indentUnit', defaults.indentUnit),
    connector: pickString(source, 'connector', defaults.connector),
  };
}

function applyEnv(config: BridgeConfig, env: Env): BridgeConfig {
  const { jira } = config;
  return {
    ...config,
    jira: {
      ...jira,
      server: env.JIRA_SERVER || jira.server,
      email: env.JIRA_EMAIL || jira.email,
      apiToken: env.JIRA_API_TOKEN || jira.apiToken,
      apiVersion: env.JIRA_API_VERSION || jira.apiVersion,
      epicLinkField: env.JIRA_EPIC_LINK_FIELD || jira.epicLinkField,
      pageSize: envNumber(env.JIRA_PAGE_SIZE, jira.pageSize),
      maxRetries: envNumber(env.JIRA_MAX_RETRIES, jira.maxRetries),
    },
  };
}

/**
 * Defaults, then `worklog-bridge.config.json` in the project directory,
 * then JIRA_* environment variables. `.env` files are not read.
 */
export function loadConfig(
  projectPath: string = process.cwd(),
  env: Env = process.env
): BridgeConfig {
  const configPath = join(projectPath, CONFIG_FILE_NAME);
  let config = DEFAULT_CONFIG;

  if (existsSync(configPath)) {
    try {
      const userConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isRecord(userConfig)) {
        config = {
          jira: mergeJira(DEFAULT_CONFIG.jira, userConfig.jira),
          export: mergeExport(DEFAULT_CONFIG.export, userConfig.export),
        };
      }
    } catch (err) {
      logger.warn(`Could not parse ${configPath}, using defaults`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return applyEnv(config, env);
}

/**
 * Fails fast before any remote call when credentials are incomplete.
 */
export function requireCredentials(config: JiraConfig): JiraConfig {
  const missing: string[] = [];
  if (!config.server) missing.push('JIRA_SERVER');
  if (!config.email) missing.push('JIRA_EMAIL');
  if (!config.apiToken) missing.push('JIRA_API_TOKEN');

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required Jira credentials: ${missing.join(', ')}. ` +
        `Set them in the environment or in ${CONFIG_FILE_NAME} (.env files are not read).`
    );
  }

  return { ...config, server: config.server.replace(/\/+$/, '') };
}
