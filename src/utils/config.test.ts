import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { CONFIG_FILE_NAME, loadConfig, requireCredentials } from './config.js';
import { ConfigError } from './errors.js';
import { setLogLevel } from './logger.js';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'worklog-config-test-'));
    setLogLevel('error');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    setLogLevel('info');
  });

  function writeConfig(content: string): void {
    writeFileSync(join(tempDir, CONFIG_FILE_NAME), content);
  }

  it('should use defaults without a config file', () => {
    const config = loadConfig(tempDir, {});

    expect(config.jira.apiVersion).toBe('latest');
    expect(config.jira.pageSize).toBe(100);
    expect(config.jira.epicLinkField).toBeUndefined();
    expect(config.export.summaryOutput).toBe('worklog_summary.xlsx');
    expect(config.export.connector).toBe('└─ ');
  });

  it('should merge the config file over defaults', () => {
    writeConfig(JSON.stringify({
      jira: { server: 'https://example.atlassian.net', apiVersion: '3', pageSize: 50, maxRetries: 'many' },
      export: { indentUnit: '    ' },
    }));

    const config = loadConfig(tempDir, {});

    expect(config.jira.server).toBe('https://example.atlassian.net');
    expect(config.jira.apiVersion).toBe('3');
    expect(config.jira.pageSize).toBe(50);
    expect(config.jira.maxRetries).toBe(3);
    expect(config.export.indentUnit).toBe('    ');
    expect(config.export.templateOutput).toBe('worklog.xlsx');
  });

  it('should let the environment override the file', () => {
    writeConfig(JSON.stringify({ jira: { email: 'file@example.com', pageSize: 50 } }));

    const config = loadConfig(tempDir, {
      JIRA_EMAIL: 'env@example.com',
      JIRA_API_TOKEN: 'test-secret',
      JIRA_PAGE_SIZE: '25',
      JIRA_EPIC_LINK_FIELD: 'customfield_10014',
    });

    expect(config.jira.email).toBe('env@example.com');
    expect(config.jira.apiToken).toBe('test-secret');
    expect(config.jira.pageSize).toBe(25);
    expect(config.jira.epicLinkField).toBe('customfield_10014');
  });

  it('should fall back to defaults on malformed JSON', () => {
    writeConfig('{ not json');
    expect(loadConfig(tempDir, {}).jira.maxRetries).toBe(3);
  });

  it('should list every missing credential', () => {
    const config = loadConfig(tempDir, { JIRA_EMAIL: 'dev@example.com' });

    expect(() => requireCredentials(config.jira)).toThrow(ConfigError);
    expect(() => requireCredentials(config.jira)).toThrow(
      'Missing required Jira credentials: JIRA_SERVER, JIRA_API_TOKEN. ' +
        'Set them in the environment or in worklog-bridge.config.json (.env files are not read).'
    );
  });

  it('should ignore a .env file in the project directory', () => {
    writeFileSync(join(tempDir, '.env'), 'JIRA_SERVER=https://example.atlassian.net\n');

    expect(loadConfig(tempDir, {}).jira.server).toBe('');
  });

  it('should strip trailing slashes from the server', () => {
    const config = loadConfig(tempDir, {
      JIRA_SERVER: 'https://example.atlassian.net/',
      JIRA_EMAIL: 'dev@example.com',
      JIRA_API_TOKEN: 'test-secret',
    });

    expect(requireCredentials(config.jira).server).toBe('https://example.atlassian.net');
  });
});
