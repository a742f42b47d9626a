import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, loadEnvFile } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const REQUIRED_ENV = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
};

describe('loadConfig', () => {
  it('should apply defaults for everything optional', () => {
    expect(loadConfig({ ...REQUIRED_ENV })).toEqual({
      supabaseUrl: 'http://localhost:54321',
      supabaseKey: 'test-secret',
      evaluationsTable: 'evaluations',
      appName: 'LLM Evaluation API',
      appVersion: '1.0.0',
      host: '0.0.0.0',
      port: 8000,
      logLevel: 'info',
      maxBodyBytes: 1048576,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...REQUIRED_ENV,
      EVALUATIONS_TABLE: 'chat_feedback',
      APP_NAME: 'Feedback API',
      APP_VERSION: '2.3.0',
      HOST: '127.0.0.1',
      PORT: '3000',
      LOG_LEVEL: 'debug',
      MAX_BODY_BYTES: '2048',
    });

    expect(config).toMatchObject({
      evaluationsTable: 'chat_feedback',
      appName: 'Feedback API',
      appVersion: '2.3.0',
      host: '127.0.0.1',
      port: 3000,
      logLevel: 'debug',
      maxBodyBytes: 2048,
    });
  });

  it('should list every missing required variable', () => {
    expect(() => loadConfig({})).toThrow(
      new ConfigError(
        'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
      )
    );
  });

  it('should treat an empty required variable as missing', () => {
    expect(() => loadConfig({ ...REQUIRED_ENV, SUPABASE_SERVICE_ROLE_KEY: '' })).toThrow(
      'Missing required environment variables: SUPABASE_SERVICE_ROLE_KEY'
    );
  });

  it('should reject an unknown LOG_LEVEL', () => {
    expect(() => loadConfig({ ...REQUIRED_ENV, LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('should reject a PORT that is not an integer in range', () => {
    expect(() => loadConfig({ ...REQUIRED_ENV, PORT: 'eighty' })).toThrow(
      'PORT must be an integer between 0 and 65535 (got "eighty")'
    );
    expect(() => loadConfig({ ...REQUIRED_ENV, PORT: '70000' })).toThrow(ConfigError);
  });

  it('should reject a non-positive MAX_BODY_BYTES', () => {
    expect(() => loadConfig({ ...REQUIRED_ENV, MAX_BODY_BYTES: '0' })).toThrow(ConfigError);
  });
});

describe('loadEnvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chat-evaluation-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fill missing variables from the file', () => {
    const path = join(dir, '.env');
    writeFileSync(
      path,
      'SUPABASE_URL=http://localhost:54321\nSUPABASE_SERVICE_ROLE_KEY=test-secret\nPORT=9000\n'
    );
    const env: NodeJS.ProcessEnv = {};

    loadEnvFile(path, env);

    expect(loadConfig(env)).toMatchObject({
      supabaseUrl: 'http://localhost:54321',
      supabaseKey: 'test-secret',
      port: 9000,
    });
  });

  it('should leave variables that are already set alone', () => {
    const path = join(dir, '.env');
    writeFileSync(path, 'PORT=9000\nHOST=127.0.0.1\n');
    const env: NodeJS.ProcessEnv = { PORT: '8080' };

    loadEnvFile(path, env);

    expect(env).toEqual({ PORT: '8080', HOST: '127.0.0.1' });
  });

  it('should do nothing when the file does not exist', () => {
    const env: NodeJS.ProcessEnv = {};

    loadEnvFile(join(dir, 'missing.env'), env);

    expect(env).toEqual({});
  });
});
