import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { configureLogger, logActivity, logRequest, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  const envName = 'IMGPUB_SAS_TOKEN';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'env-secret-leak-value-123456789';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts raw sensitive values even when they appear outside key=value patterns', () => {
    const raw = `diagnostic trace => env-secret-leak-value-123456789 <= should be hidden`;

    expect(scrubSensitiveText(raw)).toBe('diagnostic trace => [REDACTED] <= should be hidden');
  });

  it('redacts bearer tokens and SAS signatures', () => {
    expect(scrubSensitiveText('Authorization: Bearer abc.def-ghi')).toBe('Authorization: Bearer [REDACTED]');
    expect(scrubSensitiveText('PUT https://acct.blob.core.windows.net/c/b?sv=2021&sig=abc%2Fdef&se=1')).toBe(
      'PUT https://acct.blob.core.windows.net/c/b?sv=2021&sig=[REDACTED]&se=1',
    );
  });

  it('redacts client secrets in JSON text', () => {
    expect(scrubSensitiveText('{"clientSecret": "test-secret"}')).toBe('{"clientSecret": "[REDACTED]"}');
  });
});

describe('logActivity', () => {
  let errors: string[];
  let logDir: string;

  beforeEach(async () => {
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
    logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'imgpub-log-'));
  });

  afterEach(async () => {
    configureLogger({ level: 'error', noColor: false });
    vi.restoreAllMocks();
    await fs.rm(logDir, { recursive: true, force: true });
  });

  it('echoes only lines at or above the configured level', async () => {
    configureLogger({ level: 'info', noColor: true });

    await logActivity('[Blob] uploaded', 'info');
    await logActivity('[Retry] detail', 'debug');

    expect(errors).toEqual(['[Blob] uploaded']);
  });

  it('appends scrubbed entries to the daily activity file', async () => {
    configureLogger({ level: 'error', noColor: true, logDir });

    await logRequest('get', 'https://example.test/x?sig=test-secret', 200, 12);

    const [file] = await fs.readdir(logDir);
    expect(file).toMatch(/^\d{4}-\d{2}-\d{2}\.md$/);
    const content = await fs.readFile(path.join(logDir, file ?? ''), 'utf8');
    expect(content).toContain('[Request] GET https://example.test/x?sig=[REDACTED] -> 200 (12ms)');
    expect(errors).toEqual([]);
  });
});
