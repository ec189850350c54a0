/**
 * Registry of every configuration field the publisher reads.
 *
 * Each entry declares:
 *   - `key`         Field name in the profile JSON file.
 *   - `env`         Environment variable that overrides the file value.
 *   - `type`        How raw values are parsed and validated.
 *   - `secret`      The value is redacted from logs and never echoed.
 *   - `description` Human-readable purpose.
 *   - `remediation` Hint shown when the value is missing or invalid.
 *
 * Defaults live in `DEFAULT_CONFIG`; the precedence is defaults < profile file < env < CLI.
 */

import type { LogLevel } from '../utils/logger.js';

export interface PublisherConfig {
  /** Upload workers per session; unset means the uploader's own cap. */
  maxWorkers?: number;
  maxAttempts: number;
  /** Bytes per upload chunk. */
  chunkSize: number;
  /** Seconds between status probes. */
  pollInterval: number;
  /** Seconds before a wait gives up. */
  timeout: number;
  credentialsFile?: string;
  sasToken?: string;
  resourceGroup?: string;
  storageAccount?: string;
  container?: string;
  region?: string;
  publisherId?: string;
  notificationEmails?: string;
  logLevel: LogLevel;
  noColor: boolean;
  /** Directory for the daily activity log; unset disables file logging. */
  logDir?: string;
}

export type ConfigKey = keyof PublisherConfig;

export type ConfigValueType = 'string' | 'positive-integer' | 'boolean' | 'log-level';

export interface ConfigFieldSpec {
  key: ConfigKey;
  env: string;
  type: ConfigValueType;
  secret?: boolean;
  description: string;
  remediation: string;
}

export const ENV_PREFIX = 'IMGPUB_';
export const CONFIG_DIR_ENV = 'IMGPUB_CONFIG_DIR';
export const PROFILE_ENV = 'IMGPUB_PROFILE';
export const DEFAULT_PROFILE = 'default';

export const DEFAULT_CONFIG: Readonly<PublisherConfig> = {
  maxAttempts: 5,
  chunkSize: 4 * 1024 * 1024,
  pollInterval: 5,
  timeout: 1800,
  logLevel: 'info',
  noColor: false,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'error'];

export const CONFIG_SCHEMA: readonly ConfigFieldSpec[] = [
  // ── Transfer & waiting ──────────────────────────────────────────────────────
  {
    key: 'maxWorkers',
    env: 'IMGPUB_MAX_WORKERS',
    type: 'positive-integer',
    description: 'Concurrent chunk uploads per blob.',
    remediation: 'Use a positive integer; the uploader caps it at 32.',
  },
  {
    key: 'maxAttempts',
    env: 'IMGPUB_MAX_ATTEMPTS',
    type: 'positive-integer',
    description: 'Attempts per remote call, and per chunk, before giving up.',
    remediation: 'Use a positive integer such as 5.',
  },
  {
    key: 'chunkSize',
    env: 'IMGPUB_CHUNK_SIZE',
    type: 'positive-integer',
    description: 'Upload chunk size in bytes.',
    remediation: 'Use a multiple of 512 no larger than 4194304 for page blobs.',
  },
  {
    key: 'pollInterval',
    env: 'IMGPUB_POLL_INTERVAL',
    type: 'positive-integer',
    description: 'Seconds between status probes of a long-running operation.',
    remediation: 'Use a positive number of seconds.',
  },
  {
    key: 'timeout',
    env: 'IMGPUB_TIMEOUT',
    type: 'positive-integer',
    description: 'Seconds to wait for a long-running operation.',
    remediation: 'Use a positive number of seconds.',
  },

  // ── Credentials ─────────────────────────────────────────────────────────────
  {
    key: 'credentialsFile',
    env: 'IMGPUB_CREDENTIALS_FILE',
    type: 'string',
    description: 'Service principal JSON file (clientId, clientSecret, subscriptionId, tenantId).',
    remediation: 'Pass --credentials-file or set IMGPUB_CREDENTIALS_FILE.',
  },
  {
    key: 'sasToken',
    env: 'IMGPUB_SAS_TOKEN',
    type: 'string',
    secret: true,
    description: 'Shared access signature for blob operations, in place of a service principal.',
    remediation: 'Pass --sas-token or set IMGPUB_SAS_TOKEN.',
  },

  // ── Resource addressing ─────────────────────────────────────────────────────
  {
    key: 'resourceGroup',
    env: 'IMGPUB_RESOURCE_GROUP',
    type: 'string',
    description: 'Resource group holding images, galleries and the storage account.',
    remediation: 'Pass --resource-group or set it in the profile.',
  },
  {
    key: 'storageAccount',
    env: 'IMGPUB_STORAGE_ACCOUNT',
    type: 'string',
    description: 'Storage account receiving image blobs.',
    remediation: 'Pass --storage-account or set it in the profile.',
  },
  {
    key: 'container',
    env: 'IMGPUB_CONTAINER',
    type: 'string',
    description: 'Blob container receiving image blobs.',
    remediation: 'Pass --container or set it in the profile.',
  },
  {
    key: 'region',
    env: 'IMGPUB_REGION',
    type: 'string',
    description: 'Region for new images and gallery versions.',
    remediation: 'Pass --region or set it in the profile.',
  },
  {
    key: 'publisherId',
    env: 'IMGPUB_PUBLISHER_ID',
    type: 'string',
    description: 'Cloud partner publisher owning the offers.',
    remediation: 'Pass --publisher-id or set it in the profile.',
  },
  {
    key: 'notificationEmails',
    env: 'IMGPUB_NOTIFICATION_EMAILS',
    type: 'string',
    description: 'Comma-separated addresses notified about offer publishing.',
    remediation: 'Pass --notification-emails or set it in the profile.',
  },

  // ── Output ──────────────────────────────────────────────────────────────────
  {
    key: 'logLevel',
    env: 'IMGPUB_LOG_LEVEL',
    type: 'log-level',
    description: 'Console verbosity: debug, info or error.',
    remediation: 'Use one of debug, info, error.',
  },
  {
    key: 'noColor',
    env: 'IMGPUB_NO_COLOR',
    type: 'boolean',
    description: 'Disable colored console output.',
    remediation: 'Use true or false.',
  },
  {
    key: 'logDir',
    env: 'IMGPUB_LOG_DIR',
    type: 'string',
    description: 'Directory for daily activity logs.',
    remediation: 'Use a writable directory path.',
  },
];

export function findFieldSpec(key: string): ConfigFieldSpec | undefined {
  return CONFIG_SCHEMA.find((spec) => spec.key === key);
}
