import { isLogThreshold, type LogThreshold } from './logger';

export interface AppConfig {
  tablePrefix: string;
  region: string;
  endpoint?: string | undefined;
  logLevel: LogThreshold;
  qrCodes: boolean;
  refundCutoffHours: number;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(variable: string, detail: string) {
    super(`Invalid environment variable ${variable}: ${detail}`);
    this.name = 'ConfigError';
  }
}

const TABLE_PREFIX_RE = /^[A-Za-z0-9_.-]{1,200}$/;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === '' ? undefined : value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const tablePrefix = read(env, 'PARKDESK_TABLE_PREFIX') ?? 'parkdesk';
  if (!TABLE_PREFIX_RE.test(tablePrefix)) {
    throw new ConfigError('PARKDESK_TABLE_PREFIX', 'only letters, digits, "_", "-" and "." are allowed');
  }

  const logLevel = read(env, 'LOG_LEVEL') ?? 'warn';
  if (!isLogThreshold(logLevel)) {
    throw new ConfigError('LOG_LEVEL', `expected debug, info, warn, error or silent (got "${logLevel}")`);
  }

  const qr = (read(env, 'PARKDESK_QR') ?? 'on').toLowerCase();
  if (qr !== 'on' && qr !== 'off') {
    throw new ConfigError('PARKDESK_QR', `expected on or off (got "${qr}")`);
  }

  const cutoff = read(env, 'REFUND_CUTOFF_HOURS') ?? '24';
  if (!/^\d+$/.test(cutoff)) {
    throw new ConfigError('REFUND_CUTOFF_HOURS', `expected a non-negative integer (got "${cutoff}")`);
  }

  return {
    tablePrefix,
    region: read(env, 'AWS_REGION') ?? 'us-east-1',
    endpoint: read(env, 'DYNAMODB_ENDPOINT'),
    logLevel,
    qrCodes: qr === 'on',
    refundCutoffHours: Number(cutoff),
  };
}
