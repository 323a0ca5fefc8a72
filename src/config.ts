import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { LogFormat, LogLevel } from './domains/observability/types';

export interface ListenAddress {
  // undefined listens on every interface
  hostname?: string;
  port: number;
}

export interface RelayConfig {
  address: ListenAddress;
  wsPath: string;
  retryIntervalMs: number;
  reconnectDelayMs: number;
  readDelayMs: number;
  readBufferSize: number;
  portScanIntervalMs: number;
  initialPort?: string;
  initialBaudRate: number;
  mockDevices: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parses `host:port`, `:port` or `[v6]:port`.
 */
export function parseListenAddress(value: string): ListenAddress {
  const separator = value.lastIndexOf(':');
  if (separator === -1) {
    throw new Error(`"${value}" is not a host:port address`);
  }

  let host = value.slice(0, separator);
  const portText = value.slice(separator + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  if (!/^\d+$/.test(portText) || Number(portText) > 65535) {
    throw new Error(`"${portText}" is not a valid port number`);
  }
  return { hostname: host === '' ? undefined : host, port: Number(portText) };
}

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  RELAY_ADDRESS: z.string().default(':8080'),
  RELAY_WS_PATH: z.string().startsWith('/').default('/serialmonitor'),
  RELAY_RETRY_INTERVAL_MS: millis(5000),
  RELAY_RECONNECT_DELAY_MS: millis(1000),
  RELAY_READ_DELAY_MS: millis(0),
  RELAY_READ_BUFFER_SIZE: z.coerce.number().int().positive().default(128),
  RELAY_PORT_SCAN_INTERVAL_MS: millis(2000),
  RELAY_SERIAL_PORT: z.string().optional(),
  RELAY_BAUD_RATE: z.coerce.number().int().positive().default(9600),
  RELAY_MOCK_DEVICES: flag,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
  NODE_ENV: z.string().optional(),
});

/**
 * Builds the relay configuration from the environment, with `--address`
 * on the command line taking precedence over RELAY_ADDRESS.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): RelayConfig {
  let cliAddress: string | undefined;
  try {
    const { values } = parseArgs({
      args: argv,
      options: { address: { type: 'string', short: 'a' } },
      strict: true,
    });
    cliAddress = values.address;
  } catch (e) {
    throw new ConfigError([e instanceof Error ? e.message : String(e)]);
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  let address: ListenAddress;
  try {
    address = parseListenAddress(cliAddress ?? vars.RELAY_ADDRESS);
  } catch (e) {
    throw new ConfigError([`address: ${e instanceof Error ? e.message : String(e)}`]);
  }

  return {
    address,
    wsPath: vars.RELAY_WS_PATH,
    retryIntervalMs: vars.RELAY_RETRY_INTERVAL_MS,
    reconnectDelayMs: vars.RELAY_RECONNECT_DELAY_MS,
    readDelayMs: vars.RELAY_READ_DELAY_MS,
    readBufferSize: vars.RELAY_READ_BUFFER_SIZE,
    portScanIntervalMs: vars.RELAY_PORT_SCAN_INTERVAL_MS,
    initialPort: vars.RELAY_SERIAL_PORT || undefined,
    initialBaudRate: vars.RELAY_BAUD_RATE,
    mockDevices: vars.RELAY_MOCK_DEVICES,
    logLevel: vars.LOG_LEVEL,
    logFormat: vars.LOG_FORMAT ?? (vars.NODE_ENV === 'production' ? 'json' : 'pretty'),
  };
}
