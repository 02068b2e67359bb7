/**
 * P100 Control Application.
 *
 * Configuration loading, logger setup and session construction shared by the
 * CLI and programmatic users.
 *
 * @module p100-control/app
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { pino, type Logger } from 'pino';
import { parseConfig, type Config, type ConnectionConfig, type ProtocolConfig } from './core/config/schema.js';
import { P100Session } from './adapters/p100/session.js';
import { SerialTransport, TcpTransport } from './adapters/p100/transport.js';
import type { TransportFactory } from './adapters/p100/types.js';
import { FeedbackLevel } from './adapters/p100/types.js';
import { createDevice, type P100Device } from './controls/index.js';

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

// ============================================================================
// Logger Setup
// ============================================================================

/**
 * Create application logger with sensible defaults.
 */
export function createLogger(level?: string, prettyPrint = true): Logger {
  if (prettyPrint) {
    return pino({
      level: level ?? process.env['LOG_LEVEL'] ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

/**
 * Logger as configured, with `LOG_LEVEL` taking precedence over the file.
 */
export function createLoggerFromConfig(config: Config): Logger {
  return createLogger(process.env['LOG_LEVEL'] ?? config.logging.level, config.logging.prettyPrint);
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Path of the configuration file: explicit path, then `CONFIG_PATH`, then
 * the default location.
 */
export function resolveConfigPath(configPath?: string): string {
  return resolve(configPath ?? process.env['CONFIG_PATH'] ?? DEFAULT_CONFIG_PATH);
}

/**
 * Load and validate configuration from YAML file.
 */
export async function loadConfig(configPath: string, logger: Logger): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    logger.error({ path: absolutePath }, 'Configuration file not found');
    logger.info('Copy config/config.example.yaml to config/config.yaml and edit with your settings');
    throw new Error(`Configuration file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, 'utf-8');
  const raw: unknown = parseYaml(content);

  return parseConfig(raw);
}

/**
 * Connection settings given on the command line.
 */
export interface ConnectionOverrides {
  host?: string;
  port?: number;
  serial?: string;
  baud?: number;
}

/**
 * Replace the configured connection with command-line settings.
 * A serial path wins over a host when both are given.
 */
export function applyConnectionOverrides(config: Config, overrides: ConnectionOverrides): Config {
  const connection = overrideConnection(config.connection, overrides);
  return connection === config.connection ? config : { ...config, connection };
}

/**
 * Configuration from command-line settings alone, with defaults for
 * everything else.
 */
export function configFromOverrides(overrides: ConnectionOverrides): Config {
  if (overrides.serial !== undefined) {
    return parseConfig({
      connection: { type: 'serial', path: overrides.serial, baudRate: overrides.baud },
    });
  }
  if (overrides.host !== undefined) {
    return parseConfig({
      connection: { type: 'tcp', host: overrides.host, port: overrides.port },
    });
  }
  throw new Error('No configuration file found and no --host or --serial given');
}

function overrideConnection(connection: ConnectionConfig, overrides: ConnectionOverrides): ConnectionConfig {
  if (overrides.serial !== undefined) {
    return {
      type: 'serial',
      path: overrides.serial,
      baudRate: overrides.baud ?? (connection.type === 'serial' ? connection.baudRate : 115200),
    };
  }
  if (overrides.host !== undefined) {
    return {
      type: 'tcp',
      host: overrides.host,
      port: overrides.port ?? (connection.type === 'tcp' ? connection.port : 84),
    };
  }
  if (connection.type === 'tcp' && overrides.port !== undefined) {
    return { ...connection, port: overrides.port };
  }
  if (connection.type === 'serial' && overrides.baud !== undefined) {
    return { ...connection, baudRate: overrides.baud };
  }
  return connection;
}

// ============================================================================
// Session Construction
// ============================================================================

/**
 * Factory producing a fresh transport for every connection attempt.
 */
export function createTransportFactory(connection: ConnectionConfig, protocol: ProtocolConfig): TransportFactory {
  switch (connection.type) {
    case 'tcp':
      return () => new TcpTransport({
        host: connection.host,
        port: connection.port,
        connectTimeoutMs: protocol.connectTimeoutMs,
      });
    case 'serial':
      return () => new SerialTransport({
        path: connection.path,
        baudRate: connection.baudRate,
      });
  }
}

function toFeedbackLevel(level: ProtocolConfig['feedbackLevel']): FeedbackLevel {
  switch (level) {
    case 0:
      return FeedbackLevel.Minimal;
    case 1:
      return FeedbackLevel.StatusUpdates;
    case 2:
      return FeedbackLevel.EchoAndStatus;
  }
}

/**
 * Build an unconnected session from validated configuration.
 */
export function createSessionFromConfig(config: Config, logger: Logger): P100Session {
  return new P100Session({
    transportFactory: createTransportFactory(config.connection, config.protocol),
    feedbackLevel: toFeedbackLevel(config.protocol.feedbackLevel),
    commandTimeoutMs: config.protocol.commandTimeoutMs,
    connectTimeoutMs: config.protocol.connectTimeoutMs,
    reconnect: config.reconnect,
    logger,
  });
}

// ============================================================================
// Application Lifecycle
// ============================================================================

/**
 * Connect to the configured device and return its controls.
 * The caller owns the session and must disconnect it.
 */
export async function openDevice(config: Config, logger: Logger): Promise<P100Device> {
  const session = createSessionFromConfig(config, logger);

  session.on('connectionStateChange', (state) => {
    logger.debug({ state }, 'Connection state changed');
  });
  session.on('error', (error) => {
    logger.error({ error: error.message }, 'Session error');
  });

  await session.connect();
  return createDevice(session);
}
