/**
 * P100 Control
 *
 * Asynchronous command/response control of Steinway Lyngdorf P100
 * processors over TCP or RS-232.
 *
 * @module p100-control
 */

export * from './adapters/p100/index.js';
export * from './controls/index.js';
export * from './core/errors.js';

export { DeviceStateCache, createEmptyState } from './core/state/device-state.js';
export type { StateChangeListener } from './core/state/device-state.js';

export {
  ConfigSchema,
  parseConfig,
  safeParseConfig,
  validateTiming,
} from './core/config/schema.js';
export type {
  Config,
  ConnectionConfig,
  TcpConnectionConfig,
  SerialConnectionConfig,
  ProtocolConfig,
  ReconnectSettings,
  LoggingConfig,
  LogLevel,
} from './core/config/schema.js';

export {
  createLogger,
  createLoggerFromConfig,
  resolveConfigPath,
  loadConfig,
  applyConnectionOverrides,
  configFromOverrides,
  createTransportFactory,
  createSessionFromConfig,
  openDevice,
  DEFAULT_CONFIG_PATH,
} from './app.js';
export type { ConnectionOverrides } from './app.js';
