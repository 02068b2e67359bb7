/**
 * P100 adapter module.
 * Provides connectivity to Steinway Lyngdorf P100 processors.
 */

export { P100Session, DEFAULT_RECONNECT, reconnectDelay } from './session.js';

export { TcpTransport, SerialTransport } from './transport.js';
export type { Transport, TcpTransportOptions, SerialTransportOptions } from './transport.js';

export { Correlator } from './correlator.js';
export type { CorrelatorOptions, CorrelatorState, FrameWriter } from './correlator.js';

export { CommandQueue } from './queue.js';

export { FeedbackLevel, PowerState } from './types.js';
export type {
  Zone,
  Frame,
  FrameKind,
  PayloadField,
  StatusUpdate,
  MatchOutcome,
  ResponseMatcher,
  Command,
  NamedEntry,
  ConnectionState,
  ReconnectConfig,
  TransportFactory,
  P100SessionOptions,
  SendOptions,
  TrafficDirection,
  TrafficEntry,
  P100SessionEvents,
  ZoneState,
  MainZoneState,
  DeviceState,
  DeviceStateSnapshot,
} from './types.js';

export {
  encodeCommand,
  classifyLine,
  FrameDecoder,
  readField,
  readInteger,
  readIndexed,
  readPower,
  readMute,
  parseStatus,
  tenthsToDb,
  dbToTenths,
  COMMAND_PREFIX,
  STATUS_PREFIX,
  ECHO_PREFIX,
  TERMINATOR,
  DEFAULT_TCP_PORT,
  DEFAULT_BAUD_RATE,
  MAX_LINE_LENGTH,
} from './protocol.js';

export {
  action,
  query,
  listQuery,
  withTimeout,
  powerOn,
  powerOff,
  powerQuery,
  volumeSet,
  volumeUp,
  volumeDown,
  volumeQuery,
  muteOn,
  muteOff,
  muteToggle,
  muteQuery,
  sourceSelect,
  sourceQuery,
  sourceList,
  audioModeSelect,
  audioModeNext,
  audioModePrevious,
  audioModeQuery,
  audioModeList,
  audioTypeQuery,
  feedbackLevel,
  DEFAULT_COMMAND_TIMEOUT_MS,
  MIN_VOLUME_DB,
  MAX_VOLUME_DB,
  DEFAULT_VOLUME_STEP_DB,
} from './commands.js';
