/**
 * Configuration schema for P100 control.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';

// ============================================================================
// Sub-schemas
// ============================================================================

const TcpConnectionSchema = z.object({
  type: z.literal('tcp'),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(84),
});

const SerialConnectionSchema = z.object({
  type: z.literal('serial'),
  /** e.g. /dev/ttyUSB0 or COM3 */
  path: z.string().min(1),
  baudRate: z.number().int().positive().default(115200),
});

const ConnectionConfigSchema = z.discriminatedUnion('type', [
  TcpConnectionSchema,
  SerialConnectionSchema,
]);

const ProtocolConfigSchema = z.object({
  /**
   * 0 = replies only, 1 = status pushes, 2 = status pushes and command echoes.
   */
  feedbackLevel: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(1),
  commandTimeoutMs: z.number().int().positive().default(5000),
  connectTimeoutMs: z.number().int().positive().default(10000),
});

const ReconnectConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxAttempts: z.number().int().min(0).default(0), // 0 = infinite
  initialDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
  /** Uptime after which a lost connection restarts the backoff */
  stableAfterMs: z.number().int().min(0).default(60000),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  prettyPrint: z.boolean().default(true),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  connection: ConnectionConfigSchema,
  protocol: ProtocolConfigSchema.default({}),
  reconnect: ReconnectConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type TcpConnectionConfig = z.infer<typeof TcpConnectionSchema>;
export type SerialConnectionConfig = z.infer<typeof SerialConnectionSchema>;
export type ProtocolConfig = z.infer<typeof ProtocolConfigSchema>;
export type ReconnectSettings = z.infer<typeof ReconnectConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig['level'];

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Returns parsed config or throws ZodError.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

/**
 * Validate configuration without throwing.
 * Returns result object with success flag.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(raw);
}

/**
 * Cross-field checks the schema cannot express.
 * Returns human-readable warnings; an empty list means the timing is consistent.
 */
export function validateTiming(config: Config): string[] {
  const warnings: string[] = [];
  const { initialDelayMs, maxDelayMs } = config.reconnect;

  if (initialDelayMs > maxDelayMs) {
    warnings.push(
      `reconnect.initialDelayMs (${String(initialDelayMs)}) exceeds reconnect.maxDelayMs ` +
      `(${String(maxDelayMs)}); every attempt will wait ${String(maxDelayMs)}ms.`
    );
  }

  return warnings;
}
