#!/usr/bin/env node
/**
 * P100 Control CLI.
 *
 * One-shot device commands, a traffic monitor and configuration validation.
 *
 * @module p100-control/cli
 */

import { Argument, Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander';
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { Logger } from 'pino';
import {
  applyConnectionOverrides,
  configFromOverrides,
  createLogger,
  createLoggerFromConfig,
  createSessionFromConfig,
  loadConfig,
  openDevice,
  resolveConfigPath,
  type ConnectionOverrides,
} from './app.js';
import { safeParseConfig, validateTiming, type Config } from './core/config/schema.js';
import { PowerState, type NamedEntry, type TrafficEntry } from './adapters/p100/types.js';
import type { P100Device } from './controls/index.js';

// ============================================================================
// CLI Setup
// ============================================================================

interface GlobalOptions extends ConnectionOverrides {
  config?: string;
  debug: boolean;
}

const program = new Command();

program
  .name('p100')
  .description('Control a Steinway Lyngdorf P100 processor over TCP or RS-232')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to configuration file (default: $CONFIG_PATH or ./config/config.yaml)')
  .option('-H, --host <host>', 'Device host (overrides configuration)')
  .option('-p, --port <port>', 'Device TCP port', parseInteger)
  .option('-s, --serial <path>', 'Serial device path, e.g. /dev/ttyUSB0')
  .option('-b, --baud <rate>', 'Serial baud rate', parseInteger)
  .option('-d, --debug', 'Log protocol traffic', false);

// ============================================================================
// Helpers
// ============================================================================

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CommanderArgumentError('Not an integer.');
  }
  return parsed;
}

function parseDecibels(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new CommanderArgumentError('Not a number.');
  }
  return parsed;
}

function connectionOverrides(options: GlobalOptions): ConnectionOverrides {
  const overrides: ConnectionOverrides = {};
  if (options.host !== undefined) overrides.host = options.host;
  if (options.port !== undefined) overrides.port = options.port;
  if (options.serial !== undefined) overrides.serial = options.serial;
  if (options.baud !== undefined) overrides.baud = options.baud;
  return overrides;
}

/**
 * Configuration file plus command-line overrides. Without a file, the
 * command line must name the device.
 */
async function resolveConfig(options: GlobalOptions, bootstrap: Logger): Promise<Config> {
  const overrides = connectionOverrides(options);
  const configPath = resolveConfigPath(options.config);

  if (!existsSync(configPath) && options.config === undefined) {
    return configFromOverrides(overrides);
  }

  const config = await loadConfig(configPath, bootstrap);
  return applyConnectionOverrides(config, overrides);
}

function formatPower(state: PowerState): string {
  return state === PowerState.On ? 'on' : 'off';
}

function formatEntries(entries: readonly NamedEntry[], currentIndex: number | null): string {
  return entries
    .map((entry) => `${entry.index === currentIndex ? '*' : ' '} ${String(entry.index).padStart(2)}  ${entry.name}`)
    .join('\n');
}

function formatTraffic(entry: TrafficEntry): string {
  return `${entry.at.toISOString()} ${entry.direction === 'tx' ? 'TX' : 'RX'} ${entry.line}`;
}

/**
 * Connect, run one operation and disconnect. Failures are logged and set a
 * non-zero exit code.
 */
async function withDevice(run: (device: P100Device, logger: Logger) => Promise<void>): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const bootstrap = createLogger(options.debug ? 'debug' : undefined);

  let device: P100Device | null = null;
  let logger = bootstrap;

  try {
    const config = await resolveConfig(options, bootstrap);
    logger = options.debug ? createLogger('debug', config.logging.prettyPrint) : createLoggerFromConfig(config);

    // One-shot commands fail rather than wait for the device to come back
    device = await openDevice({ ...config, reconnect: { ...config.reconnect, enabled: false } }, logger);
    await run(device, logger);
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Command failed');
    process.exitCode = 1;
  } finally {
    if (device) {
      await device.session.disconnect();
    }
  }
}

/**
 * Select by index when the argument is a number, otherwise by name.
 */
async function selectEntry(
  control: { select(target: number): Promise<void>; selectByName(name: string): Promise<NamedEntry> },
  nameOrIndex: string
): Promise<string> {
  if (/^\d+$/.test(nameOrIndex)) {
    const index = Number(nameOrIndex);
    await control.select(index);
    return String(index);
  }
  const entry = await control.selectByName(nameOrIndex);
  return `${String(entry.index)} (${entry.name})`;
}

// ============================================================================
// Power Commands
// ============================================================================

program
  .command('on')
  .description('Power on the main zone')
  .action(() => withDevice(async (device) => {
    await device.power.on();
  }));

program
  .command('off')
  .description('Power off the main zone')
  .action(() => withDevice(async (device) => {
    await device.power.off();
  }));

program
  .command('toggle')
  .description('Toggle main zone power')
  .action(() => withDevice(async (device) => {
    const state = await device.power.toggle();
    console.log(`Power: ${formatPower(state)}`);
  }));

program
  .command('status')
  .description('Show power, volume, source and audio mode')
  .action(() => withDevice(async (device) => {
    const power = await device.power.status();
    console.log(`Power:      ${formatPower(power)}`);
    if (power !== PowerState.On) return;

    const volume = await device.volume.get();
    const muted = await device.volume.isMuted();
    const source = await device.source.current();
    const mode = await device.audioMode.current();

    console.log(`Volume:     ${volume.toFixed(1)} dB${muted ? ' (muted)' : ''}`);
    console.log(`Source:     ${source.name}`);
    console.log(`Audio mode: ${mode.name}`);
  }));

program
  .command('zone2')
  .description('Zone 2 power')
  .addArgument(new Argument('<action>', 'What to do').choices(['on', 'off', 'status']))
  .action((action: 'on' | 'off' | 'status') => withDevice(async (device) => {
    switch (action) {
      case 'on':
        await device.zone2Power.on();
        break;
      case 'off':
        await device.zone2Power.off();
        break;
      case 'status':
        console.log(`Zone 2 power: ${formatPower(await device.zone2Power.status())}`);
        break;
    }
  }));

// ============================================================================
// Volume Commands
// ============================================================================

program
  .command('volume')
  .description('Show the volume, or set it in dB (put -- before negative values)')
  .argument('[db]', 'Target level in dB, -99.9 to 24.0', parseDecibels)
  .action((db: number | undefined) => withDevice(async (device) => {
    if (db === undefined) {
      console.log(`Volume: ${(await device.volume.get()).toFixed(1)} dB`);
      return;
    }
    await device.volume.set(db);
  }));

program
  .command('volume-up')
  .description('Raise the volume')
  .argument('[step]', 'Step in dB', parseDecibels)
  .action((step: number | undefined) => withDevice(async (device) => {
    await device.volume.up(step);
  }));

program
  .command('volume-down')
  .description('Lower the volume')
  .argument('[step]', 'Step in dB', parseDecibels)
  .action((step: number | undefined) => withDevice(async (device) => {
    await device.volume.down(step);
  }));

program
  .command('mute')
  .description('Mute the main zone')
  .action(() => withDevice(async (device) => {
    await device.volume.mute();
  }));

program
  .command('unmute')
  .description('Unmute the main zone')
  .action(() => withDevice(async (device) => {
    await device.volume.unmute();
  }));

// ============================================================================
// Source and Audio Mode Commands
// ============================================================================

program
  .command('sources')
  .description('List input sources')
  .action(() => withDevice(async (device) => {
    const sources = await device.source.list();
    const current = await device.source.current();
    console.log(formatEntries(sources, current.index));
  }));

program
  .command('source')
  .description('Show the current source, or select one by index or name')
  .argument('[nameOrIndex]', 'Source index or (partial) name')
  .action((nameOrIndex: string | undefined) => withDevice(async (device) => {
    if (nameOrIndex === undefined) {
      const current = await device.source.current();
      console.log(`Source: ${String(current.index)} (${current.name})`);
      return;
    }
    console.log(`Selected source ${await selectEntry(device.source, nameOrIndex)}`);
  }));

program
  .command('modes')
  .description('List audio modes')
  .action(() => withDevice(async (device) => {
    const modes = await device.audioMode.list();
    const current = await device.audioMode.current();
    console.log(formatEntries(modes, current.index));
  }));

program
  .command('mode')
  .description('Show the current audio mode, or select one by index or name')
  .argument('[nameOrIndex]', 'Audio mode index or (partial) name')
  .action((nameOrIndex: string | undefined) => withDevice(async (device) => {
    if (nameOrIndex === undefined) {
      const current = await device.audioMode.current();
      console.log(`Audio mode: ${String(current.index)} (${current.name})`);
      return;
    }
    console.log(`Selected audio mode ${await selectEntry(device.audioMode, nameOrIndex)}`);
  }));

// ============================================================================
// Monitor Command
// ============================================================================

interface MonitorOptions {
  feedback: '0' | '1' | '2';
  duration?: number;
}

program
  .command('monitor')
  .description('Print every line exchanged with the device until interrupted')
  .addOption(new Option('-f, --feedback <level>', 'Feedback level').choices(['0', '1', '2']).default('2'))
  .option('-t, --duration <seconds>', 'Stop after this many seconds', parseInteger)
  .action(async (options: MonitorOptions) => {
    const globals = program.opts<GlobalOptions>();
    const bootstrap = createLogger(globals.debug ? 'debug' : undefined);

    try {
      const loaded = await resolveConfig(globals, bootstrap);
      const config: Config = {
        ...loaded,
        protocol: { ...loaded.protocol, feedbackLevel: options.feedback === '0' ? 0 : options.feedback === '1' ? 1 : 2 },
      };
      const logger = globals.debug ? createLogger('debug', config.logging.prettyPrint) : createLoggerFromConfig(config);

      // The tap must also see the VERB(n) negotiation
      const session = createSessionFromConfig(config, logger);

      session.on('traffic', (entry) => {
        console.log(formatTraffic(entry));
      });
      session.on('connectionStateChange', (state) => {
        logger.info({ state }, 'Connection state');
      });
      session.on('error', (error) => {
        logger.error({ error: error.message }, 'Session error');
      });

      await session.connect();

      logger.info({ feedbackLevel: config.protocol.feedbackLevel }, 'Monitoring. Press Ctrl+C to stop.');

      await new Promise<void>((resolveStop) => {
        const stop = (): void => {
          process.off('SIGINT', stop);
          process.off('SIGTERM', stop);
          clearTimeout(timer);
          resolveStop();
        };
        const timer = options.duration === undefined ? undefined : setTimeout(stop, options.duration * 1000);
        process.on('SIGINT', stop);
        process.on('SIGTERM', stop);
      });

      await session.disconnect();
    } catch (error) {
      bootstrap.error({ error: error instanceof Error ? error.message : String(error) }, 'Monitor failed');
      process.exitCode = 1;
    }
  });

// ============================================================================
// Validate Config Command
// ============================================================================

program
  .command('validate-config')
  .description('Validate configuration file')
  .action(async () => {
    const options = program.opts<GlobalOptions>();
    const logger = createLogger('info');

    try {
      const configPath = resolveConfigPath(options.config);

      // Check file exists
      if (!existsSync(configPath)) {
        logger.error({ path: configPath }, 'Configuration file not found');
        process.exitCode = 1;
        return;
      }

      logger.info({ path: configPath }, 'Validating configuration');

      // Read and parse YAML
      const content = await readFile(configPath, 'utf-8');
      const raw: unknown = parseYaml(content);

      // Validate against schema
      const result = safeParseConfig(raw);

      if (!result.success) {
        logger.error('Configuration validation failed:');
        for (const issue of result.error.issues) {
          const path = issue.path.join('.');
          logger.error(`  ${path}: ${issue.message}`);
        }
        process.exitCode = 1;
        return;
      }

      for (const warning of validateTiming(result.data)) {
        logger.warn(warning);
      }

      logger.info('Configuration valid');
      console.log('\nParsed configuration:');
      console.log(JSON.stringify(result.data, null, 2));

    } catch (error) {
      logger.fatal({ error }, 'Failed to validate configuration');
      process.exitCode = 1;
    }
  });

// ============================================================================
// Entry Point
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
