#!/usr/bin/env node
// src/cli.ts

import { CLI_USAGE, parseCliArgs } from './config.js';
import { SensorConfigError } from './errors.js';
import { rootLogger } from './logger.js';
import { SensorDevice } from './sensor-device.js';
import { MinMaxTracker } from './stats/min-max-tracker.js';
import {
  ACCELERATION_AXES,
  formatMinMaxLine,
  formatSampleLine,
  pickAcceleration,
} from './stats/report.js';
import NodeSerialTransport from './transport/node-serialport.js';
import { CliOptions, SensorDataEvent } from './types/sensor-types.js';

const logger = rootLogger.createLogger('CLI');

function parseOrExit(argv: string[]): CliOptions | number {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(CLI_USAGE);
      return 0;
    }
    return options;
  } catch (err: unknown) {
    if (!(err instanceof SensorConfigError)) throw err;
    console.error(`Error: ${err.message}`);
    console.error(CLI_USAGE);
    return 1;
  }
}

/**
 * Runs the reader until a signal or a transport failure.
 * @returns process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const parsed = parseOrExit(argv);
  if (typeof parsed === 'number') return parsed;
  const options = parsed;

  if (options.debug) rootLogger.setLevel('debug');
  logger.info(
    `port=${options.port}, baudrate=${options.baudRate}, max=${options.max}, live=${options.live}, debug=${options.debug}`
  );

  const transport = new NodeSerialTransport(options.port, { baudRate: options.baudRate });
  const device = new SensorDevice(transport, { name: options.port, addresses: options.addresses });
  const tracker = new MinMaxTracker(ACCELERATION_AXES);

  device.setDataHandler((event: SensorDataEvent) => {
    if (event.policy !== 'imu') return;
    const sample = pickAcceleration(event.values);
    if (!sample) return;
    if (options.live) console.log(formatSampleLine(sample, event.checksum, new Date()));
    if (tracker.record(sample) < options.max) return;
    const summary = tracker.summary();
    if (summary) console.log(formatMinMaxLine(summary, new Date()));
    tracker.reset();
  });

  const exitCode = new Promise<number>(resolve => {
    device.setErrorHandler((error: Error) => {
      logger.error(`Connection lost: ${error.message}`);
      resolve(1);
    });
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info(`${signal} received, exiting...`);
      resolve(0);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });

  try {
    await device.open();
  } catch (err: unknown) {
    logger.error(`Could not open serial port: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  device.startLoopRead();
  logger.info('Running. Use Ctrl+C to stop the program.');

  const code = await exitCode;
  await device.close();
  return code;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('Fatal error', err);
    process.exitCode = 1;
  })
  .finally(() => {
    process.removeAllListeners('SIGINT');
    process.removeAllListeners('SIGTERM');
  });
