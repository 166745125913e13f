/**
 * Configures logging. This is merely a customization of the 'winston' logging module, and all
 * winston logger methods are available, along with `log.console`, the console transport.
 * Usage:
 *    import log from 'app/server/lib/log';
 *    log.info("Comparing %s with %s", fileA, fileB);
 */

import {getLogJson, getLogLevel} from 'app/server/lib/diffSettings';
import moment from 'moment-timezone';
import * as winston from 'winston';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

interface DiffLogger extends winston.Logger {
  // The transport writing to the console, so that its level can be adjusted (e.g. in tests).
  console: winston.transports.ConsoleTransportInstance;
}

// Local time, to the millisecond.
function timestamp() {
  return moment().format(TIMESTAMP_FORMAT);
}

const asJson = getLogJson();

const consoleFormat = asJson ?
  winston.format.combine(winston.format.timestamp({format: timestamp}), winston.format.json()) :
  winston.format.combine(
    winston.format.timestamp({format: timestamp}),
    winston.format.printf((info) => {
      const {level: infoLevel, message, timestamp: ts, ...meta} = info;
      const metaStr = Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
      return `${ts} - ${infoLevel}: ${message}${metaStr}`;
    }),
  );

// All output goes to stderr, leaving stdout for the report itself.
const consoleTransport = new winston.transports.Console({
  level: getLogLevel(),
  format: consoleFormat,
  stderrLevels: Object.keys(winston.config.npm.levels),
});

const rawLog = winston.createLogger({
  level: 'debug',
  levels: winston.config.npm.levels,
  format: winston.format.splat(),
  transports: [consoleTransport],
});

const log: DiffLogger = Object.assign(rawLog, {console: consoleTransport});

// It's a little tricky to export a type when the top-level export is an object.
// tslint:disable-next-line:no-namespace
declare namespace log { // eslint-disable-line @typescript-eslint/no-namespace
  interface ILogMeta {
    [key: string]: unknown;
  }
}

export = log;
