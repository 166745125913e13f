import log from 'app/server/lib/log';

/**
 * Helper for logging with metadata. The created object has methods similar to those of the `log`
 * module, but with an extra required first argument. The produced messages get metadata produced
 * by the constructor callback applied to that argument, and the specified prefix.
 *
 * Usage:
 *    _log = new LogMethods('DatasetDiff ', (info: DiffLogInfo) => ({fileA: info.fileA}));
 *    _log.info(info, "compared %d groups", count);
 *    _log.warn(info, "%s", message);
 *    etc.
 */
export class LogMethods<Info> {
  constructor(
    private _prefix: string,
    private _getMeta: (info: Info) => log.ILogMeta,
  ) {}

  public debug(info: Info, msg: string, ...args: unknown[]) { this.log('debug', info, msg, ...args); }
  public info(info: Info, msg: string, ...args: unknown[]) { this.log('info', info, msg, ...args); }
  public warn(info: Info, msg: string, ...args: unknown[]) { this.log('warn', info, msg, ...args); }

  public log(level: string, info: Info, msg: string, ...args: unknown[]): void {
    // Metadata goes last, after the arguments interpolated into the message.
    log.log(level, this._prefix + msg, ...args, this._getMeta(info));
  }
}
