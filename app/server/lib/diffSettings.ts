import {AppSettings, appSettings} from 'app/server/lib/AppSettings';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Log level of console output. Checks DATASET_DIFF_LOG_LEVEL; "info" by default.
 */
export function getLogLevel(settings: AppSettings = appSettings): string {
  const level = settings.section('log').flag('level').requireString({
    envVar: 'DATASET_DIFF_LOG_LEVEL',
    defaultValue: 'info',
  }).toLowerCase();
  return LOG_LEVELS.includes(level) ? level : 'info';
}

/**
 * Whether to log JSON lines instead of plain text. Checks DATASET_DIFF_LOG_JSON.
 */
export function getLogJson(settings: AppSettings = appSettings): boolean {
  return settings.section('log').flag('json').readBool({
    envVar: 'DATASET_DIFF_LOG_JSON',
    defaultValue: false,
  }) ?? false;
}

/**
 * Directory where CSV reports are written when none is given on the command line. Reports are
 * not written if unset.
 */
export function getReportDir(settings: AppSettings = appSettings): string|undefined {
  return settings.section('reports').flag('dir').readString({
    envVar: 'DATASET_DIFF_REPORT_DIR',
  }) || undefined;
}

/**
 * Comma-separated list of cell values read as missing when importing CSV files. Replaces the
 * default list when set.
 */
export function getNAValues(settings: AppSettings = appSettings): string[]|undefined {
  return settings.section('import').flag('naValues').readList({
    envVar: 'DATASET_DIFF_NA_VALUES',
  });
}
