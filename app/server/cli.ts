import {getErrorMessage, isErrorWithCode} from 'app/common/ErrorWithCode';
import {appSettings} from 'app/server/lib/AppSettings';
import {diffCSVFiles} from 'app/server/lib/DatasetDiff';
import {getLogJson, getLogLevel, getNAValues, getReportDir} from 'app/server/lib/diffSettings';
import {buildReportTables, writeReports} from 'app/server/lib/ExportCSV';
import log from 'app/server/lib/log';
import {outcomeToJSON, renderReport} from 'app/server/lib/renderReport';
import * as commander from 'commander';

export interface CompareCommandOptions {
  out?: string;
  json?: boolean;
  naValues?: string[];
}

/**
 * Main entrypoint of the dataset-diff command. Exits with status 1 on any error.
 */
export function main() {
  run(process.argv).then(() => process.exit(0)).catch(e => {
    // tslint:disable-next-line:no-console
    console.error(formatError(e));
    process.exit(1);
  });
}

export async function run(argv: string[]) {
  await getProgram().parseAsync(argv);
}

if (require.main === module) {
  main();
}

export function formatError(e: unknown): string {
  if (isErrorWithCode(e)) {
    return `Error (${e.code}): ${e.message}`;
  }
  return `Unexpected error: ${getErrorMessage(e)}`;
}

function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim());
}

/**
 * Get the program as a commander object. To actually run it, call parseAsync(argv).
 */
export function getProgram(): commander.Command {
  const program = new commander.Command();
  program
    .name('dataset-diff')
    .description('compare the history rows of two CSV datasets by dataset, tactic and recency flag');

  program.command('compare <fileA> <fileB>')
    .description('compare File A with File B and print a report')
    .option('-o, --out <dir>', 'write CSV reports into this directory')
    .option('--json', 'print the comparison as JSON')
    .option('--na-values <list>', 'comma-separated cell values to read as missing', parseList)
    .action(compare);

  program.command('settings')
    .description('show settings and where they are read from')
    .action(showSettings);

  return program;
}

export async function compare(fileA: string, fileB: string, options: CompareCommandOptions) {
  const outcome = await diffCSVFiles({fileA, fileB, naValues: options.naValues ?? getNAValues()});
  // tslint:disable-next-line:no-console
  console.log(options.json ? JSON.stringify(outcomeToJSON(outcome), null, 2) : renderReport(outcome));

  const reportDir = options.out ?? getReportDir();
  if (reportDir) {
    const tables = buildReportTables(outcome.result, outcome.summaryA, outcome.summaryB);
    const paths = await writeReports(reportDir, tables);
    log.info('Wrote %d reports: %s', paths.length, paths.join(', '));
  }
}

export function showSettings() {
  getLogLevel();
  getLogJson();
  getReportDir();
  getNAValues();
  // tslint:disable-next-line:no-console
  console.log(JSON.stringify(appSettings.describeAll(), null, 2));
}
