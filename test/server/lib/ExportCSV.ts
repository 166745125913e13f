import {compareDatasets} from 'app/common/DatasetComparator';
import {summarizeDataset} from 'app/common/DatasetSummary';
import {Dataset} from 'app/common/DatasetTypes';
import {buildReportTables, tableToCsv, writeReports} from 'app/server/lib/ExportCSV';
import {assert} from 'chai';
import * as fse from 'fs-extra';
import * as path from 'path';
import {createTestDir, setTmpLogSilent} from 'test/server/testUtils';

const columns = ['dataset_id', 'dataset_nm', 'tactic_id', 'tactic_nm', 'channel_nm', 'recency_flag', 'col'];
const base = {dataset_id: 1, dataset_nm: 'Brand', tactic_nm: 'Search', channel_nm: 'Paid', recency_flag: 'history'};

const datasetA: Dataset = {columns, rows: [
  {...base, tactic_id: 5, col: 10},
  {...base, tactic_id: 6, tactic_nm: null, channel_nm: null, col: 1},
  {...base, dataset_id: 2, tactic_id: 8, col: 1},
]};
const datasetB: Dataset = {columns, rows: [
  {...base, tactic_id: 5, col: 20},
  {...base, dataset_id: 3, tactic_id: 8, col: 1},
]};

function buildTables(a: Dataset, b: Dataset) {
  return buildReportTables(compareDatasets(a, b), summarizeDataset(a, 'File A'), summarizeDataset(b, 'File B'));
}

describe('ExportCSV', function() {
  setTmpLogSilent();

  it('should build all report tables', function() {
    const tables = buildTables(datasetA, datasetB);
    assert.deepEqual(tables.map(t => t.fileName), [
      'detailed_cell_changes_report.csv',
      'tactic_recency_summary.csv',
      'unmatched_combinations_report.csv',
      'overall_comparison_summary.csv',
    ]);
    assert.equal(tableToCsv(tables[0]),
      'dataset_id,tactic_id,recency_flag,Row_Index,Column,File_A_Value,File_B_Value,Change_Type\n' +
      '1,5,history,,col,10,20,Value Modified\n');
    assert.equal(tableToCsv(tables[1]),
      'dataset_id,dataset_nm,tactic_id,tactic_nm,channel_nm,recency_flag,change_type,cell_changes_count\n' +
      '1,Brand,5,Search,Paid,history,modified,1\n');
    assert.equal(tableToCsv(tables[2]),
      'dataset_id,dataset_nm,tactic_id,tactic_nm,channel_nm,recency_flag,status,change_type\n' +
      '1,Brand,6,N/A,N/A,history,only_in_file_a,removed\n');
    assert.equal(tableToCsv(tables[3]), [
      'Metric,Count',
      'Total Groups in File A,2',
      'Total Groups in File B,2',
      'Groups Only in File A,1',
      'Groups Only in File B,1',
      'Modified Groups,1',
      'Identical Groups,0',
      'Total Tactic+Recency Changes,1',
      'Total Cell Changes,1',
      'Total Unmatched Combinations,1',
      '',
    ].join('\n'));
  });

  it('should only build the overall summary when nothing changed', function() {
    const tables = buildTables(datasetA, datasetA);
    assert.deepEqual(tables.map(t => t.fileName), ['overall_comparison_summary.csv']);
    assert.deepEqual(tables[0].rows[5], ['Identical Groups', '2']);
  });

  it('should quote values where needed', function() {
    assert.equal(tableToCsv({fileName: 'x.csv', headers: ['a', 'b'], rows: [['1,5', 'say "hi"']]}),
      'a,b\n"1,5","say ""hi"""\n');
  });

  it('should write reports into a new directory', async function() {
    const dir = path.join(await createTestDir('ExportCSV'), 'reports');
    const paths = await writeReports(dir, buildTables(datasetA, datasetB));
    assert.deepEqual(paths.map(p => path.basename(p)), [
      'detailed_cell_changes_report.csv',
      'tactic_recency_summary.csv',
      'unmatched_combinations_report.csv',
      'overall_comparison_summary.csv',
    ]);
    assert.equal(await fse.readFile(path.join(dir, 'tactic_recency_summary.csv'), 'utf8'),
      'dataset_id,dataset_nm,tactic_id,tactic_nm,channel_nm,recency_flag,change_type,cell_changes_count\n' +
      '1,Brand,5,Search,Paid,history,modified,1\n');
  });
});
