import {compareDatasets} from 'app/common/DatasetComparator';
import {importCSVFile, makeUniqueColumnNames, parseCSV} from 'app/server/lib/ImportCSV';
import {assert} from 'chai';
import {expectRejection, setTmpLogSilent, writeTmpFile} from 'test/server/testUtils';

describe('ImportCSV', function() {
  setTmpLogSilent();

  describe('parseCSV', function() {
    it('should read columns and typed rows', function() {
      const dataset = parseCSV('dataset_id,tactic_id,name\n1,5,Search\n2,x,"Display, Video"\n');
      assert.deepEqual(dataset.columns, ['dataset_id', 'tactic_id', 'name']);
      assert.deepEqual(dataset.rows, [
        {dataset_id: 1, tactic_id: '5', name: 'Search'},
        {dataset_id: 2, tactic_id: 'x', name: 'Display, Video'},
      ]);
    });

    it('should read NA values as missing', function() {
      const dataset = parseCSV('a,b,c\n,NULL,None\nN/A,x,nan\n');
      assert.deepEqual(dataset.rows, [
        {a: null, b: null, c: null},
        {a: null, b: 'x', c: null},
      ]);
    });

    it('should accept other NA values', function() {
      const dataset = parseCSV('a,b\n-,NULL\n3,\n', {naValues: ['-']});
      assert.deepEqual(dataset.rows, [
        {a: null, b: 'NULL'},
        {a: 3, b: ''},
      ]);
    });

    it('should drop a byte order mark and blank lines, and pad short records', function() {
      const dataset = parseCSV('\uFEFFid,val\n1,2\n\n3\n');
      assert.deepEqual(dataset.columns, ['id', 'val']);
      assert.deepEqual(dataset.rows, [{id: 1, val: 2}, {id: 3, val: null}]);
    });

    it('should keep integers too large for exact numbers as text', function() {
      const datasetA = parseCSV('dataset_id,tactic_id,recency_flag,col\n9007199254740993,5,history,1\n');
      const datasetB = parseCSV('dataset_id,tactic_id,recency_flag,col\n9007199254740992,5,history,1\n');
      assert.deepEqual(datasetA.rows, [{dataset_id: '9007199254740993', tactic_id: 5, recency_flag: 'history', col: 1}]);
      assert.deepEqual(datasetB.rows, [{dataset_id: '9007199254740992', tactic_id: 5, recency_flag: 'history', col: 1}]);

      const result = compareDatasets(datasetA, datasetB);
      assert.deepEqual([...result.groupsOnlyInA], ['9007199254740993']);
      assert.deepEqual([...result.groupsOnlyInB], ['9007199254740992']);
      assert.deepEqual(result.identicalGroups, []);
    });

    it('should fail on empty input and long records', function() {
      assert.throws(() => parseCSV('', {label: 'File A'}), /No columns to parse from File A/);
      assert.throws(() => parseCSV('a,b\n1,2,3\n', {label: 'File B'}),
        /Error parsing File B: expected 2 fields in line 2, saw 3/);
      assert.throws(() => parseCSV('a,b\n"1,2\n'), /Could not parse input as CSV/);
    });
  });

  describe('makeUniqueColumnNames', function() {
    it('should rename repeated and blank names', function() {
      assert.deepEqual(makeUniqueColumnNames(['a', 'b', 'a', '', 'a', 'a.1']),
        ['a', 'b', 'a.1', 'Unnamed: 3', 'a.2', 'a.1.1']);
    });
  });

  describe('importCSVFile', function() {
    it('should read a file', async function() {
      const path = await writeTmpFile('dataset_id,recency_flag\n1,history\n');
      const dataset = await importCSVFile(path, {label: 'File A'});
      assert.deepEqual(dataset, {columns: ['dataset_id', 'recency_flag'], rows: [{dataset_id: 1, recency_flag: 'history'}]});
    });

    it('should fail with UNREADABLE_FILE for a missing file', async function() {
      await expectRejection(importCSVFile('/nonexistent/dataset-diff/a.csv', {label: 'File A'}),
        'UNREADABLE_FILE', /^Could not read File A: ENOENT/);
    });
  });
});
