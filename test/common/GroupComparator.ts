import {CombinationKey, Row} from 'app/common/DatasetTypes';
import {compareGroup, compareKeys, encodeKey, pickDescriptiveFields} from 'app/common/GroupComparator';
import {assert} from 'chai';

describe('GroupComparator', function() {
  const columns = ['dataset_id', 'dataset_nm', 'tactic_id', 'tactic_nm', 'channel_nm', 'recency_flag', 'col'];

  function row(tacticId: string|number|null, values: Record<string, string|number|null> = {}): Row {
    return {
      dataset_id: 1, dataset_nm: 'Brand', tactic_id: tacticId, tactic_nm: `T${tacticId}`, channel_nm: 'Social',
      recency_flag: 'history', col: 0, ...values,
    };
  }

  it('should find identical groups', function() {
    const rows = [row(1), row(2)];
    const result = compareGroup(rows, [row(2), row(1)], 1, columns);
    assert.isFalse(result.hasChanges);
    assert.deepEqual(result.commonCombos, [
      {tactic_id: 1, recency_flag: 'history'},
      {tactic_id: 2, recency_flag: 'history'},
    ]);
    assert.equal(result.combinationCountA, 2);
    assert.equal(result.combinationCountB, 2);
    assert.deepEqual(result.cellChanges, []);
  });

  it('should report combinations present on one side, one record per row', function() {
    const result = compareGroup(
      [row(1), row(3), row(3, {channel_nm: null})],
      [row(1), row(4)],
      1, columns);
    assert.isTrue(result.hasChanges);
    assert.deepEqual(result.combosOnlyInA, [{tactic_id: 3, recency_flag: 'history'}]);
    assert.deepEqual(result.combosOnlyInB, [{tactic_id: 4, recency_flag: 'history'}]);
    assert.deepEqual(result.unmatchedCombinations, {
      onlyInA: [
        {dataset_id: 1, tactic_id: 3, recency_flag: 'history', count: 1,
          dataset_nm: 'Brand', tactic_nm: 'T3', channel_nm: 'Social'},
        {dataset_id: 1, tactic_id: 3, recency_flag: 'history', count: 1,
          dataset_nm: 'Brand', tactic_nm: 'T3', channel_nm: null},
      ],
      onlyInB: [
        {dataset_id: 1, tactic_id: 4, recency_flag: 'history', count: 1,
          dataset_nm: 'Brand', tactic_nm: 'T4', channel_nm: 'Social'},
      ],
    });
    assert.equal(result.combinationCountA, 2);
    assert.equal(result.combinationCountB, 2);
    assert.deepEqual(result.tacticRecencyChanges, []);
  });

  it('should collect cell changes of common combinations', function() {
    const result = compareGroup(
      [row(1, {col: 10}), row(2, {col: 5})],
      [row(1, {col: 20, tactic_nm: 'Renamed'}), row(2, {col: 5})],
      1, columns);
    assert.isTrue(result.hasChanges);
    assert.lengthOf(result.tacticRecencyChanges, 1);
    const [combo] = result.tacticRecencyChanges;
    assert.deepEqual(
      {tactic_id: combo.tactic_id, tactic_nm: combo.tactic_nm, dataset_nm: combo.dataset_nm},
      {tactic_id: 1, tactic_nm: 'Renamed', dataset_nm: 'Brand'});
    assert.deepEqual(combo.cellChanges.map(c => [c.Column, c.File_A_Value, c.File_B_Value]), [
      ['tactic_nm', 'T1', 'Renamed'],
      ['col', 10, 20],
    ]);
    assert.deepEqual(result.cellChanges, combo.cellChanges);
  });

  it('should never compare the description column', function() {
    const result = compareGroup(
      [row(1, {description: 'one'})],
      [row(1, {description: 'two'})],
      1, [...columns, 'description']);
    assert.isFalse(result.hasChanges);
  });

  it('should group empty and NULL tactic ids together', function() {
    const result = compareGroup([row('')], [row('NULL')], 1,
      columns.filter(colId => colId !== 'tactic_id' && colId !== 'tactic_nm'));
    assert.isFalse(result.hasChanges);
    assert.deepEqual(result.commonCombos, [{tactic_id: null, recency_flag: 'history'}]);
  });

  it('should tell apart numeric and textual tactic ids', function() {
    const result = compareGroup([row(5, {tactic_nm: 'x'})], [row('5', {tactic_nm: 'x'})], 1, ['col']);
    assert.deepEqual(result.combosOnlyInA, [{tactic_id: 5, recency_flag: 'history'}]);
    assert.deepEqual(result.combosOnlyInB, [{tactic_id: '5', recency_flag: 'history'}]);
  });

  it('should sort keys with missing tactic ids last', function() {
    const keys: CombinationKey[] = [
      {tactic_id: null, recency_flag: 'history'},
      {tactic_id: 'b', recency_flag: 'history'},
      {tactic_id: 2, recency_flag: 'history'},
      {tactic_id: 'b', recency_flag: 'current'},
    ];
    assert.deepEqual(keys.sort(compareKeys).map(encodeKey), [
      '[2,"history"]', '["b","current"]', '["b","history"]', '[null,"history"]',
    ]);
  });

  describe('pickDescriptiveFields', function() {
    it('should prefer File B, falling back to File A for missing fields', function() {
      const fields = pickDescriptiveFields(
        [{dataset_nm: 'A-ds', tactic_nm: 'A-t', channel_nm: 'A-c'}],
        [{dataset_nm: 'B-ds', tactic_nm: null}]);
      assert.deepEqual(fields, {dataset_nm: 'B-ds', tactic_nm: 'A-t', channel_nm: 'A-c'});
      assert.deepEqual(pickDescriptiveFields([], []), {dataset_nm: null, tactic_nm: null, channel_nm: null});
    });
  });
});
