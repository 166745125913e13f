import { AppSettings } from 'app/server/lib/AppSettings';
import { getLogJson, getLogLevel, getNAValues, getReportDir } from 'app/server/lib/diffSettings';
import { EnvironmentSnapshot } from 'test/server/testUtils';

import { assert } from 'chai';

describe('AppSettings', () => {
  let appSettings: AppSettings;
  let env: EnvironmentSnapshot;
  beforeEach(() => {
    appSettings = new AppSettings('test');
    env = new EnvironmentSnapshot();
  });

  afterEach(() => {
    env.restore();
  });

  describe('for strings and lists', () => {
    it('should prefer the first environment variable that is set', () => {
      process.env.TEST_B = 'b';
      assert.strictEqual(appSettings.readString({ envVar: ['TEST_A', 'TEST_B'] }), 'b');
      process.env.TEST_A = 'a';
      assert.strictEqual(appSettings.readString({ envVar: ['TEST_A', 'TEST_B'] }), 'a');
    });

    it('should fall back to the default value', () => {
      delete process.env.TEST;
      assert.strictEqual(appSettings.readString({ envVar: 'TEST', defaultValue: 'x' }), 'x');
      assert.isUndefined(appSettings.readString({ envVar: 'TEST' }));
    });

    it('should fail to require a setting that is not set', () => {
      delete process.env.TEST;
      assert.throws(() => appSettings.requireString({ envVar: 'TEST' }), 'missing environment variable: TEST');
      assert.strictEqual(appSettings.requireString({ envVar: 'TEST', defaultValue: 'x' }), 'x');
    });

    it('should split lists on commas', () => {
      process.env.TEST = 'NA, -, ,n/a';
      assert.deepEqual(appSettings.readList({ envVar: 'TEST' }), ['NA', '-', '', 'n/a']);
    });

    it('should read booleans', () => {
      process.env.TEST = 'yes';
      assert.isTrue(appSettings.readBool({ envVar: 'TEST' }));
      process.env.TEST = '0';
      assert.isFalse(appSettings.readBool({ envVar: 'TEST' }));
    });
  });

  describe('describeAll()', () => {
    it('should describe nested settings and where they came from', () => {
      process.env.TEST_SECRET = 'test-secret';
      appSettings.section('auth').flag('secret').readString({ envVar: 'TEST_SECRET', censor: true });
      appSettings.section('auth').flag('mode').readString({ envVar: 'TEST_MODE', defaultValue: 'basic' });
      assert.deepEqual(appSettings.describeAll(), [
        {
          name: 'test.auth.secret',
          value: '*****',
          foundInEnvVar: 'TEST_SECRET',
          wouldFindInEnvVar: 'TEST_SECRET',
          usedDefault: false,
        },
        {
          name: 'test.auth.mode',
          value: 'basic',
          foundInEnvVar: undefined,
          wouldFindInEnvVar: 'TEST_MODE',
          usedDefault: true,
        },
      ]);
    });
  });

  describe('diffSettings', () => {
    it('should read the log level, ignoring unknown levels', () => {
      delete process.env.DATASET_DIFF_LOG_LEVEL;
      assert.strictEqual(getLogLevel(appSettings), 'info');
      process.env.DATASET_DIFF_LOG_LEVEL = 'DEBUG';
      assert.strictEqual(getLogLevel(appSettings), 'debug');
      process.env.DATASET_DIFF_LOG_LEVEL = 'loud';
      assert.strictEqual(getLogLevel(appSettings), 'info');
    });

    it('should read the other settings', () => {
      delete process.env.DATASET_DIFF_LOG_JSON;
      delete process.env.DATASET_DIFF_REPORT_DIR;
      delete process.env.DATASET_DIFF_NA_VALUES;
      assert.isFalse(getLogJson(appSettings));
      assert.isUndefined(getReportDir(appSettings));
      assert.isUndefined(getNAValues(appSettings));

      process.env.DATASET_DIFF_LOG_JSON = 'true';
      process.env.DATASET_DIFF_REPORT_DIR = '/tmp/reports';
      process.env.DATASET_DIFF_NA_VALUES = ',NULL';
      assert.isTrue(getLogJson(appSettings));
      assert.strictEqual(getReportDir(appSettings), '/tmp/reports');
      assert.deepEqual(getNAValues(appSettings), ['', 'NULL']);
    });
  });
});
