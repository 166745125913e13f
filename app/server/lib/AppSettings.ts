import {ErrorWithCode} from 'app/common/ErrorWithCode';
import {isAffirmative} from 'app/common/gutil';

/**
 * A named setting read from the environment, which may also hold nested settings. Each setting
 * remembers the query that read it, so that `describeAll()` can report where values came from.
 */
export class AppSettings {
  private _value?: JSONValue;
  private _children?: {[key: string]: AppSettings};
  private _info?: AppSettingQueryResult;

  public constructor(public readonly name: string) {}

  /**
   * Reads the first of the query's environment variables that is set, or else takes the
   * query's default. What was tried is recorded even when nothing is found.
   */
  public read(query: AppSettingQuery) {
    const envVars = getEnvVarsFromQuery(query);
    if (!envVars.length) {
      throw new Error('could not find an environment variable to read');
    }
    const envVar = envVars.find(name => process.env[name] !== undefined);
    const value = envVar === undefined ? undefined : process.env[envVar];
    this._info = {envVar, found: envVar !== undefined, query};
    this._value = value ?? query.defaultValue;
    return this;
  }

  public readString(query: AppSettingQuery): string|undefined {
    this.read(query);
    if (this._value === undefined) { return undefined; }
    this._value = String(this._value);
    return this._value;
  }

  // Like readString(), but a setting with neither a value nor a default is an error.
  public requireString(query: AppSettingQuery): string {
    const result = this.readString(query);
    if (result === undefined) {
      throw new ErrorWithCode('INVALID_SETTING', `missing environment variable: ${query.envVar}`);
    }
    return result;
  }

  /**
   * Reads a comma-separated list, trimming each item. Items may be empty, e.g. ",NA" gives
   * ["", "NA"].
   */
  public readList(query: AppSettingQuery): string[]|undefined {
    const result = this.readString(query);
    if (result === undefined) { return undefined; }
    const list = result.split(',').map(item => item.trim());
    this._value = list;
    return list;
  }

  // "1", "on", "true" and "yes" (in any case) are true; any other value is false.
  public readBool(query: AppSettingQuery): boolean|undefined {
    const text = this.readString(query);
    const result = (text === undefined) ? undefined : isAffirmative(text);
    this._value = result;
    return result;
  }

  /**
   * Returns the nested setting of the given name, creating it on first use.
   */
  public section(fname: string): AppSettings {
    if (!this._children) { this._children = {}; }
    let child = this._children[fname];
    if (!child) {
      this._children[fname] = child = new AppSettings(fname);
    }
    return child;
  }

  // Same as section(); reads better for a setting with no nested settings of its own.
  public flag(fname: string): AppSettings {
    return this.section(fname);
  }

  public describe(): AppSettingDescription {
    return {
      name: this.name,
      value: (this._info?.query.censor && this._value !== undefined) ? '*****' : this._value,
      foundInEnvVar: this._info?.envVar,
      wouldFindInEnvVar: getEnvVarsFromQuery(this._info?.query)[0],
      usedDefault: this._value !== undefined && this._info !== undefined && !this._info.found,
    };
  }

  /**
   * Describes this setting and all nested ones, with dotted names. Settings never read are left
   * out.
   */
  public describeAll(): AppSettingDescription[] {
    const inv: AppSettingDescription[] = [this.describe()];
    for (const child of Object.values(this._children ?? {})) {
      for (const item of child.describeAll()) {
        inv.push({...item, name: this.name + '.' + item.name});
      }
    }
    return inv.filter(item => item.value !== undefined ||
      item.wouldFindInEnvVar !== undefined ||
      item.usedDefault);
  }
}

/**
 * Settings of the dataset-diff process.
 */
export const appSettings = new AppSettings('datasetDiff');

export interface AppSettingQuery {
  envVar: string|string[];  // environment variable(s) to check, in order.
  defaultValue?: JSONValue; // used when none of them is set.
  censor?: boolean;         // hide the value when settings are printed.
}

export interface AppSettingQueryResult {
  envVar?: string;          // the variable the value was found in.
  found: boolean;
  query: AppSettingQuery;
}

export interface AppSettingDescription {
  name: string;
  value?: JSONValue;
  foundInEnvVar?: string;
  wouldFindInEnvVar?: string;
  usedDefault: boolean;
}

function getEnvVarsFromQuery(q?: AppSettingQuery): string[] {
  if (!q) { return []; }
  return Array.isArray(q.envVar) ? q.envVar : [q.envVar];
}

// Setting values stay JSON-like, so that they could also be loaded from a JSON file.
export type JSONValue = string | number | boolean | null | { [member: string]: JSONValue } | JSONValue[];
