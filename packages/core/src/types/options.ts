/**
 * Configuration options for the record schema generators
 *
 * All options are optional with conservative defaults. `resolveOptions`
 * merges user options over the defaults and rejects inconsistent
 * combinations with a ConfigError.
 */

import { ConfigError } from './errors';
import { countNamesShorterThan } from '../naming/attribute-names';
import { isDebugEnv } from '../util/debug';

/**
 * Range of generated timestamps
 */
export interface TimestampRangeOptions {
  /** Earliest timestamp (default: 0001-01-01T00:00:00Z) */
  min?: Date;
  /** Latest timestamp (default: 9999-12-31T23:59:59Z) */
  max?: Date;
}

export interface GeneratorOptions {
  /** Totality of the generated records (default: drawn with a fair coin) */
  total?: boolean;
  /** Upper bound on the number of drawn fields (default: 10) */
  maxFields?: number;
  /** Upper bound on genericized fields per generic record (default: 3) */
  maxTypeParameters?: number;
  /** Upper bound on injected extra keys (default: 10) */
  maxExtraKeys?: number;
  /** Length of every injected extra key (default: 3) */
  extraKeyLength?: number;
  /** Value stored under every injected extra key (default: 1) */
  extraKeyValue?: number;
  /** Timestamp field range */
  timestamps?: TimestampRangeOptions;
  /** Log each constructed record type to stderr (default: RECORDGEN_DEBUG) */
  debug?: boolean;
}

export interface ResolvedOptions {
  total: boolean | undefined;
  maxFields: number;
  maxTypeParameters: number;
  maxExtraKeys: number;
  extraKeyLength: number;
  extraKeyValue: number;
  timestamps: Required<TimestampRangeOptions>;
  debug: boolean;
}

// RFC 3339 date-times span years 0001 through 9999
function earliestTimestamp(): Date {
  // Date.UTC maps years 0..99 to 1900..1999
  const date = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));
  date.setUTCFullYear(1);
  return date;
}

const EARLIEST_TIMESTAMP = earliestTimestamp().getTime();
const LATEST_TIMESTAMP = Date.UTC(9999, 11, 31, 23, 59, 59);

export const DEFAULT_OPTIONS: Readonly<Omit<ResolvedOptions, 'debug'>> = {
  total: undefined,
  maxFields: 10,
  maxTypeParameters: 3,
  maxExtraKeys: 10,
  extraKeyLength: 3,
  extraKeyValue: 1,
  timestamps: {
    min: new Date(EARLIEST_TIMESTAMP),
    max: new Date(LATEST_TIMESTAMP),
  },
};

export function resolveOptions(
  userOptions: GeneratorOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    total: userOptions.total ?? DEFAULT_OPTIONS.total,
    maxFields: userOptions.maxFields ?? DEFAULT_OPTIONS.maxFields,
    maxTypeParameters:
      userOptions.maxTypeParameters ?? DEFAULT_OPTIONS.maxTypeParameters,
    maxExtraKeys: userOptions.maxExtraKeys ?? DEFAULT_OPTIONS.maxExtraKeys,
    extraKeyLength:
      userOptions.extraKeyLength ?? DEFAULT_OPTIONS.extraKeyLength,
    extraKeyValue: userOptions.extraKeyValue ?? DEFAULT_OPTIONS.extraKeyValue,
    // Deep merge nested objects; dates are copied so callers never share them
    timestamps: copyRange({
      ...DEFAULT_OPTIONS.timestamps,
      ...stripUndefined(userOptions.timestamps),
    }),
    debug: userOptions.debug ?? isDebugEnv(),
  };

  validateOptions(resolved);
  return resolved;
}

function stripUndefined(
  range: TimestampRangeOptions | undefined
): TimestampRangeOptions {
  const out: TimestampRangeOptions = {};
  if (range?.min !== undefined) out.min = range.min;
  if (range?.max !== undefined) out.max = range.max;
  return out;
}

function copyRange(
  range: Required<TimestampRangeOptions>
): Required<TimestampRangeOptions> {
  return {
    min: new Date(range.min.getTime()),
    max: new Date(range.max.getTime()),
  };
}

function requireCount(setting: string, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigError({
      message: `${setting} must be an integer >= ${minimum}`,
      context: { setting, value },
    });
  }
}

/**
 * Validate option combinations
 */
export function validateOptions(options: ResolvedOptions): void {
  requireCount('maxFields', options.maxFields, 0);
  requireCount('maxTypeParameters', options.maxTypeParameters, 1);
  requireCount('maxExtraKeys', options.maxExtraKeys, 0);
  requireCount('extraKeyLength', options.extraKeyLength, 1);

  if (!Number.isFinite(options.extraKeyValue)) {
    throw new ConfigError({
      message: 'extraKeyValue must be a finite number',
      context: { setting: 'extraKeyValue', value: options.extraKeyValue },
    });
  }

  const { min, max } = options.timestamps;
  const minTime = min.getTime();
  const maxTime = max.getTime();
  if (Number.isNaN(minTime) || Number.isNaN(maxTime)) {
    throw new ConfigError({
      message: 'timestamps.min and timestamps.max must be valid dates',
      context: { setting: 'timestamps' },
    });
  }
  if (minTime > maxTime) {
    throw new ConfigError({
      message: 'timestamps.min must not be after timestamps.max',
      context: { setting: 'timestamps' },
    });
  }
  if (minTime < EARLIEST_TIMESTAMP || maxTime > LATEST_TIMESTAMP) {
    throw new ConfigError({
      message: 'timestamps must lie between years 0001 and 9999',
      context: { setting: 'timestamps' },
    });
  }
}

/**
 * Check that extra keys stay disjoint from field names: every drawn field
 * name must be shorter than an extra key.
 */
export function validateExtraKeyOptions(options: ResolvedOptions): void {
  const shortNames = countNamesShorterThan(options.extraKeyLength);
  if (options.maxFields > shortNames) {
    throw new ConfigError({
      message:
        `maxFields (${options.maxFields}) exceeds the ${shortNames} field ` +
        `names shorter than extraKeyLength (${options.extraKeyLength})`,
      context: { setting: 'maxFields', value: options.maxFields },
    });
  }
}
