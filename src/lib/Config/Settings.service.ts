import { Context, Effect, Layer, Option } from 'effect';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_SETTINGS } from './Settings.defaults.js';

export type SettingsValues = Readonly<Record<string, unknown>>;

/**
 * Read-only accessor over the crawl settings.
 *
 * Getters coerce the stored value to the requested type and fail with a
 * {@link ConfigurationError} when it cannot be coerced. Middlewares read
 * their settings while the chain is built, so a malformed value stops the
 * crawl before any request is processed.
 *
 * @group Configuration
 * @public
 */
export interface SettingsService {
  /** Raw value, or none when the key is unset */
  get: (name: string) => Option.Option<unknown>;
  /**
   * `true`/`false`, numbers and numeric strings (non-zero is true), and the
   * strings `'true'`, `'True'`, `'false'`, `'False'`.
   */
  getBool: (
    name: string,
    defaultValue?: boolean
  ) => Effect.Effect<boolean, ConfigurationError>;
  /** Integers and integral strings; other numbers are truncated */
  getInt: (
    name: string,
    defaultValue?: number
  ) => Effect.Effect<number, ConfigurationError>;
  getFloat: (
    name: string,
    defaultValue?: number
  ) => Effect.Effect<number, ConfigurationError>;
  /** Arrays are copied; strings are split on commas */
  getList: (
    name: string,
    defaultValue?: readonly unknown[]
  ) => Effect.Effect<unknown[], ConfigurationError>;
  /** Like {@link getList}, with every entry read as an integer */
  getIntList: (
    name: string,
    defaultValue?: readonly number[]
  ) => Effect.Effect<number[], ConfigurationError>;
  /** Plain objects are copied; strings are parsed as a JSON object */
  getDict: (
    name: string,
    defaultValue?: SettingsValues
  ) => Effect.Effect<Record<string, unknown>, ConfigurationError>;
}

/**
 * The Settings service tag.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const settings = yield* Settings;
 *   return yield* settings.getInt('RETRY_TIMES');
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(Settings.Live({ RETRY_TIMES: 5 })))
 * );
 * ```
 *
 * @group Configuration
 * @public
 */
export class Settings extends Context.Tag('@crawlguard/Settings')<
  Settings,
  SettingsService
>() {
  static readonly Default = Layer.sync(Settings, () => makeSettings());

  /**
   * Creates a Layer that provides Settings with the given overrides applied
   * over {@link DEFAULT_SETTINGS}
   */
  static Live = (overrides: SettingsValues) =>
    Layer.sync(Settings, () => makeSettings(overrides));
}

const INTEGER = /^\s*[+-]?\d+\s*$/;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toInt = (
  name: string,
  value: unknown
): Effect.Effect<number, ConfigurationError> => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Effect.succeed(Math.trunc(value));
  }
  if (typeof value === 'boolean') {
    return Effect.succeed(value ? 1 : 0);
  }
  if (typeof value === 'string' && INTEGER.test(value)) {
    return Effect.succeed(Number.parseInt(value, 10));
  }
  return Effect.fail(ConfigurationError.invalidSetting(name, 'an integer', value));
};

const toBool = (
  name: string,
  value: unknown
): Effect.Effect<boolean, ConfigurationError> => {
  if (typeof value === 'boolean') {
    return Effect.succeed(value);
  }
  if (value === 'true' || value === 'True') {
    return Effect.succeed(true);
  }
  if (value === 'false' || value === 'False') {
    return Effect.succeed(false);
  }
  return toInt(name, value).pipe(
    Effect.map((n) => n !== 0),
    Effect.mapError(() =>
      ConfigurationError.invalidSetting(
        name,
        "a boolean (0/1, true/false, 'True'/'False')",
        value
      )
    )
  );
};

/**
 * Creates a SettingsService over {@link DEFAULT_SETTINGS} merged with
 * `overrides`. Keys set to `undefined` fall back to the getter's default.
 *
 * @group Configuration
 * @public
 */
export const makeSettings = (overrides: SettingsValues = {}): SettingsService => {
  const values: SettingsValues = { ...DEFAULT_SETTINGS, ...overrides };

  const get = (name: string): Option.Option<unknown> =>
    Option.fromNullable(values[name]);

  const getList = (name: string, defaultValue: readonly unknown[] = []) =>
    Option.match(get(name), {
      onNone: () => Effect.succeed([...defaultValue]),
      onSome: (value): Effect.Effect<unknown[], ConfigurationError> => {
        if (typeof value === 'string') {
          return Effect.succeed(value.split(','));
        }
        if (Array.isArray(value)) {
          return Effect.succeed([...value]);
        }
        return Effect.fail(ConfigurationError.invalidSetting(name, 'a list', value));
      },
    });

  return {
    get,

    getBool: (name, defaultValue = false) =>
      Option.match(get(name), {
        onNone: () => Effect.succeed(defaultValue),
        onSome: (value) => toBool(name, value),
      }),

    getInt: (name, defaultValue = 0) =>
      Option.match(get(name), {
        onNone: () => Effect.succeed(defaultValue),
        onSome: (value) => toInt(name, value),
      }),

    getFloat: (name, defaultValue = 0) =>
      Option.match(get(name), {
        onNone: () => Effect.succeed(defaultValue),
        onSome: (value) => {
          const parsed =
            typeof value === 'number'
              ? value
              : typeof value === 'string' && value.trim() !== ''
                ? Number(value)
                : Number.NaN;
          return Number.isFinite(parsed)
            ? Effect.succeed(parsed)
            : Effect.fail(ConfigurationError.invalidSetting(name, 'a number', value));
        },
      }),

    getList,

    getIntList: (name, defaultValue = []) =>
      getList(name, defaultValue).pipe(
        Effect.flatMap((entries) =>
          Effect.forEach(entries, (entry) =>
            toInt(name, typeof entry === 'string' ? entry.trim() : entry)
          )
        )
      ),

    getDict: (name, defaultValue = {}) =>
      Option.match(get(name), {
        onNone: () => Effect.succeed({ ...defaultValue }),
        onSome: (value): Effect.Effect<Record<string, unknown>, ConfigurationError> => {
          if (isPlainObject(value)) {
            return Effect.succeed({ ...value });
          }
          if (typeof value === 'string') {
            return Effect.try({
              try: (): unknown => JSON.parse(value),
              catch: (cause) =>
                new ConfigurationError({
                  message: `Setting '${name}' is not valid JSON: ${cause}`,
                  details: { name, value },
                }),
            }).pipe(
              Effect.filterOrFail(isPlainObject, () =>
                ConfigurationError.invalidSetting(name, 'a JSON object', value)
              )
            );
          }
          return Effect.fail(ConfigurationError.invalidSetting(name, 'a dict', value));
        },
      }),
  };
};
