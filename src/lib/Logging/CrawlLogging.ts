import { Effect, Layer, Logger, LogLevel, Option } from 'effect';
import { Settings } from '../Config/Settings.service.js';
import { ConfigurationError } from '../errors.js';

/**
 * Resolve a log level from its name (`'Debug'`, `'DEBUG'`, `'warn'`, ...).
 */
export const parseLogLevel = (
  name: string
): Effect.Effect<LogLevel.LogLevel, ConfigurationError> => {
  const wanted = name.trim().toUpperCase();
  const level = LogLevel.allLevels.find(
    (candidate) =>
      candidate._tag.toUpperCase() === wanted || candidate.label === wanted
  );
  return level
    ? Effect.succeed(level)
    : Effect.fail(
        ConfigurationError.invalidSetting(
          'LOG_LEVEL',
          `one of ${LogLevel.allLevels.map((l) => l._tag).join(', ')}`,
          name
        )
      );
};

/**
 * Logger layer filtering below `level`, with logfmt output.
 */
export const makeLoggingLayer = (level: LogLevel.LogLevel) =>
  Layer.merge(
    Logger.minimumLogLevel(level),
    Logger.replace(Logger.defaultLogger, Logger.logfmtLogger)
  );

/**
 * Logging configured from the `LOG_LEVEL` setting.
 */
export const LoggingLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const settings = yield* Settings;
    const name = Option.getOrElse(settings.get('LOG_LEVEL'), () => 'Info');
    const level = yield* parseLogLevel(String(name));
    return makeLoggingLayer(level);
  })
);
