import pino, { type DestinationStream, type Level, type Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config/index.js';
import { toLevelName } from './logLevels.js';

const contextStorage = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Size and age limits for file destinations, written through pino-roll
 */
export interface RotationSettings {
  /** pino-roll size, e.g. '10m' */
  size: string;
  /** 'daily', 'hourly' or milliseconds */
  frequency: string | number;
  /** Rotated files kept for the main file */
  keep: number;
  /** Rotated files kept for the error file */
  keepErrors: number;
  /** Second file receiving ERROR and above; null for none */
  errorFile: string | null;
}

export interface LoggerSettings {
  level: Level;
  /** 'stdout', 'stderr', a file path, or an already open stream */
  destination?: string | DestinationStream;
  pretty?: boolean;
  /** Applies to file destinations; without it a file grows unbounded */
  rotation?: RotationSettings;
  /** Called when the destination reports a write failure */
  onSinkError?: (error: Error) => void;
}

export interface DestinationOptions {
  level?: Level;
  pretty?: boolean;
  rotation?: RotationSettings;
  onError?: (error: Error) => void;
}

export interface RollTarget {
  level: Level;
  options: {
    file: string;
    size: string;
    frequency: string | number;
    mkdir: true;
    limit: { count: number };
  };
}

type ErrorEmitter = { on(event: 'error', listener: (error: Error) => void): unknown };

function hasErrorEvents(stream: DestinationStream): stream is DestinationStream & ErrorEmitter {
  return 'on' in stream && typeof stream.on === 'function';
}

/**
 * pino-roll targets for a log file and its error-only companion
 */
export function rollTargets(file: string, level: Level, rotation: RotationSettings): RollTarget[] {
  const roll = (target: string, count: number): RollTarget['options'] => ({
    file: target,
    size: rotation.size,
    frequency: rotation.frequency,
    mkdir: true,
    limit: { count },
  });

  const targets: RollTarget[] = [{ level, options: roll(file, rotation.keep) }];
  if (rotation.errorFile !== null) {
    targets.push({ level: 'error', options: roll(rotation.errorFile, rotation.keepErrors) });
  }
  return targets;
}

/**
 * Open a pino destination for a configured target
 */
export function createDestination(target: string, options: DestinationOptions = {}): DestinationStream {
  const watch = <T extends DestinationStream>(stream: T): T => {
    if (options.onError && hasErrorEvents(stream)) {
      stream.on('error', options.onError);
    }
    return stream;
  };

  if (target === 'stdout' || target === 'stderr') {
    const fd = target === 'stdout' ? 1 : 2;
    if (options.pretty) {
      return watch(
        pino.transport({
          target: 'pino-pretty',
          options: {
            destination: fd,
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            messageKey: 'message',
            timestampKey: 'timestamp',
          },
        })
      );
    }
    return watch(pino.destination({ dest: fd, sync: true }));
  }

  if (options.rotation) {
    // One transport per file; level routing stays in this thread because the
    // wire level names are strings a worker-side multistream cannot compare
    return pino.multistream(
      rollTargets(target, options.level ?? 'info', options.rotation).map(({ level, options: roll }) => ({
        level,
        stream: watch(pino.transport({ target: 'pino-roll', options: roll })),
      }))
    );
  }
  return watch(pino.destination({ dest: target, mkdir: true, sync: false }));
}

/**
 * Fallback channel for faults in the primary sink.
 * Always stderr, never the sink that just failed.
 */
export function createFallbackLogger(): Logger {
  return pino(
    {
      level: 'warn',
      base: null,
      messageKey: 'message',
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: { level: (label) => ({ level: toLevelName(label) }) },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export const fallbackLogger = createFallbackLogger();

/**
 * Build a logger writing the wire schema:
 * {"level":"INFO","timestamp":"<ISO>",...fields,"message":"..."}
 */
export function createLogger(settings: LoggerSettings): Logger {
  const usePretty = settings.pretty === true;
  const reportSinkError = (error: Error) => {
    if (settings.onSinkError) {
      settings.onSinkError(error);
    } else {
      fallbackLogger.error({ err: error }, 'Log sink write failed');
    }
  };

  let stream: DestinationStream;
  if (typeof settings.destination === 'object') {
    stream = settings.destination;
    if (hasErrorEvents(stream)) {
      stream.on('error', reportSinkError);
    }
  } else {
    stream = createDestination(settings.destination ?? 'stdout', {
      level: settings.level,
      pretty: usePretty,
      rotation: settings.rotation,
      onError: reportSinkError,
    });
  }

  return pino(
    {
      level: settings.level,
      base: null,
      messageKey: 'message',
      // Copy so pino's merge never writes into the request's context store
      mixin: () => ({ ...contextStorage.getStore() }),
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      // pino-pretty expects numeric levels
      formatters: usePretty ? {} : { level: (label) => ({ level: toLevelName(label) }) },
    },
    stream
  );
}

export const logger = createLogger({
  level: config.logLevel,
  destination: config.logDestination,
  pretty: config.logPretty,
  rotation: config.logRotation ?? undefined,
});

/**
 * Run fn with fields attached to every log line written inside it
 */
export function withContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return contextStorage.run({ ...context }, fn);
}

/**
 * Add a field to the context of the currently running request, if any
 */
export function bindLogContext(key: string, value: unknown): void {
  const store = contextStorage.getStore();
  if (store) {
    store[key] = value;
  }
}

export type { Logger } from 'pino';
