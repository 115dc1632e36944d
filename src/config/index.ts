import dotenv from 'dotenv';
import path from 'path';
import type { Level } from 'pino';
import { toPinoLevel } from '../utils/logLevels.js';
import type { RotationSettings } from '../utils/logger.js';

// Load environment variables
dotenv.config();

/**
 * Application configuration parsed and validated at startup
 */
export interface Config {
  // Server
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  serviceName: string;
  corsOrigin: string;

  // Logging
  logLevel: Level;
  logDestination: string;
  logPretty: boolean;
  /** Set for file destinations unless LOG_ROTATE=false */
  logRotation: RotationSettings | null;

  // Credential parsing
  credentialHeaderName: string;
  credentialPrefix: string;
  credentialSkipPaths: string[];

  // Correlation
  correlationHeaderName: string;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;

function isNodeEnv(value: string): value is Config['nodeEnv'] {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Error file beside a log file: logs/app.log -> logs/app.error.log
 */
export function errorLogPath(file: string): string {
  const extension = path.extname(file);
  return extension ? `${file.slice(0, -extension.length)}.error${extension}` : `${file}.error`;
}

/**
 * Parse and validate environment variables
 * Throws an error listing every invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const errors: string[] = [];

  const getOptional = (key: string, fallback: string): string => {
    const value = env[key];
    return value === undefined || value.trim() === '' ? fallback : value;
  };

  const getNumber = (key: string, fallback: number): number => {
    const value = env[key];
    if (!value || value.trim() === '') {
      return fallback;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      errors.push(`Invalid number for ${key}: ${value}`);
      return fallback;
    }
    return parsed;
  };

  const nodeEnv = getOptional('NODE_ENV', 'development');
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test`);
  }

  const rawLevel = getOptional('LOG_LEVEL', 'INFO');
  const logLevel = toPinoLevel(rawLevel);
  if (!logLevel) {
    errors.push(
      `Invalid LOG_LEVEL: ${rawLevel}. Must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL`
    );
  }

  const credentialHeaderName = getOptional('CREDENTIAL_HEADER_NAME', 'authorization')
    .trim()
    .toLowerCase();
  if (!/^[a-z0-9-]+$/.test(credentialHeaderName)) {
    errors.push(`Invalid CREDENTIAL_HEADER_NAME: ${credentialHeaderName}`);
  }

  const correlationHeaderName = getOptional('CORRELATION_HEADER_NAME', 'x-request-id')
    .trim()
    .toLowerCase();
  if (!/^[a-z0-9-]+$/.test(correlationHeaderName)) {
    errors.push(`Invalid CORRELATION_HEADER_NAME: ${correlationHeaderName}`);
  }

  const logDestination = getOptional('LOG_DESTINATION', 'stdout');

  const rotateSize = getOptional('LOG_ROTATE_SIZE', '10m').trim().toLowerCase();
  if (!/^\d+[kmg]?$/.test(rotateSize)) {
    errors.push(`Invalid LOG_ROTATE_SIZE: ${rotateSize}. Use a byte count or a k, m or g suffix`);
  }

  const rawFrequency = getOptional('LOG_ROTATE_FREQUENCY', 'daily').trim().toLowerCase();
  let rotateFrequency: string | number = rawFrequency;
  if (/^\d+$/.test(rawFrequency)) {
    rotateFrequency = parseInt(rawFrequency, 10);
  } else if (rawFrequency !== 'daily' && rawFrequency !== 'hourly') {
    errors.push(`Invalid LOG_ROTATE_FREQUENCY: ${rawFrequency}. Must be daily, hourly or milliseconds`);
  }

  const errorDestination = getOptional('LOG_ERROR_DESTINATION', errorLogPath(logDestination));
  const isFile = logDestination !== 'stdout' && logDestination !== 'stderr';

  const config: Config = {
    port: getNumber('PORT', 3000),
    nodeEnv: isNodeEnv(nodeEnv) ? nodeEnv : 'development',
    serviceName: getOptional('SERVICE_NAME', 'request-pipeline'),
    corsOrigin: getOptional('CORS_ORIGIN', '*'),
    logLevel: logLevel ?? 'info',
    logDestination,
    logPretty: env.LOG_PRETTY === 'true',
    logRotation:
      isFile && env.LOG_ROTATE !== 'false'
        ? {
            size: rotateSize,
            frequency: rotateFrequency,
            keep: getNumber('LOG_RETENTION_COUNT', 30),
            keepErrors: getNumber('LOG_ERROR_RETENTION_COUNT', 90),
            errorFile: errorDestination === 'none' ? null : errorDestination,
          }
        : null,
    credentialHeaderName,
    // The prefix keeps its trailing space, so it is not trimmed
    credentialPrefix: env.CREDENTIAL_PREFIX ?? 'Bearer ',
    credentialSkipPaths: getOptional('CREDENTIAL_SKIP_PATHS', '/health')
      .split(',')
      .map((path) => path.trim())
      .filter((path) => path.length > 0),
    correlationHeaderName,
  };

  if (config.credentialPrefix.trim() === '' && config.credentialPrefix !== '') {
    errors.push('CREDENTIAL_PREFIX must not be whitespace only');
  }

  // Throw if any errors
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return config;
}

/**
 * Singleton config instance
 * Parsed and validated at module load time
 */
export const config: Config = parseConfig();
