import { performance } from 'perf_hooks';
import type { Logger } from '../utils/logger.js';
import { levelMethod, type LogLevelName } from '../utils/logLevels.js';
import type { RequestContext } from './context.js';
import type { ClassifiedError } from './errorRecord.js';
import { headerValue, type PipelineRequest } from './types.js';

/**
 * One terminal line per request, in this shape
 */
export interface LogEvent {
  readonly timestamp: string;
  readonly level: LogLevelName;
  readonly message: string;
  readonly request_id: string;
  readonly user_id: string | null;
  readonly method: string;
  readonly path: string;
  readonly status_code: number;
  readonly duration_ms: number;
  readonly extra: Readonly<Record<string, unknown>>;
}

export type Outcome =
  | { type: 'completed'; statusCode: number }
  | { type: 'failed'; error: ClassifiedError; cause: unknown }
  | { type: 'aborted' };

// Client closed the connection before a response was produced
export const ABORTED_STATUS = 499;

function terminalLevel(outcome: Outcome): LogLevelName {
  switch (outcome.type) {
    case 'completed':
      if (outcome.statusCode >= 500) return 'ERROR';
      if (outcome.statusCode >= 400) return 'WARNING';
      return 'INFO';
    case 'failed':
      return 'ERROR';
    case 'aborted':
      return 'WARNING';
  }
}

function terminalStatus(outcome: Outcome): number {
  switch (outcome.type) {
    case 'completed':
      return outcome.statusCode;
    case 'failed':
      return outcome.error.statusCode;
    case 'aborted':
      return ABORTED_STATUS;
  }
}

function terminalMessage(outcome: Outcome, request: PipelineRequest): string {
  const verb = { completed: 'completed', failed: 'failed', aborted: 'aborted' }[outcome.type];
  return `Request ${verb}: ${request.method} ${request.path}`;
}

function roundMs(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Writes the events of a request to the injected logger. Sink faults are
 * reported to the fallback logger and never reach the caller.
 */
export class RequestEventLog {
  constructor(
    private readonly logger: Logger,
    private readonly fallback: Logger
  ) {}

  event(
    level: LogLevelName,
    context: RequestContext,
    message: string,
    fields: Record<string, unknown> = {}
  ): void {
    this.safeWrite(level, { request_id: context.correlationId, ...fields }, message);
  }

  /**
   * Build and write the terminal event. Returns null when the request
   * already has one.
   */
  terminal(request: PipelineRequest, context: RequestContext, outcome: Outcome): LogEvent | null {
    if (context.terminalLogged) {
      return null;
    }
    // Set before writing: a failing sink must not lead to a second attempt
    context.terminalLogged = true;

    if (context.startedAt !== null && context.elapsedMs === null) {
      context.elapsedMs = performance.now() - context.startedAt;
    }

    const extra: Record<string, unknown> = {
      client_ip: request.clientIp ?? null,
      user_agent: headerValue(request, 'user-agent') ?? null,
      ...context.logContext,
    };
    if (outcome.type === 'failed') {
      // Internal detail stays in the log; the caller only sees the error record
      extra.error_kind = outcome.error.kind;
      extra.error_type = outcome.cause instanceof Error ? outcome.cause.name : typeof outcome.cause;
      if (outcome.cause instanceof Error) {
        extra.error_message = outcome.cause.message;
      } else if (typeof outcome.cause === 'string') {
        extra.error_message = outcome.cause;
      }
    }
    if (outcome.type === 'aborted') {
      extra.aborted = true;
    }

    const event: LogEvent = Object.freeze({
      timestamp: new Date().toISOString(),
      level: terminalLevel(outcome),
      message: terminalMessage(outcome, request),
      request_id: context.correlationId,
      user_id: context.identity.subject,
      method: request.method,
      path: request.path,
      status_code: terminalStatus(outcome),
      duration_ms: roundMs(context.elapsedMs ?? 0),
      extra: Object.freeze(extra),
    });

    const { timestamp: _timestamp, level, message, ...fields } = event;
    this.safeWrite(level, fields, message);
    return event;
  }

  private safeWrite(level: LogLevelName, fields: Record<string, unknown>, message: string): void {
    try {
      this.logger[levelMethod(level)](fields, message);
    } catch (error) {
      this.fallback.error({ err: error, dropped: { level, message, ...fields } }, 'Log sink write failed');
    }
  }
}
