import { randomUUID } from 'crypto';
import { emptyIdentity, type CallerIdentity } from './identity.js';

export type RequestState =
  | 'ENTERED'
  | 'IDENTITY_RESOLVED'
  | 'LOGGED_START'
  | 'HANDLER_RUNNING'
  | 'COMPLETED'
  | 'FAILED'
  | 'LOGGED_END'
  | 'RESPONDED';

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  ENTERED: ['IDENTITY_RESOLVED', 'FAILED'],
  // HANDLER_RUNNING directly when no logger stage is composed
  IDENTITY_RESOLVED: ['LOGGED_START', 'HANDLER_RUNNING', 'FAILED'],
  LOGGED_START: ['HANDLER_RUNNING', 'FAILED'],
  HANDLER_RUNNING: ['COMPLETED', 'FAILED'],
  COMPLETED: ['LOGGED_END'],
  FAILED: ['LOGGED_END'],
  LOGGED_END: ['RESPONDED'],
  RESPONDED: [],
};

/**
 * Per-request value bag. Created at pipeline entry, mutated in place by the
 * stages of that request only, dropped once the response is returned.
 */
export interface RequestContext {
  readonly correlationId: string;
  identity: CallerIdentity;
  startedAt: number | null;
  elapsedMs: number | null;
  state: RequestState;
  history: RequestState[];
  /** Merged into the terminal log event's extra */
  logContext: Record<string, unknown>;
  terminalLogged: boolean;
  aborted: boolean;
}

export class LifecycleError extends Error {
  constructor(
    public readonly from: RequestState,
    public readonly to: RequestState
  ) {
    super(`Illegal request state transition ${from} -> ${to}`);
    this.name = 'LifecycleError';
  }
}

const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function isValidCorrelationId(value: string | undefined): value is string {
  return value !== undefined && CORRELATION_ID_PATTERN.test(value);
}

export function createRequestContext(inboundCorrelationId?: string): RequestContext {
  return {
    correlationId: isValidCorrelationId(inboundCorrelationId) ? inboundCorrelationId : randomUUID(),
    identity: emptyIdentity(),
    startedAt: null,
    elapsedMs: null,
    state: 'ENTERED',
    history: ['ENTERED'],
    logContext: {},
    terminalLogged: false,
    aborted: false,
  };
}

type StateListener = () => void;

// Kept outside the context so the context itself stays plain data
const listeners = new WeakMap<RequestContext, Map<RequestState, StateListener[]>>();

/**
 * Run listener once, when the context next enters state
 */
export function onState(context: RequestContext, state: RequestState, listener: StateListener): void {
  let byState = listeners.get(context);
  if (!byState) {
    byState = new Map();
    listeners.set(context, byState);
  }
  byState.set(state, [...(byState.get(state) ?? []), listener]);
}

export function canAdvance(context: RequestContext, to: RequestState): boolean {
  return TRANSITIONS[context.state].includes(to);
}

export function advance(context: RequestContext, to: RequestState): void {
  if (!canAdvance(context, to)) {
    throw new LifecycleError(context.state, to);
  }
  context.state = to;
  context.history.push(to);

  const pending = listeners.get(context)?.get(to);
  if (pending) {
    listeners.get(context)?.delete(to);
    pending.forEach((listener) => listener());
  }
}

/**
 * Mark the response as handed back to the host. Valid from any state:
 * the error translator must be able to finish a request whatever went wrong.
 */
export function markResponded(context: RequestContext): void {
  if (context.state !== 'RESPONDED') {
    context.state = 'RESPONDED';
    context.history.push('RESPONDED');
  }
  listeners.delete(context);
}

/**
 * Attach fields to the terminal log event of this request
 */
export function addLogContext(context: RequestContext, fields: Record<string, unknown>): void {
  Object.assign(context.logContext, fields);
}
