import { describe, it, expect, vi } from 'vitest';
import {
  LifecycleError,
  addLogContext,
  advance,
  canAdvance,
  createRequestContext,
  isValidCorrelationId,
  markResponded,
  onState,
} from '../../src/pipeline/context.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('createRequestContext', () => {
  it('should start in ENTERED with an empty identity', () => {
    const context = createRequestContext();

    expect(context.correlationId).toMatch(UUID_PATTERN);
    expect(context.state).toBe('ENTERED');
    expect(context.history).toEqual(['ENTERED']);
    expect(context.identity.subject).toBeNull();
    expect(context.identity.roles.size).toBe(0);
    expect(context.startedAt).toBeNull();
    expect(context.elapsedMs).toBeNull();
    expect(context.terminalLogged).toBe(false);
    expect(context.aborted).toBe(false);
  });

  it('should keep a well-formed inbound correlation id', () => {
    expect(createRequestContext('trace-abc.123:7').correlationId).toBe('trace-abc.123:7');
  });

  it('should replace a malformed inbound correlation id', () => {
    expect(createRequestContext('bad id').correlationId).toMatch(UUID_PATTERN);
    expect(createRequestContext('a'.repeat(129)).correlationId).toMatch(UUID_PATTERN);
    expect(createRequestContext('').correlationId).toMatch(UUID_PATTERN);
  });

  it('should give every request its own id', () => {
    const ids = new Set(Array.from({ length: 50 }, () => createRequestContext().correlationId));
    expect(ids.size).toBe(50);
  });
});

describe('isValidCorrelationId', () => {
  it('should accept up to 128 safe characters', () => {
    expect(isValidCorrelationId('a'.repeat(128))).toBe(true);
    expect(isValidCorrelationId('req_1')).toBe(true);
  });

  it('should reject header injection attempts', () => {
    expect(isValidCorrelationId('abc\r\nSet-Cookie: x=1')).toBe(false);
    expect(isValidCorrelationId(undefined)).toBe(false);
  });
});

describe('request lifecycle', () => {
  it('should follow the success path', () => {
    const context = createRequestContext();

    advance(context, 'IDENTITY_RESOLVED');
    advance(context, 'LOGGED_START');
    advance(context, 'HANDLER_RUNNING');
    advance(context, 'COMPLETED');
    advance(context, 'LOGGED_END');
    advance(context, 'RESPONDED');

    expect(context.history).toEqual([
      'ENTERED',
      'IDENTITY_RESOLVED',
      'LOGGED_START',
      'HANDLER_RUNNING',
      'COMPLETED',
      'LOGGED_END',
      'RESPONDED',
    ]);
  });

  it('should allow the handler to run without a start event', () => {
    const context = createRequestContext();
    advance(context, 'IDENTITY_RESOLVED');

    expect(canAdvance(context, 'HANDLER_RUNNING')).toBe(true);
  });

  it('should reject an illegal transition and keep the state', () => {
    const context = createRequestContext();

    expect(() => advance(context, 'COMPLETED')).toThrow(LifecycleError);
    expect(() => advance(context, 'COMPLETED')).toThrow('Illegal request state transition ENTERED -> COMPLETED');
    expect(context.state).toBe('ENTERED');
    expect(context.history).toEqual(['ENTERED']);
  });

  it('should not leave FAILED except to LOGGED_END', () => {
    const context = createRequestContext();
    advance(context, 'FAILED');

    expect(canAdvance(context, 'FAILED')).toBe(false);
    expect(canAdvance(context, 'COMPLETED')).toBe(false);
    expect(canAdvance(context, 'LOGGED_END')).toBe(true);
  });

  it('should mark a request responded from any state once', () => {
    const context = createRequestContext();
    advance(context, 'IDENTITY_RESOLVED');

    markResponded(context);
    markResponded(context);

    expect(context.state).toBe('RESPONDED');
    expect(context.history).toEqual(['ENTERED', 'IDENTITY_RESOLVED', 'RESPONDED']);
  });
});

describe('onState', () => {
  it('should run a listener once when the state is entered', () => {
    const context = createRequestContext();
    const listener = vi.fn();
    onState(context, 'IDENTITY_RESOLVED', listener);

    advance(context, 'IDENTITY_RESOLVED');

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should see the new state from inside the listener', () => {
    const context = createRequestContext();
    onState(context, 'IDENTITY_RESOLVED', () => advance(context, 'LOGGED_START'));

    advance(context, 'IDENTITY_RESOLVED');

    expect(context.state).toBe('LOGGED_START');
  });

  it('should drop pending listeners once responded', () => {
    const context = createRequestContext();
    const listener = vi.fn();
    onState(context, 'FAILED', listener);

    markResponded(context);

    expect(listener).not.toHaveBeenCalled();
  });
});

describe('addLogContext', () => {
  it('should merge fields into the log context', () => {
    const context = createRequestContext();

    addLogContext(context, { tenant: 'acme' });
    addLogContext(context, { order_id: 'o-1', tenant: 'globex' });

    expect(context.logContext).toEqual({ tenant: 'globex', order_id: 'o-1' });
  });
});
