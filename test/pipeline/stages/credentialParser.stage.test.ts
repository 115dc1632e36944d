import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { createRequestContext, type RequestContext } from '../../../src/pipeline/context.js';
import { RequestEventLog } from '../../../src/pipeline/logEvent.js';
import { CredentialParserStage } from '../../../src/pipeline/stages/credentialParser.stage.js';
import { json, type Next } from '../../../src/pipeline/types.js';
import { withContext, type Logger } from '../../../src/utils/logger.js';
import { CaptureSink, captureLogger, makeRequest, makeToken } from '../../utils/capture.js';

const NOW = Date.UTC(2024, 0, 1);

describe('CredentialParserStage', () => {
  let sink: CaptureSink;
  let logger: Logger;
  let stage: CredentialParserStage;
  let context: RequestContext;
  let next: Mock<Next>;

  beforeEach(() => {
    ({ sink, logger } = captureLogger());
    stage = new CredentialParserStage({
      events: new RequestEventLog(logger, captureLogger().logger),
      headerName: 'authorization',
      prefix: 'Bearer ',
      skipPaths: ['/health'],
      now: () => NOW,
    });
    context = createRequestContext('req-1');
    next = vi.fn<Next>(async () => json({ ok: true }));
  });

  it('should resolve the identity before calling next', async () => {
    const token = makeToken({ sub: 'user123', roles: ['admin'] });
    next.mockImplementation(async (_request, ctx) => json({ subject: ctx.identity.subject, state: ctx.state }));

    const response = await stage.handle(
      makeRequest({ headers: { authorization: `Bearer ${token}` } }),
      context,
      next
    );

    expect(response.body).toEqual({ subject: 'user123', state: 'IDENTITY_RESOLVED' });
    expect(sink.records).toEqual([
      {
        level: 'DEBUG',
        timestamp: expect.any(String),
        request_id: 'req-1',
        user_id: 'user123',
        roles: ['admin'],
        message: 'Bearer credential parsed',
      },
    ]);
  });

  it('should continue with an empty identity when the header is missing', async () => {
    await stage.handle(makeRequest(), context, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(context.identity.subject).toBeNull();
    expect(sink.lines).toHaveLength(0);
  });

  it('should warn once about a malformed token and continue', async () => {
    await stage.handle(makeRequest({ headers: { authorization: 'Bearer garbage' } }), context, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(context.identity.subject).toBeNull();
    expect(sink.records).toEqual([
      {
        level: 'WARNING',
        timestamp: expect.any(String),
        request_id: 'req-1',
        reason: 'MALFORMED_TOKEN',
        error: 'Failed to decode token: Invalid JWT',
        expired: false,
        message: 'Bearer credential could not be parsed',
      },
    ]);
  });

  it('should warn about a header with the wrong scheme', async () => {
    await stage.handle(makeRequest({ headers: { authorization: 'Basic dXNlcjpwYXNz' } }), context, next);

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({ level: 'WARNING', reason: 'INVALID_HEADER_FORMAT' });
  });

  it('should keep the claims of an expired token and log it at INFO', async () => {
    const token = makeToken({ sub: 'user123', exp: NOW / 1000 - 60 });

    await stage.handle(makeRequest({ headers: { authorization: `Bearer ${token}` } }), context, next);

    expect(context.identity.subject).toBe('user123');
    expect(sink.records).toEqual([
      {
        level: 'INFO',
        timestamp: expect.any(String),
        request_id: 'req-1',
        user_id: 'user123',
        expires_at: NOW / 1000 - 60,
        message: 'Bearer credential expired; claims decoded without enforcement',
      },
    ]);
  });

  it('should warn once about an expired token without subject', async () => {
    const token = makeToken({ exp: NOW / 1000 - 60 });

    await stage.handle(makeRequest({ headers: { authorization: `Bearer ${token}` } }), context, next);

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({ level: 'WARNING', reason: 'MISSING_SUBJECT', expired: true });
  });

  it('should not look at the header on skipped paths', async () => {
    const token = makeToken({ sub: 'user123' });

    await stage.handle(
      makeRequest({ path: '/health', headers: { authorization: `Bearer ${token}` } }),
      context,
      next
    );

    expect(context.identity.subject).toBeNull();
    expect(context.state).toBe('IDENTITY_RESOLVED');
    expect(sink.lines).toHaveLength(0);
  });

  it('should skip a path written with a trailing slash', async () => {
    const token = makeToken({ sub: 'user123' });

    await stage.handle(
      makeRequest({ path: '/health/', headers: { authorization: `Bearer ${token}` } }),
      context,
      next
    );

    expect(context.identity.subject).toBeNull();
    expect(sink.lines).toHaveLength(0);
  });

  it('should still parse paths below a skipped one', async () => {
    const token = makeToken({ sub: 'user123' });

    await stage.handle(
      makeRequest({ path: '/health/deep', headers: { authorization: `Bearer ${token}` } }),
      context,
      next
    );

    expect(context.identity.subject).toBe('user123');
  });

  it('should read a configured header and prefix', async () => {
    const custom = new CredentialParserStage({
      events: new RequestEventLog(logger, captureLogger().logger),
      headerName: 'X-Auth-Token',
      prefix: 'Token ',
      skipPaths: [],
    });
    const token = makeToken({ sub: 'service-a' });

    await custom.handle(makeRequest({ headers: { 'x-auth-token': `Token ${token}` } }), context, next);

    expect(context.identity.subject).toBe('service-a');
  });

  it('should attach the subject to log lines written downstream', async () => {
    const token = makeToken({ sub: 'user123' });
    next.mockImplementation(async () => {
      logger.info('inside handler');
      return json({});
    });

    await withContext({ request_id: 'req-1' }, () =>
      stage.handle(makeRequest({ headers: { authorization: `Bearer ${token}` } }), context, next)
    );

    const handlerLine = sink.records.find((record) => record.message === 'inside handler');
    expect(handlerLine).toMatchObject({ request_id: 'req-1', user_id: 'user123' });
  });
});
