import { bindLogContext } from '../../utils/logger.js';
import { advance, type RequestContext } from '../context.js';
import { decodeBearer } from '../credentials.js';
import { emptyIdentity, type CallerIdentity } from '../identity.js';
import type { RequestEventLog } from '../logEvent.js';
import { headerValue, type Next, type PipelineRequest, type PipelineResponse, type Stage } from '../types.js';

export interface CredentialParserOptions {
  events: RequestEventLog;
  headerName: string;
  prefix: string;
  /** Paths that keep the empty identity without looking at the header */
  skipPaths: readonly string[];
  now?: () => number;
}

function withoutTrailingSlash(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

/**
 * Innermost stage. Resolves the caller identity from the bearer credential
 * and always continues: a bad credential only costs the request its identity.
 */
export class CredentialParserStage implements Stage {
  readonly name = 'credential-parser';

  private readonly skipPaths: ReadonlySet<string>;

  constructor(private readonly options: CredentialParserOptions) {
    this.skipPaths = new Set(options.skipPaths.map(withoutTrailingSlash));
  }

  async handle(request: PipelineRequest, context: RequestContext, next: Next): Promise<PipelineResponse> {
    context.identity = this.resolve(request, context);
    if (context.identity.subject !== null) {
      bindLogContext('user_id', context.identity.subject);
    }
    advance(context, 'IDENTITY_RESOLVED');
    return next(request, context);
  }

  private resolve(request: PipelineRequest, context: RequestContext): CallerIdentity {
    if (this.skipPaths.has(withoutTrailingSlash(request.path))) {
      return emptyIdentity();
    }

    const result = decodeBearer(headerValue(request, this.options.headerName), {
      prefix: this.options.prefix,
      now: this.options.now?.(),
    });
    const { events } = this.options;

    if (!result.ok) {
      if (result.reason !== 'MISSING_HEADER') {
        events.event('WARNING', context, 'Bearer credential could not be parsed', {
          reason: result.reason,
          error: result.error,
          expired: result.expired,
        });
      }
      return emptyIdentity();
    }

    const { identity } = result;
    if (result.expired) {
      events.event('INFO', context, 'Bearer credential expired; claims decoded without enforcement', {
        user_id: identity.subject,
        expires_at: identity.expiresAt,
      });
    } else {
      events.event('DEBUG', context, 'Bearer credential parsed', {
        user_id: identity.subject,
        roles: [...identity.roles],
      });
    }
    return identity;
  }
}
