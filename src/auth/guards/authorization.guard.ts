import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { AllConfigType } from '../../config/config.type';
import { AuthenticatedRequest } from '../types/authenticated-request.type';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { REQUIRED_SCOPE_KEY } from '../decorators/require-scope.decorator';
import {
  RESOURCE_SCOPE_KEY,
  ResourceScopeMetadata,
} from '../decorators/resource-scoped.decorator';
import { extractCredential } from '../credentials/credential-extractor.util';
import { CredentialVerifierService } from '../credentials/credential-verifier.service';
import { CREDENTIAL_FAILURE_CODES } from '../credentials/credential-failure';
import { ScopeEvaluatorService } from '../scopes/scope-evaluator.service';
import { Identity } from '../identity/identity';
import { RateLimiter } from '../../rate-limit/rate-limiter';
import { ResourceAccessService } from '../../permissions/resource-access.service';
import {
  AccessDecision,
  ResourceTarget,
} from '../../permissions/domain/resource-target';
import {
  PermissionLookupError,
  RequestAbortedError,
} from '../../permissions/domain/errors';
import {
  AuditService,
  AuthorizationEventData,
  AuthorizationEventType,
} from '../../audit/audit.service';
import { ApiException } from '../../api-errors/api.exception';
import { ApiErrorCode } from '../../api-errors/api-error-codes';
import { parseId } from '../../utils/pipes/parse-id.pipe';

/**
 * Authorization Gateway
 *
 * Global guard deciding every HTTP request:
 *
 *   unauthenticated -> identified -> rate admitted -> scope checked
 *   -> resource checked -> admitted
 *
 * Any step can reject. `@Public()` routes are only rate limited, by client
 * address. The identity is attached to the request for `@CurrentIdentity()`.
 *
 * The request's abort signal flows into verification and permission
 * lookups; a cancelled check never admits.
 */
@Injectable()
export class AuthorizationGuard implements CanActivate {
  private readonly logger = new Logger(AuthorizationGuard.name);
  private readonly defaultLimit: number;

  constructor(
    private readonly reflector: Reflector,
    private readonly verifier: CredentialVerifierService,
    private readonly rateLimiter: RateLimiter,
    private readonly scopeEvaluator: ScopeEvaluatorService,
    private readonly resourceAccess: ResourceAccessService,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.defaultLimit = configService.getOrThrow('rateLimit.defaultLimit', {
      infer: true,
    });
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') {
      return true;
    }

    const http = context.switchToHttp();
    const request = http.getRequest<AuthenticatedRequest>();
    const response = http.getResponse<Response>();
    const sourceAddress = clientAddress(request);
    const targets = [context.getHandler(), context.getClass()];

    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(
      IS_PUBLIC_KEY,
      targets,
    );
    if (isPublic) {
      this.admitRate(request, response, `ip:${sourceAddress}`, this.defaultLimit);
      return true;
    }

    const signal = abortSignalFor(response);

    try {
      const identity = await this.identify(request, sourceAddress, signal);
      request.identity = identity;

      this.admitRate(
        request,
        response,
        `token:${identity.credentialPrefix}`,
        identity.rateLimit && identity.rateLimit > 0
          ? identity.rateLimit
          : this.defaultLimit,
        identity,
      );

      this.checkScope(
        request,
        identity,
        this.reflector.getAllAndOverride<string | undefined>(
          REQUIRED_SCOPE_KEY,
          targets,
        ),
      );

      const resource = this.reflector.getAllAndOverride<
        ResourceScopeMetadata | undefined
      >(RESOURCE_SCOPE_KEY, targets);
      if (resource) {
        await this.checkResource(request, identity, resource, signal);
      }

      return true;
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        this.audit(request, AuthorizationEventType.REQUEST_ABORTED, {
          identity: request.identity,
        });
        throw new ApiException(
          ApiErrorCode.ServiceUnavailable,
          'Request was cancelled',
        );
      }
      throw error;
    }
  }

  private async identify(
    request: AuthenticatedRequest,
    sourceAddress: string,
    signal: AbortSignal,
  ): Promise<Identity> {
    const raw = extractCredential({
      authorization: request.headers.authorization,
      cookies: cookiesOf(request),
    });
    if (!raw) {
      this.audit(request, AuthorizationEventType.CREDENTIAL_MISSING);
      throw new ApiException(ApiErrorCode.Unauthorized);
    }

    const result = await this.verifier.verify(raw, { sourceAddress, signal });
    if (!result.ok) {
      this.audit(
        request,
        result.failure === 'backend_unavailable'
          ? AuthorizationEventType.VERIFIER_UNAVAILABLE
          : AuthorizationEventType.CREDENTIAL_REJECTED,
        { reason: result.failure },
      );
      throw new ApiException(CREDENTIAL_FAILURE_CODES[result.failure]);
    }

    return result.identity;
  }

  private admitRate(
    request: AuthenticatedRequest,
    response: Response,
    key: string,
    ceiling: number,
    identity?: Identity,
  ): void {
    const allowed = this.rateLimiter.allow(key, ceiling);

    response.setHeader('X-RateLimit-Limit', String(ceiling));
    response.setHeader(
      'X-RateLimit-Remaining',
      String(this.rateLimiter.remaining(key)),
    );

    if (!allowed) {
      response.setHeader(
        'Retry-After',
        String(this.rateLimiter.retryAfterSeconds(key)),
      );
      this.audit(request, AuthorizationEventType.RATE_LIMITED, { identity });
      throw new ApiException(ApiErrorCode.RateLimited);
    }
  }

  private checkScope(
    request: AuthenticatedRequest,
    identity: Identity,
    required: string | undefined,
  ): void {
    const decision = this.scopeEvaluator.evaluate(identity, required);
    if (decision === 'allowed' || !required) {
      return;
    }

    const message = this.scopeEvaluator.denialMessage(
      identity,
      required,
      decision,
    );
    this.audit(
      request,
      decision === 'missing_scope'
        ? AuthorizationEventType.SCOPE_DENIED
        : AuthorizationEventType.ROLE_RESTRICTED,
      { identity, reason: message },
    );
    throw new ApiException(ApiErrorCode.Forbidden, message);
  }

  private async checkResource(
    request: AuthenticatedRequest,
    identity: Identity,
    resource: ResourceScopeMetadata,
    signal: AbortSignal,
  ): Promise<void> {
    const target = resolveTarget(request, resource);

    let decision: AccessDecision;
    try {
      decision = await this.resourceAccess.check(identity, target, signal);
    } catch (error) {
      if (error instanceof PermissionLookupError) {
        this.logger.error(
          `Permission lookup failed for ${resource.kind}:${resource.action}: ${error.message}`,
        );
        this.audit(request, AuthorizationEventType.PERMISSION_LOOKUP_FAILED, {
          identity,
          reason: error.operation,
        });
        throw new ApiException(ApiErrorCode.ServiceUnavailable);
      }
      throw error;
    }

    if (decision === 'hide') {
      this.audit(request, AuthorizationEventType.RESOURCE_HIDDEN, {
        identity,
        reason: `${resource.kind}:${resource.action}`,
      });
      throw new ApiException(ApiErrorCode.NotFound);
    }
    if (decision === 'forbid') {
      this.audit(request, AuthorizationEventType.RESOURCE_FORBIDDEN, {
        identity,
        reason: `${resource.kind}:${resource.action}`,
      });
      throw new ApiException(ApiErrorCode.Forbidden);
    }
  }

  private audit(
    request: AuthenticatedRequest,
    event: AuthorizationEventType,
    details: { identity?: Identity; reason?: string } = {},
  ): void {
    const data: AuthorizationEventData = {
      event,
      principalId: details.identity?.principalId,
      principalKind: details.identity?.kind,
      credentialPrefix: details.identity?.credentialPrefix,
      method: request.method,
      path: request.originalUrl,
      ipAddress: clientAddress(request),
      reason: details.reason,
    };
    this.auditService.logAuthorizationEvent(data);
  }
}

/**
 * Ids for the permission check. Guards run before pipes, so ids are
 * validated here.
 */
function resolveTarget(
  request: AuthenticatedRequest,
  resource: ResourceScopeMetadata,
): ResourceTarget {
  if (resource.kind === 'queue' && resource.action === 'create') {
    return {
      kind: 'queue',
      action: 'create',
      queueId: requireId(bodyField(request, resource.queueBodyField)),
    };
  }

  const ticketId = requireId(request.params[resource.ticketParam]);
  if (resource.kind === 'queue') {
    return {
      kind: 'queue',
      action: 'move_into',
      ticketId,
      queueId: requireId(bodyField(request, resource.queueBodyField)),
    };
  }
  return { kind: 'ticket', action: resource.action, ticketId };
}

function requireId(value: unknown): number {
  const id = parseId(value);
  if (id === null) {
    throw new ApiException(ApiErrorCode.InvalidId);
  }
  return id;
}

function bodyField(request: AuthenticatedRequest, field: string): unknown {
  const body: unknown = request.body;
  if (typeof body !== 'object' || body === null || !(field in body)) {
    return undefined;
  }
  return Reflect.get(body, field);
}

function cookiesOf(
  request: AuthenticatedRequest,
): Record<string, unknown> | undefined {
  const cookies: unknown = request.cookies;
  if (typeof cookies !== 'object' || cookies === null) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(cookies));
}

function clientAddress(request: AuthenticatedRequest): string {
  return request.ip ?? request.socket.remoteAddress ?? 'unknown';
}

/**
 * Aborted when the connection closes before the response was written.
 */
function abortSignalFor(response: Response): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
