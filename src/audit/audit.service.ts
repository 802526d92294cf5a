import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export enum AuthorizationEventType {
  CREDENTIAL_MISSING = 'CREDENTIAL_MISSING',
  CREDENTIAL_REJECTED = 'CREDENTIAL_REJECTED',
  VERIFIER_UNAVAILABLE = 'VERIFIER_UNAVAILABLE',
  RATE_LIMITED = 'RATE_LIMITED',
  SCOPE_DENIED = 'SCOPE_DENIED',
  ROLE_RESTRICTED = 'ROLE_RESTRICTED',
  RESOURCE_HIDDEN = 'RESOURCE_HIDDEN',
  RESOURCE_FORBIDDEN = 'RESOURCE_FORBIDDEN',
  PERMISSION_LOOKUP_FAILED = 'PERMISSION_LOOKUP_FAILED',
  REQUEST_ABORTED = 'REQUEST_ABORTED',
}

export interface AuthorizationEventData {
  event: AuthorizationEventType;
  /** Principal id when the identity was resolved */
  principalId?: number;
  principalKind?: 'agent' | 'customer';
  /** Short credential prefix, never the credential itself */
  credentialPrefix?: string;
  method?: string;
  path?: string;
  ipAddress?: string;
  reason?: string;
  metadata?: Record<string, string | number | boolean>;
}

/**
 * Structured audit log of authorization decisions.
 *
 * Entries are single-line JSON on stdout so a log shipper can index them.
 * Raw credentials never reach this service; only the credential prefix.
 */
@Injectable()
export class AuditService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  logAuthorizationEvent(data: AuthorizationEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'authorization',
      event: data.event,
      principalId: data.principalId,
      principalKind: data.principalKind,
      credentialPrefix: data.credentialPrefix,
      method: data.method,
      path: data.path ? this.sanitizePath(data.path) : undefined,
      ipAddress: data.ipAddress,
      reason: data.reason ? this.sanitizeReason(data.reason) : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    console.info(JSON.stringify(logEntry));
  }

  /**
   * Query strings may carry tokens; keep only the path.
   */
  private sanitizePath(path: string): string {
    return path.split('?')[0].substring(0, 200);
  }

  private sanitizeReason(reason: string): string {
    return reason
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .replace(/gf_[A-Za-z0-9_]+/g, 'gf_[REDACTED]')
      .substring(0, 500);
  }
}
