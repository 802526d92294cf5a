import { ConfigService } from '@nestjs/config';
import { AuditService, AuthorizationEventType } from './audit.service';
import { AllConfigType } from '../config/config.type';

describe('AuditService', () => {
  let service: AuditService;
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    const configService = new ConfigService<AllConfigType>({
      app: { name: 'helpdesk-test', nodeEnv: 'test' },
    });
    service = new AuditService(configService);
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('should write one JSON line per event', () => {
    service.logAuthorizationEvent({
      event: AuthorizationEventType.SCOPE_DENIED,
      principalId: 7,
      principalKind: 'agent',
      credentialPrefix: 'a1b2c3d4',
      method: 'PATCH',
      path: '/api/v1/tickets/12',
      reason: 'missing_scope',
    });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(infoSpy.mock.calls[0][0]);
    expect(entry).toMatchObject({
      service: 'helpdesk-test',
      component: 'authorization',
      event: 'SCOPE_DENIED',
      principalId: 7,
      principalKind: 'agent',
      credentialPrefix: 'a1b2c3d4',
      method: 'PATCH',
      path: '/api/v1/tickets/12',
      reason: 'missing_scope',
      environment: 'test',
    });
  });

  it('should strip query strings from paths', () => {
    service.logAuthorizationEvent({
      event: AuthorizationEventType.CREDENTIAL_REJECTED,
      path: '/api/v1/tickets?access_token=secret',
    });

    const entry = JSON.parse(infoSpy.mock.calls[0][0]);
    expect(entry.path).toBe('/api/v1/tickets');
  });

  it('should redact credentials from reasons', () => {
    service.logAuthorizationEvent({
      event: AuthorizationEventType.CREDENTIAL_REJECTED,
      reason: 'rejected gf_deadbeef_0123 and Bearer abc.def.ghi',
    });

    const entry = JSON.parse(infoSpy.mock.calls[0][0]);
    expect(entry.reason).toBe(
      'rejected gf_[REDACTED] and Bearer [TOKEN_REDACTED]',
    );
  });
});
