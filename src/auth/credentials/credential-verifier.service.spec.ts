import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { CredentialVerifierService } from './credential-verifier.service';
import { JwtValidatorService } from '../jwt/jwt-validator.service';
import { ApiTokensService } from '../../api-tokens/api-tokens.service';
import { VerificationCacheService } from '../../api-tokens/verification-cache.service';
import { ApiTokenRepository } from '../../api-tokens/domain/repositories/api-token.repository.port';
import { ScopeRegistry } from '../scopes/scope-registry';
import { RequestAbortedError } from '../../permissions/domain/errors';
import { AllConfigType } from '../../config/config.type';
import {
  InMemoryApiTokenRepository,
  InMemoryDatabase,
} from '../../../test/utils/in-memory-persistence';

const SECRET = 'test-secret';

describe('CredentialVerifierService', () => {
  let verifier: CredentialVerifierService;
  let apiTokens: ApiTokensService;
  let db: InMemoryDatabase;
  const signer = new JwtService({ secret: SECRET });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CredentialVerifierService,
        JwtValidatorService,
        ApiTokensService,
        VerificationCacheService,
        ScopeRegistry,
        InMemoryDatabase,
        { provide: JwtService, useValue: new JwtService({}) },
        { provide: ApiTokenRepository, useClass: InMemoryApiTokenRepository },
        {
          provide: ConfigService,
          useValue: new ConfigService<AllConfigType>({
            auth: {
              jwtSecret: SECRET,
              jwtAllowedAlgorithms: ['HS256'],
              apiTokenHashRounds: 4,
              verificationCacheTtlSeconds: 0,
            },
          }),
        },
      ],
    }).compile();

    verifier = module.get<CredentialVerifierService>(CredentialVerifierService);
    apiTokens = module.get<ApiTokensService>(ApiTokensService);
    db = module.get<InMemoryDatabase>(InMemoryDatabase);
    db.addAgent(5, 'agent.smith');
    db.addAgent(1, 'root', true);
    db.addCustomer(31, 'alice', 'acme');
  });

  describe('API tokens', () => {
    it('should build an identity from the token and its owner', async () => {
      const { token, plaintext } = await apiTokens.generateToken({
        userId: 5,
        userType: 'agent',
        name: 'ci',
        scopes: ['tickets:read'],
        rateLimit: 60,
        createdBy: 5,
      });

      const result = await verifier.verify(plaintext);

      expect(result).toEqual({
        ok: true,
        identity: {
          kind: 'agent',
          principalId: 5,
          customerLogin: undefined,
          customerCompanyId: undefined,
          role: 'agent',
          isAdmin: false,
          scopes: ['tickets:read'],
          credentialPrefix: token.prefix,
          rateLimit: 60,
          source: 'api_token',
          tokenId: token.id,
        },
      });
    });

    it('should give tokens without scopes full access', async () => {
      const { plaintext } = await apiTokens.generateToken({
        userId: 31,
        userType: 'customer',
        name: 'portal',
        createdBy: 31,
      });

      const result = await verifier.verify(plaintext);

      expect(result.ok && result.identity).toMatchObject({
        kind: 'customer',
        role: 'customer',
        customerLogin: 'alice',
        customerCompanyId: 'acme',
        scopes: ['*'],
      });
    });

    it('should give admin agents the admin role', async () => {
      const { plaintext } = await apiTokens.generateToken({
        userId: 1,
        userType: 'agent',
        name: 'ops',
        createdBy: 1,
      });

      const result = await verifier.verify(plaintext);

      expect(result.ok && result.identity.role).toBe('admin');
    });

    it('should record the last use without waiting for it', async () => {
      const { token, plaintext } = await apiTokens.generateToken({
        userId: 5,
        userType: 'agent',
        name: 'ci',
        createdBy: 5,
      });

      await verifier.verify(plaintext, { sourceAddress: '203.0.113.7' });
      await new Promise((resolve) => setImmediate(resolve));

      expect(token.lastUsedIp).toBe('203.0.113.7');
      expect(token.lastUsedAt).toBeInstanceOf(Date);
    });

    it('should still admit when recording the last use fails', async () => {
      const { plaintext } = await apiTokens.generateToken({
        userId: 5,
        userType: 'agent',
        name: 'ci',
        createdBy: 5,
      });
      db.failing.add('updateLastUsed');

      const result = await verifier.verify(plaintext, {
        sourceAddress: '203.0.113.7',
      });
      await new Promise((resolve) => setImmediate(resolve));

      expect(result.ok).toBe(true);
    });

    it('should map token states onto failures', async () => {
      const { token, plaintext } = await apiTokens.generateToken({
        userId: 5,
        userType: 'agent',
        name: 'ci',
        createdBy: 5,
      });

      await expect(verifier.verify('gf_abc')).resolves.toEqual({
        ok: false,
        failure: 'malformed',
      });
      await expect(
        verifier.verify(`gf_${token.prefix}_wrong`),
      ).resolves.toEqual({ ok: false, failure: 'unknown' });

      token.revokedAt = new Date();
      await expect(verifier.verify(plaintext)).resolves.toEqual({
        ok: false,
        failure: 'revoked',
      });
    });

    it('should report an unreachable store as unavailable', async () => {
      db.failing.add('findByPrefix');

      await expect(verifier.verify('gf_a1b2c3d4_secret')).resolves.toEqual({
        ok: false,
        failure: 'backend_unavailable',
      });
    });
  });

  describe('JWTs', () => {
    it('should build an identity keyed by principal id', async () => {
      const jwt = await signer.signAsync({ sub: 5 });

      const result = await verifier.verify(jwt);

      expect(result).toEqual({
        ok: true,
        identity: {
          kind: 'agent',
          principalId: 5,
          customerLogin: undefined,
          customerCompanyId: undefined,
          role: 'agent',
          isAdmin: false,
          scopes: ['*'],
          credentialPrefix: 'jwt:5',
          source: 'jwt',
        },
      });
    });

    it('should map expired and forged tokens', async () => {
      const expired = await signer.signAsync({
        sub: 5,
        exp: Math.floor(Date.now() / 1000) - 10,
      });
      const forged = await new JwtService({ secret: 'other-secret' }).signAsync(
        { sub: 5 },
      );

      await expect(verifier.verify(expired)).resolves.toEqual({
        ok: false,
        failure: 'expired',
      });
      await expect(verifier.verify(forged)).resolves.toEqual({
        ok: false,
        failure: 'invalid_signature',
      });
    });
  });

  it('should stop on an aborted request', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      verifier.verify('gf_a1b2c3d4_secret', { signal: controller.signal }),
    ).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it('should report a missing token store as unavailable', async () => {
    const standalone = new CredentialVerifierService(
      new JwtValidatorService(
        new JwtService({}),
        new ConfigService<AllConfigType>({ auth: {} }),
      ),
    );

    await expect(standalone.verify('gf_a1b2c3d4_secret')).resolves.toEqual({
      ok: false,
      failure: 'backend_unavailable',
    });
    await expect(standalone.verify('a.b.c')).resolves.toEqual({
      ok: false,
      failure: 'backend_unavailable',
    });
  });
});
