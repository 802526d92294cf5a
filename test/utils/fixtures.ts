import { JwtService } from '@nestjs/jwt';
import { INestApplication } from '@nestjs/common';
import { InMemoryDatabase } from './in-memory-persistence';
import { TEST_JWT_SECRET } from './test-app';
import { ApiTokensService } from '../../src/api-tokens/api-tokens.service';

/**
 * Helpdesk seen by the end-to-end tests:
 *
 *   group 10 "support" -> queue 1 "Support"
 *   group 20 "billing" -> queue 2 "Billing"
 *   group 30 "admin"
 *
 *   agent 1 alice: rw on support
 *   agent 2 bob:   ro on support
 *   agent 3 root:  admin
 *   customer 50 xavier (company acme), customer 51 yolanda (company globex)
 *
 *   ticket 100: support, acme
 *   ticket 101: billing, acme
 *   ticket 102: billing, globex
 */
export const SUPPORT_GROUP = 10;
export const BILLING_GROUP = 20;
export const SUPPORT_QUEUE = 1;
export const BILLING_QUEUE = 2;

export const ALICE = 1;
export const BOB = 2;
export const ROOT = 3;
export const XAVIER = 50;
export const YOLANDA = 51;

export function seedHelpdesk(db: InMemoryDatabase): void {
  db.addQueue(SUPPORT_QUEUE, 'Support', SUPPORT_GROUP);
  db.addQueue(BILLING_QUEUE, 'Billing', BILLING_GROUP);

  db.addAgent(ALICE, 'alice');
  db.addAgent(BOB, 'bob');
  db.addAgent(ROOT, 'root', true);
  db.grantAgent(ALICE, SUPPORT_GROUP, 'rw');
  db.grantAgent(BOB, SUPPORT_GROUP, 'ro');

  db.addCustomer(XAVIER, 'xavier', 'acme');
  db.addCustomer(YOLANDA, 'yolanda', 'globex');

  db.addTicket({ id: 100, queueId: SUPPORT_QUEUE, customerCompanyId: 'acme' });
  db.addTicket({ id: 101, queueId: BILLING_QUEUE, customerCompanyId: 'acme' });
  db.addTicket({
    id: 102,
    queueId: BILLING_QUEUE,
    customerCompanyId: 'globex',
  });
}

const jwt = new JwtService({ secret: TEST_JWT_SECRET });

export function agentJwt(
  agentId: number,
  claims: Record<string, unknown> = {},
): Promise<string> {
  return jwt.signAsync({ sub: agentId, ...claims }, { expiresIn: '1h' });
}

export function customerJwt(
  customerId: number,
  customerLogin: string,
  customerCompanyId: string,
  claims: Record<string, unknown> = {},
): Promise<string> {
  return jwt.signAsync(
    { sub: customerId, kind: 'customer', customerLogin, customerCompanyId, ...claims },
    { expiresIn: '1h' },
  );
}

/** Signed with the right secret, expired a minute ago */
export function expiredJwt(agentId: number): Promise<string> {
  return jwt.signAsync({
    sub: agentId,
    exp: Math.floor(Date.now() / 1000) - 60,
  });
}

export interface IssuedToken {
  id: number;
  plaintext: string;
}

export async function issueApiToken(
  app: INestApplication,
  userId: number,
  userType: 'agent' | 'customer',
  options: { scopes?: string[]; rateLimit?: number } = {},
): Promise<IssuedToken> {
  const { token, plaintext } = await app.get(ApiTokensService).generateToken({
    userId,
    userType,
    name: `test token for ${userId}`,
    scopes: options.scopes,
    rateLimit: options.rateLimit,
    createdBy: userId,
  });
  return { id: token.id, plaintext };
}
