import { Test, TestingModule } from '@nestjs/testing';
import { ScopeEvaluatorService, ScopeHolder } from './scope-evaluator.service';
import { ScopeRegistry } from './scope-registry';

describe('ScopeEvaluatorService', () => {
  let evaluator: ScopeEvaluatorService;

  const agent = (scopes: string[], role = 'agent'): ScopeHolder => ({
    kind: 'agent',
    role,
    scopes,
  });
  const customer = (scopes: string[]): ScopeHolder => ({
    kind: 'customer',
    role: 'customer',
    scopes,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ScopeRegistry, ScopeEvaluatorService],
    }).compile();

    evaluator = module.get<ScopeEvaluatorService>(ScopeEvaluatorService);
  });

  it('should pass an empty requirement', () => {
    expect(evaluator.evaluate(agent([]), undefined)).toBe('allowed');
    expect(evaluator.evaluate(agent([]), '')).toBe('allowed');
  });

  it('should allow a held scope', () => {
    expect(evaluator.evaluate(agent(['tickets:read']), 'tickets:read')).toBe(
      'allowed',
    );
  });

  it('should report a missing scope', () => {
    expect(evaluator.evaluate(agent(['tickets:read']), 'tickets:write')).toBe(
      'missing_scope',
    );
  });

  it('should restrict agent-only scopes for customers holding them', () => {
    expect(evaluator.evaluate(customer(['*']), 'tickets:delete')).toBe(
      'role_restricted',
    );
  });

  it('should restrict admin scopes to admins', () => {
    expect(evaluator.evaluate(agent(['*']), 'admin:*')).toBe(
      'role_restricted',
    );
    expect(evaluator.evaluate(agent(['*'], 'admin'), 'admin:*')).toBe(
      'allowed',
    );
  });

  it('should build the refusal messages', () => {
    expect(
      evaluator.denialMessage(agent([]), 'tickets:write', 'missing_scope'),
    ).toBe('Token missing required scope: tickets:write');
    expect(
      evaluator.denialMessage(customer(['*']), 'tickets:delete', 'role_restricted'),
    ).toBe('This endpoint is not available to customers');
    expect(
      evaluator.denialMessage(agent(['*']), 'admin:*', 'role_restricted'),
    ).toBe('Insufficient role for scope: admin:*');
  });
});
