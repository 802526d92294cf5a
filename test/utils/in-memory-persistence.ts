import { DynamicModule, Injectable, Module } from '@nestjs/common';
import { PermissionStore } from '../../src/permissions/domain/repositories/permission-store.port';
import { TicketAccess } from '../../src/permissions/domain/entities/ticket-access.entity';
import {
  TicketChanges,
  TicketRepository,
} from '../../src/tickets/domain/repositories/ticket.repository.port';
import {
  NewTicket,
  Ticket,
} from '../../src/tickets/domain/entities/ticket.entity';
import { ApiTokenRepository } from '../../src/api-tokens/domain/repositories/api-token.repository.port';
import {
  ApiToken,
  ApiTokenUserType,
  NewApiToken,
} from '../../src/api-tokens/domain/entities/api-token.entity';
import { TokenOwner } from '../../src/api-tokens/domain/entities/token-owner';
import { NullableType } from '../../src/utils/types/nullable.type';

interface GrantRow<K> {
  subject: K;
  groupId: number;
  key: string;
}

/**
 * In-process stand-in for the helpdesk tables. Tests seed it directly and
 * can make named operations fail.
 */
@Injectable()
export class InMemoryDatabase {
  readonly queues = new Map<number, { name: string; groupId: number }>();
  readonly tickets = new Map<number, Ticket>();
  readonly agents = new Map<number, { login: string; isAdmin: boolean }>();
  readonly customers = new Map<
    number,
    { login: string; customerCompanyId?: string }
  >();
  readonly apiTokens = new Map<number, ApiToken>();
  readonly agentGrants: GrantRow<number>[] = [];
  readonly companyGrants: GrantRow<string>[] = [];
  readonly customerUserGrants: GrantRow<string>[] = [];
  /** Operation names that reject with a connection error */
  readonly failing = new Set<string>();

  private ticketSeq = 1000;
  private tokenSeq = 1;

  addQueue(id: number, name: string, groupId: number): void {
    this.queues.set(id, { name, groupId });
  }

  addAgent(id: number, login: string, isAdmin = false): void {
    this.agents.set(id, { login, isAdmin });
  }

  addCustomer(id: number, login: string, customerCompanyId?: string): void {
    this.customers.set(id, { login, customerCompanyId });
  }

  addTicket(
    data: Partial<Ticket> & Pick<Ticket, 'id' | 'queueId'>,
  ): Ticket {
    const now = new Date();
    const ticket = new Ticket({
      ticketNumber: `T${data.id}`,
      title: `Ticket ${data.id}`,
      priorityId: 3,
      customerCompanyId: null,
      customerLogin: null,
      archived: false,
      createdAt: now,
      updatedAt: now,
      ...data,
    });
    this.tickets.set(ticket.id, ticket);
    return ticket;
  }

  grantAgent(agentId: number, groupId: number, ...keys: string[]): void {
    for (const key of keys) {
      this.agentGrants.push({ subject: agentId, groupId, key });
    }
  }

  grantCompany(companyId: string, groupId: number, ...keys: string[]): void {
    for (const key of keys) {
      this.companyGrants.push({ subject: companyId, groupId, key });
    }
  }

  grantCustomerUser(login: string, groupId: number, ...keys: string[]): void {
    for (const key of keys) {
      this.customerUserGrants.push({ subject: login, groupId, key });
    }
  }

  insertTicket(data: NewTicket): Ticket {
    return this.addTicket({ id: ++this.ticketSeq, ...data });
  }

  insertToken(data: NewApiToken): ApiToken {
    const token = new ApiToken({
      ...data,
      id: this.tokenSeq++,
      lastUsedAt: null,
      lastUsedIp: null,
      createdAt: new Date(),
      revokedAt: null,
      revokedBy: null,
    });
    this.apiTokens.set(token.id, token);
    return token;
  }

  async run<T>(operation: string, body: () => T): Promise<T> {
    if (this.failing.has(operation)) {
      throw new Error(`connection refused during ${operation}`);
    }
    return body();
  }
}

@Injectable()
export class InMemoryPermissionStore implements PermissionStore {
  constructor(private readonly db: InMemoryDatabase) {}

  findTicketAccess(ticketId: number): Promise<NullableType<TicketAccess>> {
    return this.db.run('findTicketAccess', () => {
      const ticket = this.db.tickets.get(ticketId);
      const queue = ticket ? this.db.queues.get(ticket.queueId) : undefined;
      if (!ticket || !queue) {
        return null;
      }
      return new TicketAccess({
        ticketId: ticket.id,
        queueId: ticket.queueId,
        groupId: queue.groupId,
        customerCompanyId: ticket.customerCompanyId,
      });
    });
  }

  findQueueGroupId(queueId: number): Promise<NullableType<number>> {
    return this.db.run(
      'findQueueGroupId',
      () => this.db.queues.get(queueId)?.groupId ?? null,
    );
  }

  findAgentGrants(agentId: number, groupId: number): Promise<string[]> {
    return this.db.run('findAgentGrants', () =>
      keysFor(this.db.agentGrants, agentId, groupId),
    );
  }

  findCompanyGrants(
    customerCompanyId: string,
    groupId: number,
  ): Promise<string[]> {
    return this.db.run('findCompanyGrants', () =>
      keysFor(this.db.companyGrants, customerCompanyId, groupId),
    );
  }

  findCustomerUserGrants(
    customerLogin: string,
    groupId: number,
  ): Promise<string[]> {
    return this.db.run('findCustomerUserGrants', () =>
      keysFor(this.db.customerUserGrants, customerLogin, groupId),
    );
  }
}

@Injectable()
export class InMemoryTicketRepository implements TicketRepository {
  constructor(private readonly db: InMemoryDatabase) {}

  findById(id: number): Promise<NullableType<Ticket>> {
    return this.db.run('findTicket', () => this.db.tickets.get(id) ?? null);
  }

  create(data: NewTicket): Promise<Ticket> {
    return this.db.run('createTicket', () => this.db.insertTicket(data));
  }

  update(id: number, changes: TicketChanges): Promise<NullableType<Ticket>> {
    return this.db.run('updateTicket', () => {
      const ticket = this.db.tickets.get(id);
      if (!ticket) {
        return null;
      }
      const updated = new Ticket({
        ...ticket,
        ...changes,
        updatedAt: new Date(),
      });
      this.db.tickets.set(id, updated);
      return updated;
    });
  }
}

@Injectable()
export class InMemoryApiTokenRepository implements ApiTokenRepository {
  constructor(private readonly db: InMemoryDatabase) {}

  findByPrefix(prefix: string): Promise<ApiToken[]> {
    return this.db.run('findByPrefix', () =>
      [...this.db.apiTokens.values()].filter((t) => t.prefix === prefix),
    );
  }

  findById(id: number): Promise<NullableType<ApiToken>> {
    return this.db.run('findTokenById', () => this.db.apiTokens.get(id) ?? null);
  }

  findByUser(userId: number, userType: ApiTokenUserType): Promise<ApiToken[]> {
    return this.db.run('findByUser', () =>
      [...this.db.apiTokens.values()].filter(
        (t) => t.userId === userId && t.userType === userType,
      ),
    );
  }

  create(data: NewApiToken): Promise<ApiToken> {
    return this.db.run('createToken', () => this.db.insertToken(data));
  }

  updateLastUsed(id: number, ip: string, at: Date): Promise<void> {
    return this.db.run('updateLastUsed', () => {
      const token = this.db.apiTokens.get(id);
      if (token) {
        token.lastUsedAt = at;
        token.lastUsedIp = ip;
      }
    });
  }

  revoke(id: number, revokedBy: number, at: Date): Promise<boolean> {
    return this.db.run('revoke', () => {
      const token = this.db.apiTokens.get(id);
      if (!token || token.revokedAt) {
        return false;
      }
      token.revokedAt = at;
      token.revokedBy = revokedBy;
      return true;
    });
  }

  findOwner(
    userId: number,
    userType: ApiTokenUserType,
  ): Promise<NullableType<TokenOwner>> {
    return this.db.run('findOwner', (): NullableType<TokenOwner> => {
      if (userType === 'customer') {
        const customer = this.db.customers.get(userId);
        return customer
          ? {
              kind: 'customer',
              customerLogin: customer.login,
              customerCompanyId: customer.customerCompanyId,
            }
          : null;
      }
      const agent = this.db.agents.get(userId);
      return agent ? { kind: 'agent', isAdmin: agent.isAdmin } : null;
    });
  }
}

function keysFor<K>(rows: GrantRow<K>[], subject: K, groupId: number): string[] {
  return rows
    .filter((row) => row.subject === subject && row.groupId === groupId)
    .map((row) => row.key);
}

/**
 * Replaces every relational persistence module in tests. Each override gets
 * its own module instance, so the database is passed in rather than
 * provided, and every store reads the same tables.
 */
@Module({})
export class InMemoryPersistenceModule {
  static forDatabase(db: InMemoryDatabase): DynamicModule {
    return {
      module: InMemoryPersistenceModule,
      providers: [
        { provide: InMemoryDatabase, useValue: db },
        { provide: PermissionStore, useValue: new InMemoryPermissionStore(db) },
        { provide: TicketRepository, useValue: new InMemoryTicketRepository(db) },
        {
          provide: ApiTokenRepository,
          useValue: new InMemoryApiTokenRepository(db),
        },
      ],
      exports: [
        InMemoryDatabase,
        PermissionStore,
        TicketRepository,
        ApiTokenRepository,
      ],
    };
  }
}
