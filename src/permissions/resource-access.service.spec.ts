import { Test, TestingModule } from '@nestjs/testing';
import { ResourceAccessService } from './resource-access.service';
import { PermissionDomainService } from './domain/services/permission.domain.service';
import { AccessSubject } from './domain/resource-target';
import { PermissionLookupError } from './domain/errors';

describe('ResourceAccessService', () => {
  let service: ResourceAccessService;
  let permissions: {
    canReadTicket: jest.Mock<Promise<boolean>>;
    canWriteTicket: jest.Mock<Promise<boolean>>;
    canAddNote: jest.Mock<Promise<boolean>>;
    canChangePriority: jest.Mock<Promise<boolean>>;
    canCreate: jest.Mock<Promise<boolean>>;
    canMoveInto: jest.Mock<Promise<boolean>>;
    customerCanAccessTicket: jest.Mock<Promise<boolean>>;
    customerCompanyCanAccessQueue: jest.Mock<Promise<boolean>>;
    customerCanAccessQueue: jest.Mock<Promise<boolean>>;
  };

  const agent: AccessSubject = { kind: 'agent', principalId: 7 };
  const customer: AccessSubject = {
    kind: 'customer',
    principalId: 31,
    customerLogin: 'alice',
    customerCompanyId: 'acme',
  };

  beforeEach(async () => {
    permissions = {
      canReadTicket: jest.fn().mockResolvedValue(false),
      canWriteTicket: jest.fn().mockResolvedValue(false),
      canAddNote: jest.fn().mockResolvedValue(false),
      canChangePriority: jest.fn().mockResolvedValue(false),
      canCreate: jest.fn().mockResolvedValue(false),
      canMoveInto: jest.fn().mockResolvedValue(false),
      customerCanAccessTicket: jest.fn().mockResolvedValue(false),
      customerCompanyCanAccessQueue: jest.fn().mockResolvedValue(false),
      customerCanAccessQueue: jest.fn().mockResolvedValue(false),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ResourceAccessService,
        { provide: PermissionDomainService, useValue: permissions },
      ],
    }).compile();

    service = module.get<ResourceAccessService>(ResourceAccessService);
  });

  describe('agents', () => {
    it('should hide an unreadable ticket on read', async () => {
      await expect(
        service.check(agent, { kind: 'ticket', action: 'read', ticketId: 1 }),
      ).resolves.toBe('hide');
    });

    it('should allow read with read access', async () => {
      permissions.canReadTicket.mockResolvedValue(true);

      await expect(
        service.check(agent, { kind: 'ticket', action: 'read', ticketId: 1 }),
      ).resolves.toBe('allow');
    });

    it('should forbid update of a readable ticket without write', async () => {
      permissions.canReadTicket.mockResolvedValue(true);

      await expect(
        service.check(agent, { kind: 'ticket', action: 'update', ticketId: 1 }),
      ).resolves.toBe('forbid');
    });

    it('should hide update of an unreadable ticket', async () => {
      await expect(
        service.check(agent, { kind: 'ticket', action: 'update', ticketId: 1 }),
      ).resolves.toBe('hide');
    });

    it('should hide delete of a readable ticket without write', async () => {
      permissions.canReadTicket.mockResolvedValue(true);

      await expect(
        service.check(agent, { kind: 'ticket', action: 'delete', ticketId: 1 }),
      ).resolves.toBe('hide');
      expect(permissions.canReadTicket).not.toHaveBeenCalled();
    });

    it('should allow note and priority with their own kinds', async () => {
      permissions.canAddNote.mockResolvedValue(true);
      permissions.canChangePriority.mockResolvedValue(true);

      await expect(
        service.check(agent, { kind: 'ticket', action: 'note', ticketId: 1 }),
      ).resolves.toBe('allow');
      await expect(
        service.check(agent, {
          kind: 'ticket',
          action: 'priority',
          ticketId: 1,
        }),
      ).resolves.toBe('allow');
    });

    it('should forbid creating in a queue without create', async () => {
      await expect(
        service.check(agent, { kind: 'queue', action: 'create', queueId: 2 }),
      ).resolves.toBe('forbid');
      expect(permissions.canCreate).toHaveBeenCalledWith(7, 2, undefined);
    });

    it('should check the source ticket before the target queue on move', async () => {
      await expect(
        service.check(agent, {
          kind: 'queue',
          action: 'move_into',
          ticketId: 1,
          queueId: 2,
        }),
      ).resolves.toBe('hide');
      expect(permissions.canMoveInto).not.toHaveBeenCalled();

      permissions.canReadTicket.mockResolvedValue(true);
      await expect(
        service.check(agent, {
          kind: 'queue',
          action: 'move_into',
          ticketId: 1,
          queueId: 2,
        }),
      ).resolves.toBe('forbid');

      permissions.canMoveInto.mockResolvedValue(true);
      await expect(
        service.check(agent, {
          kind: 'queue',
          action: 'move_into',
          ticketId: 1,
          queueId: 2,
        }),
      ).resolves.toBe('allow');
    });

    it('should propagate lookup errors', async () => {
      permissions.canReadTicket.mockRejectedValue(
        new PermissionLookupError('findTicketAccess', new Error('down')),
      );

      await expect(
        service.check(agent, { kind: 'ticket', action: 'read', ticketId: 1 }),
      ).rejects.toBeInstanceOf(PermissionLookupError);
    });
  });

  describe('customers', () => {
    it('should allow read and note on an accessible ticket', async () => {
      permissions.customerCanAccessTicket.mockResolvedValue(true);

      await expect(
        service.check(customer, {
          kind: 'ticket',
          action: 'read',
          ticketId: 1,
        }),
      ).resolves.toBe('allow');
      await expect(
        service.check(customer, {
          kind: 'ticket',
          action: 'note',
          ticketId: 1,
        }),
      ).resolves.toBe('allow');
      expect(permissions.customerCanAccessTicket).toHaveBeenCalledWith(
        'alice',
        'acme',
        1,
        undefined,
      );
    });

    it('should hide an inaccessible ticket', async () => {
      await expect(
        service.check(customer, {
          kind: 'ticket',
          action: 'read',
          ticketId: 1,
        }),
      ).resolves.toBe('hide');
    });

    it('should forbid update and delete on an accessible ticket', async () => {
      permissions.customerCanAccessTicket.mockResolvedValue(true);

      await expect(
        service.check(customer, {
          kind: 'ticket',
          action: 'update',
          ticketId: 1,
        }),
      ).resolves.toBe('forbid');
      await expect(
        service.check(customer, {
          kind: 'ticket',
          action: 'delete',
          ticketId: 1,
        }),
      ).resolves.toBe('forbid');
    });

    it('should allow creating through a company or individual grant', async () => {
      await expect(
        service.check(customer, { kind: 'queue', action: 'create', queueId: 2 }),
      ).resolves.toBe('forbid');

      permissions.customerCanAccessQueue.mockResolvedValue(true);
      await expect(
        service.check(customer, { kind: 'queue', action: 'create', queueId: 2 }),
      ).resolves.toBe('allow');
      expect(permissions.customerCompanyCanAccessQueue).toHaveBeenCalledWith(
        'acme',
        2,
        undefined,
      );
    });
  });
});
