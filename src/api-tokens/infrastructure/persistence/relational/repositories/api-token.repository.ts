import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';
import { ApiTokenEntity } from '../entities/api-token.entity';
import { AgentUserEntity } from '../entities/agent-user.entity';
import { CustomerUserEntity } from '../entities/customer-user.entity';
import { GroupUserEntity } from '../../../../../permissions/infrastructure/persistence/relational/entities/group-user.entity';
import { GroupEntity } from '../../../../../permissions/infrastructure/persistence/relational/entities/group.entity';
import { ApiTokenRepository } from '../../../../domain/repositories/api-token.repository.port';
import {
  ApiToken,
  ApiTokenUserType,
  NewApiToken,
} from '../../../../domain/entities/api-token.entity';
import { TokenOwner } from '../../../../domain/entities/token-owner';
import { NullableType } from '../../../../../utils/types/nullable.type';

const VALID = 1;
const ADMIN_GROUP = 'admin';

@Injectable()
export class ApiTokenRelationalRepository implements ApiTokenRepository {
  constructor(
    @InjectRepository(ApiTokenEntity)
    private readonly repository: Repository<ApiTokenEntity>,
    @InjectRepository(AgentUserEntity)
    private readonly agents: Repository<AgentUserEntity>,
    @InjectRepository(CustomerUserEntity)
    private readonly customers: Repository<CustomerUserEntity>,
    @InjectRepository(GroupUserEntity)
    private readonly groupUsers: Repository<GroupUserEntity>,
  ) {}

  async findByPrefix(prefix: string): Promise<ApiToken[]> {
    const entities = await this.repository.find({ where: { prefix } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findById(id: number): Promise<NullableType<ApiToken>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByUser(
    userId: number,
    userType: ApiTokenUserType,
  ): Promise<ApiToken[]> {
    const entities = await this.repository.find({
      where: { userId, userType },
      order: { createdAt: 'DESC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(data: NewApiToken): Promise<ApiToken> {
    const entity = this.repository.create({
      userId: data.userId,
      userType: data.userType,
      name: data.name,
      prefix: data.prefix,
      tokenHash: data.tokenHash,
      scopes: data.scopes.length > 0 ? data.scopes : null,
      expiresAt: data.expiresAt,
      rateLimit: data.rateLimit,
      createdBy: data.createdBy,
    });

    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  async updateLastUsed(id: number, ip: string, at: Date): Promise<void> {
    await this.repository.update({ id }, { lastUsedAt: at, lastUsedIp: ip });
  }

  async revoke(id: number, revokedBy: number, at: Date): Promise<boolean> {
    const result = await this.repository.update(
      { id, revokedAt: IsNull() },
      { revokedAt: at, revokedBy },
    );
    return (result.affected ?? 0) > 0;
  }

  async findOwner(
    userId: number,
    userType: ApiTokenUserType,
  ): Promise<NullableType<TokenOwner>> {
    if (userType === 'customer') {
      const customer = await this.customers.findOne({
        where: { id: userId, validId: VALID },
      });
      if (!customer) {
        return null;
      }
      return {
        kind: 'customer',
        customerLogin: customer.login,
        customerCompanyId: customer.customerId ?? undefined,
      };
    }

    const agent = await this.agents.findOne({
      where: { id: userId, validId: VALID },
    });
    if (!agent) {
      return null;
    }

    // Only rw on the admin group makes the owner an admin
    const adminGrants = await this.groupUsers
      .createQueryBuilder('gu')
      .innerJoin(GroupEntity, 'g', 'g.id = gu.group_id')
      .where('gu.user_id = :userId', { userId })
      .andWhere('g.name = :name', { name: ADMIN_GROUP })
      .andWhere('gu.permission_key = :key', { key: 'rw' })
      .getCount();

    return { kind: 'agent', isAdmin: adminGrants > 0 };
  }

  private toDomain(entity: ApiTokenEntity): ApiToken {
    return new ApiToken({
      id: entity.id,
      userId: entity.userId,
      userType: entity.userType,
      name: entity.name,
      prefix: entity.prefix,
      tokenHash: entity.tokenHash,
      scopes: entity.scopes ?? [],
      expiresAt: entity.expiresAt,
      lastUsedAt: entity.lastUsedAt,
      lastUsedIp: entity.lastUsedIp,
      rateLimit: entity.rateLimit,
      createdAt: entity.createdAt,
      createdBy: entity.createdBy,
      revokedAt: entity.revokedAt,
      revokedBy: entity.revokedBy,
    });
  }
}
