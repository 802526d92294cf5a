import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { ApiTokenUserType } from '../../../../domain/entities/api-token.entity';

@Entity({
  name: 'user_api_tokens',
})
@Index(['userId', 'userType'])
@Index(['revokedAt', 'expiresAt'])
export class ApiTokenEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({
    name: 'user_type',
    type: 'varchar',
    length: 20,
    default: 'agent',
  })
  userType!: ApiTokenUserType;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 8 })
  @Index()
  prefix!: string;

  @Column({ name: 'token_hash', type: 'varchar', length: 255 })
  tokenHash!: string;

  // NULL inherits every permission of the user
  @Column({ type: 'jsonb', nullable: true })
  scopes!: string[] | null;

  @Column({ name: 'expires_at', type: 'timestamp', nullable: true })
  expiresAt!: Date | null;

  @Column({ name: 'last_used_at', type: 'timestamp', nullable: true })
  lastUsedAt!: Date | null;

  @Column({ name: 'last_used_ip', type: 'varchar', length: 45, nullable: true })
  lastUsedIp!: string | null;

  @Column({ name: 'rate_limit', type: 'integer', default: 1000 })
  rateLimit!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @Column({ name: 'created_by', type: 'integer', nullable: true })
  createdBy!: number | null;

  @Column({ name: 'revoked_at', type: 'timestamp', nullable: true })
  revokedAt!: Date | null;

  @Column({ name: 'revoked_by', type: 'integer', nullable: true })
  revokedBy!: number | null;
}
