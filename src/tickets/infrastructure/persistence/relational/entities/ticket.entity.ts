import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { QueueEntity } from '../../../../../permissions/infrastructure/persistence/relational/entities/queue.entity';

@Entity({
  name: 'ticket',
})
export class TicketEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'tn', type: 'varchar', length: 50, unique: true })
  tn!: string;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @ManyToOne(() => QueueEntity, { nullable: false })
  @JoinColumn({ name: 'queue_id' })
  queue?: QueueEntity;

  @Column({ name: 'queue_id', type: 'integer' })
  @Index()
  queueId!: number;

  @Column({ name: 'ticket_priority_id', type: 'smallint', default: 3 })
  priorityId!: number;

  @Column({ name: 'customer_id', type: 'varchar', length: 150, nullable: true })
  @Index()
  customerId!: string | null;

  @Column({
    name: 'customer_user_id',
    type: 'varchar',
    length: 250,
    nullable: true,
  })
  customerUserId!: string | null;

  @Column({ name: 'archive_flag', type: 'smallint', default: 0 })
  archiveFlag!: number;

  @CreateDateColumn({ name: 'create_time' })
  createTime!: Date;

  @UpdateDateColumn({ name: 'change_time' })
  changeTime!: Date;
}
