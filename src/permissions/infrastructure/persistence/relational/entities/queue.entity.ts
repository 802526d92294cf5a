import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { GroupEntity } from './group.entity';

@Entity({
  name: 'queue',
})
export class QueueEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200, unique: true })
  name!: string;

  @ManyToOne(() => GroupEntity, { nullable: false })
  @JoinColumn({ name: 'group_id' })
  group?: GroupEntity;

  @Column({ name: 'group_id', type: 'integer' })
  @Index()
  groupId!: number;

  @Column({ name: 'valid_id', type: 'smallint', default: 1 })
  validId!: number;
}
