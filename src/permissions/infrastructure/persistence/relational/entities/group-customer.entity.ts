import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

/**
 * Customer company grant on a group.
 */
@Entity({
  name: 'group_customer',
})
export class GroupCustomerEntity extends EntityRelationalHelper {
  @PrimaryColumn({ name: 'customer_id', type: 'varchar', length: 150 })
  customerId!: string;

  @PrimaryColumn({ name: 'group_id', type: 'integer' })
  groupId!: number;

  @PrimaryColumn({ name: 'permission_key', type: 'varchar', length: 20 })
  permissionKey!: string;

  @Column({ name: 'permission_value', type: 'smallint', default: 1 })
  permissionValue!: number;

  @Column({
    name: 'permission_context',
    type: 'varchar',
    length: 100,
    default: 'Ticket',
  })
  permissionContext!: string;

  @CreateDateColumn({ name: 'create_time' })
  createTime!: Date;
}
