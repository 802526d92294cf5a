import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

/**
 * Individual customer user grant on a group, keyed by login.
 */
@Entity({
  name: 'group_customer_user',
})
export class GroupCustomerUserEntity extends EntityRelationalHelper {
  @PrimaryColumn({ name: 'user_id', type: 'varchar', length: 200 })
  customerLogin!: string;

  @PrimaryColumn({ name: 'group_id', type: 'integer' })
  groupId!: number;

  @PrimaryColumn({ name: 'permission_key', type: 'varchar', length: 20 })
  permissionKey!: string;

  @Column({ name: 'permission_value', type: 'smallint', default: 1 })
  permissionValue!: number;

  @CreateDateColumn({ name: 'create_time' })
  createTime!: Date;
}
