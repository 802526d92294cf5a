import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

/**
 * Agent grant on a group. One row per permission kind.
 */
@Entity({
  name: 'group_user',
})
export class GroupUserEntity extends EntityRelationalHelper {
  @PrimaryColumn({ name: 'user_id', type: 'integer' })
  userId!: number;

  @PrimaryColumn({ name: 'group_id', type: 'integer' })
  groupId!: number;

  @PrimaryColumn({ name: 'permission_key', type: 'varchar', length: 20 })
  permissionKey!: string;

  @CreateDateColumn({ name: 'create_time' })
  createTime!: Date;
}
