import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'customer_user',
})
export class CustomerUserEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200, unique: true })
  login!: string;

  // Customer company
  @Column({ name: 'customer_id', type: 'varchar', length: 150, nullable: true })
  @Index()
  customerId!: string | null;

  @Column({ name: 'valid_id', type: 'smallint', default: 1 })
  validId!: number;
}
