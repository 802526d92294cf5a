import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

const validId = {
  name: 'valid_id',
  type: 'smallint',
  default: 1,
  isNullable: false,
};

const createTime = {
  name: 'create_time',
  type: 'timestamp',
  default: 'now()',
  isNullable: false,
};

const permissionKey = {
  name: 'permission_key',
  type: 'varchar',
  length: '20',
  isPrimary: true,
};

const groupId = { name: 'group_id', type: 'integer', isPrimary: true };

export class CreateHelpdeskDirectory1760000000000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'users',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'login', type: 'varchar', length: '200', isUnique: true },
          validId,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'customer_user',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'login', type: 'varchar', length: '200', isUnique: true },
          {
            name: 'customer_id',
            type: 'varchar',
            length: '150',
            isNullable: true,
          },
          validId,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'groups',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'name', type: 'varchar', length: '200', isUnique: true },
          validId,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'queue',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'name', type: 'varchar', length: '200', isUnique: true },
          { name: 'group_id', type: 'integer', isNullable: false },
          validId,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'group_user',
        columns: [
          { name: 'user_id', type: 'integer', isPrimary: true },
          groupId,
          permissionKey,
          createTime,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'group_customer',
        columns: [
          {
            name: 'customer_id',
            type: 'varchar',
            length: '150',
            isPrimary: true,
          },
          groupId,
          permissionKey,
          { name: 'permission_value', type: 'smallint', default: 1 },
          {
            name: 'permission_context',
            type: 'varchar',
            length: '100',
            default: "'Ticket'",
          },
          createTime,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'group_customer_user',
        columns: [
          {
            name: 'user_id',
            type: 'varchar',
            length: '200',
            isPrimary: true,
          },
          groupId,
          permissionKey,
          { name: 'permission_value', type: 'smallint', default: 1 },
          createTime,
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'queue',
      new TableForeignKey({
        columnNames: ['group_id'],
        referencedTableName: 'groups',
        referencedColumnNames: ['id'],
      }),
    );

    for (const table of ['group_user', 'group_customer', 'group_customer_user']) {
      await queryRunner.createForeignKey(
        table,
        new TableForeignKey({
          columnNames: ['group_id'],
          referencedTableName: 'groups',
          referencedColumnNames: ['id'],
          onDelete: 'CASCADE',
        }),
      );
    }

    await queryRunner.query(`
      ALTER TABLE group_user
      ADD CONSTRAINT check_group_user_permission_key
      CHECK (permission_key IN ('ro', 'move_into', 'create', 'note', 'owner', 'priority', 'rw'));
    `);

    await queryRunner.createIndex(
      'queue',
      new TableIndex({
        name: 'IDX_queue_group_id',
        columnNames: ['group_id'],
      }),
    );

    await queryRunner.createIndex(
      'customer_user',
      new TableIndex({
        name: 'IDX_customer_user_customer_id',
        columnNames: ['customer_id'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('group_customer_user', true);
    await queryRunner.dropTable('group_customer', true);
    await queryRunner.dropTable('group_user', true);
    await queryRunner.dropTable('queue', true);
    await queryRunner.dropTable('groups', true);
    await queryRunner.dropTable('customer_user', true);
    await queryRunner.dropTable('users', true);
  }
}
