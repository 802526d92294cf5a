import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreateTickets1760000001000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'ticket',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'tn', type: 'varchar', length: '50', isUnique: true },
          { name: 'title', type: 'varchar', length: '255' },
          { name: 'queue_id', type: 'integer', isNullable: false },
          { name: 'ticket_priority_id', type: 'smallint', default: 3 },
          {
            name: 'customer_id',
            type: 'varchar',
            length: '150',
            isNullable: true,
          },
          {
            name: 'customer_user_id',
            type: 'varchar',
            length: '250',
            isNullable: true,
          },
          { name: 'archive_flag', type: 'smallint', default: 0 },
          { name: 'create_time', type: 'timestamp', default: 'now()' },
          { name: 'change_time', type: 'timestamp', default: 'now()' },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'ticket',
      new TableForeignKey({
        columnNames: ['queue_id'],
        referencedTableName: 'queue',
        referencedColumnNames: ['id'],
      }),
    );

    // Permission checks resolve a ticket to its queue and company
    await queryRunner.createIndex(
      'ticket',
      new TableIndex({
        name: 'IDX_ticket_queue_id',
        columnNames: ['queue_id'],
      }),
    );

    await queryRunner.createIndex(
      'ticket',
      new TableIndex({
        name: 'IDX_ticket_customer_id',
        columnNames: ['customer_id'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex('ticket', 'IDX_ticket_customer_id');
    await queryRunner.dropIndex('ticket', 'IDX_ticket_queue_id');
    await queryRunner.dropTable('ticket', true);
  }
}
