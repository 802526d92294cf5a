import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateUserApiTokens1760000002000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'user_api_tokens',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'user_id', type: 'integer', isNullable: false },
          {
            name: 'user_type',
            type: 'varchar',
            length: '20',
            default: "'agent'",
          },
          { name: 'name', type: 'varchar', length: '100' },
          { name: 'prefix', type: 'varchar', length: '8' },
          { name: 'token_hash', type: 'varchar', length: '255' },
          // NULL inherits every permission of the user
          { name: 'scopes', type: 'jsonb', isNullable: true },
          { name: 'expires_at', type: 'timestamp', isNullable: true },
          { name: 'last_used_at', type: 'timestamp', isNullable: true },
          {
            name: 'last_used_ip',
            type: 'varchar',
            length: '45',
            isNullable: true,
          },
          { name: 'rate_limit', type: 'integer', default: 1000 },
          { name: 'created_at', type: 'timestamp', default: 'now()' },
          { name: 'created_by', type: 'integer', isNullable: true },
          { name: 'revoked_at', type: 'timestamp', isNullable: true },
          { name: 'revoked_by', type: 'integer', isNullable: true },
        ],
      }),
      true,
    );

    await queryRunner.query(`
      ALTER TABLE user_api_tokens
      ADD CONSTRAINT check_user_api_tokens_user_type
      CHECK (user_type IN ('agent', 'customer'));
    `);

    await queryRunner.createIndex(
      'user_api_tokens',
      new TableIndex({
        name: 'IDX_user_api_tokens_prefix',
        columnNames: ['prefix'],
      }),
    );

    await queryRunner.createIndex(
      'user_api_tokens',
      new TableIndex({
        name: 'IDX_user_api_tokens_user',
        columnNames: ['user_id', 'user_type'],
      }),
    );

    await queryRunner.createIndex(
      'user_api_tokens',
      new TableIndex({
        name: 'IDX_user_api_tokens_active',
        columnNames: ['revoked_at', 'expires_at'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex('user_api_tokens', 'IDX_user_api_tokens_active');
    await queryRunner.dropIndex('user_api_tokens', 'IDX_user_api_tokens_user');
    await queryRunner.dropIndex('user_api_tokens', 'IDX_user_api_tokens_prefix');
    await queryRunner.query(`
      ALTER TABLE user_api_tokens
      DROP CONSTRAINT IF EXISTS check_user_api_tokens_user_type;
    `);
    await queryRunner.dropTable('user_api_tokens', true);
  }
}
