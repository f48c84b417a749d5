import { OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';
import { Database } from './database.types';

export const createPostgresDatabase = (
  connectionString: string
): Kysely<Database> =>
  new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

/**
 * Owns the Kysely instance for the process; built by `DatabaseModule`.
 */
export class DatabaseService implements OnModuleDestroy {
  constructor(private readonly db: Kysely<Database>) {}

  getDb(): Kysely<Database> {
    return this.db;
  }

  async ping(): Promise<void> {
    await sql`select 1`.execute(this.db);
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
