import { Global, Logger, Module } from '@nestjs/common';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export type DrizzleDB = NodePgDatabase<typeof schema>;

export function createDrizzle(connectionString: string): DrizzleDB {
  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}

// DB resolves to null without DATABASE_URL; sessions then stay in memory.
@Global()
@Module({
  providers: [
    {
      provide: DB,
      useFactory: (): DrizzleDB | null => {
        const url = process.env.DATABASE_URL;
        if (!url) {
          new Logger('DrizzleModule').warn('DATABASE_URL not set, PostgreSQL disabled');
          return null;
        }
        return createDrizzle(url);
      },
    },
  ],
  exports: [DB],
})
export class DrizzleModule {}
