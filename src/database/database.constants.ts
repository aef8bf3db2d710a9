import type { NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';

import type * as schema from './schema';

export const PG_POOL = 'PG_POOL';
export const DRIZZLE = 'DRIZZLE';

export type Database = NodePgDatabase<typeof schema>;

/** Anything a query can run on: the database itself or an open transaction. */
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;
