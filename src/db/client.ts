/**
 * Neon Serverless Database Client
 *
 * Builds the Drizzle ORM client for PostgreSQL + pgvector over Neon's
 * serverless HTTP driver. Each query is an independent HTTP request, so
 * there is no pool to manage or close.
 *
 * @see {@link https://neon.tech/docs/serverless/serverless-driver} Neon Serverless Driver
 * @see {@link https://orm.drizzle.team/docs/get-started-postgresql#neon} Drizzle + Neon Setup
 *
 * @module db/client
 */

import { neon } from "@neondatabase/serverless"
import { drizzle } from "drizzle-orm/neon-http"
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core"
import * as schema from "./schema"

/**
 * Any Drizzle PostgreSQL client carrying the application schema.
 *
 * Neon in production and PGlite in tests both satisfy this type, so
 * repositories take it as a constructor argument.
 *
 * @example
 * ```typescript
 * import type { Database } from "@/db/client"
 *
 * const index = new PgOrderIndex(db satisfies Database)
 * ```
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

/**
 * Create the production database client.
 */
export function createDatabase(databaseUrl: string): Database {
  return drizzle(neon(databaseUrl), { schema })
}
