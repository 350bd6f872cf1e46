// src/test/db.ts
import { PGlite } from "@electric-sql/pglite"
import { vector } from "@electric-sql/pglite/vector"
import { drizzle } from "drizzle-orm/pglite"
import { sql } from "drizzle-orm"
import * as schema from "@/db/schema"
import type { Database } from "@/db/client"

/**
 * In-memory PostgreSQL with pgvector, for index tests.
 */
export async function createTestDatabase(): Promise<{
  db: Database
  close: () => Promise<void>
}> {
  const client = new PGlite({ extensions: { vector } })
  const db = drizzle(client, { schema })

  await db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`)
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS orders (
      row_id SERIAL PRIMARY KEY,
      order_id BIGINT,
      task_number TEXT NOT NULL DEFAULT '',
      user_id TEXT NOT NULL,
      industry_name VARCHAR(100) NOT NULL DEFAULT 'N/A',
      title VARCHAR(500) NOT NULL,
      content VARCHAR(2000) NOT NULL DEFAULT '',
      full_amount DOUBLE PRECISION NOT NULL DEFAULT 0,
      state TEXT NOT NULL,
      create_time TEXT NOT NULL,
      update_time TEXT NOT NULL,
      site_id TEXT NOT NULL DEFAULT 'default',
      promotion BOOLEAN NOT NULL DEFAULT false,
      priority INTEGER NOT NULL DEFAULT 0,
      embedding vector(1024) NOT NULL,
      indexed_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `)

  return {
    db,
    close: () => client.close(),
  }
}
