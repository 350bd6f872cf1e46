// src/db/schema/orders.ts
// Open marketplace orders with their text embeddings
import {
  pgTable,
  text,
  serial,
  bigint,
  integer,
  varchar,
  doublePrecision,
  boolean,
  timestamp,
  index,
  vector,
} from "drizzle-orm/pg-core"

/**
 * One row per order in state WaitReceive. Rows are hard-deleted when the
 * order leaves that state, so there is no soft-delete column.
 */
export const orders = pgTable(
  "orders",
  {
    rowId: serial("row_id").primaryKey(),
    orderId: bigint("order_id", { mode: "number" }), // Backend numeric id; null for taskNumber-only orders
    taskNumber: text("task_number").notNull().default(""),
    userId: text("user_id").notNull(),
    industryName: varchar("industry_name", { length: 100 }).notNull().default("N/A"),
    title: varchar("title", { length: 500 }).notNull(),
    content: varchar("content", { length: 2000 }).notNull().default(""),
    fullAmount: doublePrecision("full_amount").notNull().default(0),
    state: text("state").notNull(),
    createTime: text("create_time").notNull(), // Backend "YYYY-MM-DD HH:mm:ss", kept verbatim
    updateTime: text("update_time").notNull(),
    siteId: text("site_id").notNull().default("default"),
    promotion: boolean("promotion").notNull().default(false),
    priority: integer("priority").notNull().default(0),
    embedding: vector("embedding", { dimensions: 1024 }).notNull(), // voyage-3
    indexedAt: timestamp("indexed_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index("idx_orders_order_id").on(table.orderId),
    index("idx_orders_task_number").on(table.taskNumber),
    index("idx_orders_state").on(table.state),
    index("idx_orders_user").on(table.userId),
    index("idx_orders_embedding_hnsw").using("hnsw", table.embedding.op("vector_cosine_ops")),
  ]
)

export type OrderRow = typeof orders.$inferSelect
export type NewOrderRow = typeof orders.$inferInsert
