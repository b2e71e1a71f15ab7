// src/db/schema/audit-events.ts

import { pgTable, uuid, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type { AuditEntityType } from "@triage/shared";

/** Chain-of-custody log. Append-only; `id` comes from the emitter so redeliveries collapse. */
export const auditEvents = pgTable(
  "audit_events",
  {
    id: uuid().primaryKey(),
    entityType: text("entity_type").$type<AuditEntityType>().notNull(),
    entityId: text("entity_id").notNull(),
    action: text().notNull(),
    actorId: text("actor_id").notNull(),
    occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull(),
    details: jsonb().$type<Record<string, unknown>>().notNull(),
    recordedAt: timestamp("recorded_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("audit_events_entity_idx").on(table.entityType, table.entityId, table.occurredAt),
    index("audit_events_actor_idx").on(table.actorId),
  ]
);
