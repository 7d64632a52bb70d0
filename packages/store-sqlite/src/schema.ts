import { sqliteTable, integer, text, uniqueIndex } from "drizzle-orm/sqlite-core";

export const packages = sqliteTable("packages", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  trackingNumber: text("tracking_number").notNull().unique(),
  carrier: text("carrier"),
  carrierCode: integer("carrier_code").notNull().default(0),
  description: text("description"),
  status: text("status").notNull().default("pending"),
  lastEvent: text("last_event"),
  lastEventDate: text("last_event_date"),
  lastChecked: text("last_checked"),
  deliveredDate: text("delivered_date"),
  /** JSON text of the last provider payload */
  rawData: text("raw_data"),
  registered: integer("registered", { mode: "boolean" }).notNull().default(false),
  active: integer("active", { mode: "boolean" }).notNull().default(true),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export const trackingEvents = sqliteTable(
  "tracking_events",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    packageId: integer("package_id")
      .notNull()
      .references(() => packages.id),
    eventDate: text("event_date").notNull(),
    location: text("location"),
    description: text("description").notNull(),
    statusCode: text("status_code").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    eventKey: uniqueIndex("tracking_events_event_key").on(table.packageId, table.eventDate, table.description),
  })
);

export const apiUsage = sqliteTable(
  "api_usage",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    apiName: text("api_name").notNull(),
    /** YYYY-MM (UTC) */
    month: text("month").notNull(),
    registrationsUsed: integer("registrations_used").notNull().default(0),
  },
  (table) => ({
    apiMonth: uniqueIndex("api_usage_api_month").on(table.apiName, table.month),
  })
);

export type PackageRow = typeof packages.$inferSelect;
export type TrackingEventRow = typeof trackingEvents.$inferSelect;

/**
 * DDL matching the tables above. The store creates missing tables on open.
 */
export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS packages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tracking_number TEXT NOT NULL UNIQUE,
    carrier TEXT,
    carrier_code INTEGER NOT NULL DEFAULT 0,
    description TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    last_event TEXT,
    last_event_date TEXT,
    last_checked TEXT,
    delivered_date TEXT,
    raw_data TEXT,
    registered INTEGER NOT NULL DEFAULT 0,
    active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tracking_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    package_id INTEGER NOT NULL REFERENCES packages(id),
    event_date TEXT NOT NULL,
    location TEXT,
    description TEXT NOT NULL,
    status_code TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS tracking_events_event_key
    ON tracking_events (package_id, event_date, description);

  CREATE TABLE IF NOT EXISTS api_usage (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    api_name TEXT NOT NULL,
    month TEXT NOT NULL,
    registrations_used INTEGER NOT NULL DEFAULT 0
  );

  CREATE UNIQUE INDEX IF NOT EXISTS api_usage_api_month
    ON api_usage (api_name, month);
`;
