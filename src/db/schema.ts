import { sqliteTable, text, integer, real, primaryKey, index, unique } from "drizzle-orm/sqlite-core";

// Mirrors db/schema.sql, which is what actually creates the tables.

export const locations = sqliteTable(
  "locations",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    provider: text("provider", { enum: ["playtomic"] }).notNull(),
    slug: text("slug").notNull(),
    providerLocationId: text("provider_location_id").notNull(), // Playtomic tenant_id
    name: text("name").notNull(),
    timezone: text("timezone").notNull(),
    street: text("street"),
    city: text("city"),
    postalCode: text("postal_code"),
    country: text("country"),
    latitude: real("latitude"),
    longitude: real("longitude"),
    phone: text("phone"),
    website: text("website"),
    openingHours: text("opening_hours"), // JSON object keyed by weekday
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    uniqueSlug: unique().on(table.provider, table.slug),
  })
);

export const courts = sqliteTable(
  "courts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    locationId: integer("location_id")
      .references(() => locations.id, { onDelete: "cascade" })
      .notNull(),
    providerCourtId: text("provider_court_id").notNull(),
    name: text("name").notNull(),
    sport: text("sport"),
    isIndoor: integer("is_indoor", { mode: "boolean" }).notNull().default(false),
    isDouble: integer("is_double", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    uniqueProviderCourt: unique().on(table.locationId, table.providerCourtId),
  })
);

export const availabilities = sqliteTable(
  "availabilities",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    courtId: integer("court_id")
      .references(() => courts.id, { onDelete: "cascade" })
      .notNull(),
    date: text("date").notNull(), // YYYY-MM-DD, location local
    startTime: text("start_time").notNull(), // HH:MM
    endTime: text("end_time").notNull(),
    durationMinutes: integer("duration_minutes").notNull(),
    price: real("price"),
    currency: text("currency"),
    isAvailable: integer("is_available", { mode: "boolean" }).notNull().default(true),
    fetchedAt: text("fetched_at").notNull(),
  },
  (table) => ({
    // No duplicate slot per court
    uniqueSlot: unique().on(table.courtId, table.date, table.startTime, table.endTime),
    courtDateIdx: index("idx_availabilities_court_date").on(table.courtId, table.date),
  })
);

export const cacheEntries = sqliteTable(
  "cache_entries",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    locationId: integer("location_id")
      .references(() => locations.id, { onDelete: "cascade" })
      .notNull(),
    date: text("date").notNull(),
    fetchedAt: text("fetched_at").notNull(),
    slotCount: integer("slot_count").notNull(),
    skippedCount: integer("skipped_count").notNull(),
  },
  (table) => ({
    uniqueScope: unique().on(table.locationId, table.date),
  })
);

export const searchOrders = sqliteTable(
  "search_orders",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: text("user_id").notNull(),
    date: text("date").notNull(),
    endDate: text("end_date"), // inclusive, null = single day
    startTime: text("start_time").notNull(),
    endTime: text("end_time").notNull(),
    durationMinutes: integer("duration_minutes").notNull(),
    courtType: text("court_type", { enum: ["all", "indoor", "outdoor"] }).notNull().default("all"),
    courtConfig: text("court_config", { enum: ["all", "single", "double"] }).notNull().default("all"),
    isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
    notifyEmail: text("notify_email"),
    lastCheckedAt: text("last_checked_at"),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    userIdx: index("idx_search_orders_user").on(table.userId),
    activeIdx: index("idx_search_orders_active").on(table.isActive),
  })
);

export const searchOrderLocations = sqliteTable(
  "search_order_locations",
  {
    searchOrderId: integer("search_order_id")
      .references(() => searchOrders.id, { onDelete: "cascade" })
      .notNull(),
    locationId: integer("location_id")
      .references(() => locations.id, { onDelete: "cascade" })
      .notNull(),
    position: integer("position").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.searchOrderId, table.locationId] }),
  })
);

export const searchOrderNotifications = sqliteTable(
  "search_order_notifications",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    searchOrderId: integer("search_order_id")
      .references(() => searchOrders.id, { onDelete: "cascade" })
      .notNull(),
    // Null once a data refresh removed the row; the snapshot below survives
    availabilityId: integer("availability_id").references(() => availabilities.id, {
      onDelete: "set null",
    }),
    locationId: integer("location_id").notNull(),
    locationName: text("location_name").notNull(),
    courtName: text("court_name").notNull(),
    date: text("date").notNull(),
    startTime: text("start_time").notNull(),
    endTime: text("end_time").notNull(),
    price: real("price"),
    currency: text("currency"),
    bookingUrl: text("booking_url"),
    notified: integer("notified", { mode: "boolean" }).notNull().default(false),
    notifiedAt: text("notified_at"),
    read: integer("read", { mode: "boolean" }).notNull().default(false),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    uniqueMatch: unique().on(table.searchOrderId, table.availabilityId),
    orderIdx: index("idx_notifications_order").on(table.searchOrderId),
  })
);

export type Location = typeof locations.$inferSelect;
export type NewLocation = typeof locations.$inferInsert;
export type Court = typeof courts.$inferSelect;
export type Availability = typeof availabilities.$inferSelect;
export type CacheEntry = typeof cacheEntries.$inferSelect;
export type SearchOrderRow = typeof searchOrders.$inferSelect;
export type SearchOrderNotification = typeof searchOrderNotifications.$inferSelect;
