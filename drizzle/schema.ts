import { boolean, index, int, mysqlEnum, mysqlTable, text, timestamp, uniqueIndex, varchar } from "drizzle-orm/mysql-core";

/**
 * Staff accounts that can sign in to manage registrants.
 */
export const users = mysqlTable("users", {
  id: varchar("id", { length: 64 }).primaryKey(),
  name: text("name"),
  email: varchar("email", { length: 320 }),
  /** bcrypt hash — only set for email+password accounts. */
  passwordHash: varchar("passwordHash", { length: 255 }),
  loginMethod: varchar("loginMethod", { length: 64 }),
  role: mysqlEnum("role", ["user", "admin"]).default("user").notNull(),
  isActive: boolean("isActive").default(true).notNull(),
  createdAt: timestamp("createdAt").defaultNow(),
  lastSignedIn: timestamp("lastSignedIn").defaultNow(),
}, (table) => ({
  emailUniqueIdx: uniqueIndex("users_email_unique").on(table.email),
}));

export type User = typeof users.$inferSelect;
export type InsertUser = typeof users.$inferInsert;
/** A user row without its password hash, safe to put in a request context. */
export type SafeUser = Omit<User, "passwordHash">;

export const registrantStatuses = ["registered", "attended", "cancelled", "no_show"] as const;
export type RegistrantStatus = (typeof registrantStatuses)[number];

/**
 * People who signed up for a webinar. `photoUrl` points at the local upload
 * route or the bucket, depending on where the photo was stored.
 */
export const webinarRegistrants = mysqlTable("webinar_registrants", {
  id: varchar("id", { length: 64 }).primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  email: varchar("email", { length: 320 }).notNull(),
  company: varchar("company", { length: 255 }),
  webinarTitle: varchar("webinarTitle", { length: 255 }).notNull(),
  webinarDate: timestamp("webinarDate").notNull(),
  status: mysqlEnum("status", registrantStatuses).default("registered").notNull(),
  group: varchar("group", { length: 64 }),
  notes: text("notes"),
  photoUrl: varchar("photoUrl", { length: 1024 }),
  registrationDate: timestamp("registrationDate").defaultNow().notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  emailIdx: index("idx_registrant_email").on(table.email),
  webinarIdx: index("idx_registrant_webinar").on(table.webinarTitle, table.webinarDate),
}));

export type WebinarRegistrant = typeof webinarRegistrants.$inferSelect;
export type InsertWebinarRegistrant = typeof webinarRegistrants.$inferInsert;

/**
 * Catalogue items offered alongside the webinars. Prices are stored in cents.
 */
export const products = mysqlTable("products", {
  id: varchar("id", { length: 64 }).primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  description: text("description"),
  priceCents: int("priceCents").notNull(),
  category: varchar("category", { length: 64 }),
  inStock: boolean("inStock").default(true).notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  categoryIdx: index("idx_product_category").on(table.category),
}));

export type Product = typeof products.$inferSelect;
export type InsertProduct = typeof products.$inferInsert;
