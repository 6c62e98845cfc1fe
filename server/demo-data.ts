import type { InsertProduct, InsertUser, InsertWebinarRegistrant } from "../drizzle/schema";

/** Staff accounts without a password; they exist to populate listings. */
export const demoUsers: InsertUser[] = [
  { id: "demo-user-1", name: "Jordan Lee", email: "jordan.lee@example.com", loginMethod: "demo", role: "user", isActive: true },
  { id: "demo-user-2", name: "Sam Rivera", email: "sam.rivera@example.com", loginMethod: "demo", role: "user", isActive: true },
  { id: "demo-user-3", name: "Alex Chen", email: "alex.chen@example.com", loginMethod: "demo", role: "user", isActive: false },
];

export const demoProducts: InsertProduct[] = [
  { id: "demo-product-1", name: "Webinar Replay Pass", description: "Unlimited access to recorded sessions", priceCents: 4900, category: "replays", inStock: true },
  { id: "demo-product-2", name: "Speaker Slide Deck Bundle", description: "Slides from every session this season", priceCents: 1900, category: "downloads", inStock: true },
  { id: "demo-product-3", name: "Workshop Seat", description: "One seat at the next live workshop", priceCents: 12900, category: "workshops", inStock: false },
  { id: "demo-product-4", name: "Conference Tote", description: null, priceCents: 1500, category: "merch", inStock: true },
];

/** Registrants in the order sample photos are handed out. */
export const demoRegistrants: Omit<InsertWebinarRegistrant, "photoUrl">[] = [
  {
    id: "demo-registrant-1",
    name: "Priya Natarajan",
    email: "priya.natarajan@example.com",
    company: "Northwind Analytics",
    webinarTitle: "Scaling Photo Storage",
    webinarDate: new Date("2026-11-12T17:00:00.000Z"),
    status: "registered",
    group: "speakers",
    registrationDate: new Date("2026-10-01T09:30:00.000Z"),
  },
  {
    id: "demo-registrant-2",
    name: "Marcus Okafor",
    email: "marcus.okafor@example.com",
    company: "Bluebird Media",
    webinarTitle: "Scaling Photo Storage",
    webinarDate: new Date("2026-11-12T17:00:00.000Z"),
    status: "registered",
    group: "attendees",
    registrationDate: new Date("2026-10-02T14:05:00.000Z"),
  },
  {
    id: "demo-registrant-3",
    name: "Elena Petrova",
    email: "elena.petrova@example.com",
    company: null,
    webinarTitle: "Backups Without Tears",
    webinarDate: new Date("2026-12-03T16:00:00.000Z"),
    status: "attended",
    group: "attendees",
    registrationDate: new Date("2026-10-04T11:45:00.000Z"),
  },
  {
    id: "demo-registrant-4",
    name: "Tomás García",
    email: "tomas.garcia@example.com",
    company: "Harbor Labs",
    webinarTitle: "Backups Without Tears",
    webinarDate: new Date("2026-12-03T16:00:00.000Z"),
    status: "no_show",
    group: null,
    registrationDate: new Date("2026-10-06T08:20:00.000Z"),
  },
];
