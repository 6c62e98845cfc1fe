import { asc, desc, eq } from "drizzle-orm";
import { drizzle } from "drizzle-orm/mysql2";
import { products, users, webinarRegistrants } from "../drizzle/schema";
import type {
  InsertProduct,
  InsertUser,
  InsertWebinarRegistrant,
  Product,
  SafeUser,
  User,
  WebinarRegistrant,
} from "../drizzle/schema";
import { errorMeta, logger } from "./_core/logger";

const log = logger.child({ component: "db" });

export type Database = ReturnType<typeof drizzle>;

const safeUserFields = {
  id: users.id,
  name: users.name,
  email: users.email,
  loginMethod: users.loginMethod,
  role: users.role,
  isActive: users.isActive,
  createdAt: users.createdAt,
  lastSignedIn: users.lastSignedIn,
} as const;

/**
 * Build the drizzle instance. mysql2 opens pool connections on first query,
 * so this succeeds without a reachable server.
 */
export function connectDatabase(databaseUrl: string): Database {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  return drizzle(databaseUrl);
}

export interface UserRepository {
  getUser(id: string): Promise<SafeUser | undefined>;
  /** Includes the password hash; only the login path should call this. */
  getUserByEmail(email: string): Promise<User | undefined>;
  upsertUser(user: InsertUser): Promise<void>;
  markSignedIn(id: string): Promise<void>;
}

export interface RegistrantRepository {
  listRegistrants(): Promise<WebinarRegistrant[]>;
  getRegistrant(id: string): Promise<WebinarRegistrant | undefined>;
  setPhotoUrl(id: string, photoUrl: string | null): Promise<void>;
  setNotes(id: string, notes: string): Promise<void>;
  /** Insert, or overwrite every given column of the row with the same id. */
  upsertRegistrant(registrant: InsertWebinarRegistrant): Promise<void>;
}

export interface ProductRepository {
  /** Ordered by name. */
  listProducts(): Promise<Product[]>;
  upsertProduct(product: InsertProduct): Promise<void>;
}

export function createUserRepository(db: Database): UserRepository {
  return {
    async getUser(id) {
      const result = await db.select(safeUserFields).from(users).where(eq(users.id, id)).limit(1);
      return result.length > 0 ? result[0] : undefined;
    },

    async getUserByEmail(email) {
      const result = await db
        .select()
        .from(users)
        .where(eq(users.email, email.trim().toLowerCase()))
        .limit(1);
      return result.length > 0 ? result[0] : undefined;
    },

    async upsertUser(user) {
      if (!user.id) {
        throw new Error("User ID is required for upsert");
      }

      try {
        const values: InsertUser = { id: user.id };
        const updateSet: Record<string, unknown> = {};

        const nullableFields = ["name", "email", "passwordHash", "loginMethod"] as const;
        type NullableField = (typeof nullableFields)[number];

        const assignNullable = (field: NullableField) => {
          const value = user[field];
          if (value === undefined) return;
          const normalized = field === "email" && value ? value.trim().toLowerCase() : value ?? null;
          values[field] = normalized;
          updateSet[field] = normalized;
        };

        nullableFields.forEach(assignNullable);

        if (user.role !== undefined) {
          values.role = user.role;
          updateSet.role = user.role;
        }
        if (user.isActive !== undefined) {
          values.isActive = user.isActive;
          updateSet.isActive = user.isActive;
        }
        if (user.lastSignedIn !== undefined) {
          values.lastSignedIn = user.lastSignedIn;
          updateSet.lastSignedIn = user.lastSignedIn;
        }

        if (Object.keys(updateSet).length === 0) {
          updateSet.lastSignedIn = new Date();
        }

        await db.insert(users).values(values).onDuplicateKeyUpdate({ set: updateSet });
      } catch (error) {
        log.error("Failed to upsert user", { userId: user.id, ...errorMeta(error) });
        throw error;
      }
    },

    async markSignedIn(id) {
      await db.update(users).set({ lastSignedIn: new Date() }).where(eq(users.id, id));
    },
  };
}

export function createRegistrantRepository(db: Database): RegistrantRepository {
  return {
    async listRegistrants() {
      return await db
        .select()
        .from(webinarRegistrants)
        .orderBy(desc(webinarRegistrants.registrationDate));
    },

    async getRegistrant(id) {
      const result = await db
        .select()
        .from(webinarRegistrants)
        .where(eq(webinarRegistrants.id, id))
        .limit(1);
      return result.length > 0 ? result[0] : undefined;
    },

    async setPhotoUrl(id, photoUrl) {
      await db.update(webinarRegistrants).set({ photoUrl }).where(eq(webinarRegistrants.id, id));
    },

    async setNotes(id, notes) {
      await db.update(webinarRegistrants).set({ notes }).where(eq(webinarRegistrants.id, id));
    },

    async upsertRegistrant(registrant) {
      const { id: _id, ...updateSet } = registrant;
      await db.insert(webinarRegistrants).values(registrant).onDuplicateKeyUpdate({ set: updateSet });
    },
  };
}

export function createProductRepository(db: Database): ProductRepository {
  return {
    async listProducts() {
      return await db.select().from(products).orderBy(asc(products.name));
    },

    async upsertProduct(product) {
      const { id: _id, ...updateSet } = product;
      await db.insert(products).values(product).onDuplicateKeyUpdate({ set: updateSet });
    },
  };
}
