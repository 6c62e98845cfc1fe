import { COOKIE_NAME, ONE_YEAR_MS, PHOTOS_SUBDIR } from "@shared/const";
import { TRPCError } from "@trpc/server";
import { compare } from "bcryptjs";
import { z } from "zod";
import { getSessionCookieOptions } from "./_core/cookies";
import { systemRouter } from "./_core/systemRouter";
import { adminProcedure, protectedProcedure, publicProcedure, router } from "./_core/trpc";
import { runSync } from "./storage-sync";

// 10 MB of photo, base64-encoded
const MAX_PHOTO_BASE64_LENGTH = 4 * Math.ceil((10 * 1024 * 1024) / 3);
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const registrantId = z.string().trim().min(1).max(64);

export const appRouter = router({
  system: systemRouter,

  auth: router({
    me: publicProcedure.query(opts => opts.ctx.user),

    login: publicProcedure
      .input(z.object({
        email: z.string().email(),
        password: z.string().min(1),
      }))
      .mutation(async ({ ctx, input }) => {
        const { users, sessions } = ctx.services;
        const user = await users.getUserByEmail(input.email);
        const passwordMatches = user?.passwordHash
          ? await compare(input.password, user.passwordHash)
          : false;

        if (!user || !passwordMatches || !user.isActive) {
          throw new TRPCError({ code: "UNAUTHORIZED", message: "Invalid email or password" });
        }

        const token = await sessions.createSessionToken(user.id, { name: user.name ?? "" });
        await users.markSignedIn(user.id);

        const cookieOptions = getSessionCookieOptions(ctx.req);
        ctx.res.cookie(COOKIE_NAME, token, { ...cookieOptions, maxAge: ONE_YEAR_MS });
        return { success: true } as const;
      }),

    logout: publicProcedure.mutation(({ ctx }) => {
      const cookieOptions = getSessionCookieOptions(ctx.req);
      ctx.res.clearCookie(COOKIE_NAME, { ...cookieOptions, maxAge: -1 });
      return {
        success: true,
      } as const;
    }),
  }),

  registrants: router({
    list: protectedProcedure.query(({ ctx }) => ctx.services.registrants.listRegistrants()),

    // Public marketing page
    attendees: publicProcedure.query(({ ctx }) => ctx.services.registrants.listAttendees()),

    uploadPhoto: protectedProcedure
      .input(z.object({
        id: registrantId,
        filename: z.string().trim().min(1).max(255),
        fileData: z
          .string()
          .min(1)
          .max(MAX_PHOTO_BASE64_LENGTH, "Photo must be 10 MB or smaller")
          .regex(BASE64, "fileData must be base64 encoded"),
      }))
      .mutation(({ ctx, input }) => {
        const bytes = Buffer.from(input.fileData, "base64");
        return ctx.services.registrants.uploadPhoto(input.id, bytes, input.filename);
      }),

    deletePhoto: protectedProcedure
      .input(z.object({ id: registrantId }))
      .mutation(({ ctx, input }) => ctx.services.registrants.deletePhoto(input.id)),

    updateNotes: protectedProcedure
      .input(z.object({
        id: registrantId,
        notes: z.string().max(10_000),
      }))
      .mutation(({ ctx, input }) => ctx.services.registrants.updateNotes(input.id, input.notes)),
  }),

  products: router({
    list: publicProcedure
      .input(z.object({
        category: z.string().max(64).optional(),
        inStockOnly: z.boolean().optional(),
      }).optional())
      .query(({ ctx, input }) => ctx.services.products.listProducts(input)),
  }),

  storage: router({
    mode: adminProcedure.query(({ ctx }) => ({
      mode: ctx.services.storageMode,
      bucket: ctx.services.bucket.name ?? null,
      uploadDir: ctx.services.config.uploadDir,
    })),

    // Upload directory -> bucket, keyed by path under the upload directory
    backup: adminProcedure.mutation(({ ctx }) => {
      const { backupSync, config } = ctx.services;
      return runSync("Backup", () => backupSync.backup(config.uploadDir));
    }),

    // Bucket -> upload directory
    restore: adminProcedure
      .input(z.object({ prefix: z.string().max(512).optional() }).optional())
      .mutation(({ ctx, input }) => {
        const { backupSync, config } = ctx.services;
        const prefix = input?.prefix ?? `${PHOTOS_SUBDIR}/`;
        return runSync("Restore", () => backupSync.restore(prefix, config.uploadDir));
      }),
  }),
});

export type AppRouter = typeof appRouter;
