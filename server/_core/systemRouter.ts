import { publicProcedure, router } from "./trpc";

export const systemRouter = router({
  health: publicProcedure.query(({ ctx }) => ({
    status: "healthy" as const,
    environment: ctx.services.config.environment,
    storage: ctx.services.photoStore.kind,
  })),
});
