import type { users } from "../db/schema/index.js";

export type User = typeof users.$inferSelect;

export type AppEnv = {
  Variables: {
    requestId: string;
    user: User;
  };
};
