import type { Context } from "hono";

// Context variables set by middleware
export type Variables = {
  requestId: string;
};

export type AppEnv = {
  Variables: Variables;
};

export type AppContext = Context<AppEnv>;
