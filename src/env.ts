import type { Config } from "./config";
import type { Services } from "./services";
import type { CurrentUser } from "./types";

// Hono context variables, set once per request by createApp()
export interface AppEnv {
  Variables: {
    config: Config;
    services: Services;
    user: CurrentUser | null;
  };
}
