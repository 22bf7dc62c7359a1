// Environment variables are read once here, at startup. A local .env file is
// loaded first when present.

import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { envSchema } from "./config";

export const env = createEnv({
  /**
   * Server-side environment variables schema.
   */
  server: envSchema,

  /**
   * Runtime environment variables.
   */
  runtimeEnv: process.env,

  /**
   * Skip validation in certain environments.
   */
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,

  /**
   * Treat empty strings as undefined.
   * Useful for optional env vars that might be set to "".
   */
  emptyStringAsUndefined: true,
});
