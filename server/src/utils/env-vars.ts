import { z } from "zod";

const envScheme = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .optional()
    .default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  APP_PORT: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 3000),
  APP_FRONTEND_URL: z.string().optional(),
  // Basic auth on /api is only enabled when both are set
  APP_API_KEY: z.string().optional(),
  APP_API_SECRET: z.string().optional(),
  DATABASE_FILE: z.string().optional().default("./data/kakeibo.sqlite"),
  MAX_FILE_SIZE: z
    .string()
    .optional()
    // Default file size is 5MB
    .transform((str) => (str && parseInt(str)) || 5242880),
  RECEIPT_DIRECTORY: z.string().optional().default("./uploads/receipts"),
  DATE_SUBDIRECTORIES: z.preprocess(
    (val) => `${val}`.toLowerCase() !== "false",
    z.boolean()
  ),
});

export type Env = z.infer<typeof envScheme>;

export const parseEnv = (source: Record<string, string | undefined>): Env =>
  envScheme.parse(source);

const env = parseEnv(process.env);

export default env;
