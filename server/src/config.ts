import { z } from "zod";
import { ConfigError } from "./errors";
import { logger, type LogLevel } from "./logger";

const DEV_JWT_SECRET = "development-only-jwt-secret";

// Relative time spans as jose's setExpirationTime reads them, e.g. "24h", "90 minutes", "7d".
const TIME_SPAN = /^(\d+|\d+\.\d+) ?(seconds?|secs?|s|minutes?|mins?|m|hours?|hrs?|h|days?|d|weeks?|w|years?|yrs?|y)$/i;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_EXPIRES_IN: z
    .string()
    .regex(TIME_SPAN, 'must be a time span such as "15m", "24h" or "7 days"')
    .default("24h"),
  ALLOW_ANONYMOUS: booleanFlag.default("true"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  CORS_ORIGIN: z.string().default("*"),
});

export type AppConfig = {
  port: number;
  nodeEnv: "development" | "test" | "production";
  jwtSecret: string;
  jwtExpiresIn: string;
  allowAnonymous: boolean;
  logLevel: LogLevel;
  corsOrigin: string;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const values = parsed.data;

  let jwtSecret = values.JWT_SECRET;
  if (!jwtSecret) {
    if (values.NODE_ENV === "production") {
      throw new ConfigError(["JWT_SECRET: required in production"]);
    }
    logger.warn("JWT_SECRET is not set; using the development placeholder");
    jwtSecret = DEV_JWT_SECRET;
  }

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    jwtSecret,
    jwtExpiresIn: values.JWT_EXPIRES_IN,
    allowAnonymous: values.ALLOW_ANONYMOUS,
    logLevel: values.LOG_LEVEL,
    corsOrigin: values.CORS_ORIGIN,
  };
};
