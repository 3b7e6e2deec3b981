import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is required'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(12 * 60 * 60),
  ADMIN_USERNAME: z.string().optional(),
  ADMIN_PASSWORD: z.string().optional(),
  FACILITY_NAME: z.string().min(1).default('VENGATESAN CAR PARKING'),
  FACILITY_CONTACT: z.string().min(1).default('Tittagudi | Contact: 9791365506'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface FacilityInfo {
  name: string;
  contact: string;
}

export interface AppConfig {
  port: number;
  databaseUrl: string;
  jwtSecret: string;
  /** Token lifetime in seconds. */
  jwtTtlSeconds: number;
  /** Only set when both username and password are given. */
  bootstrapAdmin?: { username: string; password: string };
  facility: FacilityInfo;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Parse the process environment into an explicit config object.
 * Throws ZodError listing every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const adminUsername = parsed.ADMIN_USERNAME?.trim();
  const adminPassword = parsed.ADMIN_PASSWORD;

  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    jwtSecret: parsed.JWT_SECRET,
    jwtTtlSeconds: parsed.JWT_TTL_SECONDS,
    bootstrapAdmin:
      adminUsername && adminPassword
        ? { username: adminUsername, password: adminPassword }
        : undefined,
    facility: {
      name: parsed.FACILITY_NAME,
      contact: parsed.FACILITY_CONTACT,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}
