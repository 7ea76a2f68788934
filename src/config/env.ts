import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors/AppError";

dotenv.config();

export type ClaimMode = "last_write_wins" | "exclusive";

export type PoolSettings = {
  port: number;
  ssl: boolean;
  maxConnections?: number;
  connectTimeoutMs?: number;
  statementTimeoutMs?: number;
};

export type PasswordDatabaseConfig = PoolSettings & {
  mode: "password";
  host: string;
  database: string;
  user: string;
  password: string;
};

export type ManagedIdentityDatabaseConfig = PoolSettings & {
  mode: "managed_identity";
  host: string;
  database: string;
  user: string;
  clientId: string;
  credentialTimeoutMs?: number;
};

export type DatabaseConfig = PasswordDatabaseConfig | ManagedIdentityDatabaseConfig;

type EnvSource = Record<string, string | undefined>;

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const positiveInt = z
  .string()
  .optional()
  .refine((value) => value === undefined || value.trim() === "" || /^[1-9][0-9]*$/.test(value.trim()), {
    message: "must be a positive integer",
  })
  .transform((value) => (value && value.trim() !== "" ? Number(value.trim()) : undefined));

const envSchema = z.object({
  DB_AUTH_MODE: z.enum(["password", "managed_identity"]).optional(),
  DB_HOST: optionalText,
  DB_PORT: positiveInt,
  DB_NAME: optionalText,
  DB_USER: optionalText,
  DB_PASSWORD: optionalText,
  POSTGRES_HOST: optionalText,
  POSTGRES_DB: optionalText,
  POSTGRES_USER: optionalText,
  POSTGRES_PASSWORD: optionalText,
  AZURE_CLIENT_ID: optionalText,
  DB_SSL: z.enum(["true", "false"]).optional(),
  DB_POOL_MAX: positiveInt,
  DB_CONNECT_TIMEOUT_MS: positiveInt,
  DB_STATEMENT_TIMEOUT_MS: positiveInt,
  CREDENTIAL_TIMEOUT_MS: positiveInt,
  CLAIM_MODE: z.enum(["last_write_wins", "exclusive"]).optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;

function parseEnv(env: EnvSource): ParsedEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${message}`);
  }
  return parsed.data;
}

function missingFields(
  mode: DatabaseConfig["mode"],
  fields: Record<string, string | undefined>
): ConfigurationError {
  const missing = Object.entries(fields)
    .filter(([, value]) => value === undefined)
    .map(([key]) => key);
  return new ConfigurationError(
    `Database configuration incomplete for ${mode} mode. Missing: ${missing.join(", ")}`
  );
}

function poolSettings(parsed: ParsedEnv): PoolSettings {
  const settings: PoolSettings = {
    port: parsed.DB_PORT ?? 5432,
    ssl: parsed.DB_SSL === "true",
  };
  if (parsed.DB_POOL_MAX !== undefined) settings.maxConnections = parsed.DB_POOL_MAX;
  if (parsed.DB_CONNECT_TIMEOUT_MS !== undefined) settings.connectTimeoutMs = parsed.DB_CONNECT_TIMEOUT_MS;
  if (parsed.DB_STATEMENT_TIMEOUT_MS !== undefined) settings.statementTimeoutMs = parsed.DB_STATEMENT_TIMEOUT_MS;
  return settings;
}

/**
 * Resolves the database connection strategy from the environment.
 *
 * Returns `null` when no database setting is present at all, which callers treat as
 * "reporting not configured". Partial settings raise a {@link ConfigurationError}.
 * The `POSTGRES_*` names are accepted as fallbacks for the password strategy.
 */
export function loadDatabaseConfig(env: EnvSource = process.env): DatabaseConfig | null {
  const parsed = parseEnv(env);

  const host = parsed.DB_HOST ?? parsed.POSTGRES_HOST;
  const database = parsed.DB_NAME ?? parsed.POSTGRES_DB;
  const user = parsed.DB_USER ?? parsed.POSTGRES_USER;
  const password = parsed.DB_PASSWORD ?? parsed.POSTGRES_PASSWORD;

  const anyProvided = [host, database, user, password, parsed.AZURE_CLIENT_ID].some(
    (value) => value !== undefined
  );
  if (!parsed.DB_AUTH_MODE && !anyProvided) {
    return null;
  }

  const mode = parsed.DB_AUTH_MODE ?? "password";

  if (mode === "managed_identity") {
    const clientId = parsed.AZURE_CLIENT_ID;
    if (!host || !database || !user || !clientId) {
      throw missingFields(mode, { DB_HOST: host, DB_NAME: database, DB_USER: user, AZURE_CLIENT_ID: clientId });
    }
    const config: ManagedIdentityDatabaseConfig = {
      ...poolSettings(parsed),
      mode,
      host,
      database,
      user,
      clientId,
    };
    if (parsed.CREDENTIAL_TIMEOUT_MS !== undefined) {
      config.credentialTimeoutMs = parsed.CREDENTIAL_TIMEOUT_MS;
    }
    return config;
  }

  if (!host || !database || !user || !password) {
    throw missingFields(mode, { DB_HOST: host, DB_NAME: database, DB_USER: user, DB_PASSWORD: password });
  }
  return { ...poolSettings(parsed), mode, host, database, user, password };
}

export function getClaimMode(env: EnvSource = process.env): ClaimMode {
  return parseEnv(env).CLAIM_MODE ?? "last_write_wins";
}
