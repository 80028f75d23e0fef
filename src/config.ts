/**
 * Configuration for a DataSource.
 *
 * - defineConfig(): validates a literal options object and returns it typed
 * - env(): reads a required environment variable
 * - configFromEnv(): options assembled from the DATABASE_* variables
 *
 * Nothing here reads .env files. Load them before the config module runs,
 * e.g. with `node --env-file=.env`.
 */

import { ConfigurationError } from "./errors";
import type { DataSourceOptions } from "./types";

/**
 * Validate DataSource options and return them unchanged, keeping the
 * literal type of the object.
 *
 * @example
 * ```typescript
 * import { defineConfig, env } from 'rowbinder'
 *
 * export default defineConfig({
 *   type: 'postgres',
 *   url: env('DATABASE_URL'),
 *   repositories: [UserRepository],
 *   logging: process.env.NODE_ENV === 'development',
 * })
 * ```
 */
export function defineConfig<T extends DataSourceOptions>(options: T): T {
  validateConfig(options);
  return options;
}

/**
 * Value of an environment variable. An empty variable counts as unset.
 *
 * @example
 * ```typescript
 * const url = env('DATABASE_URL') // throws if not set
 * const poolSize = env('DATABASE_POOL_SIZE', '10')
 * ```
 *
 * @throws ConfigurationError if variable is not set and no default provided
 */
export function env(name: string, defaultValue?: string): string {
  const value = process.env[name];

  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Missing required environment variable: ${name}\n` +
        `Please set ${name} or provide a default in your config.`
    );
  }

  return value;
}

/**
 * Build DataSource options from the environment:
 *
 * - DATABASE_URL: `file:` path or `:memory:` for SQLite, otherwise a
 *   PostgreSQL connection string (required)
 * - DATABASE_USER, DATABASE_PASSWORD: PostgreSQL credentials
 * - DATABASE_POOL_SIZE: maximum pooled connections (default 10)
 * - DATABASE_SSL: "true" to connect over TLS
 *
 * Anything in `overrides` (repositories, logging, ...) is merged on top.
 */
export function configFromEnv(
  overrides: Partial<Pick<DataSourceOptions, "repositories" | "synchronize" | "logging">> = {}
): DataSourceOptions {
  const url = env("DATABASE_URL");

  if (url.startsWith("file:") || url === ":memory:") {
    return defineConfig({ type: "sqlite", dbPath: url, ...overrides });
  }

  const poolSize = Number(env("DATABASE_POOL_SIZE", "10"));
  if (!Number.isInteger(poolSize) || poolSize < 1) {
    throw new ConfigurationError(
      `DATABASE_POOL_SIZE must be a positive integer, got "${process.env.DATABASE_POOL_SIZE}".`
    );
  }

  return defineConfig({
    type: "postgres",
    url,
    user: process.env.DATABASE_USER || undefined,
    password: process.env.DATABASE_PASSWORD || undefined,
    poolSize,
    ssl: env("DATABASE_SSL", "false") === "true",
    ...overrides,
  });
}

function validateConfig(options: DataSourceOptions): void {
  switch (options.type) {
    case "sqlite":
      if (!options.dbPath) {
        throw new ConfigurationError(
          'DataSourceOptions.dbPath is required for SQLite. \n' +
            'Example: { type: "sqlite", dbPath: "app.db" }'
        );
      }
      break;
    case "postgres":
      if (!options.url) {
        throw new ConfigurationError(
          'DataSourceOptions.url is required for PostgreSQL. \n' +
            'Example: { type: "postgres", url: "postgres://localhost:5432/app" }'
        );
      }
      if (options.poolSize !== undefined && options.poolSize < 1) {
        throw new ConfigurationError("DataSourceOptions.poolSize must be at least 1.");
      }
      break;
    case "custom":
      if (!options.provider) {
        throw new ConfigurationError(
          "DataSourceOptions.provider is required when type is custom."
        );
      }
      break;
    default:
      throw new ConfigurationError(
        `Unsupported DataSourceOptions.type. Expected "postgres", "sqlite" or "custom".`
      );
  }
}
