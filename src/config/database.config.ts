export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
  /**
   * Upper bound on concurrent connections. Kept deliberately small: conflicting
   * ledger writes queue on the pool instead of racing.
   */
  poolMax: number;
  poolAcquireTimeoutMs: number;
}

export const getDatabaseConfig = (): DatabaseConfig => {
  const nodeEnv = process.env.NODE_ENV;
  const dbName = process.env.DB_DATABASE || "defrag";

  // Tests must never point at a development or production database
  if (nodeEnv === "test" && !dbName.includes("test")) {
    throw new Error(
      `NODE_ENV=test but DB_DATABASE="${dbName}" does not contain "test". ` +
        `Set DB_DATABASE=defrag_test in .env.test`,
    );
  }

  return {
    host: process.env.DB_HOST || "localhost",
    port: parseInt(process.env.DB_PORT || "5432", 10),
    username: process.env.DB_USERNAME || "defrag",
    password: process.env.DB_PASSWORD || "defrag_dev_password",
    database: dbName,
    synchronize: process.env.DB_SYNCHRONIZE === "true",
    logging: process.env.DB_LOGGING === "true",
    poolMax: parseInt(process.env.DB_POOL_MAX || "3", 10),
    poolAcquireTimeoutMs: parseInt(
      process.env.DB_POOL_ACQUIRE_TIMEOUT_MS || "5000",
      10,
    ),
  };
};
