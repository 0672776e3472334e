import { TypeOrmModuleAsyncOptions } from "@nestjs/typeorm";
import { ConfigModule } from "@nestjs/config";
import { getDatabaseConfig } from "./database.config";

export const typeOrmConfig: TypeOrmModuleAsyncOptions = {
  imports: [ConfigModule],
  useFactory: () => {
    const dbConfig = getDatabaseConfig();

    return {
      type: "postgres" as const,
      host: dbConfig.host,
      port: dbConfig.port,
      username: dbConfig.username,
      password: dbConfig.password,
      database: dbConfig.database,
      entities: [__dirname + "/../**/*.entity{.ts,.js}"],
      synchronize: dbConfig.synchronize, // Auto-sync schema (dev only!)
      logging: dbConfig.logging,
      extra: {
        max: dbConfig.poolMax,
        connectionTimeoutMillis: dbConfig.poolAcquireTimeoutMs,
      },
    };
  },
};
