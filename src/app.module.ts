import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { typeOrmConfig } from "./config/typeorm.config";
import { HealthModule } from "./health/health.module";
import { HolidaysModule } from "./holidays/holidays.module";
import { PropertiesModule } from "./properties/properties.module";
import { MovesModule } from "./moves/moves.module";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // TypeORM with async config
    TypeOrmModule.forRootAsync(typeOrmConfig),

    // Core modules
    HealthModule,

    // Feature modules
    HolidaysModule,
    PropertiesModule,
    MovesModule,
  ],
})
export class AppModule {}
