import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { Logger, ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import { CacheControlInterceptor } from "./common/interceptors/cache-control.interceptor";
import * as packageJson from "../package.json";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["log", "error", "warn"],
  });

  app.disable("x-powered-by");

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error on unknown properties
      transform: true, // Auto-transform payloads to DTO instances
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Global exception filter
  app.useGlobalFilters(new HttpExceptionFilter());

  // Global interceptors
  app.useGlobalInterceptors(new CacheControlInterceptor(), new LoggingInterceptor());

  app.enableCors({
    origin: process.env.NODE_ENV === "production" ? false : "*",
  });

  // API versioning prefix
  app.setGlobalPrefix("v1");

  // Swagger/OpenAPI Documentation
  const config = new DocumentBuilder()
    .setTitle("Defrag Move Ledger API")
    .setDescription(
      "Batches of inventory defragmentation moves for accommodation properties, " +
        "tagged with the public and school holidays they fall into, " +
        "and driven through approval by reviewers.",
    )
    .setVersion(packageJson.version)
    .addTag("health", "Database connectivity and holiday cache status")
    .addTag("properties", "Property registry and region classification")
    .addTag("batches", "Move batches and their progress")
    .addTag("moves", "Approve or reject individual moves")
    .addTag("holidays", "Regional public and school holiday periods")
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("api", app, document, {
    customSiteTitle: "Defrag Move Ledger API Documentation",
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);

  const logger = new Logger("Bootstrap");
  logger.log(`Defrag Move Ledger running on: http://localhost:${port}/v1`);
  logger.log(`API Documentation: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
