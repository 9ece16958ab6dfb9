import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { SwaggerModule, DocumentBuilder } from "@nestjs/swagger";
import helmet from "helmet";
import { DNSHA_VERSION } from "@dnsha/core";
import { AppModule } from "./app.module";
import { GlobalExceptionFilter } from "./common/http-exception.filter";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger("Bootstrap");

  app.use(helmet());

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
  }));

  app.useGlobalFilters(new GlobalExceptionFilter());
  app.enableShutdownHooks();

  const config = app.get(ConfigService);

  if (config.get<string>("NODE_ENV") !== "production") {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle("DNS HA control plane")
        .setDescription("Profile reconciliation and aggregated health for redundant DNS filtering")
        .setVersion(DNSHA_VERSION)
        .build(),
    );
    SwaggerModule.setup("api/docs", app, document);
  }

  const port = config.get<number>("PORT") ?? 8888;
  await app.listen(port);

  logger.log(`DNS HA API listening on port ${port}`);
  if (config.get<string>("NODE_ENV") !== "production") {
    logger.log(`Swagger docs at http://localhost:${port}/api/docs`);
  }
}

bootstrap().catch((err: unknown) => {
  new Logger("Bootstrap").error("Failed to start", err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
