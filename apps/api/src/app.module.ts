import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ScheduleModule } from "@nestjs/schedule";
import { configValidationSchema } from "./config/validation";
import { GatewayModule } from "./gateway/gateway.module";
import { ProfilesModule } from "./profiles/profiles.module";
import { ReconcilerModule } from "./reconciler/reconciler.module";
import { HealthModule } from "./health/health.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: configValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),
    ScheduleModule.forRoot(),
    GatewayModule,
    HealthModule,
    ProfilesModule,
    ReconcilerModule,
  ],
})
export class AppModule {}
