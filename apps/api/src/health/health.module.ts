import { Module } from "@nestjs/common";
import { GatewayModule } from "../gateway/gateway.module";
import { HealthController } from "./health.controller";
import { HealthAggregatorService } from "./health-aggregator.service";
import { WatchdogNotifier } from "./watchdog-notifier.service";
import { WatchdogScheduler } from "./watchdog.scheduler";

@Module({
  imports: [GatewayModule],
  controllers: [HealthController],
  providers: [HealthAggregatorService, WatchdogNotifier, WatchdogScheduler],
  exports: [HealthAggregatorService],
})
export class HealthModule {}
