import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { DNSHA_SETTINGS, loadDnsHaSettings } from "../config/dns-ha.config";
import { COMMAND_EXECUTOR } from "./command-executor.interface";
import { ChildProcessExecutor } from "./child-process.executor";
import { TARGET_GATEWAY } from "./target-gateway.interface";
import { TargetGatewayService } from "./target-gateway.service";

@Module({
  providers: [
    {
      provide: DNSHA_SETTINGS,
      useFactory: (config: ConfigService) => loadDnsHaSettings(config),
      inject: [ConfigService],
    },
    {
      provide: COMMAND_EXECUTOR,
      useClass: ChildProcessExecutor,
    },
    {
      provide: TARGET_GATEWAY,
      useClass: TargetGatewayService,
    },
  ],
  exports: [DNSHA_SETTINGS, COMMAND_EXECUTOR, TARGET_GATEWAY],
})
export class GatewayModule {}
