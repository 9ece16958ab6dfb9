import { Module } from "@nestjs/common";
import { GatewayModule } from "../gateway/gateway.module";
import { ProfilesModule } from "../profiles/profiles.module";
import { ReconcilerController } from "./reconciler.controller";
import { ReconcilerService } from "./reconciler.service";

@Module({
  imports: [GatewayModule, ProfilesModule],
  controllers: [ReconcilerController],
  providers: [ReconcilerService],
  exports: [ReconcilerService],
})
export class ReconcilerModule {}
