import { Module } from "@nestjs/common";
import { GatewayModule } from "../gateway/gateway.module";
import { ProfileLoaderService } from "./profile-loader.service";
import { ProfilesController } from "./profiles.controller";

@Module({
  imports: [GatewayModule],
  controllers: [ProfilesController],
  providers: [ProfileLoaderService],
  exports: [ProfileLoaderService],
})
export class ProfilesModule {}
