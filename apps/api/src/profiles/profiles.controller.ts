import { Controller, Get, Param } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiParam } from "@nestjs/swagger";
import type { ProfileSpec } from "@dnsha/core";
import { ProfileLoaderService } from "./profile-loader.service";
import { rethrowProfileError } from "./profile-errors";

@ApiTags("profiles")
@Controller("profiles")
export class ProfilesController {
  constructor(private readonly profiles: ProfileLoaderService) {}

  @Get()
  @ApiOperation({ summary: "List available profile ids" })
  async list(): Promise<{ profiles: string[] }> {
    return { profiles: await this.profiles.list() };
  }

  @Get(":id")
  @ApiOperation({ summary: "Show a parsed profile" })
  @ApiParam({ name: "id", description: "Profile id (file name without .yml)" })
  async get(@Param("id") id: string): Promise<ProfileSpec> {
    try {
      return await this.profiles.load(id);
    } catch (err) {
      return rethrowProfileError(err);
    }
  }
}
