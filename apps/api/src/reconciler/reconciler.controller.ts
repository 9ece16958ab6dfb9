import { Controller, HttpStatus, Param, Post, Query, Res } from "@nestjs/common";
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { ReconciliationReport } from "@dnsha/core";
import { rethrowProfileError } from "../profiles/profile-errors";
import { ReconcileQueryDto } from "./dto/reconcile-query.dto";
import { ReconcilerService } from "./reconciler.service";
import type { Response } from "express";

@ApiTags("reconciler")
@Controller("profiles")
export class ReconcilerController {
  constructor(private readonly reconcilerService: ReconcilerService) {}

  // ------------------------------------------------------------------
  // POST /profiles/:id/reconcile
  // ------------------------------------------------------------------

  @Post(":id/reconcile")
  @ApiOperation({
    summary: "Apply a profile to the primary instance",
    description:
      "Verifies connectivity, applies blocklists, whitelist and regex rules with " +
      "per-item failure isolation, then rebuilds the index. With dryRun=true no " +
      "instance is touched and the report lists what would be applied.",
  })
  @ApiParam({ name: "id", description: "Profile id" })
  @ApiResponse({ status: 200, description: "Reconciliation succeeded" })
  @ApiResponse({ status: 502, description: "Target unreachable or index rebuild failed" })
  async reconcile(
    @Param("id") profileId: string,
    @Query() query: ReconcileQueryDto,
    @Res() res: Response,
  ): Promise<void> {
    let report: ReconciliationReport;
    try {
      report = await this.reconcilerService.reconcile(profileId, { dryRun: query.dryRun ?? false });
    } catch (err) {
      rethrowProfileError(err);
    }

    res.status(report.overallSuccess ? HttpStatus.OK : HttpStatus.BAD_GATEWAY).json(report);
  }
}
