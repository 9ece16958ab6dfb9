import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ReconciliationReport } from "@dnsha/core";
import { DNSHA_SETTINGS } from "../config/dns-ha.config";
import type { DnsHaSettings } from "../config/dns-ha.config";
import { TARGET_GATEWAY } from "../gateway/target-gateway.interface";
import type { ITargetGateway } from "../gateway/target-gateway.interface";
import { ProfileLoaderService } from "../profiles/profile-loader.service";
import { ReconciliationPipeline } from "./reconciliation-pipeline";

export interface ReconcileOptions {
  dryRun?: boolean;
}

/**
 * ReconcilerService: entry point for profile reconciliation.
 *
 * Holds no run state: every call builds a fresh ReconciliationPipeline.
 * Concurrent runs against the same target are not serialized.
 */
@Injectable()
export class ReconcilerService {
  private readonly logger = new Logger(ReconcilerService.name);

  constructor(
    @Inject(TARGET_GATEWAY) private readonly gateway: ITargetGateway,
    @Inject(DNSHA_SETTINGS) private readonly settings: DnsHaSettings,
    private readonly profiles: ProfileLoaderService,
  ) {}

  async reconcile(profileId: string, options: ReconcileOptions = {}): Promise<ReconciliationReport> {
    const pipeline = new ReconciliationPipeline(this.gateway, this.profiles, {
      profileId,
      target: this.settings.primary,
      dryRun: options.dryRun ?? false,
    });

    const report = await pipeline.run();

    if (report.overallSuccess) {
      this.logger.log(`Reconciliation of ${profileId} succeeded${report.dryRun ? " (dry-run)" : ""}`);
    } else {
      this.logger.error(`Reconciliation of ${profileId} failed: ${report.abortReason}`);
    }
    return report;
  }
}
