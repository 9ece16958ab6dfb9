import { Logger } from "@nestjs/common";
import {
  countEnabledItems,
  emptyStageCounts,
  skipped,
  tallyOutcome,
  type ItemStage,
  type OperationOutcome,
  type PipelineStage,
  type ProfileSpec,
  type RebuildResult,
  type ReconciliationReport,
  type ReportItem,
  type StageCounts,
} from "@dnsha/core";
import type { TargetInstance } from "../config/dns-ha.config";
import type { ITargetGateway } from "../gateway/target-gateway.interface";
import type { TargetOperation } from "../gateway/target-operations";
import type { IProfileSource } from "../profiles/profile-loader.service";

export interface PipelineOptions {
  profileId: string;
  target: TargetInstance;
  dryRun: boolean;
}

interface PlannedItem {
  stage: ItemStage;
  subject: string;
  label: string;
  /** Undefined when the item is recorded as skipped without an attempt. */
  operation?: TargetOperation;
  skipReason?: string;
}

/**
 * ReconciliationPipeline: one reconciliation run of a profile against a
 * target. Instances hold the state of a single run and are not reused.
 *
 * Stages run strictly in order:
 *  1. load                 parse + validate the profile (throws ProfileLoadError)
 *  2. verify_connectivity  live runs only; abort before any mutation if unreachable
 *  3. blocklists           enabled entries, continue past individual failures
 *  4. whitelist            every non-blank domain of every category, same isolation
 *  5. regexPatterns        enabled rules, same isolation
 *  6. rebuild_index        live runs only; the commit point, failure fails the run
 *  7. report
 */
export class ReconciliationPipeline {
  private readonly logger = new Logger(ReconciliationPipeline.name);
  private readonly stages: Record<ItemStage, StageCounts> = {
    blocklists: emptyStageCounts(),
    whitelist: emptyStageCounts(),
    regexPatterns: emptyStageCounts(),
  };
  private readonly items: ReportItem[] = [];
  private readonly visited: PipelineStage[] = [];
  private started = false;

  constructor(
    private readonly gateway: ITargetGateway,
    private readonly profiles: IProfileSource,
    private readonly options: PipelineOptions,
  ) {}

  /** Stages entered so far, in order. */
  get stageHistory(): readonly PipelineStage[] {
    return this.visited;
  }

  async run(): Promise<ReconciliationReport> {
    if (this.started) {
      throw new Error("ReconciliationPipeline instances run once; create a new one per run");
    }
    this.started = true;

    const startedAt = new Date();
    const { target, dryRun, profileId } = this.options;

    this.enter("load");
    const profile = await this.profiles.load(profileId);
    this.logger.log(
      `Applying profile ${profile.name} to ${target.name} (${target.container}) in ${dryRun ? "DRY-RUN" : "LIVE"} mode`,
    );

    if (!dryRun) {
      this.enter("verify_connectivity");
      const connectivity = await this.gateway.verifyConnectivity(target);
      if (!connectivity.reachable) {
        const reason = connectivity.reason ?? `Target ${target.name} is unreachable`;
        this.logger.error(`Cannot proceed without access to ${target.name}: ${reason}`);
        return this.report(profile, startedAt, { executed: false }, reason);
      }
    }

    await this.applyStage("blocklists", this.planBlocklists(profile));
    await this.applyStage("whitelist", this.planWhitelist(profile));
    await this.applyStage("regexPatterns", this.planRegexPatterns(profile));

    let rebuild: RebuildResult = { executed: false };
    let abortReason: string | undefined;
    if (!dryRun) {
      this.enter("rebuild_index");
      this.logger.log(`Rebuilding index on ${target.name} (this may take a few minutes)`);
      const outcome = await this.gateway.apply({ type: "rebuild-index" }, target);
      rebuild = { executed: true, outcome };
      if (outcome.kind === "failed") {
        abortReason = `Index rebuild failed: ${outcome.reason}`;
        this.logger.error(abortReason);
      }
    }

    return this.report(profile, startedAt, rebuild, abortReason);
  }

  // ---- Planning ------------------------------------------------------------

  private planBlocklists(profile: ProfileSpec): PlannedItem[] {
    return profile.blocklists.map((entry): PlannedItem => {
      const base = { stage: "blocklists" as const, subject: entry.url, label: entry.name };
      if (!entry.enabled) {
        return { ...base, skipReason: "disabled" };
      }
      if (entry.url === "") {
        return { ...base, skipReason: "no URL" };
      }
      return { ...base, operation: { type: "add-blocklist", url: entry.url, comment: entry.name } };
    });
  }

  private planWhitelist(profile: ProfileSpec): PlannedItem[] {
    return profile.whitelist.flatMap((category) =>
      category.domains.map((domain): PlannedItem => {
        const base = { stage: "whitelist" as const, subject: domain, label: category.name };
        if (domain === "") {
          return { ...base, skipReason: "no domain" };
        }
        return { ...base, operation: { type: "add-whitelist", domain } };
      }),
    );
  }

  private planRegexPatterns(profile: ProfileSpec): PlannedItem[] {
    return profile.regexPatterns.map((rule): PlannedItem => {
      const base = { stage: "regexPatterns" as const, subject: rule.pattern, label: rule.description };
      if (!rule.enabled) {
        return { ...base, skipReason: "disabled" };
      }
      if (rule.pattern === "") {
        return { ...base, skipReason: "no pattern" };
      }
      return { ...base, operation: { type: "add-regex", pattern: rule.pattern } };
    });
  }

  // ---- Execution -----------------------------------------------------------

  /**
   * Apply a stage's items sequentially in declaration order. The gateway
   * never rejects, so one failing item cannot stop the ones after it.
   */
  private async applyStage(stage: ItemStage, planned: PlannedItem[]): Promise<void> {
    this.enter(stage);
    if (planned.length === 0) {
      this.logger.log(`No ${stage} defined in profile`);
      return;
    }

    for (const item of planned) {
      const outcome: OperationOutcome = item.operation
        ? await this.gateway.apply(item.operation, this.options.target, { dryRun: this.options.dryRun })
        : skipped(item.skipReason ?? "skipped");

      this.stages[stage] = tallyOutcome(this.stages[stage], outcome);
      this.items.push({ stage, subject: item.subject, label: item.label, outcome });

      if (outcome.kind === "failed") {
        this.logger.warn(`${stage}: ${item.label} (${item.subject}) failed: ${outcome.reason}`);
      } else {
        this.logger.debug(`${stage}: ${item.label} (${item.subject}) ${outcome.kind}`);
      }
    }

    const counts = this.stages[stage];
    this.logger.log(
      `${stage}: ${counts.attempted} attempted, ${counts.added} added, ` +
        `${counts.alreadyPresent} already present, ${counts.skipped} skipped, ${counts.failed} failed`,
    );
  }

  private report(
    profile: ProfileSpec,
    startedAt: Date,
    rebuild: RebuildResult,
    abortReason?: string,
  ): ReconciliationReport {
    this.enter("report");
    const durationMs = Date.now() - startedAt.getTime();
    const overallSuccess = abortReason === undefined;

    if (overallSuccess) {
      this.logger.log(
        this.options.dryRun
          ? `Dry-run of ${profile.name} completed in ${durationMs}ms; no changes were made (${JSON.stringify(countEnabledItems(profile))})`
          : `Profile ${profile.name} applied to ${this.options.target.name} in ${durationMs}ms`,
      );
    }

    return {
      profile: profile.name,
      target: this.options.target.name,
      dryRun: this.options.dryRun,
      overallSuccess,
      ...(abortReason !== undefined ? { abortReason } : {}),
      warnings: [...profile.warnings],
      stages: {
        blocklists: { ...this.stages.blocklists },
        whitelist: { ...this.stages.whitelist },
        regexPatterns: { ...this.stages.regexPatterns },
      },
      rebuild,
      items: [...this.items],
      startedAt: startedAt.toISOString(),
      durationMs,
    };
  }

  private enter(stage: PipelineStage): void {
    this.visited.push(stage);
    this.logger.debug(`[${this.options.profileId}] stage ${stage}`);
  }
}
