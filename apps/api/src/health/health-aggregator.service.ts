import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  aggregateHealth,
  buildRoleGroups,
  deriveReadiness,
  type AggregateHealth,
  type CheckDefinition,
  type CheckResult,
  type ReadinessVerdict,
  type RoleGroup,
} from "@dnsha/core";
import { DNSHA_SETTINGS } from "../config/dns-ha.config";
import type { DnsHaSettings } from "../config/dns-ha.config";
import { TARGET_GATEWAY } from "../gateway/target-gateway.interface";
import type { ITargetGateway } from "../gateway/target-gateway.interface";

/**
 * HealthAggregatorService: probes every registered check and folds the
 * results into one status. Nothing is cached: each call probes afresh.
 */
@Injectable()
export class HealthAggregatorService {
  private readonly logger = new Logger(HealthAggregatorService.name);
  private readonly groups: RoleGroup[];

  constructor(
    @Inject(TARGET_GATEWAY) private readonly gateway: ITargetGateway,
    @Inject(DNSHA_SETTINGS) private readonly settings: DnsHaSettings,
  ) {
    this.groups = buildRoleGroups(settings.health.checks, settings.health.optionalRoles);
  }

  get registry(): readonly CheckDefinition[] {
    return this.settings.health.checks;
  }

  get roleGroups(): readonly RoleGroup[] {
    return this.groups;
  }

  /**
   * Run all probes concurrently. Results are assembled in registry order,
   * so `errors` never depends on which probe finished first.
   */
  async evaluate(now?: Date): Promise<AggregateHealth> {
    const settled = await Promise.allSettled(this.registry.map((check) => this.gateway.probe(check)));

    const results = settled.map((outcome, i): CheckResult => {
      if (outcome.status === "fulfilled") {
        return outcome.value;
      }
      const check = this.registry[i];
      const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      return {
        checkName: check.name,
        status: "fail",
        detail: { role: check.role, host: check.host, port: check.port, error: reason },
      };
    });

    const health = aggregateHealth(results, this.groups, now ?? new Date());
    if (health.status !== "healthy") {
      this.logger.warn(`Health ${health.status}: failing ${health.errors.join(", ")}`);
    }
    return health;
  }

  /** Readiness from an evaluation already made. */
  readiness(health: Pick<AggregateHealth, "checks" | "timestamp">): ReadinessVerdict {
    return deriveReadiness(health, this.groups, new Date(health.timestamp));
  }

  async evaluateReadiness(): Promise<ReadinessVerdict> {
    return this.readiness(await this.evaluate());
  }
}
