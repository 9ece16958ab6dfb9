import { Inject, Injectable, Logger } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import { skipped } from "@dnsha/core";
import type { AggregateHealth, OperationOutcome } from "@dnsha/core";
import { DNSHA_SETTINGS } from "../config/dns-ha.config";
import type { DnsHaSettings } from "../config/dns-ha.config";
import { TARGET_GATEWAY } from "../gateway/target-gateway.interface";
import type { ITargetGateway } from "../gateway/target-gateway.interface";
import { HealthAggregatorService } from "./health-aggregator.service";
import { WatchdogNotifier } from "./watchdog-notifier.service";

export interface HealAttempt {
  container: string;
  /** `skipped` when the cooldown or an open breaker held the restart back. */
  outcome: OperationOutcome;
}

export interface WatchdogTick {
  status: AggregateHealth["status"];
  consecutiveFailures: number;
  restarted: HealAttempt[];
}

/** Restart bookkeeping for one container. */
export interface RestartState {
  attempts: number;
  lastRestartAt?: number;
  circuitOpen: boolean;
}

export const COOLDOWN_REASON = "restart cooldown";
export const CIRCUIT_OPEN_REASON = "circuit open";

/**
 * Auto-heal watchdog. Restarts the containers behind failing checks once
 * health has been non-healthy for `failThreshold` evaluations in a row.
 *
 * Each container gets at most `maxRestartAttempts` restarts, spaced at
 * least `restartCooldownMs` apart. One more needed restart opens its
 * breaker and no further restarts are made until all of its checks pass
 * again. All of this state lives here, outside the request path.
 */
@Injectable()
export class WatchdogScheduler {
  private readonly logger = new Logger(WatchdogScheduler.name);
  private consecutiveFailures = 0;
  private running = false;
  private readonly restarts = new Map<string, RestartState>();

  constructor(
    private readonly aggregator: HealthAggregatorService,
    @Inject(TARGET_GATEWAY) private readonly gateway: ITargetGateway,
    @Inject(DNSHA_SETTINGS) private readonly settings: DnsHaSettings,
    private readonly notifier: WatchdogNotifier,
  ) {}

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  restartState(container: string): Readonly<RestartState> | undefined {
    return this.restarts.get(container);
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async handleWatchdogCron(): Promise<void> {
    if (!this.settings.watchdog.enabled || this.running) {
      return;
    }
    this.running = true;
    try {
      await this.tick();
    } catch (err) {
      this.logger.error(
        "Watchdog evaluation failed",
        err instanceof Error ? err.stack : String(err),
      );
    } finally {
      this.running = false;
    }
  }

  async tick(now: Date = new Date()): Promise<WatchdogTick> {
    const health = await this.aggregator.evaluate(now);
    const failing = this.containersOf(health.errors);
    await this.closeRecovered(failing, now);

    if (health.status === "healthy") {
      if (this.consecutiveFailures > 0) {
        this.logger.log(`Health recovered after ${this.consecutiveFailures} failed evaluation(s)`);
      }
      this.consecutiveFailures = 0;
      return { status: health.status, consecutiveFailures: 0, restarted: [] };
    }

    this.consecutiveFailures += 1;
    const { failThreshold } = this.settings.watchdog;
    this.logger.warn(
      `Health ${health.status} (${this.consecutiveFailures}/${failThreshold}): ${health.errors.join(", ")}`,
    );

    if (this.consecutiveFailures < failThreshold) {
      return { status: health.status, consecutiveFailures: this.consecutiveFailures, restarted: [] };
    }

    const restarted: HealAttempt[] = [];
    for (const container of failing) {
      restarted.push({ container, outcome: await this.heal(container, now) });
    }
    const failures = this.consecutiveFailures;
    this.consecutiveFailures = 0;
    return { status: health.status, consecutiveFailures: failures, restarted };
  }

  /** Containers behind the failing checks, deduplicated, in registry order. */
  private containersOf(failingChecks: string[]): Set<string> {
    const containers = new Set<string>();
    for (const check of this.aggregator.registry) {
      if (failingChecks.includes(check.name) && check.container) {
        containers.add(check.container);
      }
    }
    return containers;
  }

  private async closeRecovered(failing: Set<string>, now: Date): Promise<void> {
    for (const [container, state] of this.restarts) {
      if (failing.has(container)) {
        continue;
      }
      this.restarts.delete(container);
      if (state.circuitOpen) {
        this.logger.log(`Circuit breaker closed for ${container}: service recovered`);
        await this.notifier.notify(
          { severity: "recovery", container, message: `Service ${container} has recovered, circuit breaker closed` },
          now,
        );
      }
    }
  }

  private async heal(container: string, now: Date): Promise<OperationOutcome> {
    const { maxRestartAttempts, restartCooldownMs } = this.settings.watchdog;
    const state = this.restarts.get(container) ?? { attempts: 0, circuitOpen: false };
    this.restarts.set(container, state);

    if (state.circuitOpen) {
      this.logger.warn(`Circuit breaker is open for ${container}, not restarting`);
      return skipped(CIRCUIT_OPEN_REASON);
    }

    if (state.lastRestartAt !== undefined && now.getTime() - state.lastRestartAt < restartCooldownMs) {
      this.logger.debug(`${container} in cooldown (${now.getTime() - state.lastRestartAt}ms / ${restartCooldownMs}ms)`);
      return skipped(COOLDOWN_REASON);
    }

    if (state.attempts >= maxRestartAttempts) {
      state.circuitOpen = true;
      this.logger.error(`Circuit breaker opened for ${container} after ${state.attempts} restart(s)`);
      await this.notifier.notify(
        {
          severity: "critical",
          container,
          message: `Circuit breaker opened for ${container}: manual intervention required`,
        },
        now,
      );
      return skipped(CIRCUIT_OPEN_REASON);
    }

    state.attempts += 1;
    state.lastRestartAt = now.getTime();
    this.logger.warn(`Restarting ${container} (attempt ${state.attempts}/${maxRestartAttempts})`);
    const outcome = await this.gateway.apply({ type: "restart-instance" }, { name: container, container });

    if (outcome.kind === "failed") {
      this.logger.error(`Restart of ${container} failed: ${outcome.reason}`);
    } else {
      await this.notifier.notify(
        {
          severity: "warning",
          container,
          message: `Service ${container} was restarted (attempt ${state.attempts}/${maxRestartAttempts})`,
        },
        now,
      );
    }
    return outcome;
  }
}
