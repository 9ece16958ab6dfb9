import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  classifyMutation,
  failed,
  added,
  simulated,
  type CheckDefinition,
  type CheckResult,
  type OperationOutcome,
} from "@dnsha/core";
import { DNSHA_SETTINGS } from "../config/dns-ha.config";
import type { DnsHaSettings, TargetInstance } from "../config/dns-ha.config";
import { COMMAND_EXECUTOR } from "./command-executor.interface";
import type { ICommandExecutor } from "./command-executor.interface";
import type { ApplyOptions, ConnectivityResult, ITargetGateway } from "./target-gateway.interface";
import {
  type TargetOperation,
  describeOperation,
  isEntryOperation,
  timeoutFor,
  toCommand,
} from "./target-operations";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * TargetGatewayService: wraps the command seam with per-operation timeouts
 * and outcome classification.
 */
@Injectable()
export class TargetGatewayService implements ITargetGateway {
  private readonly logger = new Logger(TargetGatewayService.name);

  constructor(
    @Inject(COMMAND_EXECUTOR) private readonly executor: ICommandExecutor,
    @Inject(DNSHA_SETTINGS) private readonly settings: DnsHaSettings,
  ) {}

  async apply(
    op: TargetOperation,
    target: TargetInstance,
    options: ApplyOptions = {},
  ): Promise<OperationOutcome> {
    const label = describeOperation(op);

    if (options.dryRun) {
      this.logger.debug(`[${target.name}] [dry-run] would ${label}`);
      return simulated();
    }

    try {
      const result = await this.executor.run(
        toCommand(op, target),
        timeoutFor(op, this.settings.timeouts),
      );

      const outcome = isEntryOperation(op)
        ? classifyMutation(result, this.settings.idempotencyMarkers)
        : result.exitCode === 0
          ? added()
          : failed(result.stderr.trim() || `exit code ${result.exitCode}`);

      this.logger.debug(`[${target.name}] ${label}: ${outcome.kind}`);
      return outcome;
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.warn(`[${target.name}] ${label} failed: ${reason}`);
      return failed(reason);
    }
  }

  async verifyConnectivity(target: TargetInstance): Promise<ConnectivityResult> {
    if (!target.adminUrl) {
      return { reachable: false, reason: `No admin URL configured for ${target.name}` };
    }

    try {
      const { status } = await this.executor.httpGet(target.adminUrl, this.settings.timeouts.connectivityMs);
      if (status === 200) {
        return { reachable: true, status };
      }
      return { reachable: false, status, reason: `Admin API returned status ${status}` };
    } catch (err) {
      return { reachable: false, reason: `Cannot connect to ${target.adminUrl}: ${errorMessage(err)}` };
    }
  }

  /**
   * Resolve the test domain against one instance with dig. A probe passes
   * when dig exits cleanly and returns at least one answer.
   */
  async probe(check: CheckDefinition): Promise<CheckResult> {
    const { testDomain } = this.settings.health;
    const timeoutMs = this.settings.timeouts.probeMs;
    // dig gives up one second before the process timeout would kill it
    const digSeconds = Math.max(1, Math.floor(timeoutMs / 1000) - 1);
    const detail: CheckResult["detail"] = {
      role: check.role,
      host: check.host,
      port: check.port,
      domain: testDomain,
    };
    const started = Date.now();

    try {
      const result = await this.executor.run(
        {
          command: "dig",
          args: [
            `@${check.host}`,
            "-p",
            String(check.port),
            testDomain,
            `+time=${digSeconds}`,
            "+tries=1",
            "+short",
          ],
        },
        timeoutMs,
      );
      const answer = result.stdout.trim().split("\n")[0] ?? "";
      detail.latencyMs = Date.now() - started;

      if (result.exitCode === 0 && answer !== "") {
        detail.answer = answer;
        return { checkName: check.name, status: "pass", detail };
      }

      detail.error =
        result.exitCode === 0
          ? "Empty answer"
          : result.stdout.trim() || result.stderr.trim() || `dig exited with ${result.exitCode}`;
      return { checkName: check.name, status: "fail", detail };
    } catch (err) {
      detail.latencyMs = Date.now() - started;
      detail.error = errorMessage(err);
      return { checkName: check.name, status: "fail", detail };
    }
  }
}
