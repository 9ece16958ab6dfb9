import type { CheckDefinition, CheckResult, OperationOutcome } from "@dnsha/core";
import type { TargetInstance } from "../config/dns-ha.config";
import type { TargetOperation } from "./target-operations";

export interface ApplyOptions {
  /** No executor call is made; the outcome is a simulated addition. */
  dryRun?: boolean;
}

export interface ConnectivityResult {
  reachable: boolean;
  status?: number;
  reason?: string;
}

/**
 * ITargetGateway: applies operations and probes against single instances.
 *
 * None of these methods reject: every timeout or transport error is folded
 * into the returned value.
 */
export interface ITargetGateway {
  apply(op: TargetOperation, target: TargetInstance, options?: ApplyOptions): Promise<OperationOutcome>;

  probe(check: CheckDefinition): Promise<CheckResult>;

  verifyConnectivity(target: TargetInstance): Promise<ConnectivityResult>;
}

/**
 * Injection token for ITargetGateway.
 */
export const TARGET_GATEWAY = Symbol("TARGET_GATEWAY");
