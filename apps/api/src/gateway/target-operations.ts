import type { GatewayTimeouts, TargetInstance } from "../config/dns-ha.config";
import type { CommandDescriptor } from "./command-executor.interface";

/**
 * Mutating operations the gateway can apply to one instance.
 */
export type TargetOperation =
  | { type: "add-blocklist"; url: string; comment?: string }
  | { type: "add-whitelist"; domain: string }
  | { type: "add-regex"; pattern: string }
  | { type: "rebuild-index" }
  | { type: "restart-instance" };

export type TargetOperationType = TargetOperation["type"];

/** Operations that add a single entry; only these are classified idempotent. */
export function isEntryOperation(op: TargetOperation): boolean {
  return op.type === "add-blocklist" || op.type === "add-whitelist" || op.type === "add-regex";
}

function piholeExec(target: TargetInstance, args: string[]): CommandDescriptor {
  return { command: "docker", args: ["exec", target.container, "pihole", ...args] };
}

export function toCommand(op: TargetOperation, target: TargetInstance): CommandDescriptor {
  switch (op.type) {
    case "add-blocklist":
      return piholeExec(target, ["-a", "-b", op.url]);
    case "add-whitelist":
      return piholeExec(target, ["-w", op.domain]);
    case "add-regex":
      return piholeExec(target, ["regex", op.pattern]);
    case "rebuild-index":
      return piholeExec(target, ["-g"]);
    case "restart-instance":
      return { command: "docker", args: ["restart", target.container] };
  }
}

/**
 * The rebuild runs once per reconciliation and is slow; everything else
 * gets the short mutation timeout.
 */
export function timeoutFor(op: TargetOperation, timeouts: GatewayTimeouts): number {
  return op.type === "rebuild-index" ? timeouts.rebuildMs : timeouts.mutationMs;
}

export function describeOperation(op: TargetOperation): string {
  switch (op.type) {
    case "add-blocklist":
      return `add blocklist ${op.url}`;
    case "add-whitelist":
      return `whitelist ${op.domain}`;
    case "add-regex":
      return `add regex ${op.pattern}`;
    case "rebuild-index":
      return "rebuild index";
    case "restart-instance":
      return "restart instance";
  }
}
