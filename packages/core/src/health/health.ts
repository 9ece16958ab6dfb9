import { z } from "zod";

// =============================================================================
// Check registry
// =============================================================================

/**
 * A named probe against one instance. `role` places the check in a
 * redundancy group (e.g. "filter", "resolver").
 */
export const CheckDefinitionSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  /** Container backing the instance, used for restarts. */
  container: z.string().min(1).optional(),
});
export type CheckDefinition = z.infer<typeof CheckDefinitionSchema>;

export const CheckRegistrySchema = z
  .array(CheckDefinitionSchema)
  .min(1, "At least one health check is required")
  .refine(
    (checks) => new Set(checks.map((c) => c.name)).size === checks.length,
    { message: "Check names must be unique" },
  );

export interface RoleGroup {
  role: string;
  members: string[];
  /** Readiness needs at least one passing member in every required group. */
  required: boolean;
}

export type CheckStatus = "pass" | "fail";

export type CheckDetailValue = string | number | boolean | null;

export interface CheckResult {
  checkName: string;
  status: CheckStatus;
  detail: Record<string, CheckDetailValue>;
}

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface AggregateHealth {
  status: HealthStatus;
  timestamp: string;
  checks: Record<string, CheckResult>;
  /** Names of failing checks, in registry order. */
  errors: string[];
}

export interface GroupVerdict {
  role: string;
  passing: number;
  total: number;
}

export interface ReadinessVerdict {
  ready: boolean;
  timestamp: string;
  groups: GroupVerdict[];
}

/**
 * Derive role groups from check definitions, keeping first-seen order.
 * Every role is required unless listed in `optionalRoles`.
 */
export function buildRoleGroups(
  checks: readonly CheckDefinition[],
  optionalRoles: readonly string[] = [],
): RoleGroup[] {
  const groups = new Map<string, RoleGroup>();
  for (const check of checks) {
    const group = groups.get(check.role) ?? {
      role: check.role,
      members: [],
      required: !optionalRoles.includes(check.role),
    };
    group.members.push(check.name);
    groups.set(check.role, group);
  }
  return Array.from(groups.values());
}

function groupVerdicts(
  checks: Record<string, CheckResult>,
  groups: readonly RoleGroup[],
): GroupVerdict[] {
  return groups
    .filter((g) => g.required)
    .map((g) => ({
      role: g.role,
      passing: g.members.filter((m) => checks[m]?.status === "pass").length,
      total: g.members.length,
    }));
}

/**
 * Quorum per group: ready iff every required group has at least one passing
 * member. This is not a majority over all checks.
 */
export function deriveReadiness(
  health: Pick<AggregateHealth, "checks">,
  groups: readonly RoleGroup[],
  now: Date = new Date(),
): ReadinessVerdict {
  const verdicts = groupVerdicts(health.checks, groups);
  return {
    ready: verdicts.length > 0 && verdicts.every((v) => v.passing > 0),
    timestamp: now.toISOString(),
    groups: verdicts,
  };
}

/**
 * Aggregate an ordered list of results. `results` must follow registry
 * order so that `errors` does not depend on probe completion order.
 */
export function aggregateHealth(
  results: readonly CheckResult[],
  groups: readonly RoleGroup[],
  now: Date = new Date(),
): AggregateHealth {
  const checks: Record<string, CheckResult> = {};
  const errors: string[] = [];

  for (const result of results) {
    checks[result.checkName] = result;
    if (result.status === "fail") {
      errors.push(result.checkName);
    }
  }

  let status: HealthStatus;
  if (results.length === 0) {
    status = "unhealthy";
  } else if (errors.length === 0) {
    status = "healthy";
  } else if (!deriveReadiness({ checks }, groups, now).ready) {
    status = "unhealthy";
  } else {
    status = "degraded";
  }

  return { status, timestamp: now.toISOString(), checks, errors };
}
