import type { ConfigService } from "@nestjs/config";
import {
  CheckRegistrySchema,
  DEFAULT_CONNECTIVITY_TIMEOUT_MS,
  DEFAULT_DNS_PORT,
  DEFAULT_HEALTH_TEST_DOMAIN,
  DEFAULT_IDEMPOTENCY_MARKERS,
  DEFAULT_MAX_RESTART_ATTEMPTS,
  DEFAULT_MUTATION_TIMEOUT_MS,
  DEFAULT_PIHOLE_PRIMARY_IP,
  DEFAULT_PIHOLE_SECONDARY_IP,
  DEFAULT_PRIMARY_CONTAINER,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_REBUILD_TIMEOUT_MS,
  DEFAULT_RESTART_COOLDOWN_MS,
  DEFAULT_UNBOUND_PORT,
  DEFAULT_WATCHDOG_FAIL_THRESHOLD,
  FILTER_ROLE,
  RESOLVER_ROLE,
} from "@dnsha/core";
import type { CheckDefinition } from "@dnsha/core";

/**
 * Injection token for the resolved DnsHaSettings.
 */
export const DNSHA_SETTINGS = Symbol("DNSHA_SETTINGS");

/** One resolver/filter instance that operations are applied against. */
export interface TargetInstance {
  name: string;
  container: string;
  /** Admin API probed by the connectivity check. */
  adminUrl?: string;
}

export interface GatewayTimeouts {
  mutationMs: number;
  probeMs: number;
  connectivityMs: number;
  rebuildMs: number;
}

export interface WatchdogSettings {
  enabled: boolean;
  /** Consecutive non-healthy evaluations before restarts are attempted. */
  failThreshold: number;
  /** Restarts per container before its breaker opens. */
  maxRestartAttempts: number;
  /** Minimum time between two restarts of one container. */
  restartCooldownMs: number;
  /** Receives JSON alerts on restarts, open breakers and recoveries. */
  notificationWebhook?: string;
}

export interface DnsHaSettings {
  profilesDir: string;
  primary: TargetInstance;
  timeouts: GatewayTimeouts;
  idempotencyMarkers: string[];
  health: {
    testDomain: string;
    checks: CheckDefinition[];
    optionalRoles: string[];
  };
  watchdog: WatchdogSettings;
}

type ConfigReader = Pick<ConfigService, "get">;

function readString(config: ConfigReader, key: string, fallback: string): string {
  const value = config.get<string>(key);
  return value === undefined || value === null || value === "" ? fallback : String(value);
}

function readNumber(config: ConfigReader, key: string, fallback: number): number {
  const value = Number(config.get<number | string>(key));
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function readBoolean(config: ConfigReader, key: string): boolean {
  const value = config.get<boolean | string>(key);
  return value === true || value === "true";
}

function readList(config: ConfigReader, key: string): string[] {
  return readString(config, key, "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * The redundant pair layout: two filter instances on :53 and two resolver
 * instances on the Unbound port, primary and secondary.
 */
function defaultChecks(config: ConfigReader): CheckDefinition[] {
  const piholePrimary = readString(config, "PIHOLE_PRIMARY_IP", DEFAULT_PIHOLE_PRIMARY_IP);
  const piholeSecondary = readString(config, "PIHOLE_SECONDARY_IP", DEFAULT_PIHOLE_SECONDARY_IP);
  const unboundPort = readNumber(config, "UNBOUND_PORT", DEFAULT_UNBOUND_PORT);

  return [
    {
      name: "pihole_primary",
      role: FILTER_ROLE,
      host: piholePrimary,
      port: DEFAULT_DNS_PORT,
      container: "pihole_primary",
    },
    {
      name: "pihole_secondary",
      role: FILTER_ROLE,
      host: piholeSecondary,
      port: DEFAULT_DNS_PORT,
      container: "pihole_secondary",
    },
    {
      name: "unbound_primary",
      role: RESOLVER_ROLE,
      host: readString(config, "UNBOUND_PRIMARY_IP", piholePrimary),
      port: unboundPort,
      container: "unbound_primary",
    },
    {
      name: "unbound_secondary",
      role: RESOLVER_ROLE,
      host: readString(config, "UNBOUND_SECONDARY_IP", piholeSecondary),
      port: unboundPort,
      container: "unbound_secondary",
    },
  ];
}

function parseCheckRegistry(raw: string): CheckDefinition[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`HEALTH_CHECKS is not valid JSON: ${message}`);
  }

  const result = CheckRegistrySchema.safeParse(decoded);
  if (!result.success) {
    throw new Error(
      `HEALTH_CHECKS is invalid: ${result.error.issues.map((i) => i.message).join("; ")}`,
    );
  }
  return result.data;
}

/**
 * Resolve typed settings from the validated environment.
 */
export function loadDnsHaSettings(config: ConfigReader): DnsHaSettings {
  const primaryIp = readString(config, "PIHOLE_PRIMARY_IP", DEFAULT_PIHOLE_PRIMARY_IP);
  const customChecks = readString(config, "HEALTH_CHECKS", "");
  const markers = readList(config, "IDEMPOTENCY_MARKERS");

  return {
    profilesDir: readString(config, "PROFILES_DIR", "profiles"),
    primary: {
      name: "primary",
      container: readString(config, "PRIMARY_CONTAINER", DEFAULT_PRIMARY_CONTAINER),
      adminUrl: readString(config, "PRIMARY_ADMIN_URL", `http://${primaryIp}/admin/api.php`),
    },
    timeouts: {
      mutationMs: readNumber(config, "MUTATION_TIMEOUT_MS", DEFAULT_MUTATION_TIMEOUT_MS),
      probeMs: readNumber(config, "PROBE_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS),
      connectivityMs: readNumber(config, "CONNECTIVITY_TIMEOUT_MS", DEFAULT_CONNECTIVITY_TIMEOUT_MS),
      rebuildMs: readNumber(config, "REBUILD_TIMEOUT_MS", DEFAULT_REBUILD_TIMEOUT_MS),
    },
    idempotencyMarkers: markers.length > 0 ? markers : [...DEFAULT_IDEMPOTENCY_MARKERS],
    health: {
      testDomain: readString(config, "HEALTH_TEST_DOMAIN", DEFAULT_HEALTH_TEST_DOMAIN),
      checks: customChecks ? parseCheckRegistry(customChecks) : defaultChecks(config),
      optionalRoles: readList(config, "HEALTH_OPTIONAL_ROLES"),
    },
    watchdog: {
      enabled: readBoolean(config, "WATCHDOG_ENABLED"),
      failThreshold: readNumber(config, "WATCHDOG_FAIL_THRESHOLD", DEFAULT_WATCHDOG_FAIL_THRESHOLD),
      maxRestartAttempts: readNumber(config, "WATCHDOG_MAX_RESTART_ATTEMPTS", DEFAULT_MAX_RESTART_ATTEMPTS),
      restartCooldownMs: readNumber(config, "WATCHDOG_RESTART_COOLDOWN_MS", DEFAULT_RESTART_COOLDOWN_MS),
      notificationWebhook: readString(config, "NOTIFICATION_WEBHOOK", "") || undefined,
    },
  };
}
