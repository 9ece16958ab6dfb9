/**
 * Settings fixture for API unit tests.
 */
import type { DnsHaSettings } from "../../src/config/dns-ha.config";

export function createTestSettings(overrides: Partial<DnsHaSettings> = {}): DnsHaSettings {
  return {
    profilesDir: "profiles",
    primary: {
      name: "primary",
      container: "pihole_primary",
      adminUrl: "http://10.0.0.1/admin/api.php",
    },
    timeouts: {
      mutationMs: 10_000,
      probeMs: 5_000,
      connectivityMs: 5_000,
      rebuildMs: 300_000,
    },
    idempotencyMarkers: ["already exists", "already"],
    health: {
      testDomain: "example.test",
      checks: [
        { name: "pihole_primary", role: "filter", host: "10.0.0.1", port: 53, container: "pihole_primary" },
        { name: "pihole_secondary", role: "filter", host: "10.0.0.2", port: 53, container: "pihole_secondary" },
        { name: "unbound_primary", role: "resolver", host: "10.0.0.1", port: 5335, container: "unbound_primary" },
        { name: "unbound_secondary", role: "resolver", host: "10.0.0.2", port: 5335, container: "unbound_secondary" },
      ],
      optionalRoles: [],
    },
    watchdog: {
      enabled: false,
      failThreshold: 2,
      maxRestartAttempts: 3,
      restartCooldownMs: 300_000,
    },
    ...overrides,
  };
}
