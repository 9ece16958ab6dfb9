import { ConfigService } from "@nestjs/config";
import { loadDnsHaSettings } from "../dns-ha.config";

describe("loadDnsHaSettings", () => {
  // process.env from test/setup.ts: PIHOLE_PRIMARY_IP=10.0.0.1, PIHOLE_SECONDARY_IP=10.0.0.2,
  // HEALTH_TEST_DOMAIN=example.test, WATCHDOG_ENABLED=false
  it("builds the paired filter/resolver registry by default", () => {
    const settings = loadDnsHaSettings(new ConfigService({}));

    expect(settings.primary).toEqual({
      name: "primary",
      container: "pihole_primary",
      adminUrl: "http://10.0.0.1/admin/api.php",
    });
    expect(settings.health.testDomain).toBe("example.test");
    expect(settings.health.checks).toEqual([
      { name: "pihole_primary", role: "filter", host: "10.0.0.1", port: 53, container: "pihole_primary" },
      { name: "pihole_secondary", role: "filter", host: "10.0.0.2", port: 53, container: "pihole_secondary" },
      { name: "unbound_primary", role: "resolver", host: "10.0.0.1", port: 5335, container: "unbound_primary" },
      { name: "unbound_secondary", role: "resolver", host: "10.0.0.2", port: 5335, container: "unbound_secondary" },
    ]);
    expect(settings.health.optionalRoles).toEqual([]);
  });

  it("uses the default timeouts, markers and watchdog settings", () => {
    const settings = loadDnsHaSettings(new ConfigService({}));

    expect(settings.timeouts).toEqual({
      mutationMs: 10_000,
      probeMs: 5_000,
      connectivityMs: 5_000,
      rebuildMs: 300_000,
    });
    expect(settings.idempotencyMarkers).toEqual(["already exists", "already"]);
    expect(settings.watchdog).toEqual({
      enabled: false,
      failThreshold: 2,
      maxRestartAttempts: 3,
      restartCooldownMs: 300_000,
      notificationWebhook: undefined,
    });
  });

  it("applies overrides", () => {
    const settings = loadDnsHaSettings(
      new ConfigService({
        PRIMARY_CONTAINER: "filter_a",
        UNBOUND_PORT: "5353",
        IDEMPOTENCY_MARKERS: "exists, duplicate",
        HEALTH_OPTIONAL_ROLES: "resolver",
        WATCHDOG_FAIL_THRESHOLD: "5",
        WATCHDOG_MAX_RESTART_ATTEMPTS: "1",
        WATCHDOG_RESTART_COOLDOWN_MS: "60000",
        NOTIFICATION_WEBHOOK: "http://alerts.test/hook",
      }),
    );

    expect(settings.primary.container).toBe("filter_a");
    expect(settings.health.checks[2].port).toBe(5353);
    expect(settings.idempotencyMarkers).toEqual(["exists", "duplicate"]);
    expect(settings.health.optionalRoles).toEqual(["resolver"]);
    expect(settings.watchdog).toEqual({
      enabled: false,
      failThreshold: 5,
      maxRestartAttempts: 1,
      restartCooldownMs: 60_000,
      notificationWebhook: "http://alerts.test/hook",
    });
  });

  it("reads a custom registry from HEALTH_CHECKS", () => {
    const settings = loadDnsHaSettings(
      new ConfigService({
        HEALTH_CHECKS: JSON.stringify([
          { name: "edge", role: "filter", host: "10.1.0.1", port: 53, container: "edge_dns" },
          { name: "upstream", role: "resolver", host: "10.1.0.2", port: 5335 },
        ]),
      }),
    );

    expect(settings.health.checks.map((c) => c.name)).toEqual(["edge", "upstream"]);
    expect(settings.health.checks[1].container).toBeUndefined();
  });

  it("rejects HEALTH_CHECKS that is not JSON", () => {
    expect(() => loadDnsHaSettings(new ConfigService({ HEALTH_CHECKS: "[{" }))).toThrow(
      /^HEALTH_CHECKS is not valid JSON/,
    );
  });

  it("rejects duplicate check names", () => {
    const check = { name: "dup", role: "filter", host: "10.1.0.1", port: 53 };

    expect(() =>
      loadDnsHaSettings(new ConfigService({ HEALTH_CHECKS: JSON.stringify([check, check]) })),
    ).toThrow("HEALTH_CHECKS is invalid: Check names must be unique");
  });
});
