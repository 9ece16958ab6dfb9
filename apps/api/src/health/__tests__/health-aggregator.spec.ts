import type { CheckDefinition, CheckResult, OperationOutcome } from "@dnsha/core";
import { TargetGatewayService } from "../../gateway/target-gateway.service";
import type { ConnectivityResult, ITargetGateway } from "../../gateway/target-gateway.interface";
import { HealthAggregatorService } from "../health-aggregator.service";
import { FakeDnsTarget, exit } from "../../../test/utils/fake-dns-target";
import { createTestSettings } from "../../../test/utils/settings";

const NO_SERVERS = exit(9, "", ";; connection timed out; no servers could be reached");

/** Gateway whose probes settle after a per-check delay, or reject. */
class ScriptedProbes implements ITargetGateway {
  constructor(private readonly script: Record<string, { delayMs: number; pass?: boolean; reject?: string }>) {}

  async apply(): Promise<OperationOutcome> {
    return { kind: "added" };
  }

  async verifyConnectivity(): Promise<ConnectivityResult> {
    return { reachable: true, status: 200 };
  }

  probe(check: CheckDefinition): Promise<CheckResult> {
    const step = this.script[check.name] ?? { delayMs: 0, pass: true };
    return new Promise((resolve, reject) => {
      setTimeout(() => {
        if (step.reject) {
          reject(new Error(step.reject));
          return;
        }
        resolve({ checkName: check.name, status: step.pass === false ? "fail" : "pass", detail: {} });
      }, step.delayMs);
    });
  }
}

describe("HealthAggregatorService", () => {
  const settings = createTestSettings();
  const now = new Date("2026-03-01T12:00:00.000Z");
  let target: FakeDnsTarget;
  let aggregator: HealthAggregatorService;

  beforeEach(() => {
    target = new FakeDnsTarget();
    aggregator = new HealthAggregatorService(new TargetGatewayService(target, settings), settings);
  });

  it("derives role groups from the registry", () => {
    expect(aggregator.roleGroups).toEqual([
      { role: "filter", members: ["pihole_primary", "pihole_secondary"], required: true },
      { role: "resolver", members: ["unbound_primary", "unbound_secondary"], required: true },
    ]);
  });

  it("is healthy when every probe passes", async () => {
    const health = await aggregator.evaluate(now);

    expect(health.status).toBe("healthy");
    expect(health.errors).toEqual([]);
    expect(health.timestamp).toBe("2026-03-01T12:00:00.000Z");
    expect(Object.keys(health.checks)).toEqual([
      "pihole_primary",
      "pihole_secondary",
      "unbound_primary",
      "unbound_secondary",
    ]);
    expect(target.calls).toHaveLength(4);
  });

  it("is degraded when one member of each group still passes", async () => {
    target.digReplies.set("10.0.0.2:53", NO_SERVERS);

    const health = await aggregator.evaluate(now);

    expect(health.status).toBe("degraded");
    expect(health.errors).toEqual(["pihole_secondary"]);
    expect(aggregator.readiness(health).ready).toBe(true);
  });

  it("is unhealthy when a required group has no passing member", async () => {
    target.digReplies.set("10.0.0.1:53", NO_SERVERS);
    target.digReplies.set("10.0.0.2:53", NO_SERVERS);

    const health = await aggregator.evaluate(now);
    const verdict = aggregator.readiness(health);

    expect(health.status).toBe("unhealthy");
    expect(health.errors).toEqual(["pihole_primary", "pihole_secondary"]);
    expect(verdict).toEqual({
      ready: false,
      timestamp: "2026-03-01T12:00:00.000Z",
      groups: [
        { role: "filter", passing: 0, total: 2 },
        { role: "resolver", passing: 2, total: 2 },
      ],
    });
  });

  it("stays ready when only an optional role is down", async () => {
    const optional = createTestSettings({
      health: { ...settings.health, optionalRoles: ["resolver"] },
    });
    aggregator = new HealthAggregatorService(new TargetGatewayService(target, optional), optional);
    target.digReplies.set("10.0.0.1:5335", NO_SERVERS);
    target.digReplies.set("10.0.0.2:5335", NO_SERVERS);

    const health = await aggregator.evaluate(now);

    expect(health.status).toBe("degraded");
    expect(aggregator.readiness(health).ready).toBe(true);
  });

  it("lists errors in registry order whatever order probes finish in", async () => {
    aggregator = new HealthAggregatorService(
      new ScriptedProbes({
        pihole_primary: { delayMs: 30, pass: false },
        pihole_secondary: { delayMs: 0 },
        unbound_primary: { delayMs: 0, pass: false },
        unbound_secondary: { delayMs: 10 },
      }),
      settings,
    );

    const health = await aggregator.evaluate(now);

    expect(health.errors).toEqual(["pihole_primary", "unbound_primary"]);
    expect(health.status).toBe("degraded");
  });

  it("turns a rejected probe into a failing result", async () => {
    aggregator = new HealthAggregatorService(
      new ScriptedProbes({ unbound_secondary: { delayMs: 0, reject: "probe crashed" } }),
      settings,
    );

    const health = await aggregator.evaluate(now);

    expect(health.checks.unbound_secondary).toEqual({
      checkName: "unbound_secondary",
      status: "fail",
      detail: { role: "resolver", host: "10.0.0.2", port: 5335, error: "probe crashed" },
    });
    expect(health.errors).toEqual(["unbound_secondary"]);
  });

  it("is unhealthy and not ready with an empty registry", async () => {
    const empty = createTestSettings({ health: { ...settings.health, checks: [] } });
    aggregator = new HealthAggregatorService(new TargetGatewayService(target, empty), empty);

    const health = await aggregator.evaluate(now);

    expect(health.status).toBe("unhealthy");
    expect(aggregator.readiness(health).ready).toBe(false);
    expect(target.calls).toHaveLength(0);
  });

  it("probes afresh on every evaluation", async () => {
    await aggregator.evaluate(now);
    await aggregator.evaluateReadiness();

    expect(target.calls).toHaveLength(8);
  });
});
