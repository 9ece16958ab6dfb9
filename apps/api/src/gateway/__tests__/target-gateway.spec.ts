import { TargetGatewayService } from "../target-gateway.service";
import { CommandTimeoutError } from "../command-executor.interface";
import { FakeDnsTarget, exit, ok } from "../../../test/utils/fake-dns-target";
import { createTestSettings } from "../../../test/utils/settings";

describe("TargetGatewayService", () => {
  const settings = createTestSettings();
  let target: FakeDnsTarget;
  let gateway: TargetGatewayService;

  beforeEach(() => {
    target = new FakeDnsTarget();
    gateway = new TargetGatewayService(target, settings);
  });

  describe("apply", () => {
    it("runs the pihole command inside the target container with the short timeout", async () => {
      const outcome = await gateway.apply({ type: "add-blocklist", url: "http://lists.test/ads" }, settings.primary);

      expect(outcome).toEqual({ kind: "added" });
      expect(target.calls).toEqual([
        {
          descriptor: {
            command: "docker",
            args: ["exec", "pihole_primary", "pihole", "-a", "-b", "http://lists.test/ads"],
          },
          timeoutMs: 10_000,
        },
      ]);
    });

    it("builds whitelist and regex commands", async () => {
      await gateway.apply({ type: "add-whitelist", domain: "cdn.example.test" }, settings.primary);
      await gateway.apply({ type: "add-regex", pattern: "^ads\\." }, settings.primary);

      expect(target.piholeCommands).toEqual([
        ["pihole", "-w", "cdn.example.test"],
        ["pihole", "regex", "^ads\\."],
      ]);
    });

    it("classifies a repeated entry as already present", async () => {
      const op = { type: "add-whitelist" as const, domain: "cdn.example.test" };
      await gateway.apply(op, settings.primary);

      expect(await gateway.apply(op, settings.primary)).toEqual({ kind: "already_present" });
    });

    it("returns failed with stderr on a non-zero exit", async () => {
      target.failWhen("bad.test", exit(1, "Invalid domain\n"));

      const outcome = await gateway.apply({ type: "add-whitelist", domain: "bad.test" }, settings.primary);

      expect(outcome).toEqual({ kind: "failed", reason: "Invalid domain" });
    });

    it("folds a timeout into a failed outcome", async () => {
      const descriptor = { command: "docker", args: ["exec", "pihole_primary", "pihole", "-w", "slow.test"] };
      target.failWhen("slow.test", new CommandTimeoutError(descriptor, 10_000));

      const outcome = await gateway.apply({ type: "add-whitelist", domain: "slow.test" }, settings.primary);

      expect(outcome).toEqual({
        kind: "failed",
        reason: "Command timed out after 10000ms: docker exec pihole_primary pihole -w slow.test",
      });
    });

    it("makes no executor call in dry-run", async () => {
      const outcome = await gateway.apply(
        { type: "add-blocklist", url: "http://lists.test/ads" },
        settings.primary,
        { dryRun: true },
      );

      expect(outcome).toEqual({ kind: "added", simulated: true });
      expect(target.calls).toHaveLength(0);
    });

    it("uses the long timeout for the index rebuild", async () => {
      await gateway.apply({ type: "rebuild-index" }, settings.primary);

      expect(target.calls[0]).toEqual({
        descriptor: { command: "docker", args: ["exec", "pihole_primary", "pihole", "-g"] },
        timeoutMs: 300_000,
      });
    });

    it("judges the rebuild by exit code only", async () => {
      target.rebuildReply = ok("[i] List already up to date");
      expect(await gateway.apply({ type: "rebuild-index" }, settings.primary)).toEqual({ kind: "added" });

      target.rebuildReply = exit(1, "gravity database locked");
      expect(await gateway.apply({ type: "rebuild-index" }, settings.primary)).toEqual({
        kind: "failed",
        reason: "gravity database locked",
      });
    });

    it("restarts a container with docker restart", async () => {
      await gateway.apply({ type: "restart-instance" }, { name: "unbound_primary", container: "unbound_primary" });

      expect(target.calls[0].descriptor).toEqual({ command: "docker", args: ["restart", "unbound_primary"] });
    });
  });

  describe("verifyConnectivity", () => {
    it("is reachable on HTTP 200", async () => {
      expect(await gateway.verifyConnectivity(settings.primary)).toEqual({ reachable: true, status: 200 });
      expect(target.httpCalls).toEqual(["http://10.0.0.1/admin/api.php"]);
    });

    it("is unreachable on another status", async () => {
      target.adminResponse = 502;
      expect(await gateway.verifyConnectivity(settings.primary)).toEqual({
        reachable: false,
        status: 502,
        reason: "Admin API returned status 502",
      });
    });

    it("is unreachable when the connection fails", async () => {
      target.adminResponse = new Error("connect ECONNREFUSED 10.0.0.1:80");
      expect(await gateway.verifyConnectivity(settings.primary)).toEqual({
        reachable: false,
        reason: "Cannot connect to http://10.0.0.1/admin/api.php: connect ECONNREFUSED 10.0.0.1:80",
      });
    });

    it("is unreachable without an admin URL", async () => {
      const result = await gateway.verifyConnectivity({ name: "bare", container: "bare" });
      expect(result).toEqual({ reachable: false, reason: "No admin URL configured for bare" });
      expect(target.httpCalls).toHaveLength(0);
    });
  });

  describe("probe", () => {
    const check = settings.health.checks[2];

    it("passes when dig returns an answer", async () => {
      const result = await gateway.probe(check);

      expect(result.checkName).toBe("unbound_primary");
      expect(result.status).toBe("pass");
      expect(result.detail).toMatchObject({
        role: "resolver",
        host: "10.0.0.1",
        port: 5335,
        domain: "example.test",
        answer: "93.184.216.34",
      });
      expect(target.calls[0]).toEqual({
        descriptor: {
          command: "dig",
          args: ["@10.0.0.1", "-p", "5335", "example.test", "+time=4", "+tries=1", "+short"],
        },
        timeoutMs: 5_000,
      });
    });

    it("fails on an empty answer", async () => {
      target.digReplies.set("10.0.0.1:5335", ok(""));
      const result = await gateway.probe(check);
      expect(result.status).toBe("fail");
      expect(result.detail.error).toBe("Empty answer");
    });

    it("fails when dig cannot reach the server", async () => {
      target.digReplies.set("10.0.0.1:5335", exit(9, "", ";; connection timed out; no servers could be reached"));
      const result = await gateway.probe(check);
      expect(result.status).toBe("fail");
      expect(result.detail.error).toBe(";; connection timed out; no servers could be reached");
    });

    it("fails instead of throwing when the executor rejects", async () => {
      target.digReplies.set("10.0.0.1:5335", new Error("spawn dig ENOENT"));
      const result = await gateway.probe(check);
      expect(result.status).toBe("fail");
      expect(result.detail.error).toBe("spawn dig ENOENT");
    });

    it("creates a fresh result on every call", async () => {
      const first = await gateway.probe(check);
      const second = await gateway.probe(check);
      expect(first).not.toBe(second);
      expect(first.detail).not.toBe(second.detail);
    });
  });
});
