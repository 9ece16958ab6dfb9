import { NotFoundException, UnprocessableEntityException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import type { Response } from "express";
import {
  emptyStageCounts,
  ProfileNotFoundError,
  ProfileValidationError,
  type ReconciliationReport,
} from "@dnsha/core";
import { ReconcilerController } from "../reconciler.controller";
import { ReconcilerService } from "../reconciler.service";

function report(overrides: Partial<ReconciliationReport> = {}): ReconciliationReport {
  return {
    profile: "standard",
    target: "primary",
    dryRun: false,
    overallSuccess: true,
    warnings: [],
    stages: {
      blocklists: emptyStageCounts(),
      whitelist: emptyStageCounts(),
      regexPatterns: emptyStageCounts(),
    },
    rebuild: { executed: true, outcome: { kind: "added" } },
    items: [],
    startedAt: "2026-01-01T00:00:00.000Z",
    durationMs: 12,
    ...overrides,
  };
}

describe("ReconcilerController", () => {
  let controller: ReconcilerController;
  const reconcile = jest.fn();
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  const res = { status } as unknown as Response;

  beforeEach(async () => {
    reconcile.mockReset();
    json.mockReset();
    status.mockClear();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ReconcilerController],
      providers: [{ provide: ReconcilerService, useValue: { reconcile } }],
    }).compile();

    controller = module.get(ReconcilerController);
  });

  it("replies 200 with the report on success", async () => {
    const ok = report();
    reconcile.mockResolvedValue(ok);

    await controller.reconcile("standard", {}, res);

    expect(reconcile).toHaveBeenCalledWith("standard", { dryRun: false });
    expect(status).toHaveBeenCalledWith(200);
    expect(json).toHaveBeenCalledWith(ok);
  });

  it("passes dryRun through", async () => {
    reconcile.mockResolvedValue(report({ dryRun: true, rebuild: { executed: false } }));

    await controller.reconcile("standard", { dryRun: true }, res);

    expect(reconcile).toHaveBeenCalledWith("standard", { dryRun: true });
  });

  it("answers 502 with the report when the run failed", async () => {
    const failed = report({ overallSuccess: false, abortReason: "Index rebuild failed: locked" });
    reconcile.mockResolvedValue(failed);

    await controller.reconcile("standard", {}, res);

    expect(status).toHaveBeenCalledWith(502);
    expect(json).toHaveBeenCalledWith(failed);
  });

  it("maps a missing profile to 404 with the available ids", async () => {
    reconcile.mockRejectedValue(new ProfileNotFoundError("nope", ["family", "standard"]));

    const error = await controller.reconcile("nope", {}, res).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundException);
    if (error instanceof NotFoundException) {
      expect(error.getResponse()).toEqual({
        message: "Profile not found: nope",
        available: ["family", "standard"],
      });
    }
  });

  it("maps an invalid profile to 422 with its issues", async () => {
    reconcile.mockRejectedValue(new ProfileValidationError("broken", ["name: Profile name is required"]));

    await expect(controller.reconcile("broken", {}, res)).rejects.toBeInstanceOf(UnprocessableEntityException);
    expect(status).not.toHaveBeenCalled();
  });

  it("rethrows unexpected errors unchanged", async () => {
    const boom = new Error("boom");
    reconcile.mockRejectedValue(boom);

    await expect(controller.reconcile("standard", {}, res)).rejects.toBe(boom);
  });
});
