import type { z } from "zod";
import type { AggregateHealth, ReconciliationReport } from "@dnsha/core";
import {
  AggregateHealthSchema,
  ErrorBodySchema,
  ProfileListSchema,
  ReadinessSchema,
  ReportSchema,
  type ErrorBody,
  type Readiness,
} from "./schemas";

export const DEFAULT_API_URL = "http://localhost:8888";

export type FetchLike = (url: string, init?: { method?: string }) => Promise<{
  status: number;
  json(): Promise<unknown>;
}>;

/** Non-success response that carries no usable report or health body. */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly body?: ErrorBody,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function resolveApiUrl(flag?: string, env: NodeJS.ProcessEnv = process.env): string {
  return (flag ?? env.DNSHA_API_URL ?? DEFAULT_API_URL).replace(/\/+$/, "");
}

/**
 * Thin HTTP client for the control-plane API. Statuses listed in `accept`
 * still carry a body the CLI renders (a failed report, a degraded health).
 */
export class DnsHaApiClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async listProfiles(): Promise<string[]> {
    const body = await this.request("GET", "/profiles", ProfileListSchema, [200]);
    return body.profiles;
  }

  async reconcile(profileId: string, dryRun: boolean): Promise<ReconciliationReport> {
    const path = `/profiles/${encodeURIComponent(profileId)}/reconcile?dryRun=${dryRun}`;
    return this.request("POST", path, ReportSchema, [200, 502]);
  }

  async health(): Promise<AggregateHealth> {
    return this.request("GET", "/health/detailed", AggregateHealthSchema, [200, 503]);
  }

  async ready(): Promise<Readiness> {
    return this.request("GET", "/ready", ReadinessSchema, [200, 503]);
  }

  private async request<T extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: T,
    accept: number[],
  ): Promise<z.output<T>> {
    const url = `${this.baseUrl}${path}`;
    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(url, { method });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ApiError(0, `Cannot reach ${this.baseUrl}: ${reason}`);
    }

    const payload: unknown = await response.json().catch(() => undefined);

    if (!accept.includes(response.status)) {
      const parsed = ErrorBodySchema.safeParse(payload);
      if (parsed.success) {
        const message = Array.isArray(parsed.data.message) ? parsed.data.message.join("; ") : parsed.data.message;
        throw new ApiError(response.status, message, parsed.data);
      }
      throw new ApiError(response.status, `${method} ${path} returned HTTP ${response.status}`);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ApiError(response.status, `Unexpected response from ${method} ${path}`);
    }
    return parsed.data;
  }
}
