import { Controller, Get, Header, HttpStatus, Res } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { AggregateHealth, HealthStatus } from "@dnsha/core";
import { HealthAggregatorService } from "./health-aggregator.service";
import type { Response } from "express";

export interface HealthSummary {
  status: HealthStatus;
  timestamp: string;
  errors_count: number;
}

export interface ReadinessSummary {
  ready: boolean;
  timestamp: string;
}

export interface LivenessSummary {
  alive: true;
  timestamp: string;
}

/**
 * Probe endpoints for load balancers and orchestrators. Every response is
 * marked uncacheable.
 */
@ApiTags("health")
@Controller()
export class HealthController {
  constructor(private readonly aggregator: HealthAggregatorService) {}

  @Get("health")
  @Header("Cache-Control", "no-cache")
  @ApiOperation({ summary: "Aggregate health; 200 only when every check passes" })
  @ApiResponse({ status: 200, description: "Healthy" })
  @ApiResponse({ status: 503, description: "Degraded or unhealthy" })
  async health(@Res() res: Response): Promise<void> {
    const health = await this.aggregator.evaluate();
    const body: HealthSummary = {
      status: health.status,
      timestamp: health.timestamp,
      errors_count: health.errors.length,
    };
    res.status(health.status === "healthy" ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE).json(body);
  }

  @Get("health/detailed")
  @Header("Cache-Control", "no-cache")
  @ApiOperation({ summary: "Per-check results; 503 only when unhealthy" })
  @ApiResponse({ status: 200, description: "Healthy or degraded" })
  @ApiResponse({ status: 503, description: "Unhealthy" })
  async detailed(@Res() res: Response): Promise<void> {
    const health: AggregateHealth = await this.aggregator.evaluate();
    res.status(health.status === "unhealthy" ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.OK).json(health);
  }

  @Get("ready")
  @Header("Cache-Control", "no-cache")
  @ApiOperation({ summary: "Readiness: every required role has a passing member" })
  @ApiResponse({ status: 200, description: "Ready" })
  @ApiResponse({ status: 503, description: "Some required role has no passing member" })
  async ready(@Res() res: Response): Promise<void> {
    const verdict = await this.aggregator.evaluateReadiness();
    const body: ReadinessSummary = { ready: verdict.ready, timestamp: verdict.timestamp };
    res.status(verdict.ready ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE).json(body);
  }

  @Get("live")
  @Header("Cache-Control", "no-cache")
  @ApiOperation({ summary: "Liveness of this process; runs no probes" })
  live(): LivenessSummary {
    return { alive: true, timestamp: new Date().toISOString() };
  }
}
