import { Inject, Injectable, Logger } from "@nestjs/common";
import { DNSHA_SETTINGS } from "../config/dns-ha.config";
import type { DnsHaSettings } from "../config/dns-ha.config";

export type WatchdogSeverity = "warning" | "critical" | "recovery";

export interface WatchdogAlert {
  severity: WatchdogSeverity;
  container: string;
  message: string;
}

/**
 * Delivers watchdog alerts to NOTIFICATION_WEBHOOK. Without a webhook the
 * alert is only logged. Delivery failures are logged and never reach the
 * watchdog.
 */
@Injectable()
export class WatchdogNotifier {
  private readonly logger = new Logger(WatchdogNotifier.name);

  constructor(@Inject(DNSHA_SETTINGS) private readonly settings: DnsHaSettings) {}

  async notify(alert: WatchdogAlert, now: Date = new Date()): Promise<void> {
    const url = this.settings.watchdog.notificationWebhook;
    if (!url) {
      return;
    }

    const body = {
      event: "watchdog",
      source: "dns-ha",
      severity: alert.severity,
      container: alert.container,
      message: alert.message,
      timestamp: now.toISOString(),
    };

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.settings.timeouts.connectivityMs),
      });
      if (!response.ok) {
        throw new Error(`Webhook responded with status ${response.status}`);
      }
    } catch (err) {
      this.logger.warn(
        `Notification delivery failed for ${alert.container}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
