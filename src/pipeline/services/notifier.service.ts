import { Injectable, Logger } from '@nestjs/common';
import {
  NOTIFY_DESTINATION,
  NOTIFY_ENABLED,
  NOTIFY_MAX_ITEMS,
  NOTIFY_TIMEOUT_MS,
  NOTIFY_WEBHOOK_URL,
  RETRY_BASE_DELAY_MS,
  RETRY_JITTER_RATIO,
  RETRY_MAX_DELAY_MS,
  RETRY_MAX_RETRIES,
  SERVICE_NAME,
} from '../config/pipeline.constants';
import {
  CategorizedLine,
  Report,
  StoredAnalysis,
} from '../types/pipeline.types';
import { runWithRetry, sleep } from '../utils/retry.util';
import { truncate } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const SCOPE_TITLES: Record<Report['scope'], string> = {
  single: 'Run digest',
  daily: 'Daily digest',
  weekly: 'Weekly digest',
  monthly: 'Monthly digest',
};

export interface NotifierSettings {
  enabled: boolean;
  webhookUrl: string;
  destination: string;
}

/**
 * Best-effort push to a webhook that accepts `{destination, text}`.
 * Delivery problems are logged and reported as `false`, never thrown.
 */
@Injectable()
export class NotifierService {
  private readonly logger = new Logger(NotifierService.name);

  protected settings(): NotifierSettings {
    return {
      enabled: NOTIFY_ENABLED,
      webhookUrl: NOTIFY_WEBHOOK_URL,
      destination: NOTIFY_DESTINATION,
    };
  }

  protected sleep(ms: number): Promise<void> {
    return sleep(ms);
  }

  formatUrgent(stored: StoredAnalysis): string | null {
    const posts = stored.result.urgentPosts;
    if (posts.length === 0) {
      return null;
    }
    const lines = [`[${SERVICE_NAME}] ${posts.length} urgent post(s)`];
    posts.slice(0, NOTIFY_MAX_ITEMS).forEach((post, i) => {
      lines.push(`${i + 1}. @${post.author}: ${truncate(post.text, 200)}`);
      lines.push(`   ${post.url}`);
    });
    if (posts.length > NOTIFY_MAX_ITEMS) {
      lines.push(`... and ${posts.length - NOTIFY_MAX_ITEMS} more`);
    }
    return lines.join('\n');
  }

  formatHighlights(
    report: Report,
    highlights: CategorizedLine[],
  ): string | null {
    if (report.entryCount === 0) {
      return null;
    }
    const lines = [
      `[${SERVICE_NAME}] ${SCOPE_TITLES[report.scope]} ${report.periodLabel}: ${report.entryCount} entries`,
    ];
    for (const line of highlights.slice(0, NOTIFY_MAX_ITEMS)) {
      lines.push(`- ${line.description} ${line.link}`);
    }
    return lines.join('\n');
  }

  async notifyUrgent(stored: StoredAnalysis): Promise<boolean> {
    const text = this.formatUrgent(stored);
    return text ? this.deliver('urgent', text) : false;
  }

  async notifyHighlights(
    report: Report,
    highlights: CategorizedLine[],
  ): Promise<boolean> {
    const text = this.formatHighlights(report, highlights);
    return text ? this.deliver('highlights', text) : false;
  }

  private async deliver(kind: string, text: string): Promise<boolean> {
    const settings = this.settings();
    if (!settings.enabled || !settings.webhookUrl) {
      return false;
    }

    const run = await runWithRetry(
      () => this.postOnce(settings, text),
      (status) =>
        status >= 200 && status < 300
          ? { ok: true }
          : {
              ok: false,
              retryable: status === 0 || RETRYABLE_STATUS.has(status),
              reason: `status=${status}`,
            },
      {
        policy: {
          maxRetries: RETRY_MAX_RETRIES,
          baseDelayMs: RETRY_BASE_DELAY_MS,
          maxDelayMs: RETRY_MAX_DELAY_MS,
          jitterRatio: RETRY_JITTER_RATIO,
        },
        sleep: (ms) => this.sleep(ms),
      },
    );

    if (run.final.phase === 'failed') {
      this.logger.warn(
        `notify failed: kind=${kind} ${run.final.reason} attempts=${run.attempts}`,
      );
      return false;
    }
    this.logger.log(`notify sent: kind=${kind} chars=${text.length}`);
    return true;
  }

  private async postOnce(
    settings: NotifierSettings,
    text: string,
  ): Promise<number> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), NOTIFY_TIMEOUT_MS);
    try {
      const res = await fetch(settings.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ destination: settings.destination, text }),
        signal: controller.signal,
      });
      return res.status;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`notify request error: ${message}`);
      return 0;
    } finally {
      clearTimeout(timeout);
    }
  }
}
