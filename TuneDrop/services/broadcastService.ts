export interface BroadcastProgress {
  total: number;
  sent: number;
  failed: number;
}

export interface BroadcastReport extends BroadcastProgress {
  /** Recipients that refused delivery permanently (blocked the bot) */
  blocked: number[];
}

export interface BroadcastOptions {
  /** Report progress after this many recipients (default 50) */
  progressEvery?: number;
  onProgress?: (progress: BroadcastProgress) => Promise<void> | void;
  isBlocked?: (err: unknown) => boolean;
}

/**
 * Sends to every recipient one after another.  A failed recipient is counted
 * and skipped; the loop itself never stops early.
 */
export async function broadcast(
  recipients: number[],
  send: (userId: number) => Promise<void>,
  options: BroadcastOptions = {},
): Promise<BroadcastReport> {
  const progressEvery = options.progressEvery ?? 50;
  const report: BroadcastReport = { total: recipients.length, sent: 0, failed: 0, blocked: [] };

  for (const userId of recipients) {
    try {
      await send(userId);
      report.sent += 1;
    } catch (err) {
      report.failed += 1;
      if (options.isBlocked?.(err)) {
        report.blocked.push(userId);
      } else {
        console.warn(`[broadcastService] Delivery to ${userId} failed`, err);
      }
    }

    const processed = report.sent + report.failed;
    if (options.onProgress && processed % progressEvery === 0 && processed < report.total) {
      try {
        await options.onProgress({ total: report.total, sent: report.sent, failed: report.failed });
      } catch (err) {
        console.warn('[broadcastService] Progress update failed', err);
      }
    }
  }

  console.log(`[broadcastService] Broadcast finished: ${report.sent}/${report.total} sent, ${report.failed} failed`);
  return report;
}
