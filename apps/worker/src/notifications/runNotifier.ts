import { errorMessage, logger } from "@shortloop/shared";

import type { NotifyConfig } from "../config";
import type { RunSummary } from "../scheduler/scheduler";
import { TelegramClient } from "../services/telegram/client";

/**
 * Tells the operator what a run did. Delivery problems are logged and never
 * change the run's outcome.
 */
export interface RunNotifier {
  runFinished(summary: RunSummary): Promise<void>;
  /** The run could not start or ended with an error outside the scheduler */
  runAborted(error: string): Promise<void>;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatAbortMessage(error: string): string {
  return `<b>Shortloop run aborted</b>\n\n${escapeHtml(error)}`;
}

/**
 * Message for a finished run, or null when there is nothing worth telling:
 * no part published, no item completed or failed.
 */
export function formatRunMessage(summary: RunSummary): string | null {
  if (summary.outcome === "fatal") {
    return formatAbortMessage(summary.error ?? "unknown error");
  }

  const { publishedParts, completedItems, failedItems } = summary;
  if (publishedParts.length === 0 && completedItems.length === 0 && failedItems.length === 0) {
    return null;
  }

  const lines = ["<b>Shortloop run</b>"];

  if (publishedParts.length > 0) {
    lines.push("", `<b>Published</b> (${publishedParts.length})`);
    for (const part of publishedParts) {
      lines.push(`• ${escapeHtml(part.title)}: part ${part.segmentIndex}/${part.totalSegments}`);
    }
  }

  if (completedItems.length > 0) {
    lines.push("", `<b>Completed</b> (${completedItems.length})`);
    for (const item of completedItems) {
      lines.push(`• ${escapeHtml(item.title)}`);
    }
  }

  if (failedItems.length > 0) {
    lines.push("", `<b>Failed</b> (${failedItems.length})`);
    for (const item of failedItems) {
      lines.push(`• ${escapeHtml(item.title)} [${item.stage}]: ${escapeHtml(item.error)}`);
    }
  }

  if (summary.usage) {
    const { consumedUnits, dailyBudget, date } = summary.usage;
    lines.push("", `Quota: ${consumedUnits}/${dailyBudget} units on ${date}`);
  }

  return lines.join("\n");
}

export class NoopRunNotifier implements RunNotifier {
  async runFinished(): Promise<void> {}

  async runAborted(): Promise<void> {}
}

export class TelegramRunNotifier implements RunNotifier {
  private readonly client: Pick<TelegramClient, "sendMessage">;

  constructor(client: Pick<TelegramClient, "sendMessage">) {
    this.client = client;
  }

  async runFinished(summary: RunSummary): Promise<void> {
    const message = formatRunMessage(summary);
    if (message === null) return;
    await this.deliver(message, summary.runId);
  }

  async runAborted(error: string): Promise<void> {
    await this.deliver(formatAbortMessage(error));
  }

  private async deliver(message: string, runId?: string): Promise<void> {
    try {
      await this.client.sendMessage(message);
      logger.info("notification_sent", { service: "worker", runId, channel: "telegram" });
    } catch (error) {
      logger.warn("notification_failed", {
        service: "worker",
        runId,
        channel: "telegram",
        error: errorMessage(error),
      });
    }
  }
}

export function createRunNotifier(config: NotifyConfig): RunNotifier {
  if (!config.telegram) {
    return new NoopRunNotifier();
  }
  return new TelegramRunNotifier(new TelegramClient(config.telegram));
}
