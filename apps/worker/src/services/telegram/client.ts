import { errorMessage, withRetry } from "@shortloop/shared";
import { z } from "zod";

const BotResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export class TelegramApiError extends Error {
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, status: number, options?: { retryable?: boolean }) {
    super(message);
    this.name = "TelegramApiError";
    this.status = status;
    this.retryable = options?.retryable ?? (status >= 500 || status === 429 || status === 408);
  }
}

/**
 * Minimal Bot API client: sends HTML-formatted messages to one chat.
 */
export class TelegramClient {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryBaseDelayMs: number;

  constructor(config: {
    botToken: string;
    chatId: string;
    baseUrl?: string;
    timeoutMs?: number;
    retryBaseDelayMs?: number;
  }) {
    if (!config.botToken.trim() || !config.chatId.trim()) {
      throw new Error("Telegram bot token and chat id are required");
    }
    this.botToken = config.botToken.trim();
    this.chatId = config.chatId.trim();
    this.baseUrl = config.baseUrl ?? "https://api.telegram.org";
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 500;
  }

  async sendMessage(html: string): Promise<void> {
    await withRetry("telegram.sendMessage", () => this.post(html), {
      maxAttempts: 3,
      baseDelayMs: this.retryBaseDelayMs,
      maxDelayMs: 5_000,
      retryableError: (error) => error instanceof TelegramApiError && error.retryable,
    });
  }

  private async post(html: string): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/bot${this.botToken}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: html,
          parse_mode: "HTML",
          disable_web_page_preview: true,
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TelegramApiError("Telegram request timeout", 408, { retryable: true });
      }
      throw new TelegramApiError(`Telegram request failed: ${errorMessage(error)}`, 500, { retryable: true });
    } finally {
      clearTimeout(timeoutId);
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = BotResponseSchema.safeParse(body);
    if (response.ok && parsed.success && parsed.data.ok) {
      return;
    }

    const description = parsed.success ? parsed.data.description : undefined;
    throw new TelegramApiError(
      `Telegram sendMessage failed: ${response.status} ${description ?? response.statusText}`,
      response.status,
    );
  }
}
