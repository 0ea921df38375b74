/**
 * Notification channel.
 *
 * Alerts are forwarded to a local Telegram relay service which owns the
 * bot token; this process only knows the chat id and the relay's API key.
 */

/**
 * Delivers a text alert. Implementations may reject; callers treat
 * delivery as best effort.
 */
export interface Notifier {
  send(text: string): Promise<void>;
}

export interface TelegramRelayOptions {
  /** Relay endpoint (default: http://localhost:3000/send-message) */
  url?: string;
  /** Target chat id; the notifier is inactive without it */
  chatId?: string;
  /** Relay API key; the notifier is inactive without it */
  apiKey?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

const DEFAULT_RELAY_URL = "http://localhost:3000/send-message";

/**
 * Notifier posting `{ chatId, message }` to the Telegram relay.
 */
export class TelegramRelayNotifier implements Notifier {
  private url: string;
  private chatId: string | undefined;
  private apiKey: string | undefined;
  private timeout: number;

  constructor(options: TelegramRelayOptions = {}) {
    this.url = options.url || DEFAULT_RELAY_URL;
    this.chatId = options.chatId;
    this.apiKey = options.apiKey;
    this.timeout = options.timeout || 6_000;
  }

  isConfigured(): boolean {
    return !!(this.chatId && this.apiKey);
  }

  async send(text: string): Promise<void> {
    if (!this.chatId || !this.apiKey) return;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(this.url, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          "X-API-Key": this.apiKey,
        },
        body: JSON.stringify({ chatId: this.chatId, message: text }),
      });

      if (!response.ok) {
        throw new Error(`Telegram relay responded ${response.status}`);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
