import type { StoredAnnouncement } from "../types/monitor.js";
import { escapeHtml } from "../utils/html.js";
import { describeError } from "../utils/logger.js";

export type NotificationResult = { ok: true } | { ok: false; message: string };

export interface Notifier {
  send(text: string, destinationId: string): Promise<NotificationResult>;
}

interface TelegramNotifierOptions {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  /** Destinations that get link previews turned off. */
  quietDestinations?: readonly string[];
}

interface TelegramApiResponse {
  ok?: boolean;
  description?: string;
}

export function formatAnnouncementMessage(announcement: StoredAnnouncement, sourceUrl: string): string {
  const lines = [
    "📢 <b>New announcement detected</b>",
    "",
    escapeHtml(announcement.text),
    "",
    `🔗 <a href="${escapeHtml(sourceUrl)}">Source page</a>`,
  ];
  if (announcement.pdf_url) {
    lines.push(`📄 <a href="${escapeHtml(announcement.pdf_url)}">PDF link</a>`);
  }
  return lines.join("\n");
}

export function formatErrorAlert(message: string): string {
  return `⚠️ <b>Monitoring error</b>\n\n<code>${escapeHtml(message)}</code>`;
}

async function readTelegramBody(response: Response): Promise<TelegramApiResponse | null> {
  try {
    const body: unknown = await response.json();
    if (!body || typeof body !== "object") return null;
    const ok = "ok" in body && typeof body.ok === "boolean" ? body.ok : undefined;
    const description = "description" in body && typeof body.description === "string" ? body.description : undefined;
    return { ok, description };
  } catch {
    return null;
  }
}

/** Bot API `sendMessage` with HTML parse mode. Never throws. */
export class TelegramNotifier implements Notifier {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly quietDestinations: ReadonlySet<string>;

  constructor(options: TelegramNotifierOptions) {
    const base = (options.apiBaseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    this.endpoint = `${base}/bot${options.botToken}/sendMessage`;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.quietDestinations = new Set(options.quietDestinations ?? []);
  }

  async send(text: string, destinationId: string): Promise<NotificationResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          chat_id: destinationId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: this.quietDestinations.has(destinationId),
        }),
        signal: controller.signal,
      });

      const body = await readTelegramBody(response);
      if (!response.ok || body?.ok === false) {
        const detail = body?.description ? `: ${body.description}` : "";
        return { ok: false, message: `Telegram responded with ${response.status}${detail}` };
      }
      return { ok: true };
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, message: `Telegram request timed out after ${this.timeoutMs}ms` };
      }
      return { ok: false, message: `Telegram request failed: ${describeError(error)}` };
    } finally {
      clearTimeout(timer);
    }
  }
}
