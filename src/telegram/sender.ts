import { autoRetry } from "@grammyjs/auto-retry";
import { Bot, GrammyError, HttpError } from "grammy";
import { DeliveryError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ReportItem } from "../tracking/types.js";
import { formatReport } from "./formatter.js";

const log = createLogger("telegram");

export interface TelegramSender {
  send(message: string): Promise<boolean>;
}

/** Delivers a finished report; `render` is the same output without sending. */
export interface Notifier {
  render(items: readonly ReportItem[]): string[];
  deliver(items: readonly ReportItem[]): Promise<void>;
}

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, "")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, "&");
}

export function createTelegramSender(botToken: string, chatId: string): TelegramSender {
  const bot = new Bot(botToken);

  bot.api.config.use(
    autoRetry({
      maxRetryAttempts: 3,
      maxDelaySeconds: 60,
    }),
  );

  return {
    async send(message: string): Promise<boolean> {
      try {
        await bot.api.sendMessage(chatId, message, {
          parse_mode: "HTML",
          link_preview_options: { is_disabled: true },
        });
        log.debug({ chatId, length: message.length }, "Report message sent");
        return true;
      } catch (err) {
        if (err instanceof GrammyError) {
          if (err.error_code === 400 && err.description.includes("can't parse entities")) {
            log.warn({ chatId }, "HTML parse failed, falling back to plain text");
            try {
              await bot.api.sendMessage(chatId, stripHtml(message));
              log.info({ chatId }, "Report message sent as plain text");
              return true;
            } catch (fallbackErr) {
              log.error({ chatId, err: fallbackErr }, "Plain text fallback also failed");
              return false;
            }
          }
          log.error({ chatId, description: err.description }, "Telegram API error");
          return false;
        }
        if (err instanceof HttpError) {
          log.error({ chatId, err }, "Could not contact Telegram");
          return false;
        }
        log.error({ chatId, err }, "Unknown error sending report");
        return false;
      }
    },
  };
}

/** Without a sender the notifier can only render, as for --print. */
export function createTelegramNotifier(title: string, sender: TelegramSender | null): Notifier {
  const render = (items: readonly ReportItem[]) => formatReport(title, items);
  return {
    render,
    async deliver(items: readonly ReportItem[]): Promise<void> {
      if (sender === null) {
        throw new DeliveryError("No Telegram recipient configured");
      }
      const messages = render(items);
      for (const [index, message] of messages.entries()) {
        const sent = await sender.send(message);
        if (!sent) {
          throw new DeliveryError(
            `Failed to send report message ${index + 1} of ${messages.length}`,
          );
        }
      }
      log.info({ messages: messages.length, items: items.length }, "Report delivered");
    },
  };
}
