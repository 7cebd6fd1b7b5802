import { beforeEach, describe, expect, it, vi } from "vitest";
import { GrammyError } from "grammy";
import { DeliveryError } from "../errors.js";
import type { ReportItem } from "../tracking/types.js";
import { createTelegramNotifier, createTelegramSender, stripHtml, type TelegramSender } from "./sender.js";

const { sendMessage } = vi.hoisted(() => ({ sendMessage: vi.fn() }));

vi.mock("grammy", async (importOriginal) => {
  const actual = await importOriginal<typeof import("grammy")>();
  class Bot {
    api = { config: { use: vi.fn() }, sendMessage };
    constructor(readonly token: string) {}
  }
  return { ...actual, Bot };
});

const items: ReportItem[] = [
  { type: "untracked", timestamp: new Date("2024-05-01T00:00:00Z"), repo: { id: "R_1", owner: "acme", name: "a" } },
  { type: "untracked", timestamp: new Date("2024-05-02T00:00:00Z"), repo: { id: "R_2", owner: "acme", name: "b" } },
];

describe("stripHtml", () => {
  it("drops tags and unescapes entities", () => {
    expect(stripHtml('<b>[a/b]</b> <a href="x">#1</a>: 1 &lt; 2 &amp;&amp; &quot;ok&quot;')).toBe(
      '[a/b] #1: 1 < 2 && "ok"',
    );
  });
});

describe("createTelegramSender", () => {
  beforeEach(() => {
    sendMessage.mockReset();
  });

  it("sends HTML without link previews", async () => {
    sendMessage.mockResolvedValue({});
    const sender = createTelegramSender("test-bot-token", "-100123");
    await expect(sender.send("<b>hi</b>")).resolves.toBe(true);
    expect(sendMessage).toHaveBeenCalledWith("-100123", "<b>hi</b>", {
      parse_mode: "HTML",
      link_preview_options: { is_disabled: true },
    });
  });

  it("falls back to plain text when Telegram cannot parse the markup", async () => {
    sendMessage
      .mockRejectedValueOnce(
        new GrammyError(
          "Call to 'sendMessage' failed!",
          { ok: false, error_code: 400, description: "Bad Request: can't parse entities" },
          "sendMessage",
          {},
        ),
      )
      .mockResolvedValueOnce({});
    const sender = createTelegramSender("test-bot-token", "-100123");

    await expect(sender.send("<b>a &amp; b</b>")).resolves.toBe(true);
    expect(sendMessage).toHaveBeenLastCalledWith("-100123", "a & b");
  });

  it("reports other failures as not sent", async () => {
    sendMessage.mockRejectedValue(
      new GrammyError(
        "Call to 'sendMessage' failed!",
        { ok: false, error_code: 403, description: "Forbidden: bot was blocked by the user" },
        "sendMessage",
        {},
      ),
    );
    const sender = createTelegramSender("test-bot-token", "-100123");
    await expect(sender.send("hi")).resolves.toBe(false);
    expect(sendMessage).toHaveBeenCalledTimes(1);
  });
});

describe("createTelegramNotifier", () => {
  it("sends each rendered message in order", async () => {
    const sent: string[] = [];
    const sender: TelegramSender = {
      send: async (message) => {
        sent.push(message);
        return true;
      },
    };
    const notifier = createTelegramNotifier("News", sender);

    await notifier.deliver(items);

    expect(sent).toEqual(notifier.render(items));
    expect(sent).toEqual([
      "<b>News</b>\n\n🚫 No longer tracking repository acme/a\n\n🚫 No longer tracking repository acme/b",
    ]);
  });

  it("fails delivery when a message is not sent", async () => {
    const notifier = createTelegramNotifier("News", { send: async () => false });
    await expect(notifier.deliver(items)).rejects.toThrow(
      new DeliveryError("Failed to send report message 1 of 1"),
    );
  });

  it("renders without a sender but cannot deliver", async () => {
    const notifier = createTelegramNotifier("News", null);
    expect(notifier.render(items)).toHaveLength(1);
    await expect(notifier.deliver(items)).rejects.toThrow(DeliveryError);
  });
});
