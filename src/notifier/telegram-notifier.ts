import TelegramBot from "node-telegram-bot-api";
import { describeError } from "../errors";
import type { Logger } from "../logger";
import type { MessageSender } from "../types";

/**
 * Outbound-only Telegram client: the bot never polls for updates.
 */
export function createTelegramBot(token: string): TelegramBot {
  return new TelegramBot(token, { polling: false });
}

export class TelegramNotifier {
  constructor(
    private readonly bot: MessageSender,
    private readonly chatId: string,
    private readonly logger: Logger
  ) {}

  /**
   * Sends `text` to the configured chat. A failed send is logged and reported
   * through the return value; it is never retried.
   */
  async sendMessage(text: string): Promise<boolean> {
    try {
      await this.bot.sendMessage(this.chatId, text);
      this.logger.debug(`Message sent to chat ${this.chatId}: ${text}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to send message: ${describeError(error)}`);
      return false;
    }
  }
}
