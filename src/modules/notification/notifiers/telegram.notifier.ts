import { Inject, Injectable, Logger } from '@nestjs/common';
import { Telegram } from 'telegraf';
import { AppError } from '../../../common/errors/app.error';
import { INotifier } from '../../../common/interfaces/notifier.interface';
import { escapeMarkdown } from '../../../common/utils/markdown.utils';
import { BreachMatch } from '../../breach-check/types/breach.types';

export const TELEGRAM_CLIENT = 'TELEGRAM_CLIENT';

/** The part of telegraf's `Telegram` client the notifier uses. */
export type TelegramClient = Pick<Telegram, 'sendMessage'>;

export function formatTelegramAlert(matches: BreachMatch[]): string {
  const lines = matches.map(
    (match) =>
      `\\- *${escapeMarkdown(match.source)}* \\| ${escapeMarkdown(match.date ?? 'N/A')} \\| ${escapeMarkdown(match.riskLevel)}`,
  );
  return [
    '🚨 *Security alert: breach detected*',
    '',
    'Your banking detail was found in these breaches:',
    ...lines,
  ].join('\n');
}

@Injectable()
export class TelegramNotifier implements INotifier<'telegram'> {
  private readonly logger = new Logger(TelegramNotifier.name);

  constructor(
    @Inject(TELEGRAM_CLIENT) private readonly client: TelegramClient | null,
  ) {}

  async notify(
    target: { channel: 'telegram'; chatId: number },
    matches: BreachMatch[],
  ): Promise<void> {
    if (!this.client) {
      throw new AppError(
        'Telegram notifications are not configured',
        500,
        'NOTIFIER_UNAVAILABLE',
      );
    }

    try {
      await this.client.sendMessage(
        target.chatId,
        formatTelegramAlert(matches),
        { parse_mode: 'MarkdownV2' },
      );
      this.logger.debug(`Sent breach alert to chat ${target.chatId}`);
    } catch (error) {
      this.logger.error(
        `Failed to send message to chat ${target.chatId}: ${(error as Error).message}`,
      );
      throw error;
    }
  }
}
