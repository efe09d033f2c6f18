import { Injectable, Logger } from '@nestjs/common';
import { NotifyTarget } from '../../common/interfaces/notifier.interface';
import { BreachMatch } from '../breach-check/types/breach.types';
import { MailLogNotifier } from './notifiers/mail-log.notifier';
import { TelegramNotifier } from './notifiers/telegram.notifier';

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    private readonly mailNotifier: MailLogNotifier,
    private readonly telegramNotifier: TelegramNotifier,
  ) {}

  async notify(target: NotifyTarget, matches: BreachMatch[]): Promise<void> {
    this.logger.log(
      `Sending ${target.channel} alert for ${matches.length} breaches`,
    );
    switch (target.channel) {
      case 'email':
        return this.mailNotifier.notify(target, matches);
      case 'telegram':
        return this.telegramNotifier.notify(target, matches);
    }
  }
}
