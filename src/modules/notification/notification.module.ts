import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegram } from 'telegraf';
import { NotificationService } from './notification.service';
import { MailLogNotifier } from './notifiers/mail-log.notifier';
import {
  TELEGRAM_CLIENT,
  TelegramClient,
  TelegramNotifier,
} from './notifiers/telegram.notifier';

@Module({
  providers: [
    {
      provide: TELEGRAM_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TelegramClient | null => {
        const token = configService.get<string>('app.telegramBotToken');
        return token ? new Telegram(token) : null;
      },
    },
    MailLogNotifier,
    TelegramNotifier,
    NotificationService,
  ],
  exports: [NotificationService],
})
export class NotificationModule {}
