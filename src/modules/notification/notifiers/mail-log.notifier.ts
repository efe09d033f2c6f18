import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INotifier } from '../../../common/interfaces/notifier.interface';
import { BreachMatch } from '../../breach-check/types/breach.types';

export function formatMailAlert(
  to: string,
  from: string,
  matches: BreachMatch[],
): string {
  return [
    '--- SIMULATED EMAIL NOTIFICATION ---',
    `To: ${to}`,
    `From: ${from}`,
    'Subject: URGENT: Security Alert - Breach Detected',
    '-'.repeat(35),
    ...matches.map(
      (match) => `- Source: ${match.source} | Date: ${match.date ?? 'N/A'}`,
    ),
    '--- END OF SIMULATED EMAIL ---',
  ].join('\n');
}

/** Writes the alert e-mail to the log instead of sending it. */
@Injectable()
export class MailLogNotifier implements INotifier<'email'> {
  private readonly logger = new Logger(MailLogNotifier.name);
  private readonly from: string;

  constructor(configService: ConfigService) {
    this.from = configService.getOrThrow<string>('app.mailFrom');
  }

  async notify(
    target: { channel: 'email'; address: string },
    matches: BreachMatch[],
  ): Promise<void> {
    this.logger.log(`\n${formatMailAlert(target.address, this.from, matches)}`);
  }
}
