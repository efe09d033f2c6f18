import { Logger } from '@nestjs/common';
import { BreachMatch } from '../../breach-check/types/breach.types';
import {
  formatTelegramAlert,
  TelegramClient,
  TelegramNotifier,
} from './telegram.notifier';

const matches: BreachMatch[] = [
  {
    source: 'Retail_Skim',
    date: null,
    riskLevel: 'critical',
    description: null,
  },
  {
    source: 'BankLeak2023',
    date: '2023-01-01',
    riskLevel: 'high',
    description: 'Card numbers exposed.',
  },
];

describe('formatTelegramAlert', () => {
  it('escapes MarkdownV2 characters in every field', () => {
    expect(formatTelegramAlert(matches)).toBe(
      [
        '🚨 *Security alert: breach detected*',
        '',
        'Your banking detail was found in these breaches:',
        '\\- *Retail\\_Skim* \\| N/A \\| critical',
        '\\- *BankLeak2023* \\| 2023\\-01\\-01 \\| high',
      ].join('\n'),
    );
  });
});

describe('TelegramNotifier', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => jest.restoreAllMocks());

  it('sends the formatted alert to the chat', async () => {
    const sendMessage = jest.fn().mockResolvedValue({});
    const client: TelegramClient = { sendMessage };
    const notifier = new TelegramNotifier(client);

    await notifier.notify({ channel: 'telegram', chatId: 42 }, matches);

    expect(sendMessage).toHaveBeenCalledWith(42, formatTelegramAlert(matches), {
      parse_mode: 'MarkdownV2',
    });
  });

  it('fails when no bot token is configured', async () => {
    const notifier = new TelegramNotifier(null);

    await expect(
      notifier.notify({ channel: 'telegram', chatId: 42 }, matches),
    ).rejects.toMatchObject({ code: 'NOTIFIER_UNAVAILABLE', statusCode: 500 });
  });

  it('rethrows client errors', async () => {
    const failure = new Error('Forbidden: bot was blocked by the user');
    const notifier = new TelegramNotifier({
      sendMessage: jest.fn().mockRejectedValue(failure),
    });

    await expect(
      notifier.notify({ channel: 'telegram', chatId: 7 }, matches),
    ).rejects.toBe(failure);
  });
});
