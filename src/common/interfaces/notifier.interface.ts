import { BreachMatch } from '../../modules/breach-check/types/breach.types';

export type NotifyTarget =
  | { channel: 'email'; address: string }
  | { channel: 'telegram'; chatId: number };

export type NotifyChannel = NotifyTarget['channel'];

export interface INotifier<C extends NotifyChannel> {
  notify(
    target: Extract<NotifyTarget, { channel: C }>,
    matches: BreachMatch[],
  ): Promise<void>;
}
