import { NotifyTarget } from '../../common/interfaces/notifier.interface';
import { CheckBreachDto } from './dto/check-breach.dto';
import {
  BreachMatch,
  BreachMatchPayload,
  MatchResult,
  MatchResultPayload,
} from './types/breach.types';

export function toBreachMatchPayload(match: BreachMatch): BreachMatchPayload {
  return {
    source: match.source,
    date: match.date,
    risk_level: match.riskLevel,
    description: match.description,
  };
}

export function toMatchResultPayload(result: MatchResult): MatchResultPayload {
  if (!result.breached) {
    return { breached: false };
  }
  return { breached: true, matches: result.matches.map(toBreachMatchPayload) };
}

export function toNotifyTarget(dto: CheckBreachDto): NotifyTarget | undefined {
  if (dto.email) {
    return { channel: 'email', address: dto.email };
  }
  if (dto.telegram_chat_id !== undefined) {
    return { channel: 'telegram', chatId: dto.telegram_chat_id };
  }
  return undefined;
}
