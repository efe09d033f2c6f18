import { Inject, Injectable, Logger } from '@nestjs/common';
import { NotifyTarget } from '../../../common/interfaces/notifier.interface';
import { DelayPolicy } from '../../../common/utils/delay';
import { NotificationService } from '../../notification/notification.service';
import { BREACH_CORPUS } from '../corpus/corpus.provider';
import { BreachCorpus } from '../engine/corpus';
import { normalizeDigest } from '../engine/digest';
import { findMatches } from '../engine/matcher';
import { ReportNotification, buildReport } from '../engine/report';
import { MatchResult } from '../types/breach.types';

export const CHECK_DELAY_POLICY = 'CHECK_DELAY_POLICY';

@Injectable()
export class BreachCheckService {
  private readonly logger = new Logger(BreachCheckService.name);

  constructor(
    @Inject(BREACH_CORPUS) private readonly corpus: BreachCorpus,
    @Inject(CHECK_DELAY_POLICY) private readonly delayPolicy: DelayPolicy,
    private readonly notificationService: NotificationService,
  ) {
    this.logger.log(
      `BreachCheckService initialized with ${corpus.size} breach records`,
    );
  }

  get corpusSize(): number {
    return this.corpus.size;
  }

  async checkBreach(hash: string, target?: NotifyTarget): Promise<MatchResult> {
    const digest = normalizeDigest(hash);
    const records = findMatches(digest, this.corpus);
    this.logger.log(
      `Digest ${digest.slice(0, 10)}... matched ${records.length} breaches`,
    );

    await this.delayPolicy.wait();

    return buildReport(
      records,
      target ? this.notificationFor(target) : undefined,
    );
  }

  private notificationFor(
    target: NotifyTarget,
  ): ReportNotification<NotifyTarget> {
    return {
      target,
      notify: (to, matches) => this.notificationService.notify(to, matches),
      onError: (error) =>
        this.logger.error(
          `Breach notification via ${target.channel} failed: ${(error as Error).message}`,
        ),
    };
  }
}
