import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { delayPolicyFor } from '../../common/utils/delay';
import { NotificationModule } from '../notification/notification.module';
import { BreachCheckController } from './breach-check.controller';
import { CorpusLoader } from './corpus/corpus.loader';
import { breachCorpusProvider } from './corpus/corpus.provider';
import {
  BreachCheckService,
  CHECK_DELAY_POLICY,
} from './services/breach-check.service';

@Module({
  imports: [NotificationModule],
  controllers: [BreachCheckController],
  providers: [
    CorpusLoader,
    breachCorpusProvider,
    {
      provide: CHECK_DELAY_POLICY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        delayPolicyFor(configService.getOrThrow<number>('app.checkDelayMs')),
    },
    BreachCheckService,
  ],
  exports: [BreachCheckService],
})
export class BreachCheckModule {}
