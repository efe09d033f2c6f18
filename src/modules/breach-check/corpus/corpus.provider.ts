import { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BreachCorpus } from '../engine/corpus';
import { CorpusLoader } from './corpus.loader';

export const BREACH_CORPUS = 'BREACH_CORPUS';

// Async factory: Nest resolves it before the HTTP server accepts requests.
export const breachCorpusProvider: FactoryProvider<Promise<BreachCorpus>> = {
  provide: BREACH_CORPUS,
  inject: [CorpusLoader, ConfigService],
  useFactory: (loader: CorpusLoader, configService: ConfigService) =>
    loader.load(configService.getOrThrow<string>('app.corpusPath')),
};
