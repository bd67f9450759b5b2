/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens meet implementations. `reflect-metadata` has
 * to load before tsyringe reads any @inject/@injectable metadata, hence the
 * first import.
 *
 *   - Config slices and the logger are plain values (`useValue`).
 *   - The two provider clients are built by factories, because their
 *     constructors take an HTTP/SDK handle rather than injectable classes;
 *     `instanceCachingFactory` makes each a per-process singleton.
 *   - Services are `useClass` and get their dependencies by token.
 *
 * Tests re-register RegistryClient/CompletionClient with fakes before
 * building the app; the services resolve whatever is registered last.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { config, type CompletionConfig, type RegistryConfig } from './config';
import { logger, type Logger } from './logger';
import { TOKENS } from './types';

import { AnalysisService } from '@application/services/AnalysisService';
import type { ICompletionClient } from '@domain/interfaces/ICompletionClient';
import type { IRegistryClient } from '@domain/interfaces/IRegistryClient';
import {
  createOpenAiSdk,
  OpenAiCompletionClient,
} from '@infrastructure/completion/OpenAiCompletionClient';
import {
  createRegistryHttp,
  TianyanchaRegistryClient,
} from '@infrastructure/registry/TianyanchaRegistryClient';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.RegistryConfig, { useValue: config.registry });
container.register(TOKENS.CompletionConfig, { useValue: config.completion });
container.register(TOKENS.ReportConfig, { useValue: config.report });

container.register<IRegistryClient>(TOKENS.RegistryClient, {
  useFactory: instanceCachingFactory((c) => {
    const cfg = c.resolve<RegistryConfig>(TOKENS.RegistryConfig);
    return new TianyanchaRegistryClient(
      createRegistryHttp(cfg),
      cfg,
      c.resolve<Logger>(TOKENS.Logger),
    );
  }),
});

container.register<ICompletionClient>(TOKENS.CompletionClient, {
  useFactory: instanceCachingFactory((c) => {
    const cfg = c.resolve<CompletionConfig>(TOKENS.CompletionConfig);
    return new OpenAiCompletionClient(createOpenAiSdk(cfg), cfg, c.resolve<Logger>(TOKENS.Logger));
  }),
});

container.register(TOKENS.AnalysisService, { useClass: AnalysisService });

export { container };
