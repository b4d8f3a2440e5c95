import { Module } from '@nestjs/common';

import { BotCommandsService } from './bot-commands.service';
import { BotUiService } from './bot-ui.service';
import { ConversationListenerRegistry } from './conversation-listener.registry';
import { TelegramDispatcherService } from './telegram-dispatcher.service';
import { TelegramRouterService } from './telegram-router.service';
import { TelegramSenderService } from './telegram-sender.service';
import { TelegramTransportService } from './telegram-transport.service';
import { type FetchFn, TELEGRAM_FETCH, TELEGRAM_TRANSPORT } from './telegram.tokens';
import { UpdateGuardService } from './update-guard.service';
import { ObservabilityModule } from '../observability/observability.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { RateLimitingModule } from '../rate-limiting/rate-limiting.module';

const globalFetch: FetchFn = async (input: string, init?: RequestInit): Promise<Response> =>
  fetch(input, init);

@Module({
  imports: [RateLimitingModule, ObservabilityModule, ProfilesModule],
  providers: [
    {
      provide: TELEGRAM_FETCH,
      useValue: globalFetch,
    },
    TelegramTransportService,
    {
      provide: TELEGRAM_TRANSPORT,
      useExisting: TelegramTransportService,
    },
    UpdateGuardService,
    ConversationListenerRegistry,
    TelegramSenderService,
    TelegramRouterService,
    TelegramDispatcherService,
    BotUiService,
    BotCommandsService,
  ],
  exports: [TelegramSenderService, TelegramDispatcherService],
})
export class TelegramModule {}
