import { Module } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { TelegramBotService } from './telegram-bot.service';
import { CommandRouter } from './routers/command.router';
import { MessageRouter } from './routers/message.router';
import { ChatMemberRouter } from './routers/chat-member.router';
import { TelegramBotErrorHandler } from './telegram-bot.error-handler';
import { TELEGRAF_BOT } from './telegram-bot.constants';
import { NicknameModule } from '../modules/feature-modules/nickname/nickname.module';
import { GroupRelayModule } from '../modules/feature-modules/group-relay/group-relay.module';
import { APP_CONFIG, AppConfig } from '../config/app.config';

@Module({
  imports: [NicknameModule, GroupRelayModule],
  providers: [
    {
      provide: TELEGRAF_BOT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new Telegraf(config.botToken),
    },
    TelegramBotService,
    TelegramBotErrorHandler,
    CommandRouter,
    MessageRouter,
    ChatMemberRouter,
  ],
})
export class TelegramBotModule {}
