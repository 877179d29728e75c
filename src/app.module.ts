import { DynamicModule, Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  APP_CONFIG,
  AppConfig,
  buildSslOptions,
} from './config/app.config';
import { UserEntity } from './modules/core-modules/user/user.entity';
import { CreateUsers1776600000000 } from './migrations/1776600000000-create-users';
import { TelegramBotModule } from './telegram-bot/telegram-bot.module';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      global: true,
      imports: [
        ScheduleModule.forRoot(),
        TypeOrmModule.forRoot({
          type: 'postgres',
          url: config.database.url,
          ssl: buildSslOptions(config.database),
          entities: [UserEntity],
          migrations: [CreateUsers1776600000000],
          migrationsRun: config.database.runMigrations,
          synchronize: false,
        }),
        TelegramBotModule,
      ],
      providers: [{ provide: APP_CONFIG, useValue: config }],
      exports: [APP_CONFIG],
    };
  }
}
