import { Injectable } from '@nestjs/common';
import { Context } from 'telegraf';
import { NicknameFlow } from '../../modules/feature-modules/nickname/nickname.flow';
import { GroupRelayFlow } from '../../modules/feature-modules/group-relay/group-relay.flow';

/**
 * Текст без команды: в группах relay, в личке подсказка.
 * Слэш без команды ("/ hello") в личке тоже получает подсказку,
 * в группе его отбрасывает GroupRelayFlow.
 */
@Injectable()
export class MessageRouter {
  constructor(
    private readonly nicknameFlow: NicknameFlow,
    private readonly groupRelayFlow: GroupRelayFlow,
  ) {}

  async route(ctx: Context): Promise<void> {
    const text = ctx.message && 'text' in ctx.message ? ctx.message.text : '';
    if (!text) {
      return;
    }

    switch (ctx.chat?.type) {
      case 'group':
      case 'supergroup':
        return this.groupRelayFlow.handle(ctx);
      case 'private':
        return this.nicknameFlow.privateHint(ctx);
      default:
        return;
    }
  }
}
