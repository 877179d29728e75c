import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Logger } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';

import { GroupRelayFlow } from '../src/modules/feature-modules/group-relay/group-relay.flow';
import { ReminderSchedulerService } from '../src/modules/feature-modules/group-relay/reminder-scheduler.service';
import { REMINDER_TTL_MS } from '../src/modules/feature-modules/group-relay/group-relay.constants';
import { UserService } from '../src/modules/core-modules/user/user.service';
import { UserEntity } from '../src/modules/core-modules/user/user.entity';
import { InMemoryUserRepository } from './fakes/in-memory-user.repository';
import {
  GROUP_CHAT_ID,
  PRIVATE_CHAT_ID,
  createMockContext,
} from './helpers/mock-context';

describe('GroupRelayFlow', () => {
  let module: TestingModule;
  let flow: GroupRelayFlow;
  let reminders: ReminderSchedulerService;
  let repository: InMemoryUserRepository;
  let warn: jest.SpyInstance;

  beforeEach(async () => {
    jest.useFakeTimers();
    repository = new InMemoryUserRepository();

    module = await Test.createTestingModule({
      providers: [
        GroupRelayFlow,
        ReminderSchedulerService,
        SchedulerRegistry,
        UserService,
        { provide: getRepositoryToken(UserEntity), useValue: repository },
      ],
    }).compile();

    flow = module.get(GroupRelayFlow);
    reminders = module.get(ReminderSchedulerService);
    warn = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await module.close();
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  describe('sender with a nickname', () => {
    beforeEach(() => {
      repository.seed({ telegram_id: PRIVATE_CHAT_ID, game_nick: 'Hero' });
    });

    it('reposts the message under the nickname and deletes the original', async () => {
      const { ctx, reply, telegram } = createMockContext({
        text: 'hello everyone',
        chatType: 'supergroup',
        messageId: 42,
      });

      await flow.handle(ctx);

      expect(telegram.sendMessage).toHaveBeenCalledTimes(1);
      expect(telegram.sendMessage).toHaveBeenCalledWith(
        GROUP_CHAT_ID,
        'Hero: hello everyone',
        { entities: [{ type: 'bold', offset: 0, length: 5 }] },
      );
      expect(telegram.deleteMessage).toHaveBeenCalledTimes(1);
      expect(telegram.deleteMessage).toHaveBeenCalledWith(GROUP_CHAT_ID, 42);
      expect(reply).not.toHaveBeenCalled();
    });

    it('keeps the forum topic of the original message', async () => {
      const { ctx, telegram } = createMockContext({
        text: 'in topic',
        chatType: 'supergroup',
        message: { is_topic_message: true, message_thread_id: 7 },
      });

      await flow.handle(ctx);

      expect(telegram.sendMessage).toHaveBeenCalledWith(
        GROUP_CHAT_ID,
        'Hero: in topic',
        {
          entities: [{ type: 'bold', offset: 0, length: 5 }],
          message_thread_id: 7,
        },
      );
    });

    it('removes its own relay when the original cannot be deleted', async () => {
      const { ctx, telegram } = createMockContext({
        text: 'hello',
        chatType: 'group',
        messageId: 42,
      });
      telegram.sendMessage.mockResolvedValueOnce({ message_id: 777 });
      telegram.deleteMessage
        .mockRejectedValueOnce(new Error('not enough rights'))
        .mockResolvedValueOnce(true);

      await flow.handle(ctx);

      expect(telegram.deleteMessage).toHaveBeenNthCalledWith(1, GROUP_CHAT_ID, 42);
      expect(telegram.deleteMessage).toHaveBeenNthCalledWith(2, GROUP_CHAT_ID, 777);
      expect(warn).toHaveBeenCalledWith(
        `Failed to delete message 42 in chat ${GROUP_CHAT_ID}: not enough rights`,
      );
    });

    it('swallows a failure to remove its own relay', async () => {
      const { ctx, telegram } = createMockContext({
        text: 'hello',
        chatType: 'group',
      });
      telegram.deleteMessage.mockRejectedValue(new Error('not enough rights'));

      await expect(flow.handle(ctx)).resolves.toBeUndefined();
      expect(telegram.deleteMessage).toHaveBeenCalledTimes(2);
    });
  });

  describe('sender without a nickname', () => {
    it('replies with a reminder and deletes it after the delay', async () => {
      const { ctx, reply, telegram } = createMockContext({
        text: 'hello',
        chatType: 'group',
        messageId: 42,
      });
      reply.mockResolvedValueOnce({ message_id: 901 });

      await flow.handle(ctx);

      expect(telegram.sendMessage).not.toHaveBeenCalled();
      expect(reply).toHaveBeenCalledTimes(1);
      expect(reply).toHaveBeenCalledWith(
        '👤 Ivan, чтобы писать в группе, нужен игровой ник!\n\n' +
          'Напиши мне в личные сообщения:\n' +
          '<code>/nick ТвойИгровойНик</code>',
        { parse_mode: 'HTML', reply_parameters: { message_id: 42 } },
      );
      expect(reminders.pendingCount()).toBe(1);

      await jest.advanceTimersByTimeAsync(REMINDER_TTL_MS - 1);
      expect(telegram.deleteMessage).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1);
      expect(telegram.deleteMessage).toHaveBeenCalledWith(GROUP_CHAT_ID, 901);
      expect(reminders.pendingCount()).toBe(0);
    });

    it('logs and ignores a failure to send the reminder', async () => {
      const { ctx, reply } = createMockContext({
        text: 'hello',
        chatType: 'group',
      });
      reply.mockRejectedValueOnce(new Error('chat not found'));

      await expect(flow.handle(ctx)).resolves.toBeUndefined();
      expect(reminders.pendingCount()).toBe(0);
    });

    it('treats a store failure as a missing nickname', async () => {
      repository.failWith = new Error('connection refused');
      const { ctx, reply, telegram } = createMockContext({
        text: 'hello',
        chatType: 'group',
      });

      await flow.handle(ctx);

      expect(telegram.sendMessage).not.toHaveBeenCalled();
      expect(reply).toHaveBeenCalledTimes(1);
    });
  });

  it('ignores commands, private chats and messages sent on behalf of a chat', async () => {
    repository.seed({ telegram_id: PRIVATE_CHAT_ID, game_nick: 'Hero' });

    const command = createMockContext({ text: '/stats', chatType: 'group' });
    const privateText = createMockContext({ text: 'hi', chatType: 'private' });
    const anonymous = createMockContext({
      text: 'hi',
      chatType: 'supergroup',
      message: { sender_chat: { id: GROUP_CHAT_ID, type: 'supergroup' } },
    });

    for (const { ctx, reply, telegram } of [command, privateText, anonymous]) {
      await flow.handle(ctx);
      expect(telegram.sendMessage).not.toHaveBeenCalled();
      expect(reply).not.toHaveBeenCalled();
    }
  });
});
