import { Module } from '@nestjs/common';
import { UserModule } from '../../core-modules/user/user.module';
import { GroupRelayFlow } from './group-relay.flow';
import { ReminderSchedulerService } from './reminder-scheduler.service';

@Module({
  imports: [UserModule],
  providers: [GroupRelayFlow, ReminderSchedulerService],
  exports: [GroupRelayFlow, ReminderSchedulerService],
})
export class GroupRelayModule {}
