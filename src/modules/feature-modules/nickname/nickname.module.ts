import { Module } from '@nestjs/common';
import { UserModule } from '../../core-modules/user/user.module';
import { NicknameFlow } from './nickname.flow';

@Module({
  imports: [UserModule],
  providers: [NicknameFlow],
  exports: [NicknameFlow],
})
export class NicknameModule {}
