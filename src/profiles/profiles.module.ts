import { Module } from '@nestjs/common';

import { ChatProfileRepository } from './chat-profile.repository';

@Module({
  providers: [ChatProfileRepository],
  exports: [ChatProfileRepository],
})
export class ProfilesModule {}
