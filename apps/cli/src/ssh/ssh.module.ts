import { Module } from '@nestjs/common';
import { SSH_SPAWN, SshService, spawnSsh } from './ssh.service';

@Module({
  providers: [SshService, { provide: SSH_SPAWN, useValue: spawnSsh }],
  exports: [SshService],
})
export class SshModule {}
