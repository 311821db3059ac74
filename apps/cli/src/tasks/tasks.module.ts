import { Module } from '@nestjs/common';
import { SshModule } from '../ssh/ssh.module';
import { RemoteExecutorService } from './remote-executor.service';
import { REMOTE_EXECUTOR } from './task.types';
import { TasksService } from './tasks.service';

@Module({
  imports: [SshModule],
  providers: [TasksService, RemoteExecutorService, { provide: REMOTE_EXECUTOR, useExisting: RemoteExecutorService }],
  exports: [TasksService],
})
export class TasksModule {}
