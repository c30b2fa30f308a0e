import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { CommandDispatcherService } from './command-dispatcher.service';
import { SessionRegistryService } from './session-registry.service';

@Module({
  imports: [CollaboratorsModule],
  providers: [SessionRegistryService, CommandDispatcherService],
  exports: [SessionRegistryService, CommandDispatcherService],
})
export class LessonSessionModule {}
