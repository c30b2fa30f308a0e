import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { LessonSessionModule } from '../lesson-session/lesson-session.module';
import { LessonSchedulerService } from './lesson-scheduler.service';

@Module({
  imports: [CollaboratorsModule, LessonSessionModule],
  providers: [LessonSchedulerService],
  exports: [LessonSchedulerService],
})
export class SchedulerModule {}
