import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { LessonSessionModule } from '../lesson-session/lesson-session.module';
import { LessonController } from './lesson.controller';
import { LessonGateway } from './lesson.gateway';

@Module({
  imports: [AuthModule, CollaboratorsModule, LessonSessionModule],
  providers: [LessonGateway],
  controllers: [LessonController],
})
export class LessonModule {}
