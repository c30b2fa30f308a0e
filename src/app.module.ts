import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AuthModule } from './auth/auth.module';
import { CollaboratorsModule } from './collaborators/collaborators.module';
import { orchestratorConfig } from './config/orchestrator.config';
import { LessonSessionModule } from './lesson-session/lesson-session.module';
import { LessonModule } from './lesson/lesson.module';
import { SchedulerModule } from './scheduler/scheduler.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.development', '.env'],
      isGlobal: true,
      load: [orchestratorConfig],
    }),
    EventEmitterModule.forRoot(),
    AuthModule,
    CollaboratorsModule,
    LessonSessionModule,
    LessonModule,
    SchedulerModule,
  ],
})
export class AppModule {}
