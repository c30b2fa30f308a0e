import { Module } from '@nestjs/common';
import { SupabaseModule } from '../database/supabase.module';
import {
  ANSWER_SERVICE,
  ATTENDANCE_SCANNER,
  LESSON_STORE,
  PRESENTATION_STORE,
} from './collaborators.interface';
import { SupabaseAnswerService } from './supabase-answer.service';
import { SupabaseAttendanceScanner } from './supabase-attendance.scanner';
import { SupabaseLessonStore } from './supabase-lesson.store';
import { SupabasePresentationStore } from './supabase-presentation.store';

@Module({
  imports: [SupabaseModule],
  providers: [
    { provide: LESSON_STORE, useClass: SupabaseLessonStore },
    { provide: PRESENTATION_STORE, useClass: SupabasePresentationStore },
    { provide: ATTENDANCE_SCANNER, useClass: SupabaseAttendanceScanner },
    { provide: ANSWER_SERVICE, useClass: SupabaseAnswerService },
  ],
  exports: [LESSON_STORE, PRESENTATION_STORE, ATTENDANCE_SCANNER, ANSWER_SERVICE],
})
export class CollaboratorsModule {}
