import {
  LessonEndReason,
  LessonPhase,
  QuestionMethod,
  SessionStartSource,
} from '../lesson-session/lesson-session.interface';

// Client >>>> Server, sent on `lesson:command`
export type LessonCommand =
  | { type: 'start_attendance' }
  | { type: 'end_attendance' }
  | { type: 'start_presentation' }
  | { type: 'next_slide' }
  | { type: 'previous_slide' }
  | { type: 'pause_presentation' }
  | { type: 'resume_presentation' }
  | { type: 'ask_question'; question: string; method: QuestionMethod }
  | { type: 'start_qa' }
  | { type: 'end_lesson' };

export type LessonCommandType = LessonCommand['type'];

export const LESSON_COMMAND_TYPES: readonly LessonCommandType[] = [
  'start_attendance',
  'end_attendance',
  'start_presentation',
  'next_slide',
  'previous_slide',
  'pause_presentation',
  'resume_presentation',
  'ask_question',
  'start_qa',
  'end_lesson',
];

export function parseLessonCommandType(value: unknown): LessonCommandType | null {
  return LESSON_COMMAND_TYPES.find((type) => type === value) ?? null;
}

// Server >>>> Client, sent on `lesson:event`
export interface SlidePayload {
  slide_number: number;
  text: string;
  audio_ref: string | null;
  image_ref: string | null;
}

export interface AttendancePayload {
  student_id: string;
  confidence: number;
  photo: string | null;
}

export interface SessionSnapshot {
  lesson_id: string;
  phase: LessonPhase;
  started_by: SessionStartSource;
  started_at: string;
  current_slide: number | null;
  total_slides: number;
  slide: SlidePayload | null;
  attendance_started_at: string | null;
  attendance_ended_at: string | null;
  presentation_started_at: string | null;
  paused_at: string | null;
  completed_at: string | null;
  pending_question: { question: string; method: QuestionMethod; asked_at: string } | null;
  present_students: AttendancePayload[];
  connection_count: number;
}

export type LessonEventBody =
  | { type: 'lesson_state'; state: SessionSnapshot }
  | { type: 'attendance_started' }
  | ({ type: 'attendance_update' } & AttendancePayload)
  | { type: 'attendance_ended' }
  | { type: 'presentation_started'; total_slides: number; slide: SlidePayload }
  | ({ type: 'slide_changed' } & SlidePayload)
  | { type: 'presentation_paused' }
  | { type: 'presentation_resumed' }
  | { type: 'question_received'; question: string; method: QuestionMethod }
  | {
      type: 'question_answered';
      question: string;
      answer_text: string;
      audio_ref: string | null;
      found: boolean;
    }
  | { type: 'presentation_completed'; message: string }
  | { type: 'qa_mode_started' }
  | { type: 'lesson_ended'; reason: LessonEndReason }
  | { type: 'error'; message: string };

export type LessonEventType = LessonEventBody['type'];

export type LessonEvent = LessonEventBody & { timestamp: string };

export function createLessonEvent(body: LessonEventBody, at: Date): LessonEvent {
  return { ...body, timestamp: at.toISOString() };
}
