import { QuestionMethod, SlideContent } from '../lesson-session/lesson-session.interface';

export const ATTENDANCE_SCANNER = Symbol('ATTENDANCE_SCANNER');
export const PRESENTATION_STORE = Symbol('PRESENTATION_STORE');
export const ANSWER_SERVICE = Symbol('ANSWER_SERVICE');
export const LESSON_STORE = Symbol('LESSON_STORE');

export interface AttendanceMatch {
  studentId: string;
  confidence: number; // 0..1
  photoRef: string | null;
}

/** Face matching against the classroom camera feed. */
export interface AttendanceScanner {
  scan(lessonId: string): Promise<AttendanceMatch[]>;
}

/** Slides with their narration audio, prepared ahead of the lesson. */
export interface PresentationStore {
  slideCount(lessonId: string): Promise<number>;
  slide(lessonId: string, index: number): Promise<SlideContent>;
}

export interface QuestionInput {
  question: string;
  method: QuestionMethod;
}

export interface AnswerResult {
  answerText: string;
  audioRef: string | null;
  found: boolean;
}

/** Retrieval-backed answers over the lesson materials. */
export interface AnswerService {
  answer(lessonId: string, input: QuestionInput): Promise<AnswerResult>;
}

export type LessonStatus = 'scheduled' | 'in_progress' | 'completed' | 'cancelled';

export interface LessonRecord {
  id: string;
  title: string;
  status: LessonStatus;
  scheduledAt: Date;
  startedAt: Date | null;
  endedAt: Date | null;
}

/** Durable lesson records. */
export interface LessonStore {
  // lessons still `scheduled` whose scheduled time lies in [now - windowMinutes, now]
  dueLessons(now: Date, windowMinutes: number): Promise<string[]>;
  find(lessonId: string): Promise<LessonRecord | null>;
  markStarted(lessonId: string, at: Date): Promise<void>;
  markCompleted(lessonId: string, at: Date): Promise<void>;
}

export interface LessonCollaborators {
  attendanceScanner: AttendanceScanner;
  presentationStore: PresentationStore;
  answerService: AnswerService;
  lessonStore: LessonStore;
}
