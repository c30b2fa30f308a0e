import { ConnectionRole } from '../types/socket.types';

export type LessonPhase =
  | 'scheduled'
  | 'attendance_active'
  | 'presentation_active'
  | 'paused'
  | 'qa_active'
  | 'completed';

export type QuestionMethod = 'text' | 'audio';

export type SessionStartSource = 'scheduler' | 'manual';

export type LessonEndReason = 'ended' | 'invariant_violation';

export interface SlideContent {
  text: string;
  audioRef: string | null;
  imageRef: string | null;
}

// the slide clients were last shown, paired with its number
export interface ShownSlide {
  slideNumber: number;
  content: SlideContent;
}

export interface PendingQuestion {
  question: string; // question text, or an audio reference when method is 'audio'
  method: QuestionMethod;
  askedBy: string | null; // userId of the asker
  askedAt: Date;
}

export interface PresentStudent {
  studentId: string;
  confidence: number;
  photo: string | null;
  recognizedAt: Date;
}

/**
 * State of one live lesson. Only the owning LessonSessionActor writes to it.
 */
export interface SessionState {
  lessonId: string;
  phase: LessonPhase;
  startedBy: SessionStartSource;
  startedAt: Date;

  currentSlide: number | null; // 1-based, only set in presentation_active and paused
  totalSlides: number;
  shownSlide: ShownSlide | null; // trails currentSlide while a fetch is in flight
  pendingOperation: 'loading_presentation' | null;

  attendanceStartedAt: Date | null;
  attendanceEndedAt: Date | null;
  presentationStartedAt: Date | null;
  pausedAt: Date | null; // set on pause, cleared on resume
  completedAt: Date | null;

  pendingQuestion: PendingQuestion | null; // single slot
  presentStudents: PresentStudent[];
}

export interface ConnectionRecord {
  connectionId: string;
  lessonId: string;
  role: ConnectionRole;
  userId: string;
  userName: string;
  joinedAt: Date;
}

export interface CommandOrigin {
  connectionId: string | null; // null for HTTP and scheduler callers
  userId: string | null;
}
