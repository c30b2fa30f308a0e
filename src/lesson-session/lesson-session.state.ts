import { SessionSnapshot, SlidePayload } from '../types/lesson-protocol.types';
import {
  LessonPhase,
  PresentStudent,
  SessionStartSource,
  SessionState,
  SlideContent,
} from './lesson-session.interface';

export function createInitialSessionState(
  lessonId: string,
  startedBy: SessionStartSource,
  startedAt: Date,
): SessionState {
  return {
    lessonId,
    phase: 'scheduled',
    startedBy,
    startedAt,
    currentSlide: null,
    totalSlides: 0,
    shownSlide: null,
    pendingOperation: null,
    attendanceStartedAt: null,
    attendanceEndedAt: null,
    presentationStartedAt: null,
    pausedAt: null,
    completedAt: null,
    pendingQuestion: null,
    presentStudents: [],
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled lesson phase: ${String(value)}`);
}

// phases in which currentSlide must point into the deck
export function isSlidePhase(phase: LessonPhase): boolean {
  switch (phase) {
    case 'presentation_active':
    case 'paused':
      return true;
    case 'scheduled':
    case 'attendance_active':
    case 'qa_active':
    case 'completed':
      return false;
    default:
      return assertNever(phase);
  }
}

export function isTerminalPhase(phase: LessonPhase): boolean {
  switch (phase) {
    case 'completed':
      return true;
    case 'scheduled':
    case 'attendance_active':
    case 'presentation_active':
    case 'paused':
    case 'qa_active':
      return false;
    default:
      return assertNever(phase);
  }
}

/**
 * Returns a description of the first broken invariant, or null when the
 * state is consistent.
 */
export function findInvariantViolation(state: SessionState): string | null {
  if (!Number.isInteger(state.totalSlides) || state.totalSlides < 0) {
    return `total_slides is ${state.totalSlides}`;
  }
  if (isSlidePhase(state.phase)) {
    const slide = state.currentSlide;
    if (slide === null || !Number.isInteger(slide) || slide < 1 || slide > state.totalSlides) {
      return `current_slide ${String(slide)} is outside 1..${state.totalSlides} in phase ${state.phase}`;
    }
  }
  if (state.phase === 'paused' && state.pausedAt === null) {
    return 'phase is paused but paused_at is not set';
  }
  return null;
}

export function toSlidePayload(slideNumber: number, content: SlideContent): SlidePayload {
  return {
    slide_number: slideNumber,
    text: content.text,
    audio_ref: content.audioRef,
    image_ref: content.imageRef,
  };
}

// keeps the best match per student
export function mergePresentStudent(
  students: PresentStudent[],
  incoming: PresentStudent,
): PresentStudent[] {
  const existing = students.find((student) => student.studentId === incoming.studentId);
  if (!existing) return [...students, incoming];
  if (existing.confidence >= incoming.confidence) return students;
  return students.map((student) => (student.studentId === incoming.studentId ? incoming : student));
}

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export function toSessionSnapshot(state: SessionState, connectionCount: number): SessionSnapshot {
  const inSlides = isSlidePhase(state.phase);
  // the payload is the slide last broadcast, never new number + old content
  const slide =
    inSlides && state.shownSlide
      ? toSlidePayload(state.shownSlide.slideNumber, state.shownSlide.content)
      : null;

  return {
    lesson_id: state.lessonId,
    phase: state.phase,
    started_by: state.startedBy,
    started_at: state.startedAt.toISOString(),
    current_slide: inSlides ? state.currentSlide : null,
    total_slides: state.totalSlides,
    slide,
    attendance_started_at: iso(state.attendanceStartedAt),
    attendance_ended_at: iso(state.attendanceEndedAt),
    presentation_started_at: iso(state.presentationStartedAt),
    paused_at: iso(state.pausedAt),
    completed_at: iso(state.completedAt),
    pending_question: state.pendingQuestion
      ? {
          question: state.pendingQuestion.question,
          method: state.pendingQuestion.method,
          asked_at: state.pendingQuestion.askedAt.toISOString(),
        }
      : null,
    present_students: state.presentStudents.map((student) => ({
      student_id: student.studentId,
      confidence: student.confidence,
      photo: student.photo,
    })),
    connection_count: connectionCount,
  };
}
