import { isRecord, readDate, readId, readNumber, readString } from '../utils/guards';
import { SlideContent } from '../lesson-session/lesson-session.interface';
import { AnswerResult, AttendanceMatch, LessonRecord, LessonStatus } from './collaborators.interface';

const LESSON_STATUSES: readonly LessonStatus[] = ['scheduled', 'in_progress', 'completed', 'cancelled'];

export function parseLessonIds(rows: unknown): string[] {
  if (!Array.isArray(rows)) return [];
  const ids: string[] = [];
  for (const row of rows) {
    const id = isRecord(row) ? readId(row, 'id') : null;
    if (id) ids.push(id);
  }
  return ids;
}

// lessons row -> LessonRecord; null when required columns are missing
export function parseLessonRecord(row: unknown): LessonRecord | null {
  if (!isRecord(row)) return null;
  const id = readId(row, 'id');
  const status = LESSON_STATUSES.find((candidate) => candidate === row.status);
  const scheduledAt = readDate(row, 'scheduled_at');
  if (!id || !status || !scheduledAt) return null;

  return {
    id,
    title: readString(row, 'title') ?? `Lesson ${id}`,
    status,
    scheduledAt,
    startedAt: readDate(row, 'started_at'),
    endedAt: readDate(row, 'ended_at'),
  };
}

export function parseSlideRow(row: unknown, slideNumber: number): SlideContent | null {
  if (!isRecord(row)) return null;
  const text = readString(row, 'text')?.trim();
  return {
    text: text || `Slide ${slideNumber}`,
    audioRef: readString(row, 'audio_path'),
    imageRef: readString(row, 'image_path'),
  };
}

// scan-attendance returns { matches: [{ student_id, confidence, photo_path }] }
export function parseAttendanceMatches(payload: unknown): AttendanceMatch[] {
  const rows = isRecord(payload) ? payload.matches : payload;
  if (!Array.isArray(rows)) return [];

  const matches: AttendanceMatch[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const studentId = readId(row, 'student_id');
    const confidence = readNumber(row, 'confidence');
    if (!studentId || confidence === null) continue;
    matches.push({ studentId, confidence, photoRef: readString(row, 'photo_path') });
  }
  return matches;
}

// answer-question returns { answer_text, audio_path, found }
export function parseAnswerResult(payload: unknown): AnswerResult | null {
  if (!isRecord(payload)) return null;
  const answerText = readString(payload, 'answer_text');
  if (answerText === null) return null;
  const found = typeof payload.found === 'boolean' ? payload.found : answerText.trim().length > 0;
  return { answerText, audioRef: readString(payload, 'audio_path'), found };
}
