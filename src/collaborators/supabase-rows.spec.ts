import {
  parseAnswerResult,
  parseAttendanceMatches,
  parseLessonIds,
  parseLessonRecord,
  parseSlideRow,
} from './supabase-rows';

describe('supabase row parsing', () => {
  it('reads lesson ids from numeric and uuid columns', () => {
    expect(parseLessonIds([{ id: 12 }, { id: 'a1b2' }, { id: null }, 'junk'])).toEqual(['12', 'a1b2']);
    expect(parseLessonIds(null)).toEqual([]);
  });

  it('maps a lessons row to a record', () => {
    expect(
      parseLessonRecord({
        id: 7,
        title: 'Photosynthesis',
        status: 'in_progress',
        scheduled_at: '2026-03-02T09:00:00.000Z',
        started_at: '2026-03-02T09:01:00.000Z',
        ended_at: null,
      }),
    ).toEqual({
      id: '7',
      title: 'Photosynthesis',
      status: 'in_progress',
      scheduledAt: new Date('2026-03-02T09:00:00.000Z'),
      startedAt: new Date('2026-03-02T09:01:00.000Z'),
      endedAt: null,
    });
  });

  it('rejects lessons rows with an unknown status or no schedule', () => {
    expect(parseLessonRecord({ id: 7, status: 'archived', scheduled_at: '2026-03-02T09:00:00Z' })).toBeNull();
    expect(parseLessonRecord({ id: 7, status: 'scheduled', scheduled_at: 'not a date' })).toBeNull();
    expect(parseLessonRecord(null)).toBeNull();
  });

  it('falls back to a default title', () => {
    expect(
      parseLessonRecord({ id: 'x', status: 'scheduled', scheduled_at: '2026-03-02T09:00:00.000Z' })?.title,
    ).toBe('Lesson x');
  });

  it('maps a slide row, naming slides without text', () => {
    expect(parseSlideRow({ text: '  Cells  ', audio_path: 'a/1.mp3', image_path: null }, 1)).toEqual({
      text: 'Cells',
      audioRef: 'a/1.mp3',
      imageRef: null,
    });
    expect(parseSlideRow({ text: '' }, 4)).toEqual({ text: 'Slide 4', audioRef: null, imageRef: null });
    expect(parseSlideRow(undefined, 1)).toBeNull();
  });

  it('reads attendance matches and skips incomplete ones', () => {
    const payload = {
      matches: [
        { student_id: 3, confidence: 0.91, photo_path: 'photos/3.jpg' },
        { student_id: 'abc', confidence: 'high' },
        { confidence: 0.5 },
      ],
    };

    expect(parseAttendanceMatches(payload)).toEqual([
      { studentId: '3', confidence: 0.91, photoRef: 'photos/3.jpg' },
    ]);
    expect(parseAttendanceMatches([{ student_id: 'abc', confidence: 0.7 }])).toEqual([
      { studentId: 'abc', confidence: 0.7, photoRef: null },
    ]);
    expect(parseAttendanceMatches('nope')).toEqual([]);
  });

  it('reads answers and infers found from the text', () => {
    expect(parseAnswerResult({ answer_text: 'Chlorophyll.', audio_path: 'a/q.mp3', found: true })).toEqual({
      answerText: 'Chlorophyll.',
      audioRef: 'a/q.mp3',
      found: true,
    });
    expect(parseAnswerResult({ answer_text: '' })).toEqual({ answerText: '', audioRef: null, found: false });
    expect(parseAnswerResult({ found: true })).toBeNull();
  });
});
