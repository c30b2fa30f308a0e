import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import {
  ANSWER_SERVICE,
  ATTENDANCE_SCANNER,
  LESSON_STORE,
  PRESENTATION_STORE,
} from '../collaborators/collaborators.interface';
import { orchestratorConfig } from '../config/orchestrator.config';
import {
  createFakeCollaborators,
  createTestConfig,
  FakeCollaborators,
} from '../testing/fakes';
import { canIssue, CommandContext, CommandDispatcherService } from './command-dispatcher.service';
import { CommandRejectedError, LessonUnavailableError } from './lesson-session.errors';
import { SessionRegistryService } from './session-registry.service';

const teacherContext: CommandContext = {
  lessonId: 'lesson-1',
  connectionId: 'socket-teacher',
  userId: 'teacher-1',
  role: 'teacher',
};

describe('CommandDispatcherService', () => {
  let dispatcher: CommandDispatcherService;
  let registry: SessionRegistryService;
  let collaborators: FakeCollaborators;

  beforeEach(async () => {
    collaborators = createFakeCollaborators(3);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CommandDispatcherService,
        SessionRegistryService,
        { provide: orchestratorConfig.KEY, useValue: createTestConfig() },
        { provide: ATTENDANCE_SCANNER, useValue: collaborators.attendanceScanner },
        { provide: PRESENTATION_STORE, useValue: collaborators.presentationStore },
        { provide: ANSWER_SERVICE, useValue: collaborators.answerService },
        { provide: LESSON_STORE, useValue: collaborators.lessonStore },
        { provide: EventEmitter2, useValue: new EventEmitter2() },
      ],
    }).compile();

    dispatcher = module.get<CommandDispatcherService>(CommandDispatcherService);
    registry = module.get<SessionRegistryService>(SessionRegistryService);
  });

  afterEach(() => {
    registry.onModuleDestroy();
  });

  describe('parse', () => {
    it('rejects envelopes without a type', () => {
      expect(() => dispatcher.parse('next_slide')).toThrow(
        'Command must be an object with a "type" field.',
      );
      expect(() => dispatcher.parse(null)).toThrow(CommandRejectedError);
    });

    it('rejects unknown command types', () => {
      expect(() => dispatcher.parse({ type: 'fly_away' })).toThrow('Unknown command type: fly_away');
    });

    it('parses simple commands', () => {
      expect(dispatcher.parse({ type: 'next_slide', extra: true })).toEqual({ type: 'next_slide' });
    });

    it('trims the question and defaults the method to text', () => {
      expect(dispatcher.parse({ type: 'ask_question', question: '  What is a cell?  ' })).toEqual({
        type: 'ask_question',
        question: 'What is a cell?',
        method: 'text',
      });
    });

    it('rejects a question without text', () => {
      expect(() => dispatcher.parse({ type: 'ask_question', question: '   ' })).toThrow(
        'Invalid ask_question: question should not be empty',
      );
    });

    it('rejects an unknown question method', () => {
      expect(() => dispatcher.parse({ type: 'ask_question', question: 'Why?', method: 'video' })).toThrow(
        /^Invalid ask_question: method must be one of the following values/,
      );
    });
  });

  describe('canIssue', () => {
    it('lets teachers send everything, students only questions, viewers nothing', () => {
      expect(canIssue('teacher', 'end_lesson')).toBe(true);
      expect(canIssue('student', 'ask_question')).toBe(true);
      expect(canIssue('student', 'next_slide')).toBe(false);
      expect(canIssue('viewer', 'ask_question')).toBe(false);
    });
  });

  describe('dispatch', () => {
    it('forwards a permitted command to the lesson actor', async () => {
      collaborators.lessonStore.add('lesson-1');
      await dispatcher.start('lesson-1', 'manual');

      await expect(dispatcher.dispatch(teacherContext, { type: 'start_attendance' })).resolves.toBe(
        'attendance_active',
      );
      await registry.get('lesson-1')?.actor.whenIdle();
    });

    it('refuses commands the role may not send', async () => {
      collaborators.lessonStore.add('lesson-1');
      await dispatcher.start('lesson-1', 'manual');

      await expect(
        dispatcher.dispatch({ ...teacherContext, role: 'student' }, { type: 'next_slide' }),
      ).rejects.toThrow('A student cannot send next_slide.');
      expect(registry.get('lesson-1')?.actor.phase).toBe('scheduled');
    });

    it('refuses commands for lessons without a session', async () => {
      await expect(
        dispatcher.dispatch({ ...teacherContext, lessonId: 'lesson-9' }, { type: 'start_attendance' }),
      ).rejects.toThrow('Lesson lesson-9 has no active session.');
    });
  });

  describe('start', () => {
    it('creates the session once and marks the record started', async () => {
      collaborators.lessonStore.add('lesson-1');

      const first = await dispatcher.start('lesson-1', 'manual');
      const second = await dispatcher.start('lesson-1', 'scheduler');

      expect(first).toEqual({ lessonId: 'lesson-1', created: true, phase: 'scheduled' });
      expect(second).toEqual({ lessonId: 'lesson-1', created: false, phase: 'scheduled' });
      expect(collaborators.lessonStore.started).toEqual(['lesson-1']);
      expect(collaborators.lessonStore.lessons.get('lesson-1')?.status).toBe('in_progress');
    });

    it('refuses a manual start for an unknown lesson', async () => {
      const attempt = dispatcher.start('missing', 'manual');

      await expect(attempt).rejects.toThrow(LessonUnavailableError);
      await expect(attempt).rejects.toMatchObject({ reason: 'not_found' });
      expect(registry.get('missing')).toBeUndefined();
    });

    it('refuses a manual start for a lesson that already finished', async () => {
      collaborators.lessonStore.add('lesson-1', { status: 'completed' });

      await expect(dispatcher.start('lesson-1', 'manual')).rejects.toMatchObject({
        reason: 'closed',
        message: 'Lesson lesson-1 is completed.',
      });
    });

    it('refuses to restart a session that has ended but not yet been torn down', async () => {
      collaborators.lessonStore.add('lesson-1');
      await dispatcher.start('lesson-1', 'manual');
      await dispatcher.end('lesson-1');

      await expect(dispatcher.start('lesson-1', 'manual')).rejects.toThrow(
        'Lesson lesson-1 has already ended.',
      );
    });

    it('keeps the session when persisting the start fails', async () => {
      collaborators.lessonStore.add('lesson-1');
      jest.spyOn(collaborators.lessonStore, 'markStarted').mockRejectedValue(new Error('database offline'));

      await expect(dispatcher.start('lesson-1', 'manual')).resolves.toMatchObject({ created: true });
      expect(registry.exists('lesson-1')).toBe(true);
    });
  });

  describe('end', () => {
    it('ends a live session', async () => {
      collaborators.lessonStore.add('lesson-1');
      await dispatcher.start('lesson-1', 'manual');

      await expect(dispatcher.end('lesson-1')).resolves.toBe('completed');
      await registry.get('lesson-1')?.actor.whenIdle();
      expect(collaborators.lessonStore.completed).toEqual(['lesson-1']);
    });

    it('closes an in-progress record that has no live session', async () => {
      collaborators.lessonStore.add('lesson-2', { status: 'in_progress' });

      await expect(dispatcher.end('lesson-2')).resolves.toBe('completed');
      expect(collaborators.lessonStore.lessons.get('lesson-2')?.status).toBe('completed');
    });

    it('refuses to end a lesson that never started', async () => {
      collaborators.lessonStore.add('lesson-3');

      await expect(dispatcher.end('lesson-3')).rejects.toMatchObject({
        reason: 'closed',
        message: 'Lesson lesson-3 is scheduled.',
      });
    });
  });
});
