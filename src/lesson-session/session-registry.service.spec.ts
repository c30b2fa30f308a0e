import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import {
  ANSWER_SERVICE,
  ATTENDANCE_SCANNER,
  LESSON_STORE,
  PRESENTATION_STORE,
} from '../collaborators/collaborators.interface';
import { orchestratorConfig } from '../config/orchestrator.config';
import { createFakeCollaborators, createTestConfig, FakeConnection } from '../testing/fakes';
import { events } from '../utils/events';
import { SessionRegistryService } from './session-registry.service';

describe('SessionRegistryService', () => {
  let registry: SessionRegistryService;
  let eventEmitter: EventEmitter2;

  beforeEach(async () => {
    const collaborators = createFakeCollaborators(3);
    eventEmitter = new EventEmitter2();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionRegistryService,
        { provide: orchestratorConfig.KEY, useValue: createTestConfig({ sessionLingerMs: 5_000 }) },
        { provide: ATTENDANCE_SCANNER, useValue: collaborators.attendanceScanner },
        { provide: PRESENTATION_STORE, useValue: collaborators.presentationStore },
        { provide: ANSWER_SERVICE, useValue: collaborators.answerService },
        { provide: LESSON_STORE, useValue: collaborators.lessonStore },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    registry = module.get<SessionRegistryService>(SessionRegistryService);
  });

  afterEach(() => {
    registry.onModuleDestroy();
    jest.useRealTimers();
  });

  it('should be defined', () => {
    expect(registry).toBeDefined();
  });

  it('creates one session per lesson', () => {
    const emit = jest.spyOn(eventEmitter, 'emit');

    const first = registry.getOrCreate('lesson-1', 'scheduler');
    const second = registry.getOrCreate('lesson-1', 'manual');

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.session).toBe(first.session);
    expect(first.session.actor.getState().startedBy).toBe('scheduler');
    expect(emit).toHaveBeenCalledTimes(1);
    expect(emit).toHaveBeenCalledWith(events.SESSION_CREATED, { lessonId: 'lesson-1' });
  });

  it('lists only sessions that have not completed', async () => {
    registry.getOrCreate('lesson-1', 'manual');
    const { session } = registry.getOrCreate('lesson-2', 'manual');

    await session.actor.execute({ type: 'end_lesson' });

    expect(registry.activeLessonIds()).toEqual(['lesson-1']);
    expect(registry.exists('lesson-1')).toBe(true);
    expect(registry.exists('lesson-2')).toBe(false);
    // still reachable until the linger window passes
    expect(registry.get('lesson-2')).toBe(session);
  });

  it('tears a completed session down after the linger window', async () => {
    jest.useFakeTimers();
    const emit = jest.spyOn(eventEmitter, 'emit');
    const { session } = registry.getOrCreate('lesson-1', 'manual');
    const connection = new FakeConnection('teacher');
    session.hub.join(
      {
        connectionId: 'teacher',
        lessonId: 'lesson-1',
        role: 'teacher',
        userId: 'teacher-1',
        userName: 'Teacher',
        joinedAt: new Date(),
      },
      connection,
    );

    await session.actor.execute({ type: 'end_lesson' });
    await session.actor.whenIdle();
    jest.advanceTimersByTime(4_999);
    expect(registry.get('lesson-1')).toBe(session);

    jest.advanceTimersByTime(1);
    expect(registry.get('lesson-1')).toBeUndefined();
    expect(connection.types()).toEqual(['lesson_state', 'lesson_ended']);
    expect(connection.closed).toBe(true);
    expect(emit).toHaveBeenCalledWith(events.SESSION_CLOSED, { lessonId: 'lesson-1' });
  });

  it('allows a fresh session once the previous one was removed', () => {
    const { session } = registry.getOrCreate('lesson-1', 'manual');

    expect(registry.remove('lesson-1')).toBe(true);
    expect(registry.remove('lesson-1')).toBe(false);
    expect(session.hub.isClosed).toBe(true);

    const next = registry.getOrCreate('lesson-1', 'manual');
    expect(next.created).toBe(true);
    expect(next.session).not.toBe(session);
  });

  it('closes every session on shutdown', () => {
    registry.getOrCreate('lesson-1', 'manual');
    registry.getOrCreate('lesson-2', 'scheduler');

    registry.onModuleDestroy();

    expect(registry.activeLessonIds()).toEqual([]);
    expect(registry.get('lesson-1')).toBeUndefined();
  });
});
