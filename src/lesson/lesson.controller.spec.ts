import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import {
  ANSWER_SERVICE,
  ATTENDANCE_SCANNER,
  LESSON_STORE,
  PRESENTATION_STORE,
} from '../collaborators/collaborators.interface';
import { orchestratorConfig } from '../config/orchestrator.config';
import { CommandDispatcherService } from '../lesson-session/command-dispatcher.service';
import { SessionRegistryService } from '../lesson-session/session-registry.service';
import { createFakeCollaborators, FakeCollaborators, FakeConnection, createTestConfig } from '../testing/fakes';
import { LessonController } from './lesson.controller';

describe('LessonController', () => {
  let controller: LessonController;
  let registry: SessionRegistryService;
  let collaborators: FakeCollaborators;

  beforeEach(async () => {
    collaborators = createFakeCollaborators(3);

    const module: TestingModule = await Test.createTestingModule({
      controllers: [LessonController],
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

    controller = module.get<LessonController>(LessonController);
    registry = module.get<SessionRegistryService>(SessionRegistryService);
  });

  afterEach(() => {
    registry.onModuleDestroy();
  });

  it('starts a lesson and lists it as active', async () => {
    collaborators.lessonStore.add('lesson-1');

    await expect(controller.start('lesson-1')).resolves.toEqual({
      lessonId: 'lesson-1',
      created: true,
      phase: 'scheduled',
    });
    expect(controller.listActive()).toEqual({ lessonIds: ['lesson-1'] });
  });

  it('maps an unknown lesson to 404 and a finished one to 409', async () => {
    collaborators.lessonStore.add('lesson-2', { status: 'cancelled' });

    await expect(controller.start('missing')).rejects.toThrow(NotFoundException);
    await expect(controller.start('lesson-2')).rejects.toThrow(
      new ConflictException('Lesson lesson-2 is cancelled.'),
    );
  });

  it('ends a live lesson and refuses to end it twice', async () => {
    collaborators.lessonStore.add('lesson-1');
    await controller.start('lesson-1');

    await expect(controller.end('lesson-1')).resolves.toEqual({ lessonId: 'lesson-1', phase: 'completed' });
    await expect(controller.end('lesson-1')).rejects.toThrow(
      new BadRequestException('Lesson lesson-1 has already ended.'),
    );
    await registry.get('lesson-1')?.actor.whenIdle();
  });

  it('returns the session snapshot with the live connection count', async () => {
    collaborators.lessonStore.add('lesson-1');
    await controller.start('lesson-1');
    registry.get('lesson-1')?.hub.join(
      {
        connectionId: 'socket-1',
        lessonId: 'lesson-1',
        role: 'viewer',
        userId: 'viewer-1',
        userName: 'Viewer',
        joinedAt: new Date('2026-03-02T09:05:00.000Z'),
      },
      new FakeConnection('socket-1'),
    );

    expect(controller.state('lesson-1')).toMatchObject({
      lesson_id: 'lesson-1',
      phase: 'scheduled',
      started_by: 'manual',
      connection_count: 1,
    });
    expect(controller.connections('lesson-1')).toEqual({
      lessonId: 'lesson-1',
      activeConnections: 1,
      connections: [
        {
          connectionId: 'socket-1',
          role: 'viewer',
          userId: 'viewer-1',
          userName: 'Viewer',
          joinedAt: '2026-03-02T09:05:00.000Z',
        },
      ],
    });
  });

  it('reports lessons without a session', () => {
    expect(() => controller.state('lesson-9')).toThrow('Lesson lesson-9 has no active session.');
    expect(controller.connections('lesson-9')).toEqual({
      lessonId: 'lesson-9',
      activeConnections: 0,
      connections: [],
    });
  });
});
