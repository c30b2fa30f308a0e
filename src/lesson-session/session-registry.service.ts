import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ANSWER_SERVICE,
  AnswerService,
  ATTENDANCE_SCANNER,
  AttendanceScanner,
  LESSON_STORE,
  LessonStore,
  PRESENTATION_STORE,
  PresentationStore,
} from '../collaborators/collaborators.interface';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { events } from '../utils/events';
import { ConnectionHub } from './connection-hub';
import { LessonSessionActor } from './lesson-session.actor';
import { SessionStartSource } from './lesson-session.interface';

export interface ActiveSession {
  actor: LessonSessionActor;
  hub: ConnectionHub;
}

export interface SessionLifecycleEvent {
  lessonId: string;
}

/**
 * The only owner of the lessonId -> session map. Sessions are created lazily
 * on start and torn down `sessionLingerMs` after they complete, so the final
 * broadcasts still reach every client.
 */
@Injectable()
export class SessionRegistryService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, ActiveSession>(); // key: lessonId
  private readonly teardownTimers = new Map<string, NodeJS.Timeout>(); // key: lessonId

  constructor(
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
    @Inject(ATTENDANCE_SCANNER) private readonly attendanceScanner: AttendanceScanner,
    @Inject(PRESENTATION_STORE) private readonly presentationStore: PresentationStore,
    @Inject(ANSWER_SERVICE) private readonly answerService: AnswerService,
    @Inject(LESSON_STORE) private readonly lessonStore: LessonStore,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  getOrCreate(lessonId: string, startedBy: SessionStartSource): { session: ActiveSession; created: boolean } {
    const existing = this.sessions.get(lessonId);
    if (existing) return { session: existing, created: false };

    // hub and actor refer to each other; the snapshot callback only runs after both exist
    const hub: ConnectionHub = new ConnectionHub(lessonId, (connectionCount) => actor.snapshot(connectionCount));
    const actor: LessonSessionActor = new LessonSessionActor({
      lessonId,
      startedBy,
      hub,
      collaborators: {
        attendanceScanner: this.attendanceScanner,
        presentationStore: this.presentationStore,
        answerService: this.answerService,
        lessonStore: this.lessonStore,
      },
      collaboratorTimeoutMs: this.config.collaboratorTimeoutMs,
      onCompleted: (completedId) => this.scheduleTeardown(completedId),
    });
    const session: ActiveSession = { actor, hub };
    this.sessions.set(lessonId, session);

    this.logger.log(`Session created for lesson ${lessonId} (${startedBy})`);
    this.eventEmitter.emit(events.SESSION_CREATED, { lessonId } satisfies SessionLifecycleEvent);
    return { session, created: true };
  }

  get(lessonId: string): ActiveSession | undefined {
    return this.sessions.get(lessonId);
  }

  // a session that completed but is still lingering does not count as active
  exists(lessonId: string): boolean {
    const session = this.sessions.get(lessonId);
    return session !== undefined && !session.actor.isCompleted;
  }

  activeLessonIds(): string[] {
    return Array.from(this.sessions.entries())
      .filter(([, session]) => !session.actor.isCompleted)
      .map(([lessonId]) => lessonId);
  }

  remove(lessonId: string): boolean {
    const timer = this.teardownTimers.get(lessonId);
    if (timer) {
      clearTimeout(timer);
      this.teardownTimers.delete(lessonId);
    }

    const session = this.sessions.get(lessonId);
    if (!session) return false;

    session.hub.close();
    this.sessions.delete(lessonId);
    this.logger.log(`Session for lesson ${lessonId} removed`);
    this.eventEmitter.emit(events.SESSION_CLOSED, { lessonId } satisfies SessionLifecycleEvent);
    return true;
  }

  onModuleDestroy() {
    for (const lessonId of Array.from(this.sessions.keys())) {
      this.remove(lessonId);
    }
  }

  private scheduleTeardown(lessonId: string) {
    if (this.teardownTimers.has(lessonId)) return;
    this.logger.log(`Lesson ${lessonId} completed, tearing down in ${this.config.sessionLingerMs}ms`);
    const timer = setTimeout(() => {
      this.teardownTimers.delete(lessonId);
      this.remove(lessonId);
    }, this.config.sessionLingerMs);
    this.teardownTimers.set(lessonId, timer);
  }
}
