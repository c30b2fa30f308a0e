import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { LESSON_STORE, LessonRecord, LessonStore } from '../collaborators/collaborators.interface';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import {
  LessonCommand,
  LessonCommandType,
  parseLessonCommandType,
} from '../types/lesson-protocol.types';
import { ConnectionRole } from '../types/socket.types';
import { describeError, isRecord } from '../utils/guards';
import { withTimeout } from '../utils/with-timeout';
import { SYSTEM_ORIGIN } from './lesson-session.actor';
import { CommandRejectedError, LessonUnavailableError } from './lesson-session.errors';
import { LessonPhase, SessionStartSource } from './lesson-session.interface';
import { SessionRegistryService } from './session-registry.service';
import { AskQuestionDto } from './sessionDto/ask-question.dto';

export interface CommandContext {
  lessonId: string;
  connectionId: string | null;
  userId: string | null;
  role: ConnectionRole;
}

export interface StartResult {
  lessonId: string;
  created: boolean;
  phase: LessonPhase;
}

const STUDENT_COMMANDS: ReadonlySet<LessonCommandType> = new Set<LessonCommandType>(['ask_question']);

export function canIssue(role: ConnectionRole, type: LessonCommandType): boolean {
  switch (role) {
    case 'teacher':
      return true;
    case 'student':
      return STUDENT_COMMANDS.has(type);
    case 'viewer':
      return false;
  }
}

/**
 * Turns wire envelopes into typed commands and routes them to the lesson's
 * actor. `start` is the one entry point for creating sessions, shared by the
 * gateway, the HTTP controller and the scheduler.
 */
@Injectable()
export class CommandDispatcherService {
  private readonly logger = new Logger(CommandDispatcherService.name);

  constructor(
    private readonly registry: SessionRegistryService,
    @Inject(LESSON_STORE) private readonly lessonStore: LessonStore,
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
  ) {}

  parse(envelope: unknown): LessonCommand {
    if (!isRecord(envelope)) {
      throw new CommandRejectedError('Command must be an object with a "type" field.');
    }
    const type = parseLessonCommandType(envelope.type);
    if (!type) {
      throw new CommandRejectedError(`Unknown command type: ${String(envelope.type)}`);
    }
    if (type === 'ask_question') {
      return this.parseQuestion(envelope);
    }
    return { type };
  }

  async dispatch(context: CommandContext, envelope: unknown): Promise<LessonPhase> {
    const command = this.parse(envelope);
    // roles are checked before the session lookup
    if (!canIssue(context.role, command.type)) {
      throw new CommandRejectedError(`A ${context.role} cannot send ${command.type}.`);
    }

    const session = this.registry.get(context.lessonId);
    if (!session) {
      throw new CommandRejectedError(`Lesson ${context.lessonId} has no active session.`);
    }
    return session.actor.execute(command, {
      connectionId: context.connectionId,
      userId: context.userId,
    });
  }

  async start(lessonId: string, source: SessionStartSource): Promise<StartResult> {
    const existing = this.registry.get(lessonId);
    if (existing) {
      if (existing.actor.isCompleted) {
        throw new LessonUnavailableError(lessonId, 'closed', `Lesson ${lessonId} has already ended.`);
      }
      return { lessonId, created: false, phase: existing.actor.phase };
    }

    // the scheduler only ever sees lessons the store reported as scheduled
    if (source === 'manual') {
      const lesson = await this.findLesson(lessonId);
      if (!lesson) {
        throw new LessonUnavailableError(lessonId, 'not_found', `Lesson ${lessonId} not found.`);
      }
      if (lesson.status === 'completed' || lesson.status === 'cancelled') {
        throw new LessonUnavailableError(lessonId, 'closed', `Lesson ${lessonId} is ${lesson.status}.`);
      }
    }

    const { session, created } = this.registry.getOrCreate(lessonId, source);
    // the session stays live even if this write fails
    if (created) {
      const startedAt = session.actor.getState().startedAt;
      try {
        await this.callStore('mark lesson started', () => this.lessonStore.markStarted(lessonId, startedAt));
      } catch (error) {
        this.logger.error(`Failed to persist start of lesson ${lessonId}: ${describeError(error)}`);
      }
    }
    return { lessonId, created, phase: session.actor.phase };
  }

  findLesson(lessonId: string): Promise<LessonRecord | null> {
    return this.callStore('find lesson', () => this.lessonStore.find(lessonId));
  }

  async end(lessonId: string): Promise<LessonPhase> {
    const session = this.registry.get(lessonId);
    if (session) {
      return session.actor.execute({ type: 'end_lesson' }, SYSTEM_ORIGIN);
    }

    // no live session (e.g. after a restart): close the record directly
    const lesson = await this.findLesson(lessonId);
    if (!lesson) {
      throw new LessonUnavailableError(lessonId, 'not_found', `Lesson ${lessonId} not found.`);
    }
    if (lesson.status !== 'in_progress') {
      throw new LessonUnavailableError(lessonId, 'closed', `Lesson ${lessonId} is ${lesson.status}.`);
    }
    await this.callStore('mark lesson completed', () => this.lessonStore.markCompleted(lessonId, new Date()));
    this.logger.log(`Lesson ${lessonId} had no live session; record marked completed`);
    return 'completed';
  }

  private parseQuestion(envelope: Record<string, unknown>): LessonCommand {
    const dto = plainToInstance(AskQuestionDto, envelope);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new CommandRejectedError(`Invalid ask_question: ${details.join('; ')}`);
    }
    return { type: 'ask_question', question: dto.question, method: dto.method ?? 'text' };
  }

  // Promise.resolve().then() turns a synchronous throw into a rejection
  private callStore<T>(operation: string, call: () => Promise<T>): Promise<T> {
    return withTimeout(Promise.resolve().then(call), this.config.collaboratorTimeoutMs, operation);
  }
}
