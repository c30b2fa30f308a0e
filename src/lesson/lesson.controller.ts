import {
  BadRequestException,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { TeacherGuard } from '../auth/teacher/teacher.guard';
import { CommandDispatcherService, StartResult } from '../lesson-session/command-dispatcher.service';
import { CommandRejectedError, LessonUnavailableError } from '../lesson-session/lesson-session.errors';
import { LessonPhase } from '../lesson-session/lesson-session.interface';
import { SessionRegistryService } from '../lesson-session/session-registry.service';
import { SessionSnapshot } from '../types/lesson-protocol.types';
import { ConnectionRole } from '../types/socket.types';

export interface ConnectionSummary {
  connectionId: string;
  role: ConnectionRole;
  userId: string;
  userName: string;
  joinedAt: string;
}

export interface LessonConnections {
  lessonId: string;
  activeConnections: number;
  connections: ConnectionSummary[];
}

function toHttpException(error: unknown): unknown {
  if (error instanceof LessonUnavailableError) {
    return error.reason === 'not_found'
      ? new NotFoundException(error.message)
      : new ConflictException(error.message);
  }
  if (error instanceof CommandRejectedError) {
    return new BadRequestException(error.message);
  }
  return error;
}

@UseGuards(JwtAuthGuard)
@Controller('lessons')
export class LessonController {
  constructor(
    private readonly dispatcher: CommandDispatcherService,
    private readonly registry: SessionRegistryService,
  ) {}

  @Get('active')
  listActive(): { lessonIds: string[] } {
    return { lessonIds: this.registry.activeLessonIds() };
  }

  // manual start, same path the scheduler uses
  @UseGuards(TeacherGuard)
  @Post(':lessonId/start')
  @HttpCode(HttpStatus.OK)
  async start(@Param('lessonId') lessonId: string): Promise<StartResult> {
    try {
      return await this.dispatcher.start(lessonId, 'manual');
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @UseGuards(TeacherGuard)
  @Post(':lessonId/end')
  @HttpCode(HttpStatus.OK)
  async end(@Param('lessonId') lessonId: string): Promise<{ lessonId: string; phase: LessonPhase }> {
    try {
      const phase = await this.dispatcher.end(lessonId);
      return { lessonId, phase };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':lessonId/state')
  state(@Param('lessonId') lessonId: string): SessionSnapshot {
    const session = this.registry.get(lessonId);
    if (!session) {
      throw new NotFoundException(`Lesson ${lessonId} has no active session.`);
    }
    return session.actor.snapshot(session.hub.count());
  }

  @Get(':lessonId/connections')
  connections(@Param('lessonId') lessonId: string): LessonConnections {
    const records = this.registry.get(lessonId)?.hub.records() ?? [];
    return {
      lessonId,
      activeConnections: records.length,
      connections: records.map((record) => ({
        connectionId: record.connectionId,
        role: record.role,
        userId: record.userId,
        userName: record.userName,
        joinedAt: record.joinedAt.toISOString(),
      })),
    };
  }
}
