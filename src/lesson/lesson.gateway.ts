import { Logger, UseFilters, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { JwtService } from '@nestjs/jwt';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
  WsException,
} from '@nestjs/websockets';
import { ValidationError } from 'class-validator';
import { Server } from 'socket.io';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CommandDispatcherService } from '../lesson-session/command-dispatcher.service';
import {
  SessionLifecycleEvent,
  SessionRegistryService,
} from '../lesson-session/session-registry.service';
import { createLessonEvent } from '../types/lesson-protocol.types';
import { extractToken, getSocketUser, LessonSocket } from '../types/socket.types';
import { events } from '../utils/events';
import { WebsocketExceptionFilter } from '../websocket-exception/websocket-exception.filter';
import { JoinLessonDto } from './lessonDto/join-lesson.dto';
import { SocketConnection } from './socket-connection';

function formatValidationErrors(errors: ValidationError[]): WsException {
  const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
  return new WsException(details.join('; ') || 'Invalid message.');
}

@UseGuards(JwtAuthGuard)
@UsePipes(new ValidationPipe({ exceptionFactory: formatValidationErrors }))
@WebSocketGateway({
  cors: {
    origin: process.env.CORS_ORIGIN ?? '*',
  },
})
@UseFilters(WebsocketExceptionFilter)
export class LessonGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(LessonGateway.name);
  private readonly memberships = new Map<string, string>(); // key: socketId, value: lessonId

  constructor(
    private readonly dispatcher: CommandDispatcherService,
    private readonly registry: SessionRegistryService,
    private readonly jwtService: JwtService,
  ) {}

  @WebSocketServer()
  server!: Server;

  // guards only run for messages, so sockets without a valid token are dropped here
  handleConnection(client: LessonSocket) {
    const token = extractToken(client);
    if (!token) {
      this.refuse(client, 'Missing authentication token.');
      return;
    }
    try {
      this.jwtService.verify(token);
    } catch {
      this.refuse(client, 'Invalid or expired authentication token.');
      return;
    }
    this.logger.log(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: LessonSocket) {
    const lessonId = this.leaveCurrent(client.id);
    this.logger.log(`Client disconnected: ${client.id}${lessonId ? ` (lesson ${lessonId})` : ''}`);
  }

  @SubscribeMessage(events.LESSON_JOIN)
  async handleJoin(@MessageBody() data: JoinLessonDto, @ConnectedSocket() client: LessonSocket) {
    const user = getSocketUser(client);
    const { lessonId } = data;

    const lesson = await this.dispatcher.findLesson(lessonId);
    if (!lesson) {
      throw new WsException(`Lesson ${lessonId} not found.`);
    }

    let session = this.registry.get(lessonId);
    if (session?.actor.isCompleted) {
      throw new WsException('The lesson has already ended.');
    }
    if (!session) {
      // the teacher opening the lesson starts it; everyone else waits for that
      if (user.role !== 'teacher') {
        throw new WsException('The lesson has not started yet.');
      }
      await this.dispatcher.start(lessonId, 'manual');
      session = this.registry.get(lessonId);
    }
    if (!session) {
      throw new WsException(`Lesson ${lessonId} could not be started.`);
    }

    // a socket follows one lesson at a time
    this.leaveCurrent(client.id);
    // false once the hub is closed for teardown
    const joined = session.hub.join(
      {
        connectionId: client.id,
        lessonId,
        role: user.role,
        userId: user.userId,
        userName: user.userName,
        joinedAt: new Date(),
      },
      new SocketConnection(client),
    );
    if (!joined) {
      throw new WsException('The lesson session is closing.');
    }
    this.memberships.set(client.id, lessonId);

    return { success: true, lessonId, title: lesson.title, role: user.role, phase: session.actor.phase };
  }

  @SubscribeMessage(events.LESSON_LEAVE)
  handleLeave(@ConnectedSocket() client: LessonSocket) {
    const lessonId = this.leaveCurrent(client.id);
    return { success: lessonId !== null, lessonId };
  }

  @SubscribeMessage(events.LESSON_COMMAND)
  async handleCommand(@MessageBody() envelope: unknown, @ConnectedSocket() client: LessonSocket) {
    const lessonId = this.memberships.get(client.id);
    if (!lessonId) {
      throw new WsException('Join a lesson before sending commands.');
    }
    const user = getSocketUser(client);

    const phase = await this.dispatcher.dispatch(
      { lessonId, connectionId: client.id, userId: user.userId, role: user.role },
      envelope,
    );
    return { success: true, phase };
  }

  // the hub already disconnected these sockets; only the bookkeeping is left
  @OnEvent(events.SESSION_CLOSED)
  handleSessionClosed({ lessonId }: SessionLifecycleEvent) {
    for (const [socketId, joinedLessonId] of Array.from(this.memberships.entries())) {
      if (joinedLessonId === lessonId) this.memberships.delete(socketId);
    }
  }

  private leaveCurrent(socketId: string): string | null {
    const lessonId = this.memberships.get(socketId);
    if (!lessonId) return null;
    this.memberships.delete(socketId);
    this.registry.get(lessonId)?.hub.leave(socketId);
    return lessonId;
  }

  private refuse(client: LessonSocket, message: string) {
    this.logger.warn(`Refusing socket ${client.id}: ${message}`);
    client.emit(events.LESSON_EVENT, createLessonEvent({ type: 'error', message }, new Date()));
    client.disconnect(true);
  }
}
