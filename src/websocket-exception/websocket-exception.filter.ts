import { ArgumentsHost, Catch, HttpException, Logger, WsExceptionFilter } from '@nestjs/common';
import { WsException } from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { CommandRejectedError, LessonUnavailableError } from '../lesson-session/lesson-session.errors';
import { createLessonEvent } from '../types/lesson-protocol.types';
import { events } from '../utils/events';
import { isRecord } from '../utils/guards';

export function describeException(exception: unknown): string {
  if (exception instanceof WsException || exception instanceof HttpException) {
    const body = exception instanceof WsException ? exception.getError() : exception.getResponse();
    if (typeof body === 'string') return body;
    if (isRecord(body)) {
      const message = body.message;
      if (typeof message === 'string') return message;
      if (Array.isArray(message)) return message.map(String).join('; ');
    }
    return exception.message;
  }
  if (exception instanceof Error) return exception.message;
  return 'An unknown error occurred.';
}

/**
 * Reports any error raised while handling a socket message back to the
 * socket that sent it, as an `error` lesson event. Nothing is broadcast.
 */
@Catch()
export class WebsocketExceptionFilter implements WsExceptionFilter {
  private readonly logger = new Logger(WebsocketExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const client = host.switchToWs().getClient<Socket>();
    const message = describeException(exception);

    const expected =
      exception instanceof WsException ||
      exception instanceof HttpException ||
      exception instanceof CommandRejectedError ||
      exception instanceof LessonUnavailableError;
    if (expected) {
      this.logger.debug(`Socket ${client.id}: ${message}`);
    } else {
      this.logger.error(`Socket ${client.id}: unexpected error: ${message}`);
    }
    client.emit(events.LESSON_EVENT, createLessonEvent({ type: 'error', message }, new Date()));
  }
}
