import { LessonConnection } from '../lesson-session/connection-hub';
import { LessonEvent } from '../types/lesson-protocol.types';
import { LessonSocket } from '../types/socket.types';
import { events } from '../utils/events';

/** Adapts a socket.io socket to the hub's connection interface. */
export class SocketConnection implements LessonConnection {
  constructor(private readonly socket: LessonSocket) {}

  get id(): string {
    return this.socket.id;
  }

  send(event: LessonEvent): void {
    if (!this.socket.connected) {
      throw new Error(`socket ${this.socket.id} is disconnected`);
    }
    this.socket.emit(events.LESSON_EVENT, event);
  }

  close(): void {
    this.socket.disconnect(true);
  }
}
