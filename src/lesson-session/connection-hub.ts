import { Logger } from '@nestjs/common';
import { createLessonEvent, LessonEvent, SessionSnapshot } from '../types/lesson-protocol.types';
import { describeError } from '../utils/guards';
import { ConnectionRecord } from './lesson-session.interface';

/**
 * One live client of a lesson. `send` throws when the transport is gone;
 * the hub prunes the connection in that case.
 */
export interface LessonConnection {
  readonly id: string;
  send(event: LessonEvent): void;
  close(): void;
}

interface HubEntry {
  record: ConnectionRecord;
  connection: LessonConnection;
}

export type SnapshotSource = (connectionCount: number) => SessionSnapshot;

export class ConnectionHub {
  private readonly logger = new Logger(ConnectionHub.name);
  private readonly entries = new Map<string, HubEntry>(); // key: connectionId
  private closed = false;

  constructor(
    readonly lessonId: string,
    private readonly snapshot: SnapshotSource,
    private readonly now: () => Date = () => new Date(),
  ) {}

  // registers the connection and sends it a full snapshot right away
  join(record: ConnectionRecord, connection: LessonConnection): boolean {
    if (this.closed) return false;

    const previous = this.entries.get(record.connectionId);
    if (previous && previous.connection !== connection) {
      this.logger.debug(`Replacing connection ${record.connectionId} in lesson ${this.lessonId}`);
    }

    const entry: HubEntry = { record, connection };
    this.entries.set(record.connectionId, entry);
    this.logger.log(
      `${record.role} ${record.userName} (${record.connectionId}) joined lesson ${this.lessonId}, ${this.entries.size} connected`,
    );

    const state = this.snapshot(this.entries.size);
    return this.deliver(entry, createLessonEvent({ type: 'lesson_state', state }, this.now()));
  }

  leave(connectionId: string): boolean {
    const removed = this.entries.delete(connectionId);
    if (removed) {
      this.logger.log(
        `Connection ${connectionId} left lesson ${this.lessonId}, ${this.entries.size} connected`,
      );
    }
    return removed;
  }

  // returns the number of connections the event reached
  broadcast(event: LessonEvent): number {
    let delivered = 0;
    for (const entry of Array.from(this.entries.values())) {
      if (this.deliver(entry, event)) delivered += 1;
    }
    return delivered;
  }

  sendTo(connectionId: string, event: LessonEvent): boolean {
    const entry = this.entries.get(connectionId);
    return entry ? this.deliver(entry, event) : false;
  }

  has(connectionId: string): boolean {
    return this.entries.has(connectionId);
  }

  count(): number {
    return this.entries.size;
  }

  // copies, so callers cannot edit the roster
  records(): ConnectionRecord[] {
    return Array.from(this.entries.values(), ({ record }) => ({ ...record }));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const entry of this.entries.values()) {
      try {
        entry.connection.close();
      } catch (error) {
        this.logger.warn(
          `Closing connection ${entry.record.connectionId} of lesson ${this.lessonId} failed: ${describeError(error)}`,
        );
      }
    }
    this.logger.log(`Hub for lesson ${this.lessonId} closed (${this.entries.size} connections)`);
    this.entries.clear();
  }

  private deliver(entry: HubEntry, event: LessonEvent): boolean {
    try {
      entry.connection.send(event);
      return true;
    } catch (error) {
      this.entries.delete(entry.record.connectionId);
      this.logger.warn(
        `Pruned connection ${entry.record.connectionId} from lesson ${this.lessonId}: ${describeError(error)}`,
      );
      return false;
    }
  }
}
