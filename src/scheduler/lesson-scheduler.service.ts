import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { LESSON_STORE, LessonStore } from '../collaborators/collaborators.interface';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { CommandDispatcherService } from '../lesson-session/command-dispatcher.service';
import { describeError } from '../utils/guards';
import { withTimeout } from '../utils/with-timeout';

export interface SchedulerTickResult {
  checked: number;
  started: string[];
  failed: string[];
  skipped: boolean; // a previous tick was still running
}

/**
 * Polls the lesson store and starts every lesson whose start window is open.
 * Starting goes through the dispatcher, so a lesson that is already live is
 * left alone.
 */
@Injectable()
export class LessonSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LessonSchedulerService.name);
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly dispatcher: CommandDispatcherService,
    @Inject(LESSON_STORE) private readonly lessonStore: LessonStore,
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
  ) {}

  onModuleInit() {
    if (!this.config.schedulerEnabled) {
      this.logger.log('Lesson scheduler disabled');
      return;
    }
    // tick never rejects; failures are logged per lesson
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.schedulerIntervalMs);
    this.logger.log(
      `Lesson scheduler polling every ${this.config.schedulerIntervalMs}ms ` +
        `(start window ${this.config.schedulerStartWindowMinutes} minutes)`,
    );
  }

  onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(now: Date = new Date()): Promise<SchedulerTickResult> {
    if (this.running) {
      this.logger.debug('Previous scheduler tick still running, skipping');
      return { checked: 0, started: [], failed: [], skipped: true };
    }
    this.running = true;
    try {
      return await this.startDueLessons(now);
    } finally {
      this.running = false;
    }
  }

  private async startDueLessons(now: Date): Promise<SchedulerTickResult> {
    const result: SchedulerTickResult = { checked: 0, started: [], failed: [], skipped: false };

    let lessonIds: string[];
    try {
      lessonIds = await withTimeout(
        Promise.resolve().then(() =>
          this.lessonStore.dueLessons(now, this.config.schedulerStartWindowMinutes),
        ),
        this.config.collaboratorTimeoutMs,
        'due lessons query',
      );
    } catch (error) {
      this.logger.error(`Could not load due lessons: ${describeError(error)}`);
      return result;
    }

    // the store may list a lesson twice across overlapping windows
    const unique = Array.from(new Set(lessonIds));
    result.checked = unique.length;

    // one failing lesson must not keep the others from starting
    for (const lessonId of unique) {
      try {
        const { created } = await this.dispatcher.start(lessonId, 'scheduler');
        if (created) {
          result.started.push(lessonId);
          this.logger.log(`Auto-started lesson ${lessonId}`);
        }
      } catch (error) {
        result.failed.push(lessonId);
        this.logger.error(`Failed to auto-start lesson ${lessonId}: ${describeError(error)}`);
      }
    }
    return result;
  }
}
