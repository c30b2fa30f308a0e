import { Logger } from '@nestjs/common';
import { AnswerResult, LessonCollaborators } from '../collaborators/collaborators.interface';
import {
  createLessonEvent,
  LessonCommand,
  LessonCommandType,
  LessonEventBody,
  SessionSnapshot,
} from '../types/lesson-protocol.types';
import { describeError } from '../utils/guards';
import { withTimeout } from '../utils/with-timeout';
import { CommandQueue } from './command-queue';
import { ConnectionHub } from './connection-hub';
import { CommandRejectedError, InvariantViolationError } from './lesson-session.errors';
import {
  CommandOrigin,
  LessonEndReason,
  LessonPhase,
  PendingQuestion,
  QuestionMethod,
  SessionStartSource,
  SessionState,
  SlideContent,
} from './lesson-session.interface';
import {
  createInitialSessionState,
  findInvariantViolation,
  isSlidePhase,
  isTerminalPhase,
  mergePresentStudent,
  toSessionSnapshot,
  toSlidePayload,
} from './lesson-session.state';

export interface LessonSessionActorOptions {
  lessonId: string;
  startedBy: SessionStartSource;
  hub: ConnectionHub;
  collaborators: LessonCollaborators;
  collaboratorTimeoutMs: number;
  onCompleted?: (lessonId: string) => void;
  now?: () => Date;
}

export const SYSTEM_ORIGIN: CommandOrigin = { connectionId: null, userId: null };

export const NO_ANSWER: AnswerResult = {
  answerText: 'No answer was found for this question.',
  audioRef: null,
  found: false,
};

const MISSING_SLIDE: SlideContent = { text: '', audioRef: null, imageRef: null };

interface LoadedDeck {
  totalSlides: number;
  firstSlide: SlideContent | null;
}

/**
 * Owns the state of one live lesson.
 *
 * Every command goes through a per-lesson CommandQueue, so exactly one
 * command is applied at a time. Collaborator calls (attendance scan, slide
 * fetch, answer generation) are started from inside a command but awaited
 * outside the queue; their results are applied by a second queued step that
 * first checks the result is still current.
 */
export class LessonSessionActor {
  private readonly logger = new Logger(LessonSessionActor.name);
  private readonly queue = new CommandQueue();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly state: SessionState;
  private readonly now: () => Date;

  constructor(private readonly options: LessonSessionActorOptions) {
    this.now = options.now ?? (() => new Date());
    this.state = createInitialSessionState(options.lessonId, options.startedBy, this.now());
  }

  get lessonId(): string {
    return this.state.lessonId;
  }

  get phase(): LessonPhase {
    return this.state.phase;
  }

  get isCompleted(): boolean {
    return isTerminalPhase(this.state.phase);
  }

  getState(): SessionState {
    return { ...this.state, presentStudents: [...this.state.presentStudents] };
  }

  snapshot(connectionCount: number): SessionSnapshot {
    return toSessionSnapshot(this.state, connectionCount);
  }

  /**
   * Queues a command. Resolves with the phase after the command was applied,
   * rejects with CommandRejectedError when the command is not valid now.
   */
  execute(command: LessonCommand, origin: CommandOrigin = SYSTEM_ORIGIN): Promise<LessonPhase> {
    return this.queue.run(() => {
      this.apply(command, origin);
      return this.state.phase;
    });
  }

  // settles once queued commands and outstanding collaborator calls are done
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0 || this.queue.size > 0) {
      await Promise.all(Array.from(this.inFlight));
      await this.queue.drain();
    }
  }

  private apply(command: LessonCommand, origin: CommandOrigin): void {
    if (isTerminalPhase(this.state.phase)) {
      throw new CommandRejectedError(`Lesson ${this.lessonId} has already ended.`);
    }
    this.logger.debug(`Lesson ${this.lessonId}: ${command.type} in phase ${this.state.phase}`);
    this.guarded(() => this.handle(command, origin));
  }

  private handle(command: LessonCommand, origin: CommandOrigin): void {
    switch (command.type) {
      case 'start_attendance':
        return this.startAttendance();
      case 'end_attendance':
        return this.endAttendance();
      case 'start_presentation':
        return this.startPresentation();
      case 'next_slide':
        return this.nextSlide();
      case 'previous_slide':
        return this.previousSlide(origin);
      case 'pause_presentation':
        return this.pausePresentation(origin);
      case 'resume_presentation':
        return this.resumePresentation(origin);
      case 'ask_question':
        return this.askQuestion(command.question, command.method, origin);
      case 'start_qa':
        return this.startQa();
      case 'end_lesson':
        return this.complete('ended');
      default: {
        const unhandled: never = command;
        throw new CommandRejectedError(`Unsupported command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  // --- attendance ---

  private startAttendance(): void {
    this.requirePhase('start_attendance', ['scheduled']);
    const at = this.now();
    this.state.phase = 'attendance_active';
    this.state.attendanceStartedAt = at;
    this.logger.log(`Lesson ${this.lessonId}: attendance started`);
    this.emit({ type: 'attendance_started' }, at);

    this.runOutsideQueue(
      'attendance scan',
      () => this.options.collaborators.attendanceScanner.scan(this.lessonId),
      (matches) => {
        if (this.state.phase !== 'attendance_active' || this.state.attendanceEndedAt) {
          this.logger.debug(`Lesson ${this.lessonId}: attendance closed, dropping ${matches.length} matches`);
          return;
        }
        for (const match of matches) {
          const recognizedAt = this.now();
          this.state.presentStudents = mergePresentStudent(this.state.presentStudents, {
            studentId: match.studentId,
            confidence: match.confidence,
            photo: match.photoRef,
            recognizedAt,
          });
          this.emit(
            {
              type: 'attendance_update',
              student_id: match.studentId,
              confidence: match.confidence,
              photo: match.photoRef,
            },
            recognizedAt,
          );
        }
      },
      (error) => {
        this.logger.warn(`Lesson ${this.lessonId}: attendance scan failed, no matches recorded: ${describeError(error)}`);
      },
    );
  }

  private endAttendance(): void {
    this.requirePhase('end_attendance', ['attendance_active']);
    if (this.state.attendanceEndedAt) {
      throw new CommandRejectedError('Attendance has already ended.');
    }
    const at = this.now();
    this.state.attendanceEndedAt = at;
    this.emit({ type: 'attendance_ended' }, at);
  }

  // --- presentation ---

  private startPresentation(): void {
    this.requirePhase('start_presentation', ['scheduled', 'attendance_active']);
    if (this.state.pendingOperation === 'loading_presentation') {
      throw new CommandRejectedError('The presentation is already loading.');
    }
    this.state.pendingOperation = 'loading_presentation';

    this.runOutsideQueue(
      'presentation load',
      () => this.loadDeck(),
      (deck) => this.applyPresentationStart(deck),
      (error) => {
        if (this.state.pendingOperation !== 'loading_presentation') return;
        this.state.pendingOperation = null;
        this.logger.warn(`Lesson ${this.lessonId}: presentation could not be loaded: ${describeError(error)}`);
        this.emit({ type: 'error', message: 'No presentation available' });
      },
    );
  }

  private async loadDeck(): Promise<LoadedDeck> {
    const { presentationStore } = this.options.collaborators;
    const totalSlides = await presentationStore.slideCount(this.lessonId);
    if (totalSlides < 1) return { totalSlides, firstSlide: null };
    const firstSlide = await presentationStore.slide(this.lessonId, 1);
    return { totalSlides, firstSlide };
  }

  private applyPresentationStart(deck: LoadedDeck): void {
    if (this.state.pendingOperation !== 'loading_presentation') return;
    this.state.pendingOperation = null;

    if (!Number.isInteger(deck.totalSlides) || deck.totalSlides < 0) {
      throw new InvariantViolationError(this.lessonId, `presentation reported ${deck.totalSlides} slides`);
    }
    if (deck.totalSlides === 0 || !deck.firstSlide) {
      this.logger.warn(`Lesson ${this.lessonId}: presentation has no slides`);
      this.emit({ type: 'error', message: 'No presentation available' });
      return;
    }

    const at = this.now();
    if (this.state.phase === 'attendance_active' && !this.state.attendanceEndedAt) {
      this.state.attendanceEndedAt = at;
      this.emit({ type: 'attendance_ended' }, at);
    }

    this.state.phase = 'presentation_active';
    this.state.totalSlides = deck.totalSlides;
    this.state.currentSlide = 1;
    this.state.shownSlide = { slideNumber: 1, content: deck.firstSlide };
    this.state.presentationStartedAt = at;
    this.logger.log(`Lesson ${this.lessonId}: presentation started with ${deck.totalSlides} slides`);
    this.emit(
      {
        type: 'presentation_started',
        total_slides: deck.totalSlides,
        slide: toSlidePayload(1, deck.firstSlide),
      },
      at,
    );
  }

  private nextSlide(): void {
    this.requirePhase('next_slide', ['presentation_active']);
    const current = this.requireCurrentSlide();

    if (current >= this.state.totalSlides) {
      // last slide: the deck is finished, move on to open Q&A
      this.enterQa();
      this.logger.log(`Lesson ${this.lessonId}: presentation completed, entering Q&A`);
      this.emit({
        type: 'presentation_completed',
        message: 'Presentation finished. Starting Q&A session.',
      });
      return;
    }
    this.showSlide(current + 1);
  }

  private previousSlide(origin: CommandOrigin): void {
    this.requirePhase('previous_slide', ['presentation_active']);
    const current = this.requireCurrentSlide();
    if (current <= 1) {
      // floor at the first slide: nothing changes, only the sender hears back
      const shown = this.state.shownSlide;
      if (shown) {
        this.acknowledge(origin, { type: 'slide_changed', ...toSlidePayload(shown.slideNumber, shown.content) });
      }
      return;
    }
    this.showSlide(current - 1);
  }

  private showSlide(target: number): void {
    this.state.currentSlide = target;

    const applySlide = (content: SlideContent) => {
      // a newer navigation already moved past this slide
      if (this.state.currentSlide !== target || !isSlidePhase(this.state.phase)) return;
      this.state.shownSlide = { slideNumber: target, content };
      this.emit({ type: 'slide_changed', ...toSlidePayload(target, content) });
    };

    this.runOutsideQueue(
      `slide ${target} fetch`,
      () => this.options.collaborators.presentationStore.slide(this.lessonId, target),
      applySlide,
      (error) => {
        this.logger.warn(`Lesson ${this.lessonId}: slide ${target} unavailable: ${describeError(error)}`);
        applySlide(MISSING_SLIDE);
      },
    );
  }

  private pausePresentation(origin: CommandOrigin): void {
    if (this.state.phase === 'paused') {
      this.acknowledge(origin, { type: 'presentation_paused' });
      return;
    }
    this.requirePhase('pause_presentation', ['presentation_active']);
    const at = this.now();
    this.state.phase = 'paused';
    this.state.pausedAt = at;
    this.emit({ type: 'presentation_paused' }, at);
  }

  private resumePresentation(origin: CommandOrigin): void {
    if (this.state.phase === 'presentation_active') {
      this.acknowledge(origin, { type: 'presentation_resumed' });
      return;
    }
    this.requirePhase('resume_presentation', ['paused']);
    this.state.phase = 'presentation_active';
    this.state.pausedAt = null;
    this.emit({ type: 'presentation_resumed' });
  }

  // --- questions ---

  private askQuestion(question: string, method: QuestionMethod, origin: CommandOrigin): void {
    this.requirePhase('ask_question', ['presentation_active', 'paused', 'qa_active']);
    if (this.state.pendingQuestion) {
      throw new CommandRejectedError('Another question is still being answered. Please wait.');
    }

    const pending: PendingQuestion = { question, method, askedBy: origin.userId, askedAt: this.now() };
    this.state.pendingQuestion = pending;
    this.emit({ type: 'question_received', question, method }, pending.askedAt);

    const deliver = (answer: AnswerResult) => {
      if (this.state.pendingQuestion !== pending) return;
      this.state.pendingQuestion = null;
      this.emit({
        type: 'question_answered',
        question,
        answer_text: answer.answerText,
        audio_ref: answer.audioRef,
        found: answer.found,
      });
    };

    this.runOutsideQueue(
      'answer generation',
      () => this.options.collaborators.answerService.answer(this.lessonId, { question, method }),
      deliver,
      (error) => {
        this.logger.warn(`Lesson ${this.lessonId}: no answer for "${question}": ${describeError(error)}`);
        deliver(NO_ANSWER);
      },
    );
  }

  private startQa(): void {
    this.requirePhase('start_qa', ['presentation_active', 'paused']);
    this.enterQa();
    this.logger.log(`Lesson ${this.lessonId}: Q&A started before the end of the deck`);
    this.emit({ type: 'qa_mode_started' });
  }

  // the slide position only means something while presenting
  private enterQa(): void {
    this.state.phase = 'qa_active';
    this.state.pausedAt = null;
    this.state.currentSlide = null;
    this.state.shownSlide = null;
  }

  // --- completion ---

  private complete(reason: LessonEndReason): void {
    const at = this.now();
    this.state.phase = 'completed';
    this.state.completedAt = at;
    this.state.pendingOperation = null;
    this.logger.log(`Lesson ${this.lessonId} completed (${reason})`);
    this.emit({ type: 'lesson_ended', reason }, at);

    const persisted = withTimeout(
      Promise.resolve().then(() => this.options.collaborators.lessonStore.markCompleted(this.lessonId, at)),
      this.options.collaboratorTimeoutMs,
      `mark lesson ${this.lessonId} completed`,
    ).catch((error: unknown) => {
      this.logger.error(`Lesson ${this.lessonId}: failed to persist completion: ${describeError(error)}`);
    });
    this.track(persisted);

    this.options.onCompleted?.(this.lessonId);
  }

  // --- helpers ---

  private requirePhase(command: LessonCommandType, allowed: readonly LessonPhase[]): void {
    if (!allowed.includes(this.state.phase)) {
      throw new CommandRejectedError(`${command} is not allowed while the lesson is ${this.state.phase}.`);
    }
  }

  private requireCurrentSlide(): number {
    const current = this.state.currentSlide;
    if (current === null) {
      throw new InvariantViolationError(this.lessonId, `no current slide in phase ${this.state.phase}`);
    }
    return current;
  }

  private guarded(step: () => void): void {
    try {
      step();
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        this.failInvariant(error.message);
        return;
      }
      throw error;
    }
    if (isTerminalPhase(this.state.phase)) return;
    const violation = findInvariantViolation(this.state);
    if (violation) this.failInvariant(violation);
  }

  private failInvariant(message: string): void {
    this.logger.error(`Lesson ${this.lessonId}: invariant violated (${message}), forcing completion`);
    if (!isTerminalPhase(this.state.phase)) this.complete('invariant_violation');
  }

  private runOutsideQueue<T>(
    operation: string,
    call: () => Promise<T>,
    onResult: (result: T) => void,
    onFailure: (error: unknown) => void,
  ): void {
    // the call itself runs unqueued; only its result re-enters the queue
    const applyLater = (step: () => void) =>
      this.queue.run(() => {
        if (isTerminalPhase(this.state.phase)) {
          this.logger.debug(`Lesson ${this.lessonId}: ended, dropping ${operation} result`);
          return;
        }
        this.guarded(step);
      });

    const task = withTimeout(
      Promise.resolve().then(call),
      this.options.collaboratorTimeoutMs,
      `${operation} for lesson ${this.lessonId}`,
    )
      .then(
        (result) => applyLater(() => onResult(result)),
        (error: unknown) => applyLater(() => onFailure(error)),
      )
      .catch((error: unknown) => {
        this.logger.error(`Lesson ${this.lessonId}: applying ${operation} failed: ${describeError(error)}`);
      });
    this.track(task);
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.then(() => this.inFlight.delete(task));
  }

  private emit(body: LessonEventBody, at: Date = this.now()): void {
    this.options.hub.broadcast(createLessonEvent(body, at));
  }

  private acknowledge(origin: CommandOrigin, body: LessonEventBody): void {
    if (origin.connectionId) {
      this.options.hub.sendTo(origin.connectionId, createLessonEvent(body, this.now()));
    }
  }
}
