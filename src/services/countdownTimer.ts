import type { Duration } from '../domain/types';
import { formatMinutesSeconds } from '../utils/formatMinutes';
import { AccessibilityAnnouncer } from './AccessibilityAnnouncer';
import { HapticsService, type HapticsEvent } from './HapticsService';

export type TimerStatus = 'idle' | 'running' | 'paused' | 'finished';

export type TimerEndReason = 'finished' | 'early' | 'stopped';

export type TimerResult = {
  /** Seconds actually counted down. */
  elapsed: Duration;
  reason: TimerEndReason;
};

export type TimerSnapshot = {
  remaining: Duration;
  elapsed: Duration;
  /** 0..1 */
  progress: number;
  status: TimerStatus;
  display: string;
};

/** Runs `tick` every `ms` until the returned cancel function is called. */
export type TimerScheduler = (ms: number, tick: () => void) => () => void;

export const intervalScheduler: TimerScheduler = (ms, tick) => {
  const handle = setInterval(tick, ms);
  return () => clearInterval(handle);
};

export type CountdownTimerOptions = {
  duration: Duration;
  onTick?: (snapshot: TimerSnapshot) => void;
  /** Called once per run when the countdown ends, however it ends. */
  onComplete?: (result: TimerResult) => void;
  scheduler?: TimerScheduler;
  announce?: (message: string) => void;
  haptic?: (event: HapticsEvent) => void;
};

const TICK_MS = 1000;

/**
 * One-second countdown behind the timer habit view. Remaining time never goes
 * below zero; reaching zero stops the timer and reports `finished`.
 */
export class CountdownTimer {
  readonly duration: Duration;
  private remaining: Duration;
  private status: TimerStatus = 'idle';
  private cancelTicks: (() => void) | null = null;
  private readonly onTick?: (snapshot: TimerSnapshot) => void;
  private readonly onComplete?: (result: TimerResult) => void;
  private readonly scheduler: TimerScheduler;
  private readonly announce: (message: string) => void;
  private readonly haptic: (event: HapticsEvent) => void;

  constructor(options: CountdownTimerOptions) {
    this.duration = Number.isFinite(options.duration) ? Math.max(0, Math.floor(options.duration)) : 0;
    this.remaining = this.duration;
    this.onTick = options.onTick;
    this.onComplete = options.onComplete;
    this.scheduler = options.scheduler ?? intervalScheduler;
    this.announce = options.announce ?? ((message) => AccessibilityAnnouncer.announce(message));
    this.haptic = options.haptic ?? ((event) => void HapticsService.trigger(event));
  }

  get isRunning(): boolean {
    return this.status === 'running';
  }

  snapshot(): TimerSnapshot {
    const elapsed = this.duration - this.remaining;
    let progress = 0;
    if (this.duration > 0) {
      progress = elapsed / this.duration;
    } else if (this.status === 'finished') {
      progress = 1;
    }
    return {
      remaining: this.remaining,
      elapsed,
      progress: Math.min(1, Math.max(0, progress)),
      status: this.status,
      display: formatMinutesSeconds(this.remaining),
    };
  }

  /** From idle or finished: a fresh run. From paused: same as `resume`. */
  start(): void {
    if (this.status === 'running') return;
    if (this.status === 'paused') {
      this.resume();
      return;
    }
    this.remaining = this.duration;
    this.status = 'running';
    this.schedule();
    this.haptic('timer.start');
    this.announce('Timer started');
  }

  pause(): void {
    if (this.status !== 'running') return;
    this.unschedule();
    this.status = 'paused';
    this.haptic('timer.stop');
    this.announce('Timer paused');
  }

  resume(): void {
    if (this.status !== 'paused') return;
    this.status = 'running';
    this.schedule();
    this.haptic('timer.start');
    this.announce('Timer resumed');
  }

  /** Start/stop button behaviour: running pauses, anything else starts or resumes. */
  toggle(): void {
    if (this.status === 'running') {
      this.pause();
    } else {
      this.start();
    }
  }

  /** Abandons the run and resets to the full duration. */
  stop(): void {
    if (this.status === 'idle' || this.status === 'finished') return;
    const elapsed = this.duration - this.remaining;
    this.unschedule();
    this.status = 'idle';
    this.remaining = this.duration;
    this.haptic('timer.stop');
    this.announce('Timer stopped');
    this.onComplete?.({ elapsed, reason: 'stopped' });
  }

  /** The user marks the habit done before the countdown reaches zero. */
  completeEarly(): void {
    if (this.status === 'idle' || this.status === 'finished') return;
    this.finish('early');
  }

  /** Drops the interval without reporting. For view teardown. */
  dispose(): void {
    this.unschedule();
  }

  private tick(): void {
    if (this.status !== 'running') return;
    this.remaining = Math.max(0, this.remaining - 1);
    this.onTick?.(this.snapshot());
    if (this.remaining === 0) this.finish('finished');
  }

  private finish(reason: 'finished' | 'early'): void {
    const elapsed = reason === 'finished' ? this.duration : this.duration - this.remaining;
    this.unschedule();
    this.status = 'finished';
    if (reason === 'finished') this.haptic('outcome.success');
    this.announce('Timer complete');
    this.onComplete?.({ elapsed, reason });
  }

  private schedule(): void {
    this.unschedule();
    this.cancelTicks = this.scheduler(TICK_MS, () => this.tick());
  }

  private unschedule(): void {
    this.cancelTicks?.();
    this.cancelTicks = null;
  }
}
