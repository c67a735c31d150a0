/**
 * AutoSaveScheduler - interval and move-count auto-save for the host.
 *
 * Both triggers go through coordinator.save(hostId), so the coordinator's
 * single-outstanding-operation rule applies. A trigger that is rejected
 * (busy, store down, anything) is dropped; the next natural trigger is the
 * retry.
 */

import type { Result, SessionId, SessionView } from '../../multiplayer/types';
import { err, ok } from '../../multiplayer/types';
import type { SessionCoordinator } from './SessionCoordinator';

export interface AutoSaveSchedulerOptions {
  coordinator: SessionCoordinator;
  hostId: string;
  intervalMs: number;
  /** Save after every Nth half-move */
  moveCadence: number;
}

export type AutoSaveTrigger = 'interval' | 'move';

export class AutoSaveScheduler {
  private readonly coordinator: SessionCoordinator;
  private readonly hostId: string;
  private readonly intervalMs: number;
  private readonly moveCadence: number;

  private enabled = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastTriggeredMoveIndex = -1;
  private sessionId: SessionId | null = null;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(options: AutoSaveSchedulerOptions) {
    this.coordinator = options.coordinator;
    this.hostId = options.hostId;
    this.intervalMs = options.intervalMs;
    this.moveCadence = options.moveCadence;

    this.unsubscribers.push(
      this.coordinator.onMove(view => this.handleMove(view)),
      this.coordinator.state.subscribe(view => this.handleSessionChange(view))
    );
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isTimerRunning(): boolean {
    return this.timer !== null;
  }

  setEnabled(callerId: string, enabled: boolean): Result<boolean> {
    if (!this.coordinator.isHost(callerId)) {
      console.warn(`[AutoSaveScheduler] toggle rejected: ${callerId} is not the host`);
      return err('NotAuthorized', 'Only the host can change auto-save');
    }

    this.enabled = enabled;
    if (enabled) {
      this.startTimer();
    } else {
      this.stopTimer();
    }
    return ok(enabled);
  }

  /**
   * Stop the timer and detach from the coordinator.
   */
  dispose(): void {
    this.enabled = false;
    this.stopTimer();
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  // === PRIVATE HELPERS ===

  private startTimer(): void {
    this.stopTimer();
    if (this.coordinator.getPhase() === 'ended') {
      return;
    }
    this.timer = setInterval(() => {
      void this.trigger('interval');
    }, this.intervalMs);
    console.info('[AutoSaveScheduler] auto-save started');
  }

  private stopTimer(): void {
    if (this.timer === null) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    console.info('[AutoSaveScheduler] auto-save stopped');
  }

  private handleSessionChange(view: SessionView): void {
    if (view.phase === 'ended') {
      this.stopTimer();
      return;
    }
    if (view.state.sessionId !== this.sessionId) {
      this.sessionId = view.state.sessionId;
      this.lastTriggeredMoveIndex = -1;
    }
  }

  private handleMove(view: SessionView): void {
    if (!this.enabled) {
      return;
    }

    const { moveIndex, lastSavedMoveIndex } = view.state;
    if (moveIndex <= 0 || moveIndex % this.moveCadence !== 0) {
      return;
    }
    if (moveIndex <= lastSavedMoveIndex || moveIndex === this.lastTriggeredMoveIndex) {
      return;
    }

    this.lastTriggeredMoveIndex = moveIndex;
    void this.trigger('move');
  }

  private async trigger(reason: AutoSaveTrigger): Promise<void> {
    const result = await this.coordinator.save(this.hostId);
    if (!result.success) {
      console.debug(`[AutoSaveScheduler] ${reason} save dropped: ${result.error.code}`);
    }
  }
}
