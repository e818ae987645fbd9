/**
 * Scheduler daemon
 */

import { setTimeout as sleepFor } from "node:timers/promises";
import type { CycleOutcome } from "../../types";
import { logger } from "../../utils/logger";
import { MAX_CADENCE_MINUTES, MS_PER_MINUTE } from "../../utils/time";

/** The part of BackupCycle the scheduler drives */
export interface CycleRunner {
  runOnce(): Promise<CycleOutcome>;
}

/** Resolves after ms, rejects once signal aborts */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  sleep?: Sleep;
}

export interface SchedulerStatus {
  cadenceMinutes: number;
  running: boolean;
  cyclesRun: number;
  lastRun: Date | null;
  lastOutcome: CycleOutcome | null;
  nextRun: Date | null;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

/**
 * Runs a backup cycle, waits the cadence, and repeats. The wait starts when
 * the cycle ends, so the real period is cadence plus cycle duration.
 */
export class Scheduler {
  private readonly sleep: Sleep;
  private controller: AbortController | null = null;
  private cyclesRun = 0;
  private lastRun: Date | null = null;
  private lastOutcome: CycleOutcome | null = null;
  private nextRun: Date | null = null;

  constructor(
    private readonly cycle: CycleRunner,
    private readonly cadenceMinutes: number,
    options: SchedulerOptions = {},
  ) {
    if (!Number.isInteger(cadenceMinutes) || cadenceMinutes < 1) {
      throw new RangeError(`Cadence must be a positive number of minutes, got ${cadenceMinutes}`);
    }
    if (cadenceMinutes > MAX_CADENCE_MINUTES) {
      throw new RangeError(`Cadence must be at most ${MAX_CADENCE_MINUTES} minutes, got ${cadenceMinutes}`);
    }
    this.sleep = options.sleep ?? defaultSleep;
  }

  get intervalMs(): number {
    return this.cadenceMinutes * MS_PER_MINUTE;
  }

  /**
   * Loop until stop() is called. Under normal operation this never resolves.
   */
  async run(): Promise<void> {
    if (this.controller) {
      logger.warn("Scheduler is already running");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    logger.info(`Scheduler started. Running every ${this.cadenceMinutes} minutes.`);

    try {
      while (!controller.signal.aborted) {
        await this.tick();
        if (controller.signal.aborted) break;

        this.nextRun = new Date(Date.now() + this.intervalMs);
        try {
          await this.sleep(this.intervalMs, controller.signal);
        } catch (error) {
          if (controller.signal.aborted) break;
          throw error;
        }
      }
    } finally {
      this.controller = null;
      this.nextRun = null;
      logger.info("Scheduler stopped");
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  private async tick(): Promise<void> {
    this.lastRun = new Date();
    this.cyclesRun++;

    try {
      this.lastOutcome = await this.cycle.runOnce();
      logger.info(`Cycle ${this.cyclesRun} finished: ${this.lastOutcome}`);
    } catch (error) {
      this.lastOutcome = null;
      logger.error(`Cycle ${this.cyclesRun} failed unexpectedly: ${(error as Error).message}`);
    }
  }

  getStatus(): SchedulerStatus {
    return {
      cadenceMinutes: this.cadenceMinutes,
      running: this.controller !== null,
      cyclesRun: this.cyclesRun,
      lastRun: this.lastRun,
      lastOutcome: this.lastOutcome,
      nextRun: this.nextRun,
    };
  }
}
