/**
 * Periodic conversation maintenance: drops idle sessions, then evicts the
 * oldest sessions beyond the capacity limit.
 */

import { ConversationStore } from "./conversation-store";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("Maintenance");

export interface MaintenanceReport {
  expired: number;
  evicted: number;
}

/** Schedules `task` every `intervalMs`; returns a function that cancels it. */
export type Scheduler = (task: () => void, intervalMs: number) => () => void;

export const intervalScheduler: Scheduler = (task, intervalMs) => {
  const timer = setInterval(task, intervalMs);
  // Never keep the process alive just for maintenance
  timer.unref();
  return () => clearInterval(timer);
};

export interface MaintenanceOptions {
  intervalMs?: number; // Default: 600000 (10 minutes)
  idleHours?: number; // Default: store.expireHours
  maxSessions?: number; // Default: store.maxSessions
  scheduler?: Scheduler;
}

export class MaintenanceTask {
  private intervalMs: number;
  private idleHours: number;
  private maxSessions: number;
  private scheduler: Scheduler;
  private cancel?: () => void;

  constructor(private store: ConversationStore, options: MaintenanceOptions = {}) {
    this.intervalMs = options.intervalMs ?? 600000;
    this.idleHours = options.idleHours ?? store.expireHours;
    this.maxSessions = options.maxSessions ?? store.maxSessions;
    this.scheduler = options.scheduler ?? intervalScheduler;
  }

  runOnce(): MaintenanceReport {
    try {
      const expired = this.store.sweepExpired(this.idleHours);
      const evicted = this.store.sweepExcess(this.maxSessions);
      if (expired + evicted > 0) {
        log.info(`Sweep removed ${expired} expired and ${evicted} excess conversations`);
      }
      return { expired, evicted };
    } catch (error) {
      log.error(`Sweep failed (stage: maintenance): ${errorMessage(error)}`);
      return { expired: 0, evicted: 0 };
    }
  }

  start(): void {
    if (this.cancel) return;
    this.cancel = this.scheduler(() => {
      this.runOnce();
    }, this.intervalMs);
    log.info(`Started (every ${Math.round(this.intervalMs / 1000)}s)`);
  }

  stop(): void {
    if (!this.cancel) return;
    this.cancel();
    this.cancel = undefined;
    log.info("Stopped");
  }

  get running(): boolean {
    return this.cancel !== undefined;
  }
}
