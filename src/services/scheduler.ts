import * as cron from "node-cron";
import { errorMessage } from "../errors";
import type { AlertService, OrderFailure } from "./alerter";
import type { SearchOrderService } from "./search-orders";
import type { TaskRunner } from "./tasks";
import type { Store } from "../db/store";

export interface SchedulerOptions {
  enabled: boolean;
  schedule: string;
}

export interface PassSummary {
  startedAt: string;
  finishedAt: string;
  ordersChecked: number;
  deactivated: number;
  newNotifications: number;
  failures: OrderFailure[];
  tasksPurged: number;
}

export interface SchedulerStatus {
  enabled: boolean;
  running: boolean;
  lastPassAt: string | null;
  consecutiveFailures: number;
}

/**
 * Periodic re-check of every active search order. Passes never overlap: a
 * tick that fires while a pass is still running is skipped, not queued.
 */
export class SearchOrderScheduler {
  private cronTask: cron.ScheduledTask | null = null;
  private running = false;
  private lastPassAt: string | null = null;

  constructor(
    private readonly store: Store,
    private readonly orders: SearchOrderService,
    private readonly tasks: TaskRunner,
    private readonly alerts: AlertService,
    private readonly options: SchedulerOptions
  ) {}

  /**
   * Run one pass over all active orders. Returns null when a pass is
   * already in progress.
   */
  async runPass(): Promise<PassSummary | null> {
    if (this.running) {
      console.log("[Scheduler] Previous pass still running, skipping this tick");
      return null;
    }
    this.running = true;

    try {
      return await this.pass();
    } finally {
      this.running = false;
    }
  }

  private async pass(): Promise<PassSummary> {
    const startedAt = new Date().toISOString();
    const failures: OrderFailure[] = [];
    let ordersChecked = 0;
    let deactivated = 0;
    let newNotifications = 0;

    const active = this.store.listActiveSearchOrders();
    console.log(`[Scheduler] Checking ${active.length} active search orders`);

    for (const order of active) {
      ordersChecked++;
      try {
        const check = await this.orders.check(order);
        if (check.deactivated) deactivated++;
        newNotifications += check.newNotifications.length;
      } catch (error) {
        // One failing order never stops the pass; it is retried next tick
        console.error(`[Scheduler] Order ${order.id} failed:`, error);
        failures.push({ searchOrderId: order.id, message: errorMessage(error) });
      }
    }

    if (failures.length > 0) {
      await this.alerts.onPassFailure(failures, ordersChecked);
    } else {
      await this.alerts.onRecovery();
    }

    const tasksPurged = this.tasks.purgeExpired();
    const finishedAt = new Date().toISOString();
    this.lastPassAt = finishedAt;

    console.log(
      `[Scheduler] Pass done: ${ordersChecked} checked, ${newNotifications} new matches, ${deactivated} deactivated, ${failures.length} failed`
    );

    return {
      startedAt,
      finishedAt,
      ordersChecked,
      deactivated,
      newNotifications,
      failures,
      tasksPurged,
    };
  }

  /**
   * Start the cron scheduler
   */
  start(): void {
    if (!this.options.enabled) {
      console.log("[Scheduler] Disabled by configuration");
      return;
    }

    // Validate cron expression
    if (!cron.validate(this.options.schedule)) {
      console.error(`Invalid cron expression: ${this.options.schedule}`);
      process.exit(1);
    }

    this.cronTask = cron.schedule(this.options.schedule, () => {
      console.log(`[Scheduler] Cron triggered at ${new Date().toISOString()}`);
      this.runPass().catch((error) => {
        console.error("[Scheduler] Unexpected error during pass:", error);
      });
    });

    console.log(`[Scheduler] Cron job scheduled: ${this.options.schedule}`);
  }

  /**
   * Stop the cron scheduler
   */
  stop(): void {
    if (this.cronTask) {
      this.cronTask.stop();
      this.cronTask = null;
      console.log("[Scheduler] Cron job stopped");
    }
  }

  status(): SchedulerStatus {
    return {
      enabled: this.cronTask !== null,
      running: this.running,
      lastPassAt: this.lastPassAt,
      consecutiveFailures: this.alerts.getConsecutiveFailures(),
    };
  }
}
