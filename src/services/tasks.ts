import { randomUUID } from "node:crypto";
import { TaskNotFoundError, errorMessage } from "../errors";
import { failedLocation } from "./search";
import type { LocationOutcome, SearchEngine, SearchPlan } from "./search";
import type { CurrentUser, SearchSpec, SearchTask, TaskStatus } from "../types";

// Progress milestones: planning done, then locations fill up to LOCATIONS_DONE
const PLANNED = 0.05;
const LOCATIONS_DONE = 0.85;

const TERMINAL: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "cancelled"]);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL.has(status);
}

export interface TaskRunnerOptions {
  retentionHours: number;
}

/**
 * In-memory background search runner. Tasks live for the lifetime of the
 * process; terminal ones older than the retention are dropped whenever a
 * task starts and on every scheduler pass.
 */
export class TaskRunner {
  private readonly tasks = new Map<string, SearchTask>();

  constructor(
    private readonly engine: SearchEngine,
    private readonly options: TaskRunnerOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Validate and register a search, run it on a later tick, return its id
   */
  start(spec: SearchSpec, user: CurrentUser): string {
    const plan = this.engine.plan(spec, user);
    this.purgeExpired();
    const timestamp = this.now().toISOString();

    const task: SearchTask = {
      id: randomUUID(),
      userId: user.id,
      status: "pending",
      progress: 0,
      currentStep: "Waiting to start",
      totalLocations: plan.locations.length,
      processedLocations: 0,
      failedLocations: [],
      errorMessage: null,
      result: null,
      createdAt: timestamp,
      startedAt: null,
      completedAt: null,
      updatedAt: timestamp,
    };
    this.tasks.set(task.id, task);

    setImmediate(() => {
      this.execute(task, plan).catch((error) => {
        console.error(`[Task] ${task.id} crashed:`, error);
        this.finish(task, "failed", { errorMessage: errorMessage(error), currentStep: "Search failed" });
      });
    });

    console.log(`[Task] ${task.id} queued for ${user.id} (${plan.locations.length} locations)`);
    return task.id;
  }

  getStatus(taskId: string, user?: CurrentUser): SearchTask {
    return { ...this.find(taskId, user) };
  }

  /**
   * Cancel a pending or running task. Cancelling a finished task is a no-op.
   */
  cancel(taskId: string, user?: CurrentUser): SearchTask {
    const task = this.find(taskId, user);
    if (this.finish(task, "cancelled", { currentStep: "Search cancelled" })) {
      console.log(`[Task] ${task.id} cancelled`);
    }
    return { ...task };
  }

  /**
   * Drop terminal tasks that finished more than `retentionHours` ago
   */
  purgeExpired(retentionHours: number = this.options.retentionHours): number {
    const cutoff = this.now().getTime() - retentionHours * 60 * 60 * 1000;
    let purged = 0;

    for (const [id, task] of this.tasks) {
      if (isTerminal(task.status) && task.completedAt && new Date(task.completedAt).getTime() < cutoff) {
        this.tasks.delete(id);
        purged++;
      }
    }

    if (purged > 0) {
      console.log(`[Task] Purged ${purged} expired tasks`);
    }
    return purged;
  }

  size(): number {
    return this.tasks.size;
  }

  private find(taskId: string, user?: CurrentUser): SearchTask {
    const task = this.tasks.get(taskId);
    // Someone else's task looks exactly like a missing one
    if (!task || (user && !user.isAdmin && task.userId !== user.id)) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private update(task: SearchTask, patch: Partial<SearchTask>): boolean {
    if (isTerminal(task.status)) return false;
    Object.assign(task, patch, { updatedAt: this.now().toISOString() });
    return true;
  }

  private finish(task: SearchTask, status: TaskStatus, patch: Partial<SearchTask> = {}): boolean {
    const timestamp = this.now().toISOString();
    return this.update(task, { ...patch, status, completedAt: timestamp });
  }

  private async execute(task: SearchTask, plan: SearchPlan): Promise<void> {
    const started = this.update(task, {
      status: "running",
      startedAt: this.now().toISOString(),
      progress: PLANNED,
      currentStep: `Searching ${plan.locations.length} locations`,
    });
    if (!started) return;

    const outcomes: LocationOutcome[] = [];
    const total = plan.locations.length;

    for (const location of plan.locations) {
      if (isTerminal(task.status)) return;
      this.update(task, { currentStep: `Checking ${location.name}` });

      const outcome = await this.engine.searchLocation(plan, location);

      // Cancelled while this location was in flight: drop its result
      if (isTerminal(task.status)) return;

      outcomes.push(outcome);
      const processed = outcomes.length;
      this.update(task, {
        processedLocations: processed,
        failedLocations:
          outcome.status === "failed"
            ? [...task.failedLocations, failedLocation(outcome.location, outcome.error)]
            : task.failedLocations,
        progress: PLANNED + (LOCATIONS_DONE - PLANNED) * (processed / total),
      });
    }

    try {
      const result = this.engine.assemble(plan, outcomes);
      this.finish(task, "completed", {
        result,
        progress: 1,
        currentStep: `Found ${result.totalSlots} slots`,
      });
      console.log(`[Task] ${task.id} completed with ${result.totalSlots} slots`);
    } catch (error) {
      this.finish(task, "failed", { errorMessage: errorMessage(error), currentStep: "Search failed" });
      console.error(`[Task] ${task.id} failed:`, error);
    }
  }
}
