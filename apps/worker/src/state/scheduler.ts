import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "scheduler" });

export type TaskStatus = "waiting" | "running" | "done" | "failed" | "cancelled";

export interface TaskHandle {
    readonly id: number;
    readonly name: string;
    readonly remaining: number;
    readonly status: TaskStatus;
}

interface Task extends TaskHandle {
    remaining: number;
    status: TaskStatus;
    run: () => Promise<void>;
    promise: Promise<void> | null;
}

export interface TickResult {
    started: number;
    /** Started tasks still running when the wait ended */
    deferred: number;
}

/**
 * Wait for a promise at most ms milliseconds. Resolves true when it settled.
 */
function waitAtMost(promise: Promise<unknown>, ms: number): Promise<boolean> {
    return new Promise((resolve) => {
        const timer = setTimeout(() => resolve(false), ms);
        const done = () => {
            clearTimeout(timer);
            resolve(true);
        };
        void promise.then(done, done);
    });
}

/**
 * Tasks that fire after a number of heartbeat ticks.
 *
 * Each tick decrements waiting tasks and starts the ready ones. The tick waits
 * for them only up to the configured timeout; slower tasks keep running and
 * are tracked as in-flight.
 */
export class DelayedTaskScheduler {
    private waiting: Task[] = [];
    private running = new Set<Task>();
    private nextId = 1;

    constructor(private taskTimeoutMs = 50) {}

    get pending(): number {
        return this.waiting.length;
    }

    get inFlight(): number {
        return this.running.size;
    }

    schedule(name: string, ticks: number, run: () => Promise<void>): TaskHandle {
        const task: Task = {
            id: this.nextId++,
            name,
            remaining: Math.max(1, Math.floor(ticks)),
            status: "waiting",
            run,
            promise: null,
        };
        this.waiting.push(task);
        logger.debug({ task: name, ticks: task.remaining }, "Scheduled task");
        return task;
    }

    cancel(handle: TaskHandle): boolean {
        const index = this.waiting.findIndex((task) => task.id === handle.id);
        const task = this.waiting[index];
        if (!task) {
            return false;
        }
        this.waiting.splice(index, 1);
        task.status = "cancelled";
        return true;
    }

    async tick(): Promise<TickResult> {
        const ready: Task[] = [];
        const still: Task[] = [];
        for (const task of this.waiting) {
            task.remaining--;
            if (task.remaining <= 0) {
                ready.push(task);
            } else {
                still.push(task);
            }
        }
        this.waiting = still;
        if (ready.length === 0) {
            return { started: 0, deferred: 0 };
        }

        const promises = ready.map((task) => this.start(task));
        await waitAtMost(Promise.allSettled(promises), this.taskTimeoutMs);
        const deferred = ready.filter((task) => task.status === "running").length;
        if (deferred > 0) {
            logger.debug({ deferred, started: ready.length }, "Tasks still running after tick");
        }
        return { started: ready.length, deferred };
    }

    /** Cancel every waiting task. Running tasks finish on their own. */
    clear(): void {
        for (const task of this.waiting) {
            task.status = "cancelled";
        }
        this.waiting = [];
    }

    /** Resolve once every in-flight task has settled. */
    async settle(): Promise<void> {
        await Promise.allSettled([...this.running].map((task) => task.promise));
    }

    private start(task: Task): Promise<void> {
        task.status = "running";
        this.running.add(task);
        task.promise = task
            .run()
            .then(
                () => {
                    task.status = "done";
                },
                (err: unknown) => {
                    task.status = "failed";
                    logger.warn({ err, task: task.name }, "Scheduled task failed");
                }
            )
            .finally(() => {
                this.running.delete(task);
            });
        return task.promise;
    }
}
