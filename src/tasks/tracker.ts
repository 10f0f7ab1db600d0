import { InvalidTaskTransitionError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { MemoryTaskStore } from './store.js';
import type { Task, TaskPriority, TaskStatus, TaskStore } from './types.js';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
    pending: ['in_progress', 'failed'],
    in_progress: ['completed', 'failed'],
    completed: [],
    failed: [],
};

export interface TaskTrackerOptions {
    store?: TaskStore;
    logger?: Logger;
    /** Clock, replaced in tests */
    now?: () => Date;
}

export interface CreateTaskOptions {
    priority?: TaskPriority;
    context?: Record<string, unknown>;
}

export interface TaskSummary {
    total: number;
    byStatus: Record<TaskStatus, number>;
}

/**
 * Task Tracker — status ledger for routed commands
 *
 * pending → in_progress → completed | failed, plus pending → failed for
 * commands that never started. Terminal tasks stay terminal.
 */
export class TaskTracker {
    private readonly store: TaskStore;
    private readonly logger?: Logger;
    private readonly now: () => Date;
    private sequence = 0;

    constructor(options: TaskTrackerOptions = {}) {
        this.store = options.store ?? new MemoryTaskStore();
        this.logger = options.logger;
        this.now = options.now ?? (() => new Date());
    }

    create(description: string, options: CreateTaskOptions = {}): Task {
        const timestamp = this.now();
        const task: Task = {
            id: `task_${timestamp.getTime()}_${++this.sequence}`,
            description,
            status: 'pending',
            priority: options.priority ?? 'medium',
            context: { ...options.context },
            error: null,
            createdAt: timestamp.toISOString(),
            updatedAt: timestamp.toISOString(),
        };
        this.store.insert(task);
        this.logger?.debug(`Task ${task.id} created: ${description}`);
        return task;
    }

    start(id: string): Task {
        return this.transition(id, 'in_progress');
    }

    complete(id: string): Task {
        return this.transition(id, 'completed');
    }

    fail(id: string, error?: string): Task {
        return this.transition(id, 'failed', error);
    }

    get(id: string): Task | undefined {
        return this.store.get(id);
    }

    list(status?: TaskStatus): Task[] {
        const tasks = this.store.list();
        return status ? tasks.filter(t => t.status === status) : tasks;
    }

    summary(): TaskSummary {
        const counts: Record<TaskStatus, number> = { pending: 0, in_progress: 0, completed: 0, failed: 0 };
        const tasks = this.store.list();
        for (const task of tasks) {
            counts[task.status]++;
        }
        return { total: tasks.length, byStatus: counts };
    }

    close(): void {
        this.store.close();
    }

    private transition(id: string, to: TaskStatus, error?: string): Task {
        const task = this.store.get(id);
        if (!task) {
            throw new Error(`Unknown task: ${id}`);
        }
        if (!TRANSITIONS[task.status].includes(to)) {
            throw new InvalidTaskTransitionError(id, task.status, to);
        }

        const updated: Task = {
            ...task,
            status: to,
            error: to === 'failed' ? (error ?? null) : task.error,
            updatedAt: this.now().toISOString(),
        };
        this.store.update(updated);
        this.logger?.debug(`Task ${id}: ${task.status} -> ${to}`);
        return updated;
    }
}
