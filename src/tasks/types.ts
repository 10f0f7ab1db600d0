/**
 * Task ledger — types
 *
 * A task is a passive audit record of one routed command. It never drives
 * execution and is never retried or reopened.
 */

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface Task {
    /** `task_<epochMillis>_<sequence>` */
    id: string;
    description: string;
    status: TaskStatus;
    priority: TaskPriority;
    context: Record<string, unknown>;
    /** Failure message, set when the task moves to failed */
    error: string | null;
    /** ISO-8601 */
    createdAt: string;
    updatedAt: string;
}

/**
 * Storage behind the tracker. Implementations hand out copies.
 */
export interface TaskStore {
    insert(task: Task): void;
    update(task: Task): void;
    get(id: string): Task | undefined;
    /** In creation order */
    list(): Task[];
    close(): void;
}
