import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { TASK_PRIORITIES, TASK_STATUSES, type Task, type TaskStore } from './types.js';

function copyTask(task: Task): Task {
    return { ...task, context: { ...task.context } };
}

/**
 * In-process ledger, gone when the process exits
 */
export class MemoryTaskStore implements TaskStore {
    private readonly tasks = new Map<string, Task>();

    insert(task: Task): void {
        this.tasks.set(task.id, copyTask(task));
    }

    update(task: Task): void {
        this.tasks.set(task.id, copyTask(task));
    }

    get(id: string): Task | undefined {
        const task = this.tasks.get(id);
        return task ? copyTask(task) : undefined;
    }

    list(): Task[] {
        return Array.from(this.tasks.values(), copyTask);
    }

    close(): void {
        this.tasks.clear();
    }
}

const TaskRowSchema = z.object({
    id: z.string(),
    description: z.string(),
    status: z.enum(TASK_STATUSES),
    priority: z.enum(TASK_PRIORITIES),
    context: z.string(),
    error: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
});

const ContextSchema = z.record(z.unknown());

/**
 * Task ledger persisted in SQLite (`.assistant/tasks.db`)
 */
export class SqliteTaskStore implements TaskStore {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(path.dirname(dbPath), { recursive: true });
        }

        this.db = new Database(dbPath);
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }

        this.migrate();
    }

    private migrate(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS tasks (
                id TEXT PRIMARY KEY,
                description TEXT NOT NULL,
                status TEXT NOT NULL DEFAULT 'pending'
                    CHECK(status IN ('pending','in_progress','completed','failed')),
                priority TEXT NOT NULL DEFAULT 'medium'
                    CHECK(priority IN ('low','medium','high','critical')),
                context TEXT NOT NULL DEFAULT '{}',
                error TEXT,
                created_at TEXT NOT NULL,
                updated_at TEXT NOT NULL
            );

            CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
        `);
    }

    insert(task: Task): void {
        this.db.prepare(`
            INSERT INTO tasks (id, description, status, priority, context, error, created_at, updated_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            task.id,
            task.description,
            task.status,
            task.priority,
            JSON.stringify(task.context),
            task.error,
            task.createdAt,
            task.updatedAt,
        );
    }

    update(task: Task): void {
        this.db.prepare(`
            UPDATE tasks SET status = ?, error = ?, updated_at = ? WHERE id = ?
        `).run(task.status, task.error, task.updatedAt, task.id);
    }

    get(id: string): Task | undefined {
        const row: unknown = this.db.prepare('SELECT * FROM tasks WHERE id = ?').get(id);
        return row === undefined ? undefined : parseRow(row);
    }

    list(): Task[] {
        const rows: unknown[] = this.db.prepare('SELECT * FROM tasks ORDER BY created_at ASC, rowid ASC').all();
        return rows.map(parseRow);
    }

    close(): void {
        this.db.close();
    }
}

function parseRow(row: unknown): Task {
    const parsed = TaskRowSchema.parse(row);
    let context: Record<string, unknown> = {};
    const rawContext: unknown = JSON.parse(parsed.context);
    const checked = ContextSchema.safeParse(rawContext);
    if (checked.success) context = checked.data;

    return {
        id: parsed.id,
        description: parsed.description,
        status: parsed.status,
        priority: parsed.priority,
        context,
        error: parsed.error,
        createdAt: parsed.created_at,
        updatedAt: parsed.updated_at,
    };
}
