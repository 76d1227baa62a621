import { randomUUID } from 'crypto';
import type { Db } from './db';
import { AppError, IntegrityError, NotFoundError, ValidationError } from './errors';
import {
  isCommentParentKind,
  isTaskStatus,
  TASK_STATUSES,
  type Comment,
  type CommentParentKind,
  type Project,
  type ProjectDetail,
  type ProjectSummary,
  type Task,
  type TaskDetail,
  type TaskStatus,
  type TaskWithCounts
} from './types';

type ProjectRow = {
  id: string;
  name: string;
  description: string;
  status: string;
  icon_data: string | null;
  created_at: string;
};

type TaskRow = {
  id: string;
  project_id: string;
  parent_task_id: string | null;
  title: string;
  description: string;
  status: string;
  created_at: string;
};

type TaskCountsRow = TaskRow & { subtask_count: number; comment_count: number };

type CommentRow = {
  id: string;
  entity_type: string;
  entity_id: string;
  content: string;
  author: string;
  created_at: string;
};

export interface StoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

export interface CreateProjectInput {
  name: string;
  description?: string;
  iconData?: string | null;
}

export interface UpdateProjectInput {
  name?: string;
  description?: string;
}

export interface CreateTaskInput {
  projectId: string;
  parentTaskId?: string | null;
  title: string;
  description?: string;
}

export interface AddCommentInput {
  parentKind: string;
  parentId: string;
  text: string;
  author?: string;
}

const DEFAULT_AUTHOR = 'User';
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

// Shared SELECT for tasks annotated with their direct subtask and comment counts.
const TASK_WITH_COUNTS = `
  SELECT t.*,
    (SELECT COUNT(*) FROM tasks c WHERE c.parent_task_id = t.id) AS subtask_count,
    (SELECT COUNT(*) FROM comments m WHERE m.entity_type = 'task' AND m.entity_id = t.id) AS comment_count
  FROM tasks t`;

const SUBTREE = `
  WITH RECURSIVE subtree(id) AS (
    SELECT id FROM tasks WHERE id = ?
    UNION ALL
    SELECT t.id FROM tasks t JOIN subtree s ON t.parent_task_id = s.id
  )`;

function mapProjectRow(p: ProjectRow): Project {
  return {
    id: p.id,
    name: p.name,
    description: p.description ?? '',
    status: 'active',
    iconData: p.icon_data ?? null,
    createdAt: p.created_at
  };
}

function mapTaskRow(t: TaskRow): Task {
  if (!isTaskStatus(t.status)) {
    throw new IntegrityError('Stored task has an unknown status', { taskId: t.id, status: t.status });
  }
  return {
    id: t.id,
    projectId: t.project_id,
    parentTaskId: t.parent_task_id ?? null,
    title: t.title,
    description: t.description ?? '',
    status: t.status,
    createdAt: t.created_at
  };
}

function mapTaskCountsRow(t: TaskCountsRow): TaskWithCounts {
  return {
    ...mapTaskRow(t),
    subtaskCount: Number(t.subtask_count),
    commentCount: Number(t.comment_count)
  };
}

function mapCommentRow(c: CommentRow): Comment {
  return {
    id: c.id,
    parent: { kind: c.entity_type === 'project' ? 'project' : 'task', id: c.entity_id },
    text: c.content,
    author: c.author,
    createdAt: c.created_at
  };
}

function requireText(value: unknown, field: string): string {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return text;
}

/**
 * Persistence for projects, tasks and comments.
 *
 * Every method is one synchronous unit of work against SQLite. Cascading
 * deletes run inside a single transaction, so a reader never sees a
 * half-deleted tree.
 */
export class ProjectStore {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly db: Db, options: StoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  ping(): void {
    this.db.prepare('SELECT 1').get();
  }

  createProject(input: CreateProjectInput): Project {
    const name = requireText(input.name, 'Project name');
    const description = (input.description ?? '').trim();
    const iconData = input.iconData ? input.iconData.trim() : null;
    if (iconData && (iconData.length % 4 !== 0 || !BASE64.test(iconData))) {
      throw new ValidationError('Icon must be base64 encoded', { field: 'iconData' });
    }

    const id = this.generateId();
    this.write(() => {
      this.db
        .prepare('INSERT INTO projects (id, name, description, icon_data, created_at) VALUES (?, ?, ?, ?, ?)')
        .run(id, name, description, iconData, this.timestamp());
    });
    return this.requireProject(id);
  }

  listProjects(): ProjectSummary[] {
    const rows = this.db
      .prepare<[], ProjectRow & { task_count: number }>(
        `SELECT p.*, (SELECT COUNT(*) FROM tasks t WHERE t.project_id = p.id) AS task_count
         FROM projects p
         ORDER BY p.created_at DESC, p.rowid DESC`
      )
      .all();
    return rows.map(p => ({ ...mapProjectRow(p), taskCount: Number(p.task_count) }));
  }

  getProject(id: string): ProjectDetail {
    const project = this.requireProject(id);
    const tasks = this.db
      .prepare<[string], TaskCountsRow>(
        `${TASK_WITH_COUNTS}
         WHERE t.project_id = ? AND t.parent_task_id IS NULL
         ORDER BY t.created_at ASC, t.rowid ASC`
      )
      .all(id);
    return {
      ...project,
      tasks: tasks.map(mapTaskCountsRow),
      comments: this.commentsFor('project', id)
    };
  }

  updateProject(id: string, input: UpdateProjectInput): Project {
    this.requireProject(id);
    const sets: string[] = [];
    const vals: string[] = [];
    if (input.name !== undefined) {
      sets.push('name = ?');
      vals.push(requireText(input.name, 'Project name'));
    }
    if (input.description !== undefined) {
      sets.push('description = ?');
      vals.push(input.description.trim());
    }
    if (sets.length) {
      vals.push(id);
      this.write(() => {
        this.db.prepare(`UPDATE projects SET ${sets.join(', ')} WHERE id = ?`).run(...vals);
      });
    }
    return this.requireProject(id);
  }

  deleteProject(id: string): void {
    this.requireProject(id);
    this.write(() => {
      this.db
        .prepare(
          `DELETE FROM comments
           WHERE entity_type = 'task' AND entity_id IN (SELECT id FROM tasks WHERE project_id = ?)`
        )
        .run(id);
      this.db.prepare(`DELETE FROM comments WHERE entity_type = 'project' AND entity_id = ?`).run(id);
      this.db.prepare('DELETE FROM tasks WHERE project_id = ?').run(id);
      this.db.prepare('DELETE FROM projects WHERE id = ?').run(id);
    });
  }

  countTasks(projectId: string): number {
    this.requireProject(projectId);
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM tasks WHERE project_id = ?')
      .get(projectId);
    return Number(row?.count ?? 0);
  }

  createTask(input: CreateTaskInput): Task {
    const title = requireText(input.title, 'Task title');
    const description = (input.description ?? '').trim();
    const parentTaskId = input.parentTaskId || null;

    const id = this.generateId();
    this.write(() => {
      this.requireProject(input.projectId);
      if (parentTaskId) {
        const parent = this.findTask(parentTaskId);
        if (!parent || parent.projectId !== input.projectId) {
          throw new NotFoundError('Parent task not found in project', {
            projectId: input.projectId,
            parentTaskId
          });
        }
      }
      this.db
        .prepare(
          `INSERT INTO tasks (id, project_id, parent_task_id, title, description, status, created_at)
           VALUES (?, ?, ?, ?, ?, 'pending', ?)`
        )
        .run(id, input.projectId, parentTaskId, title, description, this.timestamp());
    });
    return this.getTask(id);
  }

  getTask(id: string): Task {
    const task = this.findTask(id);
    if (!task) {
      throw new NotFoundError('Task not found', { taskId: id });
    }
    return task;
  }

  getTaskDetail(id: string): TaskDetail {
    const task = this.getTask(id);
    const subtasks = this.db
      .prepare<[string], TaskCountsRow>(
        `${TASK_WITH_COUNTS}
         WHERE t.parent_task_id = ?
         ORDER BY t.created_at ASC, t.rowid ASC`
      )
      .all(id);
    return {
      task,
      subtasks: subtasks.map(mapTaskCountsRow),
      comments: this.commentsFor('task', id)
    };
  }

  updateTaskStatus(id: string, status: string): void {
    this.getTask(id);
    if (!isTaskStatus(status)) {
      throw new ValidationError(`Status must be one of: ${TASK_STATUSES.join(', ')}`, {
        field: 'status',
        value: status
      });
    }
    this.setStatus(id, status);
  }

  deleteTask(id: string): void {
    this.getTask(id);
    this.write(() => {
      this.db
        .prepare(
          `${SUBTREE}
           DELETE FROM comments WHERE entity_type = 'task' AND entity_id IN (SELECT id FROM subtree)`
        )
        .run(id);
      this.db.prepare(`${SUBTREE} DELETE FROM tasks WHERE id IN (SELECT id FROM subtree)`).run(id);
    });
  }

  addComment(input: AddCommentInput): Comment {
    if (!isCommentParentKind(input.parentKind)) {
      throw new ValidationError('Comment parent must be a project or a task', {
        field: 'parentKind',
        value: input.parentKind
      });
    }
    const kind = input.parentKind;
    const text = requireText(input.text, 'Comment text');
    const author = (input.author ?? '').trim() || DEFAULT_AUTHOR;

    const id = this.generateId();
    this.write(() => {
      if (kind === 'project') this.requireProject(input.parentId);
      else this.getTask(input.parentId);
      this.db
        .prepare(
          'INSERT INTO comments (id, entity_type, entity_id, content, author, created_at) VALUES (?, ?, ?, ?, ?, ?)'
        )
        .run(id, kind, input.parentId, text, author, this.timestamp());
    });

    const row = this.db.prepare<[string], CommentRow>('SELECT * FROM comments WHERE id = ?').get(id);
    if (!row) {
      throw new IntegrityError('Comment vanished after insert', { commentId: id });
    }
    return mapCommentRow(row);
  }

  deleteComment(id: string): void {
    const result = this.write(() => this.db.prepare('DELETE FROM comments WHERE id = ?').run(id));
    if (result.changes === 0) {
      throw new NotFoundError('Comment not found', { commentId: id });
    }
  }

  private setStatus(id: string, status: TaskStatus): void {
    this.write(() => {
      this.db.prepare('UPDATE tasks SET status = ? WHERE id = ?').run(status, id);
    });
  }

  private requireProject(id: string): Project {
    const row = this.db.prepare<[string], ProjectRow>('SELECT * FROM projects WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('Project not found', { projectId: id });
    }
    return mapProjectRow(row);
  }

  private findTask(id: string): Task | undefined {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
    return row ? mapTaskRow(row) : undefined;
  }

  private commentsFor(kind: CommentParentKind, id: string): Comment[] {
    return this.db
      .prepare<[CommentParentKind, string], CommentRow>(
        `SELECT * FROM comments
         WHERE entity_type = ? AND entity_id = ?
         ORDER BY created_at ASC, rowid ASC`
      )
      .all(kind, id)
      .map(mapCommentRow);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /**
   * Runs `fn` in one transaction: commits on return, rolls back on throw.
   * Store errors pass through; database failures become IntegrityError.
   */
  private write<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (e) {
      if (e instanceof AppError) throw e;
      throw new IntegrityError('Database write failed', {
        cause: e instanceof Error ? e.message : String(e)
      });
    }
  }
}
