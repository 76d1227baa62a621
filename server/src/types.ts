export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const COMMENT_PARENT_KINDS = ['project', 'task'] as const;
export type CommentParentKind = (typeof COMMENT_PARENT_KINDS)[number];

export type ProjectStatus = 'active';

export interface Project {
  id: string;
  name: string;
  description: string;
  status: ProjectStatus;
  iconData: string | null;
  createdAt: string; // ISO timestamp
}

export interface ProjectSummary extends Project {
  taskCount: number;
}

export interface Task {
  id: string;
  projectId: string;
  parentTaskId: string | null;
  title: string;
  description: string;
  status: TaskStatus;
  createdAt: string;
}

export interface TaskWithCounts extends Task {
  subtaskCount: number;
  commentCount: number;
}

export type CommentParent = { kind: CommentParentKind; id: string };

export interface Comment {
  id: string;
  parent: CommentParent;
  text: string;
  author: string;
  createdAt: string;
}

export interface ProjectDetail extends Project {
  tasks: TaskWithCounts[];
  comments: Comment[];
}

export interface TaskDetail {
  task: Task;
  subtasks: TaskWithCounts[];
  comments: Comment[];
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && (TASK_STATUSES as readonly string[]).includes(value);
}

export function isCommentParentKind(value: unknown): value is CommentParentKind {
  return typeof value === 'string' && (COMMENT_PARENT_KINDS as readonly string[]).includes(value);
}
