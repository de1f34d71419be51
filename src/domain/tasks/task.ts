import { InvalidTaskError } from './errors.js';

export const MAX_TITLE_LENGTH = 200;

/**
 * Task owned by exactly one user. `ownerId` is fixed at creation.
 */
export interface Task {
  readonly id: string;
  readonly title: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly ownerId: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewTask {
  title: string;
  description: string | null;
  completed: boolean;
  ownerId: string;
}

/**
 * Fields a caller may change. Ownership and timestamps are not among them.
 */
export interface TaskChanges {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new InvalidTaskError('title', 'Title must not be empty');
  }
  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw new InvalidTaskError('title', `Title must be at most ${MAX_TITLE_LENGTH} characters`);
  }
  return trimmed;
}

export function normalizeDescription(description: string | null | undefined): string | null {
  if (description === undefined || description === null) {
    return null;
  }
  return description.trim().length === 0 ? null : description;
}

export function newTask(
  ownerId: string,
  fields: { title: string; description?: string | null; completed?: boolean }
): NewTask {
  return {
    title: normalizeTitle(fields.title),
    description: normalizeDescription(fields.description),
    completed: fields.completed ?? false,
    ownerId,
  };
}

/**
 * Validate and normalize a change set. Absent keys stay absent.
 */
export function normalizeChanges(changes: TaskChanges): TaskChanges {
  const normalized: TaskChanges = {};
  if (changes.title !== undefined) {
    normalized.title = normalizeTitle(changes.title);
  }
  if (changes.description !== undefined) {
    normalized.description = normalizeDescription(changes.description);
  }
  if (changes.completed !== undefined) {
    normalized.completed = changes.completed;
  }
  return normalized;
}

export function applyChanges(task: Task, changes: TaskChanges, now: Date): Task {
  return {
    ...task,
    title: changes.title ?? task.title,
    description: changes.description !== undefined ? changes.description : task.description,
    completed: changes.completed ?? task.completed,
    updatedAt: now,
  };
}
