import { pool } from './pool.js';
import { isUuid } from './uuid.js';
import { TaskScope } from '../../domain/tasks/accessPolicy.js';
import { NewTask, Task, TaskChanges } from '../../domain/tasks/task.js';
import {
  Page,
  SortField,
  TaskCriteria,
  TaskFilters,
  offsetOf,
  searchTerms,
  toPage,
} from '../../domain/tasks/taskQuery.js';
import { CompletionCounts, TaskRepository } from '../../application/repositories.js';

interface TaskRow {
  id: string;
  title: string;
  description: string | null;
  completed: boolean;
  owner_id: string;
  created_at: Date;
  updated_at: Date;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

const TASK_COLUMNS = 'id, title, description, completed, owner_id, created_at, updated_at';

const SORT_COLUMNS: Record<SortField, string> = {
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  title: 'title',
};

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    completed: row.completed,
    ownerId: row.owner_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * WHERE clause for scope plus filters. The scope condition always comes
 * first so filters can only narrow it.
 */
export function buildTaskWhere(scope: TaskScope, filters: TaskFilters): SqlQuery {
  const conditions: string[] = [];
  const values: unknown[] = [];
  const param = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (scope.kind === 'owner') {
    conditions.push(`owner_id = ${param(scope.ownerId)}`);
  }
  if (filters.completed !== undefined) {
    conditions.push(`completed = ${param(filters.completed)}`);
  }
  if (filters.title !== undefined) {
    conditions.push(`title ILIKE ${param(`%${escapeLike(filters.title)}%`)}`);
  }
  if (filters.search !== undefined) {
    for (const term of searchTerms(filters.search)) {
      const placeholder = param(`%${escapeLike(term)}%`);
      conditions.push(`(title ILIKE ${placeholder} OR COALESCE(description, '') ILIKE ${placeholder})`);
    }
  }
  if (filters.createdFrom) {
    conditions.push(`created_at >= ${param(filters.createdFrom)}`);
  }
  if (filters.createdTo) {
    conditions.push(`created_at <= ${param(filters.createdTo)}`);
  }

  return {
    text: conditions.length === 0 ? '' : ` WHERE ${conditions.join(' AND ')}`,
    values,
  };
}

export function buildTaskCountQuery(criteria: TaskCriteria): SqlQuery {
  const where = buildTaskWhere(criteria.scope, criteria.filters);
  return { text: `SELECT COUNT(*) AS count FROM tasks${where.text}`, values: where.values };
}

export function buildTaskListQuery(criteria: TaskCriteria): SqlQuery {
  const where = buildTaskWhere(criteria.scope, criteria.filters);
  const column = SORT_COLUMNS[criteria.sort.field];
  const direction = criteria.sort.direction === 'asc' ? 'ASC' : 'DESC';
  const values = [...where.values, criteria.page.pageSize, offsetOf(criteria.page)];

  return {
    text:
      `SELECT ${TASK_COLUMNS} FROM tasks${where.text}` +
      ` ORDER BY ${column} ${direction}, seq ASC` +
      ` LIMIT $${values.length - 1} OFFSET $${values.length}`,
    values,
  };
}

export class PgTaskRepo implements TaskRepository {
  async findById(id: string): Promise<Task | null> {
    if (!isUuid(id)) {
      return null;
    }
    const result = await pool.query<TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = $1`, [id]);
    return result.rows.length === 0 ? null : toTask(result.rows[0]);
  }

  async create(task: NewTask): Promise<Task> {
    const result = await pool.query<TaskRow>(
      `INSERT INTO tasks (title, description, completed, owner_id)
       VALUES ($1, $2, $3, $4)
       RETURNING ${TASK_COLUMNS}`,
      [task.title, task.description, task.completed, task.ownerId]
    );
    return toTask(result.rows[0]);
  }

  async update(id: string, changes: TaskChanges): Promise<Task | null> {
    if (!isUuid(id)) {
      return null;
    }

    const assignments: string[] = [];
    const values: unknown[] = [id];
    if (changes.title !== undefined) {
      values.push(changes.title);
      assignments.push(`title = $${values.length}`);
    }
    if (changes.description !== undefined) {
      values.push(changes.description);
      assignments.push(`description = $${values.length}`);
    }
    if (changes.completed !== undefined) {
      values.push(changes.completed);
      assignments.push(`completed = $${values.length}`);
    }
    assignments.push('updated_at = NOW()');

    const result = await pool.query<TaskRow>(
      `UPDATE tasks SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${TASK_COLUMNS}`,
      values
    );
    return result.rows.length === 0 ? null : toTask(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    if (!isUuid(id)) {
      return false;
    }
    const result = await pool.query('DELETE FROM tasks WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async findPage(criteria: TaskCriteria): Promise<Page<Task>> {
    const countQuery = buildTaskCountQuery(criteria);
    const countResult = await pool.query<{ count: string }>(countQuery.text, countQuery.values);
    const count = Number(countResult.rows[0].count);

    // Past the end: no list query, so the offset never has to fit in a bigint
    if (offsetOf(criteria.page) >= count) {
      return toPage(criteria.page, count, []);
    }

    const list = buildTaskListQuery(criteria);
    const listResult = await pool.query<TaskRow>(list.text, list.values);
    return toPage(criteria.page, count, listResult.rows.map(toTask));
  }

  async countByCompletion(scope: TaskScope): Promise<CompletionCounts> {
    const where = buildTaskWhere(scope, {});
    const result = await pool.query<{ total: string; completed: string }>(
      `SELECT COUNT(*) AS total, COUNT(*) FILTER (WHERE completed) AS completed FROM tasks${where.text}`,
      where.values
    );
    return {
      total: Number(result.rows[0].total),
      completed: Number(result.rows[0].completed),
    };
  }
}
