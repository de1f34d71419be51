import { describe, it, expect } from 'vitest';
import {
  buildTaskCountQuery,
  buildTaskListQuery,
  buildTaskWhere,
  escapeLike,
} from '../taskRepo.js';
import { DEFAULT_SORT, TaskCriteria } from '../../../domain/tasks/taskQuery.js';

describe('task SQL builders', () => {
  describe('escapeLike', () => {
    it('should escape LIKE wildcards and backslashes', () => {
      expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
    });
  });

  describe('buildTaskWhere', () => {
    it('should produce no clause for an admin without filters', () => {
      expect(buildTaskWhere({ kind: 'all' }, {})).toEqual({ text: '', values: [] });
    });

    it('should put the owner condition first', () => {
      const where = buildTaskWhere({ kind: 'owner', ownerId: 'u1' }, { completed: false, title: 'report' });

      expect(where).toEqual({
        text: ' WHERE owner_id = $1 AND completed = $2 AND title ILIKE $3',
        values: ['u1', false, '%report%'],
      });
    });

    it('should require every search term in title or description', () => {
      const where = buildTaskWhere({ kind: 'all' }, { search: ' Task  1 ' });

      expect(where).toEqual({
        text:
          " WHERE (title ILIKE $1 OR COALESCE(description, '') ILIKE $1)" +
          " AND (title ILIKE $2 OR COALESCE(description, '') ILIKE $2)",
        values: ['%task%', '%1%'],
      });
    });

    it('should bound the creation time inclusively', () => {
      const from = new Date('2024-01-01T00:00:00.000Z');
      const to = new Date('2024-01-31T23:59:59.999Z');

      expect(buildTaskWhere({ kind: 'all' }, { createdFrom: from, createdTo: to })).toEqual({
        text: ' WHERE created_at >= $1 AND created_at <= $2',
        values: [from, to],
      });
    });
  });

  describe('page queries', () => {
    const criteria: TaskCriteria = {
      scope: { kind: 'owner', ownerId: 'u1' },
      filters: { completed: true },
      sort: { field: 'title', direction: 'asc' },
      page: { page: 3, pageSize: 20 },
    };

    it('should count with the same conditions', () => {
      expect(buildTaskCountQuery(criteria)).toEqual({
        text: 'SELECT COUNT(*) AS count FROM tasks WHERE owner_id = $1 AND completed = $2',
        values: ['u1', true],
      });
    });

    it('should order with an insertion-order tie-breaker and page by offset', () => {
      expect(buildTaskListQuery(criteria)).toEqual({
        text:
          'SELECT id, title, description, completed, owner_id, created_at, updated_at FROM tasks' +
          ' WHERE owner_id = $1 AND completed = $2' +
          ' ORDER BY title ASC, seq ASC LIMIT $3 OFFSET $4',
        values: ['u1', true, 20, 40],
      });
    });

    it('should sort newest first by default', () => {
      const query = buildTaskListQuery({
        scope: { kind: 'all' },
        filters: {},
        sort: DEFAULT_SORT,
        page: { page: 1, pageSize: 10 },
      });

      expect(query.text).toBe(
        'SELECT id, title, description, completed, owner_id, created_at, updated_at FROM tasks' +
          ' ORDER BY created_at DESC, seq ASC LIMIT $1 OFFSET $2'
      );
      expect(query.values).toEqual([10, 0]);
    });
  });
});
