import { describe, it, expect, beforeEach } from 'vitest';
import { CreateTaskUseCase } from '../createTask.js';
import { UpdateTaskUseCase } from '../updateTask.js';
import { DeleteTaskUseCase } from '../deleteTask.js';
import { TaskQueries } from '../queries.js';
import { InMemoryTaskRepo } from '../../../infra/memory/taskRepo.js';
import { CallerContext } from '../../../domain/auth/caller.js';
import { InvalidTaskError } from '../../../domain/tasks/errors.js';
import { NotFoundError, TASK_NOT_FOUND_MESSAGE } from '../../errors.js';

const user1: CallerContext = { userId: 'user-1', role: 'user' };
const user2: CallerContext = { userId: 'user-2', role: 'user' };
const admin: CallerContext = { userId: 'admin-1', role: 'admin' };

/** Clock that advances one minute per reading. */
function steppingClock(start = Date.UTC(2024, 0, 1)) {
  let tick = 0;
  return () => new Date(start + tick++ * 60_000);
}

describe('task use cases', () => {
  let repo: InMemoryTaskRepo;
  let create: CreateTaskUseCase;
  let update: UpdateTaskUseCase;
  let remove: DeleteTaskUseCase;
  let queries: TaskQueries;

  beforeEach(() => {
    repo = new InMemoryTaskRepo(steppingClock());
    create = new CreateTaskUseCase(repo);
    update = new UpdateTaskUseCase(repo);
    remove = new DeleteTaskUseCase(repo);
    queries = new TaskQueries(repo);
  });

  describe('CreateTaskUseCase', () => {
    it('should make the caller the owner', async () => {
      const task = await create.execute(user1, { title: 'New Test Task', description: 'New test description' });

      expect(task).toMatchObject({
        title: 'New Test Task',
        description: 'New test description',
        completed: false,
        ownerId: 'user-1',
      });
    });

    it('should reject an empty title', async () => {
      await expect(create.execute(user1, { title: '' })).rejects.toThrow(InvalidTaskError);
    });
  });

  describe('single-record access', () => {
    it('should let the owner read, update and delete', async () => {
      const task = await create.execute(user1, { title: 'Mine' });

      await expect(queries.getTask(user1, task.id)).resolves.toEqual(task);

      const updated = await update.execute(user1, task.id, { completed: true });
      expect(updated.completed).toBe(true);
      expect(updated.title).toBe('Mine');
      expect(updated.updatedAt.getTime()).toBeGreaterThan(task.updatedAt.getTime());

      await remove.execute(user1, task.id);
      await expect(repo.findById(task.id)).resolves.toBeNull();
    });

    it('should let an admin read, update and delete any task', async () => {
      const task = await create.execute(user1, { title: 'Mine' });

      await expect(queries.getTask(admin, task.id)).resolves.toEqual(task);
      await expect(update.execute(admin, task.id, { title: 'Admin Updated Title' })).resolves.toMatchObject({
        title: 'Admin Updated Title',
        ownerId: 'user-1',
      });
      await remove.execute(admin, task.id);
      await expect(repo.findById(task.id)).resolves.toBeNull();
    });

    it('should answer another user exactly as for a missing task', async () => {
      const task = await create.execute(user1, { title: 'Private' });

      const forbidden = await queries.getTask(user2, task.id).catch((e: unknown) => e);
      const missing = await queries.getTask(user2, 'no-such-task').catch((e: unknown) => e);

      expect(forbidden).toBeInstanceOf(NotFoundError);
      expect(missing).toBeInstanceOf(NotFoundError);
      expect(forbidden).toEqual(missing);
      expect(String(forbidden)).toBe(`NotFoundError: ${TASK_NOT_FOUND_MESSAGE}`);
    });

    it('should not let another user update or delete', async () => {
      const task = await create.execute(user1, { title: 'Private' });

      await expect(update.execute(user2, task.id, { completed: true })).rejects.toThrow(NotFoundError);
      await expect(remove.execute(user2, task.id)).rejects.toThrow(NotFoundError);
      await expect(repo.findById(task.id)).resolves.toEqual(task);
    });

    it('should validate changes before writing', async () => {
      const task = await create.execute(user1, { title: 'Keep' });

      await expect(update.execute(user1, task.id, { title: '  ' })).rejects.toThrow(InvalidTaskError);
      await expect(repo.findById(task.id)).resolves.toEqual(task);
    });
  });

  describe('TaskQueries', () => {
    beforeEach(async () => {
      await create.execute(user1, { title: 'User1 Task 1', description: 'Task 1 for user 1' });
      await create.execute(user1, { title: 'User1 Task 2', description: 'Task 2 for user 1', completed: true });
      await create.execute(user2, { title: 'User2 Task 1', description: 'Task 1 for user 2' });
    });

    it('should list only the caller’s own tasks', async () => {
      const page = await queries.listVisible(user1);

      expect(page.count).toBe(2);
      expect(page.results.map((t) => t.ownerId)).toEqual(['user-1', 'user-1']);
    });

    it('should list every task for an admin', async () => {
      const page = await queries.listVisible(admin);
      expect(page.results.map((t) => t.title)).toEqual(['User2 Task 1', 'User1 Task 2', 'User1 Task 1']);
    });

    it('should apply filters inside the scope', async () => {
      const page = await queries.listVisible(user2, { completed: true });
      expect(page).toEqual({ count: 0, next: null, previous: null, results: [] });
    });

    it('should search case-insensitively', async () => {
      const page = await queries.listVisible(user1, { search: 'TASK 1' });
      expect(page.results.map((t) => t.title)).toEqual(['User1 Task 2', 'User1 Task 1']);
    });

    it('should use the configured page size', async () => {
      const small = new TaskQueries(repo, 1);
      const page = await small.listVisible(admin, {}, { field: 'title', direction: 'asc' }, 2);

      expect(page).toMatchObject({ count: 3, next: 3, previous: 1 });
      expect(page.results.map((t) => t.title)).toEqual(['User1 Task 2']);
    });

    it('should compute stats over the scoped set', async () => {
      await expect(queries.stats(user1)).resolves.toEqual({
        total: 2,
        completed: 1,
        pending: 1,
        completionRate: 50,
      });
      await expect(queries.stats(admin)).resolves.toEqual({
        total: 3,
        completed: 1,
        pending: 2,
        completionRate: 33.33,
      });
    });

    it('should report zero stats for a user without tasks', async () => {
      await expect(queries.stats({ userId: 'user-3', role: 'user' })).resolves.toEqual({
        total: 0,
        completed: 0,
        pending: 0,
        completionRate: 0,
      });
    });
  });
});
