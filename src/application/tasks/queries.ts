import { CallerContext } from '../../domain/auth/caller.js';
import { visibleScope } from '../../domain/tasks/accessPolicy.js';
import { TaskStats, computeStats } from '../../domain/tasks/stats.js';
import { Task } from '../../domain/tasks/task.js';
import { DEFAULT_SORT, Page, TaskFilters, TaskSort } from '../../domain/tasks/taskQuery.js';
import { TaskRepository } from '../repositories.js';
import { loadAccessibleTask } from './access.js';

export const DEFAULT_PAGE_SIZE = 20;

/**
 * Read side for tasks. Collection reads are always limited to the caller's
 * scope before filters, sorting and paging.
 */
export class TaskQueries {
  constructor(
    private tasks: TaskRepository,
    private pageSize: number = DEFAULT_PAGE_SIZE
  ) {}

  async getTask(caller: CallerContext, taskId: string): Promise<Task> {
    return loadAccessibleTask(this.tasks, caller, taskId, 'read');
  }

  async listVisible(
    caller: CallerContext,
    filters: TaskFilters = {},
    sort: TaskSort = DEFAULT_SORT,
    page: number = 1
  ): Promise<Page<Task>> {
    return this.tasks.findPage({
      scope: visibleScope(caller),
      filters,
      sort,
      page: { page, pageSize: this.pageSize },
    });
  }

  async stats(caller: CallerContext): Promise<TaskStats> {
    const { total, completed } = await this.tasks.countByCompletion(visibleScope(caller));
    return computeStats(total, completed);
  }
}
