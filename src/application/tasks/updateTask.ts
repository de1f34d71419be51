import { CallerContext } from '../../domain/auth/caller.js';
import { Task, TaskChanges, normalizeChanges } from '../../domain/tasks/task.js';
import { NotFoundError, TASK_NOT_FOUND_MESSAGE } from '../errors.js';
import { TaskRepository } from '../repositories.js';
import { loadAccessibleTask } from './access.js';

export class UpdateTaskUseCase {
  constructor(private tasks: TaskRepository) {}

  async execute(caller: CallerContext, taskId: string, changes: TaskChanges): Promise<Task> {
    await loadAccessibleTask(this.tasks, caller, taskId, 'write');

    const updated = await this.tasks.update(taskId, normalizeChanges(changes));
    if (!updated) {
      // Deleted between the read and the write
      throw new NotFoundError(TASK_NOT_FOUND_MESSAGE);
    }
    return updated;
  }
}
