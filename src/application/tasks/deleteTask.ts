import { CallerContext } from '../../domain/auth/caller.js';
import { NotFoundError, TASK_NOT_FOUND_MESSAGE } from '../errors.js';
import { TaskRepository } from '../repositories.js';
import { loadAccessibleTask } from './access.js';

export class DeleteTaskUseCase {
  constructor(private tasks: TaskRepository) {}

  async execute(caller: CallerContext, taskId: string): Promise<void> {
    await loadAccessibleTask(this.tasks, caller, taskId, 'write');

    const deleted = await this.tasks.delete(taskId);
    if (!deleted) {
      throw new NotFoundError(TASK_NOT_FOUND_MESSAGE);
    }
  }
}
