import { CallerContext } from '../../domain/auth/caller.js';
import { AccessOperation, canAccess } from '../../domain/tasks/accessPolicy.js';
import { Task } from '../../domain/tasks/task.js';
import { NotFoundError, TASK_NOT_FOUND_MESSAGE } from '../errors.js';
import { TaskRepository } from '../repositories.js';

/**
 * Load a task the caller may act on. A task the caller cannot access is
 * reported exactly like a missing one.
 */
export async function loadAccessibleTask(
  tasks: Pick<TaskRepository, 'findById'>,
  caller: CallerContext,
  taskId: string,
  operation: AccessOperation
): Promise<Task> {
  const task = await tasks.findById(taskId);
  if (!task || !canAccess(caller, task.ownerId, operation)) {
    throw new NotFoundError(TASK_NOT_FOUND_MESSAGE);
  }
  return task;
}
