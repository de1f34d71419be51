import { CallerContext } from '../../domain/auth/caller.js';
import { Task, newTask } from '../../domain/tasks/task.js';
import { TaskRepository } from '../repositories.js';

export interface CreateTaskCommand {
  title: string;
  description?: string | null;
  completed?: boolean;
}

export class CreateTaskUseCase {
  constructor(private tasks: TaskRepository) {}

  /**
   * The owner is always the caller; clients cannot supply it.
   */
  async execute(caller: CallerContext, command: CreateTaskCommand): Promise<Task> {
    return this.tasks.create(newTask(caller.userId, command));
  }
}
