import { randomUUID } from 'crypto';
import { TaskScope, inScope } from '../../domain/tasks/accessPolicy.js';
import { NewTask, Task, TaskChanges, applyChanges } from '../../domain/tasks/task.js';
import { Page, TaskCriteria, selectTasks } from '../../domain/tasks/taskQuery.js';
import { CompletionCounts, TaskRepository } from '../../application/repositories.js';

/**
 * Process-local task store. Tasks are kept in insertion order, which the
 * stable sort in `selectTasks` uses as the tie-breaker.
 */
export class InMemoryTaskRepo implements TaskRepository {
  private tasks: Task[] = [];

  constructor(private now: () => Date = () => new Date()) {}

  async findById(id: string): Promise<Task | null> {
    return this.tasks.find((task) => task.id === id) ?? null;
  }

  async create(newTask: NewTask): Promise<Task> {
    const now = this.now();
    const task: Task = { id: randomUUID(), ...newTask, createdAt: now, updatedAt: now };
    this.tasks.push(task);
    return task;
  }

  async update(id: string, changes: TaskChanges): Promise<Task | null> {
    const index = this.tasks.findIndex((task) => task.id === id);
    if (index === -1) {
      return null;
    }
    const updated = applyChanges(this.tasks[index], changes, this.now());
    this.tasks[index] = updated;
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((task) => task.id !== id);
    return this.tasks.length < before;
  }

  async findPage(criteria: TaskCriteria): Promise<Page<Task>> {
    return selectTasks(this.tasks, criteria);
  }

  async countByCompletion(scope: TaskScope): Promise<CompletionCounts> {
    const scoped = this.tasks.filter((task) => inScope(scope, task.ownerId));
    return {
      total: scoped.length,
      completed: scoped.filter((task) => task.completed).length,
    };
  }
}
