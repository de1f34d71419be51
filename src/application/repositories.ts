import { NewUser, User } from '../domain/auth/user.js';
import { TaskScope } from '../domain/tasks/accessPolicy.js';
import { NewTask, Task, TaskChanges } from '../domain/tasks/task.js';
import { Page, TaskCriteria } from '../domain/tasks/taskQuery.js';

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
}

export interface CompletionCounts {
  total: number;
  completed: number;
}

export interface TaskRepository {
  findById(id: string): Promise<Task | null>;
  create(task: NewTask): Promise<Task>;
  /** Applies the changes and bumps `updatedAt`; null when the task is gone. */
  update(id: string, changes: TaskChanges): Promise<Task | null>;
  delete(id: string): Promise<boolean>;
  /** Scope, filters, ordering and paging evaluated together by the store. */
  findPage(criteria: TaskCriteria): Promise<Page<Task>>;
  countByCompletion(scope: TaskScope): Promise<CompletionCounts>;
}
