import { Task } from './task.js';
import { TaskScope, inScope } from './accessPolicy.js';

export const SORT_FIELDS = ['createdAt', 'updatedAt', 'title'] as const;

export type SortField = (typeof SORT_FIELDS)[number];
export type SortDirection = 'asc' | 'desc';

export interface TaskSort {
  field: SortField;
  direction: SortDirection;
}

export const DEFAULT_SORT: TaskSort = { field: 'createdAt', direction: 'desc' };

/**
 * Filters narrow the caller's scope; they are AND-composed.
 * Date bounds are inclusive.
 */
export interface TaskFilters {
  completed?: boolean;
  title?: string;
  search?: string;
  createdFrom?: Date;
  createdTo?: Date;
}

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface TaskCriteria {
  scope: TaskScope;
  filters: TaskFilters;
  sort: TaskSort;
  page: PageRequest;
}

export interface Page<T> {
  count: number;
  next: number | null;
  previous: number | null;
  results: T[];
}

/**
 * Parse an `ordering` value such as `title` or `-updatedAt`.
 * Returns null for unknown fields.
 */
export function parseOrdering(ordering: string): TaskSort | null {
  const descending = ordering.startsWith('-');
  const field = descending ? ordering.slice(1) : ordering;
  const known = SORT_FIELDS.find((candidate) => candidate === field);
  if (!known) {
    return null;
  }
  return { field: known, direction: descending ? 'desc' : 'asc' };
}

export function searchTerms(search: string): string[] {
  return search
    .split(/\s+/)
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0);
}

export function matchesFilters(task: Task, filters: TaskFilters): boolean {
  if (filters.completed !== undefined && task.completed !== filters.completed) {
    return false;
  }
  if (filters.title !== undefined && !task.title.toLowerCase().includes(filters.title.toLowerCase())) {
    return false;
  }
  if (filters.search !== undefined) {
    const title = task.title.toLowerCase();
    const description = (task.description ?? '').toLowerCase();
    const allTermsMatch = searchTerms(filters.search).every(
      (term) => title.includes(term) || description.includes(term)
    );
    if (!allTermsMatch) {
      return false;
    }
  }
  if (filters.createdFrom && task.createdAt.getTime() < filters.createdFrom.getTime()) {
    return false;
  }
  if (filters.createdTo && task.createdAt.getTime() > filters.createdTo.getTime()) {
    return false;
  }
  return true;
}

function compareBy(field: SortField, a: Task, b: Task): number {
  switch (field) {
    case 'title':
      return a.title < b.title ? -1 : a.title > b.title ? 1 : 0;
    case 'updatedAt':
      return a.updatedAt.getTime() - b.updatedAt.getTime();
    case 'createdAt':
      return a.createdAt.getTime() - b.createdAt.getTime();
  }
}

export function offsetOf(page: PageRequest): number {
  return (page.page - 1) * page.pageSize;
}

export function toPage<T>(page: PageRequest, count: number, results: T[]): Page<T> {
  return {
    count,
    next: page.page * page.pageSize < count ? page.page + 1 : null,
    previous: page.page > 1 ? page.page - 1 : null,
    results,
  };
}

/**
 * Evaluate criteria against tasks held in insertion order. Scope is applied
 * before filters; the sort is stable so ties keep insertion order.
 */
export function selectTasks(tasks: readonly Task[], criteria: TaskCriteria): Page<Task> {
  const { field, direction } = criteria.sort;
  const sign = direction === 'asc' ? 1 : -1;

  const matching = tasks
    .filter((task) => inScope(criteria.scope, task.ownerId))
    .filter((task) => matchesFilters(task, criteria.filters))
    .sort((a, b) => sign * compareBy(field, a, b));

  const offset = offsetOf(criteria.page);
  return toPage(criteria.page, matching.length, matching.slice(offset, offset + criteria.page.pageSize));
}
