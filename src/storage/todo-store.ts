/**
 * In-memory todo storage.
 * @module storage/todo-store
 */

import type { Todo, TodoChanges, TodoId } from "../types.js";

/**
 * Storage contract used by TodoService.
 *
 * Lookups of an absent id return `undefined` (or `false` for removal);
 * turning that into a not-found error is the caller's job.
 */
export interface TodoStore {
  add(title: string): Todo;
  getAll(): Todo[];
  getById(id: TodoId): Todo | undefined;
  update(id: TodoId, changes: TodoChanges): Todo | undefined;
  remove(id: TodoId): boolean;
  removeWhere(predicate: (todo: Todo) => boolean): number;
  setAllCompleted(completed: boolean): number;
  countActive(): number;
  countTotal(): number;
  clear(): void;
}

/**
 * Map-backed store. Iteration order of the map is insertion order, which is
 * the listing order.
 *
 * Every method runs to completion synchronously, so no two calls can
 * interleave on the event loop; ids come from a counter that only grows.
 *
 * @example
 * ```typescript
 * const store = new InMemoryTodoStore();
 * const todo = store.add("Learn Angular");
 * store.update(todo.id, { completed: true });
 * store.removeWhere((t) => t.completed); // 1
 * ```
 */
export class InMemoryTodoStore implements TodoStore {
  private readonly todos = new Map<TodoId, Todo>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  add(title: string): Todo {
    const timestamp = this.now().toISOString();
    const todo: Todo = {
      id: this.nextId++,
      title,
      completed: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.todos.set(todo.id, todo);
    return { ...todo };
  }

  getAll(): Todo[] {
    return Array.from(this.todos.values(), (todo) => ({ ...todo }));
  }

  getById(id: TodoId): Todo | undefined {
    const todo = this.todos.get(id);
    return todo ? { ...todo } : undefined;
  }

  update(id: TodoId, changes: TodoChanges): Todo | undefined {
    const current = this.todos.get(id);
    if (!current) return undefined;

    const updated: Todo = {
      ...current,
      ...(changes.title !== undefined ? { title: changes.title } : {}),
      ...(changes.completed !== undefined
        ? { completed: changes.completed }
        : {}),
      updatedAt: this.now().toISOString(),
    };
    this.todos.set(id, updated);
    return { ...updated };
  }

  remove(id: TodoId): boolean {
    return this.todos.delete(id);
  }

  removeWhere(predicate: (todo: Todo) => boolean): number {
    let removed = 0;
    for (const [id, todo] of this.todos) {
      if (predicate({ ...todo })) {
        this.todos.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Set every todo to the same completion state.
   *
   * @returns Number of todos whose state changed
   */
  setAllCompleted(completed: boolean): number {
    const timestamp = this.now().toISOString();
    let changed = 0;
    for (const [id, todo] of this.todos) {
      if (todo.completed !== completed) {
        this.todos.set(id, { ...todo, completed, updatedAt: timestamp });
        changed++;
      }
    }
    return changed;
  }

  countActive(): number {
    let active = 0;
    for (const todo of this.todos.values()) {
      if (!todo.completed) active++;
    }
    return active;
  }

  countTotal(): number {
    return this.todos.size;
  }

  /**
   * Drop every todo. The id counter keeps counting.
   */
  clear(): void {
    this.todos.clear();
  }
}
