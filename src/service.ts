/**
 * TodoService - the single entry point to todo storage.
 * @module service
 */

import { notFoundError } from "./errors.js";
import { getLogger } from "./logging/logger.js";
import { InMemoryTodoStore, type TodoStore } from "./storage/todo-store.js";
import { validateTitle, type TitleValidationOptions } from "./validation.js";
import type { Todo, TodoChanges, TodoId, TodoStats } from "./types.js";

const logger = getLogger("service");

/**
 * Options for TodoService.
 */
export interface TodoServiceOptions {
  /** Backing store (default: a fresh InMemoryTodoStore) */
  store?: TodoStore;
  /** Title rules */
  validation?: TitleValidationOptions;
}

/**
 * TodoService validates input, calls the store and turns missing ids into
 * NOT_FOUND errors. It never retries: every failure here is final.
 *
 * @example
 * ```typescript
 * const service = new TodoService();
 * const todo = service.createTodo("  Learn Angular ");
 * service.toggleTodo(todo.id);
 * service.clearCompleted(); // 1
 * ```
 */
export class TodoService {
  private readonly store: TodoStore;
  private readonly validation: TitleValidationOptions;

  constructor(options: TodoServiceOptions = {}) {
    this.store = options.store ?? new InMemoryTodoStore();
    this.validation = options.validation ?? {};
  }

  /**
   * Create a todo.
   *
   * @throws {TodoError} On an invalid title; nothing is stored
   */
  createTodo(title: string): Todo {
    const cleaned = validateTitle(title, this.validation);
    const todo = this.store.add(cleaned);
    logger.debug("Created todo", { id: todo.id });
    return todo;
  }

  /**
   * All todos in insertion order.
   */
  listTodos(): Todo[] {
    return this.store.getAll();
  }

  /**
   * @throws {TodoError} NOT_FOUND
   */
  getTodo(id: TodoId): Todo {
    const todo = this.store.getById(id);
    if (!todo) {
      throw notFoundError(id);
    }
    return todo;
  }

  /**
   * Apply a partial update. The title, when given, is validated before the
   * lookup, so an invalid title is reported even for an unknown id.
   *
   * @throws {TodoError} On an invalid title or NOT_FOUND
   */
  updateTodo(id: TodoId, changes: TodoChanges): Todo {
    const validated: TodoChanges = {};
    if (changes.title !== undefined) {
      validated.title = validateTitle(changes.title, this.validation);
    }
    if (changes.completed !== undefined) {
      validated.completed = changes.completed;
    }

    const todo = this.store.update(id, validated);
    if (!todo) {
      throw notFoundError(id);
    }
    logger.debug("Updated todo", { id, fields: Object.keys(validated) });
    return todo;
  }

  /**
   * Flip the completed flag.
   *
   * @throws {TodoError} NOT_FOUND
   */
  toggleTodo(id: TodoId): Todo {
    const current = this.getTodo(id);
    const todo = this.store.update(id, { completed: !current.completed });
    if (!todo) {
      throw notFoundError(id);
    }
    logger.debug("Toggled todo", { id, completed: todo.completed });
    return todo;
  }

  /**
   * Set every todo to the same completed state.
   *
   * @returns All todos after the change
   */
  toggleAll(completed: boolean): Todo[] {
    const changed = this.store.setAllCompleted(completed);
    logger.debug("Toggled all todos", { completed, changed });
    return this.store.getAll();
  }

  /**
   * @throws {TodoError} NOT_FOUND
   */
  deleteTodo(id: TodoId): void {
    if (!this.store.remove(id)) {
      throw notFoundError(id);
    }
    logger.debug("Deleted todo", { id });
  }

  /**
   * Remove every completed todo.
   *
   * @returns Number removed
   */
  clearCompleted(): number {
    const removed = this.store.removeWhere((todo) => todo.completed);
    logger.debug("Cleared completed todos", { removed });
    return removed;
  }

  countActive(): number {
    return this.store.countActive();
  }

  countTotal(): number {
    return this.store.countTotal();
  }

  getStats(): TodoStats {
    const total = this.store.countTotal();
    const active = this.store.countActive();
    return { total, active, completed: total - active };
  }
}
