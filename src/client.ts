/**
 * TodoClient - TypeScript client for the todo REST API.
 * @module client
 */

import { z } from "zod";
import {
  TodoError,
  createErrorFromNetworkFailure,
  createErrorFromResponse,
} from "./errors.js";
import { withRetry } from "./retry.js";
import type {
  TodoClientOptions,
  TodoId,
  TodoResponse,
  TodoStats,
  UpdateTodoRequest,
} from "./types.js";

const DEFAULT_TIMEOUT = 10_000;
const DEFAULT_MAX_ATTEMPTS = 3;

const todoResponseSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  completed: z.boolean(),
});

const todoListSchema = z.array(todoResponseSchema);

const countSchema = z.number().int().nonnegative();

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * TodoClient talks to a running todomvc-api server.
 *
 * Reads retry on network failures and 5xx responses. Writes are sent once.
 *
 * @example
 * ```typescript
 * const client = new TodoClient({ port: 8080 });
 *
 * const todo = await client.create("Write release notes");
 * await client.toggle(todo.id);
 *
 * const removed = await client.clearCompleted();
 * console.log(`${removed} removed, ${await client.countActive()} left`);
 * ```
 */
export class TodoClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxAttempts: number;

  constructor(options: TodoClientOptions = {}) {
    if (options.baseUrl !== undefined) {
      this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    } else {
      const host = options.host ?? "localhost";
      const port = options.port ?? 8080;
      this.baseUrl = `http://${host}:${port}${options.basePath ?? ""}`;
    }
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  /** API root every path is appended to */
  get url(): string {
    return this.baseUrl;
  }

  // ============================================
  // Reads
  // ============================================

  /**
   * All todos in creation order.
   */
  async list(): Promise<TodoResponse[]> {
    return this.read("/todos", todoListSchema);
  }

  /**
   * @throws {TodoError} NOT_FOUND if no todo has this id
   */
  async get(id: TodoId): Promise<TodoResponse> {
    return this.read(`/todos/${id}`, todoResponseSchema);
  }

  async countActive(): Promise<number> {
    return this.read("/todos/count/active", countSchema);
  }

  async countTotal(): Promise<number> {
    return this.read("/todos/count/total", countSchema);
  }

  /**
   * Counts derived from a single listing, so they agree with each other.
   */
  async stats(): Promise<TodoStats> {
    const todos = await this.list();
    const completed = todos.filter((t) => t.completed).length;
    return {
      total: todos.length,
      active: todos.length - completed,
      completed,
    };
  }

  // ============================================
  // Writes
  // ============================================

  /**
   * Create a todo. The server trims and validates the title.
   *
   * @throws {TodoError} BLANK_TITLE, TITLE_TOO_LONG or UNSAFE_CONTENT
   */
  async create(title: string): Promise<TodoResponse> {
    return this.json("POST", "/todos", todoResponseSchema, { title });
  }

  /**
   * Change the title and/or completed flag. Omitted fields keep their value.
   */
  async update(id: TodoId, changes: UpdateTodoRequest): Promise<TodoResponse> {
    return this.json("PUT", `/todos/${id}`, todoResponseSchema, changes);
  }

  async toggle(id: TodoId): Promise<TodoResponse> {
    return this.json("PUT", `/todos/${id}/toggle`, todoResponseSchema);
  }

  /**
   * Set every todo to the same completed state.
   */
  async toggleAll(completed: boolean): Promise<TodoResponse[]> {
    return this.json("PUT", "/todos/toggle-all", todoListSchema, { completed });
  }

  async remove(id: TodoId): Promise<void> {
    await this.send("DELETE", `/todos/${id}`);
  }

  /**
   * Remove all completed todos.
   *
   * @returns Number of todos removed
   */
  async clearCompleted(): Promise<number> {
    const response = await this.send("DELETE", "/todos/completed");
    const header = Number(response.headers.get("X-Deleted-Count"));
    return Number.isSafeInteger(header) && header >= 0 ? header : 0;
  }

  // ============================================
  // Transport
  // ============================================

  private async read<T>(path: string, schema: ResponseSchema<T>): Promise<T> {
    return withRetry(() => this.json("GET", path, schema), {
      maxAttempts: this.maxAttempts,
    });
  }

  private async json<T>(
    method: string,
    path: string,
    schema: ResponseSchema<T>,
    body?: unknown,
  ): Promise<T> {
    const response = await this.send(method, path, body);
    const result = schema.safeParse(await this.safeParseJson(response));
    if (!result.success) {
      throw new TodoError(
        `Unexpected response from ${method} ${path}`,
        "UNEXPECTED",
        { statusCode: response.status, cause: result.error },
      );
    }
    return result.data;
  }

  /**
   * Make an HTTP request. Every failure comes out as a TodoError.
   * @internal
   */
  private async send(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<Response> {
    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      signal: AbortSignal.timeout(this.timeout),
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, init);
    } catch (error) {
      throw createErrorFromNetworkFailure(
        error instanceof Error ? error : new Error(String(error)),
      );
    }

    if (!response.ok) {
      throw createErrorFromResponse(response, await this.safeParseJson(response));
    }
    return response;
  }

  /**
   * Parse JSON from a response, returning undefined on failure.
   * @internal
   */
  private async safeParseJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      return undefined;
    }
  }
}
