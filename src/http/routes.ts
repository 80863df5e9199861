/**
 * REST routes for todo operations.
 * @module http/routes
 */

import { Router } from "express";
import { malformedRequestError } from "../errors.js";
import type { TodoService } from "../service.js";
import type { Todo, TodoId, TodoResponse } from "../types.js";
import {
  parseCreateTodoRequest,
  parseToggleAllRequest,
  parseUpdateTodoRequest,
} from "../validation.js";

/**
 * Strip a stored todo down to its wire shape.
 */
export function toTodoResponse(todo: Todo): TodoResponse {
  return { id: todo.id, title: todo.title, completed: todo.completed };
}

/**
 * Parse a path id. Only positive safe integers are ids.
 *
 * @throws {TodoError} MALFORMED_REQUEST
 */
export function parseTodoId(raw: string): TodoId {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw malformedRequestError(`Invalid todo id: ${raw}`);
  }
  return id;
}

/**
 * Build the /todos router. Handlers are synchronous, so anything they throw
 * reaches the error middleware.
 *
 * @param service - Service behind the routes
 * @param basePath - Mount prefix, used to build Location headers
 */
export function createTodoRouter(service: TodoService, basePath = ""): Router {
  const router = Router();

  /**
   * GET /todos - List all todos
   */
  router.get("/todos", (_req, res) => {
    const todos = service.listTodos().map(toTodoResponse);
    res.set("X-Total-Count", String(todos.length)).json(todos);
  });

  /**
   * GET /todos/count/active - Number of todos not completed
   */
  router.get("/todos/count/active", (_req, res) => {
    res.set("X-Count-Type", "active").json(service.countActive());
  });

  /**
   * GET /todos/count/total - Number of todos
   */
  router.get("/todos/count/total", (_req, res) => {
    res.set("X-Count-Type", "total").json(service.countTotal());
  });

  /**
   * GET /todos/:id - Get a single todo
   */
  router.get("/todos/:id", (req, res) => {
    const todo = service.getTodo(parseTodoId(req.params.id));
    res.json(toTodoResponse(todo));
  });

  /**
   * POST /todos - Create a todo
   */
  router.post("/todos", (req, res) => {
    const request = parseCreateTodoRequest(req.body);
    const todo = service.createTodo(request.title);
    res
      .status(201)
      .location(`${basePath}/todos/${todo.id}`)
      .json(toTodoResponse(todo));
  });

  /**
   * PUT /todos/toggle-all - Set every todo to one completed state
   */
  router.put("/todos/toggle-all", (req, res) => {
    const request = parseToggleAllRequest(req.body);
    const todos = service.toggleAll(request.completed).map(toTodoResponse);
    res.set("X-Total-Count", String(todos.length)).json(todos);
  });

  /**
   * PUT /todos/:id/toggle - Flip the completed flag
   */
  router.put("/todos/:id/toggle", (req, res) => {
    const todo = service.toggleTodo(parseTodoId(req.params.id));
    res.json(toTodoResponse(todo));
  });

  /**
   * PUT /todos/:id - Update title and/or completed
   */
  router.put("/todos/:id", (req, res) => {
    const id = parseTodoId(req.params.id);
    const todo = service.updateTodo(id, parseUpdateTodoRequest(req.body));
    res.json(toTodoResponse(todo));
  });

  /**
   * DELETE /todos/completed - Remove all completed todos
   */
  router.delete("/todos/completed", (_req, res) => {
    const removed = service.clearCompleted();
    res.set("X-Deleted-Count", String(removed)).status(204).end();
  });

  /**
   * DELETE /todos/:id - Delete a todo
   */
  router.delete("/todos/:id", (req, res) => {
    service.deleteTodo(parseTodoId(req.params.id));
    res.status(204).end();
  });

  return router;
}
