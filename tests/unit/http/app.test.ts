/**
 * Tests for the express app: routes, status codes, headers and error bodies.
 * @module tests/unit/http/app
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { isErrorResponse } from "../../../src/errors.js";
import { createApp } from "../../../src/http/app.js";
import { TodoService } from "../../../src/service.js";
import type { ErrorResponse } from "../../../src/types.js";
import {
  listen,
  readTodo,
  sendJson,
  type RunningApp,
} from "../../helpers/http.js";

const CORS = {
  origins: ["http://localhost:4200"],
  credentials: true,
  maxAge: 3600,
};

async function readError(response: Response): Promise<ErrorResponse> {
  const body: unknown = await response.json();
  if (!isErrorResponse(body)) {
    throw new Error(`expected an error body, got ${JSON.stringify(body)}`);
  }
  return body;
}

describe("todo HTTP API", () => {
  let service: TodoService;
  let running: RunningApp;
  let url: string;

  beforeEach(async () => {
    service = new TodoService();
    running = await listen(createApp(service, { cors: CORS }));
    url = running.baseUrl;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await running.close();
  });

  async function create(title: string): Promise<number> {
    const response = await sendJson(`${url}/todos`, "POST", { title });
    return (await readTodo(response)).id;
  }

  describe("POST /todos", () => {
    it("should create a todo and return 201", async () => {
      const response = await sendJson(`${url}/todos`, "POST", {
        title: "Learn Angular",
      });

      expect(response.status).toBe(201);
      expect(response.headers.get("Location")).toBe("/todos/1");
      expect(await response.json()).toEqual({
        id: 1,
        title: "Learn Angular",
        completed: false,
      });
    });

    it("should trim the title", async () => {
      const response = await sendJson(`${url}/todos`, "POST", {
        title: "  Walk the dog  ",
      });

      expect((await readTodo(response)).title).toBe("Walk the dog");
    });

    it("should reject a blank title with a NotBlank field error", async () => {
      const response = await sendJson(`${url}/todos`, "POST", { title: "" });

      expect(response.status).toBe(400);
      expect(response.headers.get("X-Error-Type")).toBe("VALIDATION_ERROR");
      expect(response.headers.get("X-Validation-Error-Count")).toBe("1");

      const body = await readError(response);
      expect(body.message).toBe("Validation failed");
      expect(body.details).toBe("title: Title cannot be blank");
      expect(body.status).toBe(400);
      expect(body.path).toBe("/todos");
      expect(body.correlationId).toBe(response.headers.get("X-Request-ID"));
      expect(body.validationErrors).toEqual([
        {
          field: "title",
          rejectedValue: "",
          message: "Title cannot be blank",
          code: "NotBlank",
        },
      ]);
      expect(service.countTotal()).toBe(0);
    });

    it("should reject a title longer than 500 characters", async () => {
      const response = await sendJson(`${url}/todos`, "POST", {
        title: "x".repeat(501),
      });

      const body = await readError(response);
      expect(response.status).toBe(400);
      expect(body.validationErrors?.[0]?.code).toBe("Size");
    });

    it("should treat a missing title as blank", async () => {
      const response = await sendJson(`${url}/todos`, "POST", {});

      const body = await readError(response);
      expect(body.validationErrors?.[0]).toEqual({
        field: "title",
        rejectedValue: null,
        message: "Title cannot be blank",
        code: "NotBlank",
      });
    });

    it("should report malformed JSON", async () => {
      const response = await sendJson(`${url}/todos`, "POST", undefined, {
        raw: '{"title": ',
      });

      expect(response.status).toBe(400);
      expect(response.headers.get("X-Error-Type")).toBe("MALFORMED_REQUEST");
      const body = await readError(response);
      expect(body.message).toBe("Malformed JSON request body");
      expect(body.details).toBe("The request could not be parsed");
      expect(body.validationErrors).toBeNull();
    });

    it("should refuse bodies over 100kb", async () => {
      const response = await sendJson(`${url}/todos`, "POST", {
        title: "x".repeat(200_000),
      });

      expect(response.status).toBe(413);
      expect(response.headers.get("X-Error-Type")).toBe("MALFORMED_REQUEST");
      const body = await readError(response);
      expect(body.message).toBe("request entity too large");
      expect(service.countTotal()).toBe(0);
    });

    it("should give 50 concurrent creates distinct ids", async () => {
      const ids = await Promise.all(
        Array.from({ length: 50 }, (_, i) => create(`Todo ${i}`)),
      );

      expect(new Set(ids).size).toBe(50);
      expect([...ids].sort((a, b) => a - b)).toEqual(
        Array.from({ length: 50 }, (_, i) => i + 1),
      );
    });
  });

  describe("GET /todos", () => {
    it("should list todos with a total count header", async () => {
      await create("A");
      await create("B");

      const response = await fetch(`${url}/todos`);

      expect(response.status).toBe(200);
      expect(response.headers.get("X-Total-Count")).toBe("2");
      expect(await response.json()).toEqual([
        { id: 1, title: "A", completed: false },
        { id: 2, title: "B", completed: false },
      ]);
    });

    it("should return an empty array when there are no todos", async () => {
      const response = await fetch(`${url}/todos`);

      expect(await response.json()).toEqual([]);
    });
  });

  describe("GET /todos/:id", () => {
    it("should return one todo", async () => {
      const id = await create("Single");

      const response = await fetch(`${url}/todos/${id}`);

      expect(await response.json()).toEqual({
        id,
        title: "Single",
        completed: false,
      });
    });

    it("should reject an id that is not a number", async () => {
      const response = await fetch(`${url}/todos/abc`);

      expect(response.status).toBe(400);
      expect((await readError(response)).message).toBe("Invalid todo id: abc");
    });
  });

  describe("PUT /todos/:id", () => {
    it("should update title and completed", async () => {
      const id = await create("Draft");

      const response = await sendJson(`${url}/todos/${id}`, "PUT", {
        title: "Final",
        completed: true,
      });

      expect(await response.json()).toEqual({
        id,
        title: "Final",
        completed: true,
      });
    });

    it("should reject a blank title without deleting the todo", async () => {
      const id = await create("Keep me");

      const response = await sendJson(`${url}/todos/${id}`, "PUT", {
        title: "",
      });

      expect(response.status).toBe(400);
      expect((await readError(response)).validationErrors?.[0]?.code).toBe(
        "NotBlank",
      );
      const after = await fetch(`${url}/todos/${id}`);
      expect(after.status).toBe(200);
      expect((await readTodo(after)).title).toBe("Keep me");
    });

    it("should reject a non-boolean completed", async () => {
      const id = await create("Typed");

      const response = await sendJson(`${url}/todos/${id}`, "PUT", {
        completed: "yes",
      });

      const body = await readError(response);
      expect(response.status).toBe(400);
      expect(body.validationErrors?.[0]).toMatchObject({
        field: "completed",
        code: "TypeMismatch",
      });
    });

    it("should return 404 for an unknown id", async () => {
      const response = await sendJson(`${url}/todos/999`, "PUT", {
        completed: true,
      });

      expect(response.status).toBe(404);
      expect((await readError(response)).message).toBe(
        "Todo not found with id: 999",
      );
    });
  });

  describe("PUT /todos/:id/toggle", () => {
    it("should flip completed", async () => {
      const id = await create("Learn Angular");

      const first = await fetch(`${url}/todos/${id}/toggle`, { method: "PUT" });
      const second = await fetch(`${url}/todos/${id}/toggle`, { method: "PUT" });

      expect(await first.json()).toEqual({
        id,
        title: "Learn Angular",
        completed: true,
      });
      expect((await readTodo(second)).completed).toBe(false);
    });

    it("should return 404 for an unknown id", async () => {
      const response = await fetch(`${url}/todos/42/toggle`, { method: "PUT" });

      expect(response.status).toBe(404);
    });
  });

  describe("PUT /todos/toggle-all", () => {
    it("should set every todo", async () => {
      await create("A");
      await create("B");

      const response = await sendJson(`${url}/todos/toggle-all`, "PUT", {
        completed: true,
      });

      expect(response.headers.get("X-Total-Count")).toBe("2");
      expect(await response.json()).toEqual([
        { id: 1, title: "A", completed: true },
        { id: 2, title: "B", completed: true },
      ]);
    });

    it("should require completed", async () => {
      const response = await sendJson(`${url}/todos/toggle-all`, "PUT", {});

      const body = await readError(response);
      expect(response.status).toBe(400);
      expect(body.details).toBe("completed: Completed status must be specified");
      expect(body.validationErrors?.[0]?.code).toBe("NotNull");
    });
  });

  describe("DELETE /todos/:id", () => {
    it("should delete and return 204", async () => {
      const id = await create("Bye");

      const response = await fetch(`${url}/todos/${id}`, { method: "DELETE" });

      expect(response.status).toBe(204);
      expect(await response.text()).toBe("");
      expect(service.countTotal()).toBe(0);
    });

    it("should return 404 with the error body for an unknown id", async () => {
      const response = await fetch(`${url}/todos/999`, { method: "DELETE" });

      expect(response.status).toBe(404);
      expect(response.headers.get("X-Error-Type")).toBe("ENTITY_NOT_FOUND");
      const body = await readError(response);
      expect(body.message).toBe("Todo not found with id: 999");
      expect(body.details).toBe("The requested todo does not exist");
      expect(body.status).toBe(404);
      expect(body.path).toBe("/todos/999");
      expect(body.validationErrors).toBeNull();
      expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    });
  });

  describe("DELETE /todos/completed", () => {
    it("should clear completed todos and keep the rest", async () => {
      const a = await create("A");
      const b = await create("B");
      await create("C");
      await fetch(`${url}/todos/${a}/toggle`, { method: "PUT" });
      await fetch(`${url}/todos/${b}/toggle`, { method: "PUT" });

      const response = await fetch(`${url}/todos/completed`, {
        method: "DELETE",
      });

      expect(response.status).toBe(204);
      expect(response.headers.get("X-Deleted-Count")).toBe("2");

      const list = await fetch(`${url}/todos`);
      expect(await list.json()).toEqual([
        { id: 3, title: "C", completed: false },
      ]);
      const active = await fetch(`${url}/todos/count/active`);
      expect(await active.json()).toBe(1);
    });

    it("should keep active todos in their original order", async () => {
      const ids: number[] = [];
      for (const title of ["A", "B", "C", "D", "E"]) {
        ids.push(await create(title));
      }
      await fetch(`${url}/todos/${ids[1]}/toggle`, { method: "PUT" });
      await fetch(`${url}/todos/${ids[3]}/toggle`, { method: "PUT" });

      const response = await fetch(`${url}/todos/completed`, {
        method: "DELETE",
      });

      expect(response.headers.get("X-Deleted-Count")).toBe("2");
      const list = await fetch(`${url}/todos`);
      expect(await list.json()).toEqual([
        { id: 1, title: "A", completed: false },
        { id: 3, title: "C", completed: false },
        { id: 5, title: "E", completed: false },
      ]);
    });

    it("should succeed when nothing is completed", async () => {
      await create("A");

      const response = await fetch(`${url}/todos/completed`, {
        method: "DELETE",
      });

      expect(response.status).toBe(204);
      expect(response.headers.get("X-Deleted-Count")).toBe("0");
      expect(service.countTotal()).toBe(1);
    });
  });

  describe("counts", () => {
    it("should return active and total counts as numbers", async () => {
      const a = await create("A");
      await create("B");
      await fetch(`${url}/todos/${a}/toggle`, { method: "PUT" });

      const active = await fetch(`${url}/todos/count/active`);
      const total = await fetch(`${url}/todos/count/total`);

      expect(await active.json()).toBe(1);
      expect(await total.json()).toBe(2);
      expect(active.headers.get("X-Count-Type")).toBe("active");
    });
  });

  describe("request ids", () => {
    it("should echo a well-formed X-Request-ID", async () => {
      const response = await fetch(`${url}/todos/999`, {
        method: "DELETE",
        headers: { "X-Request-ID": "test-req-1" },
      });

      expect(response.headers.get("X-Request-ID")).toBe("test-req-1");
      expect(response.headers.get("X-Correlation-ID")).toBe("test-req-1");
      expect((await readError(response)).correlationId).toBe("test-req-1");
    });

    it("should replace a malformed X-Request-ID", async () => {
      const response = await fetch(`${url}/todos`, {
        headers: { "X-Request-ID": "bad id with spaces" },
      });

      expect(response.headers.get("X-Request-ID")).not.toBe(
        "bad id with spaces",
      );
      expect(response.headers.get("X-Request-ID")).toMatch(
        /^[0-9a-f-]{36}$/,
      );
    });
  });

  describe("other routes", () => {
    it("should report health", async () => {
      await create("A");

      const response = await fetch(`${url}/health`);

      expect(await response.json()).toEqual({ status: "ok", todos: 1 });
    });

    it("should return 404 for unknown routes", async () => {
      const response = await fetch(`${url}/nope`);

      expect(response.status).toBe(404);
      expect((await readError(response)).message).toBe(
        "Route not found: GET /nope",
      );
    });

    it("should hide the cause of unexpected errors", async () => {
      vi.spyOn(service, "listTodos").mockImplementation(() => {
        throw new Error("store exploded");
      });

      const response = await fetch(`${url}/todos`);

      expect(response.status).toBe(500);
      expect(response.headers.get("X-Error-Type")).toBe("INTERNAL_ERROR");
      const body = await readError(response);
      expect(body.message).toBe("Internal server error");
      expect(body.details).toBe("An unexpected error occurred");
    });

    it("should set security headers", async () => {
      const response = await fetch(`${url}/todos`);

      expect(response.headers.get("X-Content-Type-Options")).toBe("nosniff");
      expect(response.headers.get("X-Frame-Options")).toBe("DENY");
      expect(response.headers.get("X-Powered-By")).toBeNull();
    });
  });

  describe("CORS", () => {
    it("should allow a configured origin", async () => {
      const response = await fetch(`${url}/todos`, {
        headers: { Origin: "http://localhost:4200" },
      });

      expect(response.headers.get("Access-Control-Allow-Origin")).toBe(
        "http://localhost:4200",
      );
      expect(response.headers.get("Access-Control-Allow-Credentials")).toBe(
        "true",
      );
      expect(response.headers.get("Access-Control-Expose-Headers")).toContain(
        "X-Total-Count",
      );
    });

    it("should answer preflight requests", async () => {
      const response = await fetch(`${url}/todos/1`, {
        method: "OPTIONS",
        headers: {
          Origin: "http://localhost:4200",
          "Access-Control-Request-Method": "PUT",
          "Access-Control-Request-Headers": "content-type",
        },
      });

      expect(response.status).toBe(204);
      expect(response.headers.get("Access-Control-Allow-Methods")).toBe(
        "GET, POST, PUT, DELETE, OPTIONS",
      );
      expect(response.headers.get("Access-Control-Allow-Headers")).toBe(
        "content-type",
      );
      expect(response.headers.get("Access-Control-Max-Age")).toBe("3600");
    });

    it("should not allow other origins", async () => {
      const response = await fetch(`${url}/todos`, {
        headers: { Origin: "http://evil.test" },
      });

      expect(response.status).toBe(200);
      expect(response.headers.get("Access-Control-Allow-Origin")).toBeNull();
    });
  });
});

describe("todo HTTP API with a base path", () => {
  let running: RunningApp;

  beforeEach(async () => {
    running = await listen(
      createApp(new TodoService(), { basePath: "/api" }),
    );
  });

  afterEach(async () => {
    await running.close();
  });

  it("should serve routes under the base path", async () => {
    const response = await sendJson(`${running.baseUrl}/api/todos`, "POST", {
      title: "Prefixed",
    });

    expect(response.status).toBe(201);
    expect(response.headers.get("Location")).toBe("/api/todos/1");
  });

  it("should not serve routes without the prefix", async () => {
    const response = await fetch(`${running.baseUrl}/todos`);

    expect(response.status).toBe(404);
  });
});
