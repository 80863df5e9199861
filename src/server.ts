/**
 * HTTP server lifecycle for the todo API.
 * @module server
 */

import type { Server } from "node:http";
import type { Express } from "express";
import { getDefaultConfig } from "./config.js";
import { createApp } from "./http/app.js";
import { getLogger } from "./logging/logger.js";
import { TodoService } from "./service.js";
import type { TodoApiConfig } from "./types.js";

const logger = getLogger("server");

/**
 * Options for TodoServer.
 */
export interface TodoServerOptions {
  /** Full configuration (default: getDefaultConfig()) */
  config?: TodoApiConfig;
  /** Service to expose (default: a new service with an empty store) */
  service?: TodoService;
}

/**
 * TodoServer owns the express app and the listening socket.
 *
 * @example
 * ```typescript
 * const server = new TodoServer({ config: await loadConfig() });
 * await server.start();
 * console.log(server.getUrl());
 * await server.stop();
 * ```
 */
export class TodoServer {
  private readonly config: TodoApiConfig;
  private readonly service: TodoService;
  private readonly app: Express;

  private httpServer: Server | null = null;

  constructor(options: TodoServerOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.service =
      options.service ??
      new TodoService({ validation: this.config.validation });
    this.app = createApp(this.service, {
      basePath: this.config.server.basePath,
      cors: this.config.cors,
    });
  }

  /**
   * Start listening on the configured host and port. Port 0 picks a free
   * port; read it back with getPort().
   *
   * @throws {Error} If already running or the port cannot be bound
   */
  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error("Todo server is already running");
    }

    const { host, port } = this.config.server;
    this.httpServer = await new Promise<Server>((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once("listening", () => resolve(server));
      server.once("error", reject);
    });

    logger.info(`Todo API listening at ${this.getUrl()}`, {
      basePath: this.config.server.basePath,
      corsOrigins: this.config.cors.origins,
    });
  }

  /**
   * Stop accepting connections and wait for open ones to finish.
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });

    logger.info("Todo API stopped");
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Bound port while running, configured port otherwise.
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.config.server.port;
  }

  /**
   * Root URL of the API, including the base path.
   */
  getUrl(): string {
    return `http://${this.config.server.host}:${this.getPort()}${this.config.server.basePath}`;
  }

  getService(): TodoService {
    return this.service;
  }
}
