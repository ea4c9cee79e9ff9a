/**
 * HTTP server exposing the component library and script generation
 */

import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import type { PipesmithServerConfig, ServerDeps } from './types.js';

export class PipesmithServer {
  private app: FastifyInstance | null = null;

  constructor(
    private readonly config: PipesmithServerConfig,
    private readonly deps: ServerDeps
  ) {}

  /**
   * Build the app and start listening
   */
  async start(): Promise<void> {
    if (this.app) return;
    const app = await buildApp({ ...this.deps, corsOrigin: this.config.corsOrigin });
    try {
      await app.listen({ port: this.config.port, host: this.config.host });
    } catch (error) {
      await app.close();
      throw error;
    }
    this.app = app;
  }

  getServerInfo(): { port: number; host: string; running: boolean } {
    return {
      port: this.config.port,
      host: this.config.host,
      running: this.app !== null,
    };
  }

  /**
   * Stop the HTTP server
   */
  async stop(): Promise<void> {
    if (this.app) {
      await this.app.close();
      this.app = null;
    }
  }
}
