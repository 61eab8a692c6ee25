/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Standalone HTTP server
 *
 * @packageDocumentation
 */

import path from 'path';
import express from 'express';
import { Server } from 'http';
import { ConfigService, createLogger } from './services';
import { buildServices, createManualRagRouter } from './router';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../config/app-config.yaml');

export interface ServerOptions {
  configPath?: string;
  port?: number;
}

/**
 * Load configuration, wire the services and listen.
 * Stores are closed when the server closes.
 */
export async function startServer(options: ServerOptions = {}): Promise<Server> {
  const configService = ConfigService.fromFile(options.configPath ?? DEFAULT_CONFIG_PATH);
  const { logging } = configService.getConfig();
  const logger = createLogger({ level: logging.level, format: logging.format });

  const services = await buildServices(configService, logger);
  const app = express();
  app.use('/api/manual-rag', createManualRagRouter({ logger, services }));

  const port = options.port ?? 7007;
  const server = app.listen(port, () => {
    logger.info(`Manual RAG backend listening on port ${port}`);
  });

  server.on('close', () => {
    services.stores.close().catch(error => {
      logger.error(`Failed to close stores: ${error}`);
    });
  });

  return server;
}

if (require.main === module) {
  startServer({
    configPath: process.env.MANUAL_RAG_CONFIG,
    port: process.env.PORT ? Number(process.env.PORT) : undefined,
  }).catch(error => {
    console.error(`Failed to start manual RAG backend: ${error}`);
    process.exit(1);
  });
}
