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

import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import { once } from 'events';
import * as fs from 'fs';
import { Server } from 'http';
import fetch from 'node-fetch';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG_PATH, startServer } from './server';
import { ConfigService } from './services';

describe('startServer', () => {
  let directory: string;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'manual-rag-'));
    const configPath = path.join(directory, 'app-config.yaml');
    fs.writeFileSync(
      configPath,
      ['manualRag:', '  logging:', '    level: error', '  store:', '    type: memory', '  cache:', '    type: memory'].join(
        '\n'
      )
    );

    server = await startServer({ configPath, port: 0 });
    if (!server.listening) {
      await once(server, 'listening');
    }
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api/manual-rag`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('loads the bundled configuration', () => {
    const config = ConfigService.fromFile(DEFAULT_CONFIG_PATH).getConfig();

    expect(config.store.type).toBe('memory');
    expect(config.retrieval).toMatchObject({ topK: 3, similarityThreshold: 0.6 });
  });

  it('serves the API under /api/manual-rag', async () => {
    const response = await fetch(`${baseUrl}/stats`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      chunks: { totalChunks: 0, embeddedChunks: 0, coverage: 0, sources: 0 },
      images: { totalImages: 0, byType: {}, byComplexity: { 1: 0, 2: 0, 3: 0 } },
      cachedResponses: 0,
    });
  });
});
