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
 * Logger construction
 *
 * @packageDocumentation
 */

import winston, { Logger } from 'winston';
import { ManualRagConfig } from '../models';

export interface LoggerOptions {
  level?: string;
  format?: ManualRagConfig['logging']['format'];
  silent?: boolean;
  service?: string;
}

/**
 * Create the process logger; services receive it through their dependencies
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const format =
    options.format === 'simple'
      ? winston.format.combine(winston.format.timestamp(), winston.format.simple())
      : winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json());

  return winston.createLogger({
    level: options.level ?? 'info',
    format,
    defaultMeta: { service: options.service ?? 'manual-rag' },
    transports: [new winston.transports.Console()],
    silent: options.silent ?? false,
  });
}
