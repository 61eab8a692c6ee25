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

import { describe, expect, it, jest } from '@jest/globals';
import { TimeoutError } from '../errors';
import { untilAborted } from '../testUtils';
import { throwIfAborted, withTimeout } from './async';

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout('Lookup', 1000, async () => 42)).resolves.toBe(42);
  });

  it('rejects with TimeoutError and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;

    const result = withTimeout('Lookup', 10, signal => {
      taskSignal = signal;
      return untilAborted<number>(signal);
    });

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('Lookup timed out after 10ms');
    expect(taskSignal?.aborted).toBe(true);
  });

  it('rejects with the caller abort reason', async () => {
    const controller = new AbortController();
    const reason = new Error('request cancelled');

    const result = withTimeout('Lookup', 1000, signal => untilAborted<number>(signal), controller.signal);
    controller.abort(reason);

    await expect(result).rejects.toBe(reason);
  });

  it('does not start the task when already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    const task = jest.fn(async () => 1);

    await expect(withTimeout('Lookup', 1000, task, controller.signal)).rejects.toThrow('gone');
    expect(task).not.toHaveBeenCalled();
  });

  it('propagates task failures unchanged', async () => {
    const failure = new Error('provider failed');

    await expect(
      withTimeout('Lookup', 1000, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });
});

describe('throwIfAborted', () => {
  it('does nothing without a signal or when not aborted', () => {
    expect(() => throwIfAborted()).not.toThrow();
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
  });
});
