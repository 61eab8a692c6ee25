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

import { describe, expect, it } from '@jest/globals';
import { IntentDetector } from './IntentDetector';
import { loadKeywordTables } from './ConfigService';

describe('IntentDetector', () => {
  const detector = new IntentDetector(loadKeywordTables().intents);

  it('picks the intent with the most matching pattern groups', () => {
    expect(detector.detect('How do I check the oil level?')).toEqual({ intent: 'maintenance', confidence: 0.75 });
    expect(detector.detect('What is the valve clearance torque spec?')).toEqual({
      intent: 'specifications',
      confidence: 0.75,
    });
    expect(detector.detect('Is it safe to replace the chain?')).toEqual({ intent: 'safety', confidence: 0.5 });
  });

  it('breaks ties by intent order', () => {
    expect(detector.detect('Chain replacement')).toEqual({ intent: 'maintenance', confidence: 0.25 });
  });

  it('falls back to general when nothing matches', () => {
    expect(detector.detect('Hello there')).toEqual({ intent: 'general', confidence: 0 });
  });

  it('ignores intents without patterns', () => {
    const safetyOnly = new IntentDetector({ safety: ['danger'], procedure: [] });

    expect(safetyOnly.detect('DANGER zone')).toEqual({ intent: 'safety', confidence: 1 });
    expect(safetyOnly.detect('How to replace the filter')).toEqual({ intent: 'general', confidence: 0 });
  });
});
