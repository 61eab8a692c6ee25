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
import { ImageClassifier } from './ImageClassifier';
import { loadKeywordTables } from './ConfigService';

describe('ImageClassifier', () => {
  const classifier = new ImageClassifier(loadKeywordTables());

  it('picks the first matching image type', () => {
    expect(classifier.classifyType('Wiring diagram of the starter circuit')).toBe('technical_diagram');
    expect(classifier.classifyType('Exploded view of the parts')).toBe('parts_diagram');
    expect(classifier.classifyType('Photo of the dashboard')).toBe('photograph');
  });

  it('defaults to general', () => {
    expect(classifier.classifyType('Front view')).toBe('general');
  });

  it('rates complexity from keyword counts', () => {
    expect(classifier.assessComplexity('Wiring of the ECU', '')).toBe(3);
    expect(classifier.assessComplexity('Brake pad replacement', '')).toBe(2);
    expect(classifier.assessComplexity('Timing mark', '')).toBe(2);
    expect(classifier.assessComplexity('Dashboard lights', '')).toBe(1);
  });

  it('derives the type from OCR text when the description has no keyword', () => {
    expect(classifier.classifyType('Page 12 figure', 'Wiring schematic')).toBe('technical_diagram');
  });

  it('reads OCR text as well as the description', () => {
    expect(classifier.assessComplexity('Underside view', 'piston and crankshaft')).toBe(3);
  });
});
