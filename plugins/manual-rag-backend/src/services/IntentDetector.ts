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
 * Pattern-based question intent detection
 *
 * @packageDocumentation
 */

import { IntentMatch, KeywordTables, QUERY_INTENTS, QueryIntent } from '../models';

/**
 * Scores each intent by how many of its pattern groups occur in the
 * lower-cased query. The highest score wins; ties go to the earlier intent
 * in QUERY_INTENTS. A query matching nothing is `general`.
 */
export class IntentDetector {
  private readonly groups: Array<{ intent: QueryIntent; patterns: RegExp[] }>;

  constructor(tables: KeywordTables['intents']) {
    this.groups = QUERY_INTENTS.map(intent => ({
      intent,
      patterns: (tables[intent] ?? []).map(pattern => new RegExp(pattern)),
    })).filter(group => group.patterns.length > 0);
  }

  detect(queryText: string): IntentMatch {
    const lower = queryText.toLowerCase();
    let best: IntentMatch = { intent: 'general', confidence: 0 };
    let bestScore = 0;

    for (const { intent, patterns } of this.groups) {
      const score = patterns.filter(pattern => pattern.test(lower)).length;
      if (score > bestScore) {
        bestScore = score;
        best = { intent, confidence: score / patterns.length };
      }
    }

    return best;
  }
}
