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
 * Lexical relevance ranking of images against a query
 *
 * @packageDocumentation
 */

import { ImageRecord, ImageTieBreak, PageRef, RankedImage } from '../models';
import { tokenize } from '../utils/text';

export interface ImageRankerOptions {
  tieBreak: ImageTieBreak;
  pageMatchBoost: number;
  stopWords: string[];
}

const MIN_TERM_LENGTH = 3;

export const pageKey = (source: string, pageNumber: number): string => `${source}#${pageNumber}`;

/**
 * Ranks images by the number of distinct query terms found in their OCR
 * text, description and type, plus a boost when the image sits on a page
 * the text results came from. Images are indexed by extracted text only;
 * there is no image embedding.
 */
export class ImageRanker {
  private readonly stopWords: Set<string>;

  constructor(private readonly options: ImageRankerOptions) {
    this.stopWords = new Set(options.stopWords);
  }

  get tieBreak(): ImageTieBreak {
    return this.options.tieBreak;
  }

  get pageMatchBoost(): number {
    return this.options.pageMatchBoost;
  }

  /**
   * Distinct, meaningful query terms in query order
   */
  queryTerms(queryText: string): string[] {
    const terms = tokenize(queryText).filter(
      term => term.length >= MIN_TERM_LENGTH && !this.stopWords.has(term)
    );
    return Array.from(new Set(terms));
  }

  /**
   * Rank candidates given in insertion order; images with no relevance are dropped
   */
  rank(
    candidates: ImageRecord[],
    queryText: string,
    maxImages: number,
    correlatedPages: PageRef[] = []
  ): RankedImage[] {
    if (maxImages <= 0) {
      return [];
    }

    const terms = this.queryTerms(queryText);
    const pages = new Set(correlatedPages.map(page => pageKey(page.source, page.pageNumber)));

    const ranked = candidates
      .map((image, position) => {
        const matchedTerms = this.matchTerms(image, terms);
        const pageCorrelated = pages.has(pageKey(image.source, image.pageNumber));
        const relevance = matchedTerms.length + (pageCorrelated ? this.options.pageMatchBoost : 0);
        return { ranked: { image, relevance, matchedTerms, pageCorrelated }, position };
      })
      .filter(entry => entry.ranked.relevance > 0);

    ranked.sort((a, b) => {
      if (a.ranked.relevance !== b.ranked.relevance) {
        return b.ranked.relevance - a.ranked.relevance;
      }
      const tieBreak = this.compareComplexity(a.ranked.image, b.ranked.image);
      return tieBreak !== 0 ? tieBreak : a.position - b.position;
    });

    return ranked.slice(0, maxImages).map(entry => entry.ranked);
  }

  private matchTerms(image: ImageRecord, terms: string[]): string[] {
    const text = `${image.ocrText} ${image.description ?? ''} ${image.imageType.replace(/_/g, ' ')}`;
    const tokens = new Set(tokenize(text));

    return terms.filter(term => {
      if (tokens.has(term)) {
        return true;
      }
      // plural and inflected forms: "brake" matches "brakes"
      for (const token of tokens) {
        if (token.startsWith(term)) {
          return true;
        }
      }
      return false;
    });
  }

  private compareComplexity(a: ImageRecord, b: ImageRecord): number {
    switch (this.options.tieBreak) {
      case 'complexity-asc':
        return a.complexityLevel - b.complexityLevel;
      case 'complexity-desc':
        return b.complexityLevel - a.complexityLevel;
      default:
        return 0;
    }
  }
}
