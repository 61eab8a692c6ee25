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
 * Response consolidation: grounded generation or deterministic fallback
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IConfigService, IGenerativeModel } from '../interfaces';
import {
  AnswerContext,
  DEFAULT_SKILL_LEVEL,
  ImageSummary,
  QueryIntent,
  QueryResult,
  RankedImage,
  RESPONSE_SCHEMA_VERSION,
  ScoredChunk,
  SkillLevel,
  SourceCitation,
  StructuredResponse,
} from '../models';
import { GenerationUnavailableError, getErrorMessage, isRagError, ErrorCode } from '../errors';
import { IntentDetector } from '../services/IntentDetector';
import { SafetyClassifier } from '../services/SafetyClassifier';
import { withTimeout } from '../utils/async';
import { excerpt, normalizeSentence } from '../utils/text';
import { FallbackResponder } from './FallbackResponder';
import { ConsolidationDependencies, IResponseConsolidator } from './types';

export const CITATIONS_HEADER = '--- Sources ---';
export const OCR_EXCERPT_LENGTH = 200;
export const NO_CHUNKS_REASON = 'No chunk cleared the similarity threshold';
export const NO_GENERATOR_REASON = 'No generative model configured';

const SAFETY_SENTENCE_LIMIT = 2;

const SKILL_INSTRUCTIONS: Record<SkillLevel, string> = {
  beginner: 'Use simple, clear language. Explain technical terms and give step-by-step instructions.',
  intermediate: 'Give detailed technical information, including specifications and procedures.',
  expert: 'Focus on technical detail and advanced procedures. Assume technical knowledge.',
};

const INTENT_FOCUS: Record<QueryIntent, string | null> = {
  maintenance: 'The question is about maintenance: give the interval and what to check.',
  troubleshooting: 'The question is about a fault: list the likely causes and how to check each one.',
  specifications: 'The question asks for a specification: state exact values with their units.',
  procedure: 'The question asks for a procedure: give the steps in order.',
  safety: 'The question is about safety: start with the hazards and the precautions.',
  general: null,
};

/**
 * Prompt that restricts the model to the numbered excerpts
 */
export function buildGroundingPrompt(
  queryText: string,
  chunks: ScoredChunk[],
  skillLevel: SkillLevel = DEFAULT_SKILL_LEVEL,
  intent: QueryIntent = 'general'
): string {
  const excerpts = chunks
    .map(({ chunk }, index) => `[${index + 1}] Source: ${chunk.source} (Page ${chunk.pageNumber})\n${chunk.content.trim()}`)
    .join('\n\n---\n\n');
  const focus = INTENT_FOCUS[intent];

  return [
    'You are a technical assistant answering questions from equipment manuals.',
    'Answer only from the numbered excerpts below. If they do not contain the answer, say so.',
    'Refer to excerpts by their number, for example [1]. Repeat any safety instructions they contain.',
    SKILL_INSTRUCTIONS[skillLevel],
    ...(focus ? [focus] : []),
    '',
    'Excerpts:',
    excerpts,
    '',
    `Question: ${queryText}`,
    'Answer:',
  ].join('\n');
}

/**
 * Mean similarity of the retrieved chunks, 0 when there are none
 */
export function retrievalConfidence(chunks: ScoredChunk[]): number {
  if (chunks.length === 0) {
    return 0;
  }
  return chunks.reduce((sum, { similarity }) => sum + similarity, 0) / chunks.length;
}

/**
 * Remove repeated sentences, comparing them without case, punctuation or
 * spacing differences. The first occurrence and the line layout are kept.
 */
export function stripDuplicateSentences(text: string): string {
  const seen = new Set<string>();
  const paragraphs: string[] = [];

  for (const paragraph of text.trim().split(/\n\s*\n/)) {
    const lines: string[] = [];
    for (const line of paragraph.split('\n')) {
      const kept = line
        .trimEnd()
        .split(/(?<=[.!?])\s+/)
        .filter(sentence => {
          if (sentence.length === 0) {
            return false;
          }
          const key = normalizeSentence(sentence);
          if (key.length === 0) {
            return true;
          }
          if (seen.has(key)) {
            return false;
          }
          seen.add(key);
          return true;
        });
      if (kept.length > 0) {
        lines.push(kept.join(' '));
      }
    }
    if (lines.length > 0) {
      paragraphs.push(lines.join('\n'));
    }
  }

  return paragraphs.join('\n\n');
}

export function toCitation({ chunk, similarity }: ScoredChunk): SourceCitation {
  return {
    chunkId: chunk.id,
    source: chunk.source,
    page: chunk.pageNumber,
    similarity,
    safetyLevel: chunk.safetyLevel,
  };
}

/**
 * Delimited citation block; empty when there is nothing to cite
 */
export function buildCitationBlock(sources: SourceCitation[]): string {
  if (sources.length === 0) {
    return '';
  }

  const lines = sources.map(
    (citation, index) =>
      `[${index + 1}] ${citation.source}, page ${citation.page} (similarity ${citation.similarity.toFixed(2)})`
  );
  return [CITATIONS_HEADER, ...lines].join('\n');
}

export function summarizeImage({ image, relevance, pageCorrelated }: RankedImage): ImageSummary {
  return {
    id: image.id,
    source: image.source,
    page: image.pageNumber,
    imageType: image.imageType,
    complexityLevel: image.complexityLevel,
    ocrExcerpt: excerpt(image.ocrText, OCR_EXCERPT_LENGTH),
    ...(image.description !== undefined ? { description: image.description } : {}),
    storageReference: image.storageReference,
    relevance,
    pageCorrelated,
  };
}

interface AnswerBody {
  text: string;
  fallbackReason: string | null;
  model: string | null;
}

/**
 * Produces the same response schema on the generative and the fallback path
 */
export class ResponseConsolidator implements IResponseConsolidator {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly safetyClassifier: SafetyClassifier;
  private readonly intentDetector: IntentDetector;
  private readonly generativeModel?: IGenerativeModel;
  private readonly fallbackResponder: FallbackResponder;

  constructor(dependencies: ConsolidationDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.safetyClassifier = dependencies.safetyClassifier;
    this.intentDetector = dependencies.intentDetector;
    this.generativeModel = dependencies.generativeModel;
    this.fallbackResponder = new FallbackResponder(this.configService.getConfig().fallback.maxLength);
  }

  async consolidate(result: QueryResult, context: AnswerContext, signal?: AbortSignal): Promise<StructuredResponse> {
    const { intent, confidence: intentConfidence } = this.intentDetector.detect(result.queryText);
    const body = await this.composeBody(result, context.skillLevel, intent, signal);
    const chunks = result.chunks.map(({ chunk }) => chunk);

    let safetyLevel = this.safetyClassifier.combine(result.safetyLevel, this.safetyClassifier.classify(body.text));
    let answerText = body.text;

    const banner = this.safetyClassifier.bannerFor(safetyLevel);
    if (banner) {
      const warnings = this.safetyClassifier
        .extractSafetySentences(chunks, SAFETY_SENTENCE_LIMIT)
        .map(sentence => `• ${sentence}`);
      answerText = `${[banner, ...warnings].join('\n')}\n\n${body.text}`;
      safetyLevel = this.safetyClassifier.combine(safetyLevel, this.safetyClassifier.classify(banner));
    }

    const sources = result.chunks.map(toCitation);

    return {
      schemaVersion: RESPONSE_SCHEMA_VERSION,
      query: result.queryText,
      answerText,
      citations: buildCitationBlock(sources),
      sources,
      images: result.params.includeImages ? result.images.map(summarizeImage) : [],
      imagesOmitted: result.imageError !== undefined,
      safetyLevel,
      fallbackUsed: body.fallbackReason !== null,
      fallbackReason: body.fallbackReason,
      model: body.model,
      chunksFound: result.chunks.length,
      confidence: retrievalConfidence(result.chunks),
      intent,
      intentConfidence,
      skillLevel: context.skillLevel,
      processingTimeMs: Date.now() - context.startedAt,
    };
  }

  private async composeBody(
    result: QueryResult,
    skillLevel: SkillLevel,
    intent: QueryIntent,
    signal?: AbortSignal
  ): Promise<AnswerBody> {
    if (result.chunks.length === 0) {
      return this.fallback(result, NO_CHUNKS_REASON);
    }
    if (!this.generativeModel) {
      return this.fallback(result, NO_GENERATOR_REASON);
    }

    try {
      const prompt = buildGroundingPrompt(result.queryText, result.chunks, skillLevel, intent);
      const text = await this.generate(this.generativeModel, result, prompt, signal);
      return { text, fallbackReason: null, model: this.generativeModel.modelName };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (isRagError(error, ErrorCode.GENERATION_UNAVAILABLE) || isRagError(error, ErrorCode.TIMEOUT)) {
        this.logger.warn(`Generation failed, using fallback answer: ${error.message}`);
        return this.fallback(result, error.message);
      }
      throw error;
    }
  }

  private async generate(
    model: IGenerativeModel,
    result: QueryResult,
    prompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    const config = this.configService.getConfig();

    let generated: string;
    try {
      generated = await withTimeout(
        'Answer generation',
        config.timeouts.generationMs,
        taskSignal => model.generate(prompt, config.generation, taskSignal),
        signal
      );
    } catch (error) {
      if (signal?.aborted || isRagError(error)) {
        throw error;
      }
      throw new GenerationUnavailableError(`Generative model failed: ${getErrorMessage(error)}`, error);
    }

    const text = stripDuplicateSentences(generated);
    if (text.length === 0) {
      throw new GenerationUnavailableError('Generative model returned an empty answer');
    }

    this.logger.info(`Generated answer from ${result.chunks.length} chunks with ${model.modelName}`);
    return text;
  }

  private fallback(result: QueryResult, reason: string): AnswerBody {
    this.logger.info(`Using fallback answer: ${reason}`);
    return { text: this.fallbackResponder.compose(result.chunks), fallbackReason: reason, model: null };
  }
}
