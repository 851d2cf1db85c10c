/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { Dataset } from './dataset.js';
import { AlignCoreError } from './errors.js';
import type { Example } from './example.js';
import { OpType } from './op.js';

export interface MetricOptions {
	/** Compare normalized token text (the default) or raw token text. */
	normalized?: boolean;
}

/**
 * WER counts. `value` is `numEdits / refLength`, or `numEdits` itself when
 * the reference has no tokens.
 */
export interface WordErrorRate {
	numEdits: number;
	refLength: number;
	value: number;
}

/**
 * Keyword error counts. A keyword occurrence is an error unless every op
 * covering it in the alignment is a match. `value` is
 * `numErrors / numKeywords`, or `numErrors` when no keyword occurs.
 */
export interface KeywordErrorRate {
	numErrors: number;
	numKeywords: number;
	value: number;
}

/**
 * Character-level counts over the joined token texts. `value` is
 * `numEdits / refLength`, or `numEdits` when the joined reference is empty.
 */
export interface CharacterErrorRate {
	numEdits: number;
	refLength: number;
	value: number;
}

/**
 * Keyword recall: `numMatches` of `numKeywords` occurrences transcribed
 * correctly. `value` is `1 - ` the keyword error rate.
 */
export interface MedicalTermRecall {
	numMatches: number;
	numKeywords: number;
	value: number;
}

export interface RecallOptions extends MetricOptions {
	/** The vocabulary to rate. Defaults to {@link MEDICAL_TERMS_VOCAB}. */
	vocab?: string;
}

export const MEDICAL_TERMS_VOCAB = 'medical_terms';

function ratio(numerator: number, denominator: number): number {
	return denominator === 0 ? numerator : numerator / denominator;
}

export function exampleWordErrorRate(example: Example, options: MetricOptions = {}): WordErrorRate {
	const normalized = options.normalized ?? true;
	const numEdits = example.alignment({ normalized }).numEdits;
	const refLength = example.ref.tokens.length;
	return { numEdits, refLength, value: ratio(numEdits, refLength) };
}

/**
 * Keyword error rate of one example for the keywords of `vocab`. An
 * example without that vocabulary counts nothing.
 */
export function exampleKeywordErrorRate(example: Example, vocab: string, options: MetricOptions = {}): KeywordErrorRate {
	const normalized = options.normalized ?? true;
	const keywords = example.keywords.get(vocab) ?? [];
	let numErrors = 0;
	let numKeywords = 0;
	if (keywords.length === 0) {
		return { numErrors, numKeywords, value: 0 };
	}

	const alignment = example.alignment({ normalized });
	for (const keyword of keywords) {
		// Keywords are always located on normalized tokens; `normalized` only
		// picks the alignment they are checked against.
		for (const occurrence of keyword.findInRef(true)) {
			const first = occurrence.at(0);
			const last = occurrence.at(-1);
			if (first === undefined || last === undefined) continue;
			numKeywords++;
			const ops = alignment.opsFromRefIndex(first.index, last.index);
			if ([...ops].some(op => op.type !== OpType.MATCH)) {
				numErrors++;
			}
		}
	}
	return { numErrors, numKeywords, value: ratio(numErrors, numKeywords) };
}

export function wordErrorRate(dataset: Dataset, options: MetricOptions = {}): WordErrorRate {
	let numEdits = 0;
	let refLength = 0;
	for (const example of dataset) {
		const wer = exampleWordErrorRate(example, options);
		numEdits += wer.numEdits;
		refLength += wer.refLength;
	}
	return { numEdits, refLength, value: ratio(numEdits, refLength) };
}

/**
 * @throws {AlignCoreError} If no example of the dataset was given `vocab`.
 */
export function keywordErrorRate(dataset: Dataset, vocab: string, options: MetricOptions = {}): KeywordErrorRate {
	if (!dataset.vocabs.includes(vocab)) {
		throw new AlignCoreError(`[keywordErrorRate] Vocabulary '${vocab}' not found in dataset keyword vocabularies.`);
	}
	let numErrors = 0;
	let numKeywords = 0;
	for (const example of dataset) {
		const kwer = exampleKeywordErrorRate(example, vocab, options);
		numErrors += kwer.numErrors;
		numKeywords += kwer.numKeywords;
	}
	return { numErrors, numKeywords, value: ratio(numErrors, numKeywords) };
}

/**
 * Character error rate of one example: the dataset's edit script run over the
 * characters of the joined reference and hypothesis, one edit per step.
 *
 * @throws {AlignCoreError} If the example does not belong to a dataset.
 */
export function exampleCharacterErrorRate(example: Example, options: MetricOptions = {}): CharacterErrorRate {
	const normalized = options.normalized ?? true;
	const dataset = example.src;
	if (dataset === undefined) {
		throw new AlignCoreError(`[exampleCharacterErrorRate] ${example.toString()} is not part of a dataset; no edit script is available.`);
	}
	const refChars = Array.from(example.ref.joined(normalized));
	const hypChars = Array.from(example.hyp.joined(normalized));
	const numEdits = Array.from(dataset.editScript(refChars, hypChars)).length;
	const refLength = refChars.length;
	return { numEdits, refLength, value: ratio(numEdits, refLength) };
}

export function characterErrorRate(dataset: Dataset, options: MetricOptions = {}): CharacterErrorRate {
	let numEdits = 0;
	let refLength = 0;
	for (const example of dataset) {
		const cer = exampleCharacterErrorRate(example, options);
		numEdits += cer.numEdits;
		refLength += cer.refLength;
	}
	return { numEdits, refLength, value: ratio(numEdits, refLength) };
}

function recallFrom(kwer: KeywordErrorRate): MedicalTermRecall {
	return {
		numMatches: kwer.numKeywords - kwer.numErrors,
		numKeywords: kwer.numKeywords,
		value: 1 - kwer.value,
	};
}

/**
 * Keyword recall of one example. An example without the vocabulary has
 * nothing to miss and rates 1.
 */
export function exampleMedicalTermRecall(example: Example, options: RecallOptions = {}): MedicalTermRecall {
	return recallFrom(exampleKeywordErrorRate(example, options.vocab ?? MEDICAL_TERMS_VOCAB, options));
}

/**
 * @throws {AlignCoreError} If no example of the dataset was given the vocabulary.
 */
export function medicalTermRecall(dataset: Dataset, options: RecallOptions = {}): MedicalTermRecall {
	return recallFrom(keywordErrorRate(dataset, options.vocab ?? MEDICAL_TERMS_VOCAB, options));
}
