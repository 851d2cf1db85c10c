/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { Alignment } from './alignment.js';
import { AlignmentBuilder } from './alignment_builder.js';
import { AlignCoreError } from './errors.js';
import { Keyword } from './keyword.js';
import { StageCache } from './pipeline_cache.js';
import type { PipelineRegistry } from './pipelines.js';
import { Text, TextType } from './text.js';
import type { Dataset } from './dataset.js';

/**
 * A keyword term that was dropped because it does not occur in the reference.
 */
export interface MissingKeyword {
	readonly vocab: string;
	readonly term: string;
}

/**
 * One reference/hypothesis pair, optionally with keyword vocabularies.
 */
export class Example {
	public readonly ref: Text;
	public readonly hyp: Text;
	public readonly keywords: ReadonlyMap<string, readonly Keyword[]>;
	public readonly missingKeywords: readonly MissingKeyword[];
	public readonly index: number | undefined;
	private readonly dataset: Dataset | undefined;

	private readonly normalizedAlignments = new StageCache<Alignment>('normalizer');
	private readonly rawAlignments = new StageCache<Alignment>('tokenizer');

	/**
	 * @param ref - Reference text.
	 * @param hyp - Hypothesis text.
	 * @param options.keywords - Terms per vocabulary name. Terms that are not a
	 * substring of `ref` are left out and listed in `missingKeywords`.
	 * @param options.dataset - The owner of the pipeline registry and edit-script function.
	 * @param options.index - Position in the dataset.
	 */
	constructor(
		ref: string,
		hyp: string,
		options: { keywords?: Record<string, readonly string[]>; dataset?: Dataset; index?: number } = {},
	) {
		this.dataset = options.dataset;
		this.index = options.index;
		this.ref = new Text(ref, { source: this, textType: TextType.REF });
		this.hyp = new Text(hyp, { source: this, textType: TextType.HYP });

		const keywords = new Map<string, Keyword[]>();
		const missing: MissingKeyword[] = [];
		for (const [vocab, terms] of Object.entries(options.keywords ?? {})) {
			const found: Keyword[] = [];
			for (const term of terms) {
				if (ref.includes(term)) {
					found.push(new Keyword(term, this));
				} else {
					missing.push({ vocab, term });
				}
			}
			if (found.length > 0) {
				keywords.set(vocab, found);
			}
		}
		this.keywords = keywords;
		this.missingKeywords = missing;
	}

	public get src(): Dataset | undefined {
		return this.dataset;
	}

	public get pipelines(): PipelineRegistry | undefined {
		return this.dataset?.pipelines;
	}

	/**
	 * The alignment of `hyp` against `ref` under the active pipeline. Built
	 * once per selection (and per `normalized`) and sealed against this example.
	 *
	 * @param options.normalized - Align and label ops with normalized token text.
	 * @throws {AlignCoreError} If the example does not belong to a dataset.
	 * @throws {AlignmentContractError} If the dataset's edit script is invalid.
	 */
	public alignment(options: { normalized?: boolean } = {}): Alignment {
		const normalized = options.normalized ?? true;
		const cache = normalized ? this.normalizedAlignments : this.rawAlignments;
		return cache.getOrCompute(() => {
			const dataset = this.requireDataset();
			const refTokens = this.ref.tokens;
			const hypTokens = this.hyp.tokens;
			const refTexts = normalized ? refTokens.normalized : refTokens.raw;
			const hypTexts = normalized ? hypTokens.normalized : hypTokens.raw;
			const builder = new AlignmentBuilder({ normalized, debug: dataset.debug });
			const alignment = builder.build(refTokens, hypTokens, dataset.editScript(refTexts, hypTexts));
			alignment.attach(this);
			return alignment;
		});
	}

	public toString(): string {
		const clip = (s: string) => (s.length <= 45 ? s : s.slice(0, 42) + '...');
		return `Example(ref="${clip(this.ref.raw)}", hyp="${clip(this.hyp.raw)}")`;
	}

	private requireDataset(): Dataset {
		if (this.dataset === undefined) {
			throw new AlignCoreError(`[Example] ${this.toString()} is not part of a dataset; no edit script is available.`);
		}
		return this.dataset;
	}
}
