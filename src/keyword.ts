/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { AlignCoreError } from './errors.js';
import { StageCache } from './pipeline_cache.js';
import type { PipelineOwner } from './pipelines.js';
import { Text, TextType } from './text.js';
import type { TokenList } from './token.js';

/**
 * Finds every place where `keyword` occurs as a contiguous run in `haystack`.
 *
 * Candidate starts are the positions of the first keyword token; each later
 * token at offset `o` keeps only the candidates `p` for which `p + o` holds
 * that token. The search stops as soon as no candidate is left.
 *
 * @param keyword - The keyword's token texts, compared as given.
 * @param haystack - The tokens to search.
 * @param normalized - Compare against `Token.normalized` instead of `Token.raw`.
 * @returns One slice of `haystack` per occurrence, ordered by start; `[]`
 * when there is none or `keyword` is empty.
 */
export function locateKeyword(keyword: readonly string[], haystack: TokenList, normalized: boolean = true): TokenList[] {
	if (keyword.length === 0) {
		return [];
	}

	let starts = new Set(haystack.indices(keyword[0], normalized));
	for (let offset = 1; offset < keyword.length && starts.size > 0; offset++) {
		const positions = haystack.indices(keyword[offset], normalized);
		const next = new Set<number>();
		for (const start of starts) {
			if (positions.has(start + offset)) next.add(start);
		}
		starts = next;
	}

	return [...starts]
		.sort((a, b) => a - b)
		.map(start => haystack.slice(start, start + keyword.length));
}

/**
 * What a keyword needs from its parent: the reference it is searched in.
 */
export interface KeywordSource extends PipelineOwner {
	readonly ref: Text;
}

/**
 * A key term of an example that can find itself in token sequences.
 *
 * The keyword is standardized and tokenized with the same pipeline as the
 * text it is searched in, so multi-word terms match token by token.
 */
export class Keyword extends Text {
	private readonly normalizedHits = new StageCache<TokenList[]>('normalizer');
	private readonly rawHits = new StageCache<TokenList[]>('tokenizer');
	private keywordSource: KeywordSource | undefined;

	constructor(raw: string, source?: KeywordSource) {
		super(raw, { textType: TextType.KEYWORD });
		if (source !== undefined) {
			this.attach(source);
		}
	}

	public override attach(source: KeywordSource): void {
		super.attach(source);
		this.keywordSource = source;
	}

	/**
	 * Every contiguous occurrence of this keyword's tokens in `tokens`.
	 */
	public findInTokens(tokens: TokenList, normalized: boolean = true): TokenList[] {
		const texts = normalized ? this.tokens.normalized : this.tokens.raw;
		return locateKeyword(texts, tokens, normalized);
	}

	/**
	 * Every occurrence in the source example's reference tokens, cached per
	 * active pipeline (and per `normalized`).
	 *
	 * @throws {AlignCoreError} If the keyword is not attached to an example.
	 */
	public findInRef(normalized: boolean = true): TokenList[] {
		const source = this.keywordSource;
		if (source === undefined) {
			throw new AlignCoreError(`[Keyword] ${this.toString()} has no source example to search.`);
		}
		const cache = normalized ? this.normalizedHits : this.rawHits;
		return cache.getOrCompute(() => this.findInTokens(source.ref.tokens, normalized));
	}

	public override toString(): string {
		const text = this.raw.length <= 46 ? this.raw : this.raw.slice(0, 46) + '...';
		return `Keyword("${text}")`;
	}
}
