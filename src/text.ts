/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { SourceAlreadySetError } from './errors.js';
import { PipelineCachedValue } from './pipeline_cache.js';
import type { PipelineOwner, PipelineRegistry } from './pipelines.js';
import { joinTokens, TokenList, type TokenSource } from './token.js';

/**
 * The role a text plays in its example.
 */
export enum TextType {
	REF = 'ref',
	HYP = 'hyp',
	KEYWORD = 'keyword',
}

/**
 * A raw string and its lazily derived pipeline forms.
 *
 * `standardized` depends on the active standardizer; `tokens` on the active
 * standardizer and tokenizer. Each is computed once per selection and kept
 * for the lifetime of the text. Derivations resolve their pipeline
 * functions through the source the text is attached to.
 */
export class Text implements TokenSource {
	public readonly raw: string;
	public readonly textType: TextType | undefined;
	protected source: PipelineOwner | undefined;

	private readonly standardizedCache = new PipelineCachedValue('standardizer', standardize => standardize(this.raw));
	private readonly tokensCache = new PipelineCachedValue('tokenizer', tokenize => TokenList.fromSpans(tokenize(this.standardized), this));

	constructor(raw: string, options: { source?: PipelineOwner; textType?: TextType } = {}) {
		this.raw = raw;
		this.textType = options.textType;
		if (options.source !== undefined) {
			this.attach(options.source);
		}
	}

	public get src(): PipelineOwner | undefined {
		return this.source;
	}

	public get pipelines(): PipelineRegistry | undefined {
		return this.source?.pipelines;
	}

	public get standardized(): string {
		return this.standardizedCache.get(this);
	}

	public get tokens(): TokenList {
		return this.tokensCache.get(this);
	}

	/** Pipeline keys `tokens` has been computed under, oldest first. */
	public get tokenKeys(): string[][] {
		return this.tokensCache.keys();
	}

	/**
	 * Links the text to its parent. Allowed once.
	 * @throws {SourceAlreadySetError}
	 */
	public attach(source: PipelineOwner): void {
		if (this.source !== undefined) {
			throw new SourceAlreadySetError(`[Text] Source already set for ${this.toString()}.`);
		}
		this.source = source;
	}

	/** The tokens joined back into one string. */
	public joined(normalized: boolean = true): string {
		return joinTokens(this.tokens, normalized);
	}

	public toString(): string {
		const text = this.raw.length <= 46 ? this.raw : this.raw.slice(0, 46) + '...';
		return `Text("${text}")`;
	}
}
