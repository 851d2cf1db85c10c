/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { AlignCoreError, SourceAlreadySetError } from './errors.js';
import { Lazy, PipelineCachedValue, StageCache } from './pipeline_cache.js';
import type { PipelineOwner, PipelineRegistry } from './pipelines.js';

/**
 * A half-open character range `[start, end)`.
 */
export interface Span {
	readonly start: number;
	readonly end: number;
}

/**
 * What a tokenizer reports for one token: its text and where it sits in the
 * text that was tokenized.
 */
export interface TokenSpan extends Span {
	readonly raw: string;
}

/**
 * The text a token belongs to, as far as a token needs to know it.
 */
export interface TokenSource extends PipelineOwner {
	readonly standardized: string;
}

/**
 * One token of a text: its raw string, its span in the (standardized) text
 * and its position in the token sequence.
 *
 * Equality is structural on `raw`, `start` and `end`; `index` does not take
 * part in it.
 */
export class Token implements TokenSpan {
	public readonly raw: string;
	public readonly start: number;
	public readonly end: number;
	public readonly index: number;
	private source: TokenSource | undefined;
	private readonly normalizedCache = new PipelineCachedValue('normalizer', normalize => normalize(this.raw));

	/**
	 * @param raw - The token text.
	 * @param start - Offset of the first character.
	 * @param end - Offset just past the last character.
	 * @param index - Position in the owning token sequence.
	 * @param source - The owning text, if already known.
	 * @throws {RangeError} If the span is negative or inverted, `index` is not a non-negative integer,
	 * or `raw` is not the source's text at the span.
	 */
	constructor(raw: string, start: number, end: number, index: number, source?: TokenSource) {
		if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
			throw new RangeError(`[Token] Invalid span [${start}, ${end}) for "${raw}".`);
		}
		if (!Number.isInteger(index) || index < 0) {
			throw new RangeError(`[Token] Invalid index ${index} for "${raw}".`);
		}
		this.raw = raw;
		this.start = start;
		this.end = end;
		this.index = index;
		if (source !== undefined) {
			this.attach(source);
		}
	}

	public static fromSpan(span: TokenSpan, index: number, source?: TokenSource): Token {
		return new Token(span.raw, span.start, span.end, index, source);
	}

	public get src(): TokenSource | undefined {
		return this.source;
	}

	public get pipelines(): PipelineRegistry | undefined {
		return this.source?.pipelines;
	}

	public get span(): Span {
		return { start: this.start, end: this.end };
	}

	/**
	 * The token text under the active normalizer. Computed once per
	 * (standardizer, tokenizer, normalizer) selection.
	 */
	public get normalized(): string {
		return this.normalizedCache.get(this);
	}

	/** Pipeline keys this token has been normalized under, oldest first. */
	public get normalizedKeys(): string[][] {
		return this.normalizedCache.keys();
	}

	/**
	 * Links the token to the text it was cut from. Allowed once.
	 * @throws {SourceAlreadySetError}
	 * @throws {RangeError} If `raw` is not the source's standardized text at this span.
	 */
	public attach(source: TokenSource): void {
		if (this.source !== undefined) {
			throw new SourceAlreadySetError(`[Token] Source already set for ${this.toString()}.`);
		}
		const actual = source.standardized.slice(this.start, this.end);
		if (actual !== this.raw) {
			throw new RangeError(
				`[Token] "${this.raw}" does not match its source text at [${this.start}, ${this.end}) ("${actual}").`,
			);
		}
		this.source = source;
	}

	public equals(other: Token): boolean {
		return this.raw === other.raw && this.start === other.start && this.end === other.end;
	}

	/**
	 * The token with up to `width` characters of surrounding text on each side.
	 * @param addEllipsis - Mark truncated context with `...`.
	 */
	public inContext(width: number = 20, addEllipsis: boolean = true): string {
		if (this.source === undefined) {
			throw new AlignCoreError(`[Token] ${this.toString()} has no source text.`);
		}
		const text = this.source.standardized;
		const from = Math.max(0, this.start - width);
		const to = Math.min(text.length, this.end + width);
		let context = text.slice(from, to);
		if (addEllipsis) {
			if (from > 0) context = '...' + context;
			if (to < text.length) context = context + '...';
		}
		return context;
	}

	public toString(): string {
		return `Token("${this.raw}")`;
	}
}

/**
 * Joins tokens back into a string, putting a single space wherever the
 * original text had a gap between two tokens and nothing where they touched.
 */
export function joinTokens(tokens: Iterable<Token>, normalized: boolean = true): string {
	let joined = '';
	let prevEnd: number | undefined;
	for (const token of tokens) {
		const text = normalized ? token.normalized : token.raw;
		joined += prevEnd !== undefined && token.start > prevEnd ? ' ' + text : text;
		prevEnd = token.end;
	}
	return joined.trim();
}

function positionsOf(tokens: readonly Token[], textOf: (token: Token) => string): Map<string, Set<number>> {
	const positions = new Map<string, Set<number>>();
	tokens.forEach((token, i) => {
		const text = textOf(token);
		let set = positions.get(text);
		if (set === undefined) {
			set = new Set();
			positions.set(text, set);
		}
		set.add(i);
	});
	return positions;
}

const EMPTY_POSITIONS: ReadonlySet<number> = new Set();

/**
 * An immutable sequence of tokens with position lookups.
 *
 * Positions returned by {@link indices} and accepted by {@link at} are
 * positions in this list, which differ from `Token.index` for a slice.
 */
export class TokenList implements Iterable<Token> {
	private readonly items: readonly Token[];
	private readonly startMap = new Lazy(() => new Map(this.items.map((t, i) => [t.start, i] as const)));
	private readonly endMap = new Lazy(() => new Map(this.items.map((t, i) => [t.end, i] as const)));
	private readonly rawPositions = new Lazy(() => positionsOf(this.items, t => t.raw));
	private readonly normalizedPositions = new StageCache<Map<string, Set<number>>>('normalizer');

	constructor(tokens: Iterable<Token> = []) {
		this.items = Object.freeze([...tokens]);
	}

	/**
	 * Wraps tokenizer output, numbering the tokens and linking them to `source`.
	 */
	public static fromSpans(spans: Iterable<TokenSpan>, source?: TokenSource): TokenList {
		const tokens: Token[] = [];
		for (const span of spans) {
			tokens.push(Token.fromSpan(span, tokens.length, source));
		}
		return new TokenList(tokens);
	}

	public get length(): number {
		return this.items.length;
	}

	public at(position: number): Token | undefined {
		return this.items.at(position);
	}

	public slice(start?: number, end?: number): TokenList {
		return new TokenList(this.items.slice(start, end));
	}

	public concat(other: TokenList): TokenList {
		return new TokenList([...this.items, ...other.items]);
	}

	public toArray(): readonly Token[] {
		return this.items;
	}

	public [Symbol.iterator](): Iterator<Token> {
		return this.items[Symbol.iterator]();
	}

	public get raw(): string[] {
		return this.items.map(t => t.raw);
	}

	public get normalized(): string[] {
		return this.items.map(t => t.normalized);
	}

	public startIndexToToken(charIndex: number): Token | undefined {
		const i = this.startMap.value.get(charIndex);
		return i === undefined ? undefined : this.items[i];
	}

	public endIndexToToken(charIndex: number): Token | undefined {
		const i = this.endMap.value.get(charIndex);
		return i === undefined ? undefined : this.items[i];
	}

	/**
	 * Positions of every token whose text equals `text`. The normalized
	 * index is built once per active pipeline, the raw one once.
	 */
	public indices(text: string, normalized: boolean = true): ReadonlySet<number> {
		const positions = normalized
			? this.normalizedPositions.getOrCompute(() => positionsOf(this.items, t => t.normalized))
			: this.rawPositions.value;
		return positions.get(text) ?? EMPTY_POSITIONS;
	}

	/**
	 * Every run of `n` consecutive tokens, joined as by {@link joinTokens}.
	 * @throws {RangeError} If `n` is not a positive integer.
	 */
	public ngrams(n: number, normalized: boolean = true): string[] {
		if (!Number.isInteger(n) || n < 1) {
			throw new RangeError(`[TokenList] n must be a positive integer, got ${n}.`);
		}
		const grams: string[] = [];
		for (let i = 0; i + n <= this.items.length; i++) {
			grams.push(joinTokens(this.items.slice(i, i + n), normalized));
		}
		return grams;
	}

	public join(normalized: boolean = true): string {
		return joinTokens(this.items, normalized);
	}

	public toString(): string {
		const shown = this.items.slice(0, 60).map(t => t.toString());
		if (this.items.length > 60) shown.push('...');
		return `TokenList([${shown.join(', ')}])`;
	}
}
