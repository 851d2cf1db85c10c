/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { AlignmentIndex, type AlignmentSide } from './alignment_index.js';
import { SealedAlignmentError } from './errors.js';
import { formatOp, opToDict, OpType, type Op, type OpRecord } from './op.js';

/**
 * An ordered list of alignment operations between a reference and a
 * hypothesis token sequence.
 *
 * The list can grow until it is attached to its source (usually an
 * `Example`); from then on it is sealed and any mutation or re-binding
 * throws. Op counts are kept up to date on every append. The position
 * index behind `startIndexToOp`, `endIndexToOp` and `opsFromRefIndex` is
 * built on first use and rebuilt only if the list grew since.
 *
 * @example
 * ```typescript
 * const span = alignment.opsFromRefIndex(keyword.at(0).index, keyword.at(-1).index);
 * const correct = [...span].every(op => op.type === OpType.MATCH);
 * ```
 */
export class Alignment implements Iterable<Op> {
	private readonly ops: Op[] = [];
	private readonly counts: Record<OpType, number> = {
		[OpType.MATCH]: 0,
		[OpType.INSERT]: 0,
		[OpType.DELETE]: 0,
		[OpType.SUBSTITUTE]: 0,
	};
	private source: object | undefined;
	private index: AlignmentIndex | undefined;

	constructor(ops: Iterable<Op> = [], source?: object) {
		this.push(ops);
		if (source !== undefined) {
			this.attach(source);
		}
	}

	public get length(): number {
		return this.ops.length;
	}

	public get src(): object | undefined {
		return this.source;
	}

	public get sealed(): boolean {
		return this.source !== undefined;
	}

	public get numMatches(): number {
		return this.counts[OpType.MATCH];
	}

	public get numSubstitutions(): number {
		return this.counts[OpType.SUBSTITUTE];
	}

	public get numInsertions(): number {
		return this.counts[OpType.INSERT];
	}

	public get numDeletions(): number {
		return this.counts[OpType.DELETE];
	}

	/** Substitutions, insertions and deletions together. */
	public get numEdits(): number {
		return this.numSubstitutions + this.numInsertions + this.numDeletions;
	}

	/** @throws {SealedAlignmentError} */
	public append(op: Op): void {
		this.assertMutable('append to');
		this.push([op]);
	}

	/** @throws {SealedAlignmentError} */
	public extend(ops: Iterable<Op>): void {
		this.assertMutable('extend');
		this.push(ops);
	}

	/**
	 * Binds the alignment to its source and seals it. Allowed once.
	 * @throws {SealedAlignmentError}
	 */
	public attach(source: object): void {
		if (this.source !== undefined) {
			throw new SealedAlignmentError('[Alignment] Source already set; an alignment can be attached once.');
		}
		this.source = source;
	}

	public at(position: number): Op | undefined {
		return this.ops.at(position);
	}

	/** An unsealed copy of part of the list. */
	public slice(start?: number, end?: number): Alignment {
		return new Alignment(this.ops.slice(start, end));
	}

	/**
	 * @throws {SealedAlignmentError} If either side is sealed.
	 */
	public concat(other: Alignment): Alignment {
		if (this.sealed || other.sealed) {
			throw new SealedAlignmentError('[Alignment] Cannot concatenate alignments that are attached to a source.');
		}
		return new Alignment([...this.ops, ...other.ops]);
	}

	public toArray(): readonly Op[] {
		return this.ops;
	}

	public [Symbol.iterator](): Iterator<Op> {
		return this.ops[Symbol.iterator]();
	}

	/**
	 * The op whose span on `side` starts at `charIndex`, if any.
	 */
	public startIndexToOp(charIndex: number, side: AlignmentSide = 'ref'): Op | undefined {
		const i = this.getIndex().opIndexAtStart(charIndex, side);
		return i === undefined ? undefined : this.ops[i];
	}

	/**
	 * The op whose span on `side` ends at `charIndex`, if any.
	 */
	public endIndexToOp(charIndex: number, side: AlignmentSide = 'ref'): Op | undefined {
		const i = this.getIndex().opIndexAtEnd(charIndex, side);
		return i === undefined ? undefined : this.ops[i];
	}

	/**
	 * The contiguous ops from the one holding reference token `start` to the
	 * one holding reference token `stop` (inclusive), including inserts that
	 * fall between them. With `stop` omitted, just the op holding `start`.
	 *
	 * @throws {RefIndexError} If `start` or `stop` is not the reference
	 * position of any op here, or `stop < start`.
	 */
	public opsFromRefIndex(start: number, stop?: number): Alignment {
		const [from, to] = this.getIndex().refRange(start, stop);
		return this.slice(from, to);
	}

	/** Reference token position -> op position. */
	public refIndexMapping(): Map<number, number> {
		return this.getIndex().refTokenMapping();
	}

	public toDicts(): OpRecord[] {
		return this.ops.map(opToDict);
	}

	public toJSON(): OpRecord[] {
		return this.toDicts();
	}

	public toString(): string {
		const shown = this.ops.slice(0, 60).map(formatOp);
		if (this.ops.length > 60) shown.push('...');
		return `Alignment([\n ${shown.join(',\n ')}\n])`;
	}

	private push(ops: Iterable<Op>): void {
		for (const op of ops) {
			this.ops.push(op);
			this.counts[op.type]++;
		}
		this.index = undefined;
	}

	private getIndex(): AlignmentIndex {
		if (this.index === undefined) {
			this.index = new AlignmentIndex(this.ops);
		}
		return this.index;
	}

	private assertMutable(action: string): void {
		if (this.source !== undefined) {
			throw new SealedAlignmentError(`[Alignment] Cannot ${action} an alignment after its source is set.`);
		}
	}
}
