/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { RefIndexError } from './errors.js';
import { hasHyp, hasRef, type Op } from './op.js';

/** Which text a character offset refers to. */
export type AlignmentSide = 'ref' | 'hyp';

/**
 * Lookup tables over a fixed list of ops, from character offsets and from
 * reference token positions to positions in that list.
 * @internal
 */
export class AlignmentIndex {
	private readonly starts: Record<AlignmentSide, Map<number, number>> = { ref: new Map(), hyp: new Map() };
	private readonly ends: Record<AlignmentSide, Map<number, number>> = { ref: new Map(), hyp: new Map() };
	private readonly refTokens = new Map<number, number>();

	constructor(ops: readonly Op[]) {
		ops.forEach((op, i) => {
			if (hasRef(op)) {
				this.starts.ref.set(op.refSpan.start, i);
				this.ends.ref.set(op.refSpan.end, i);
				this.refTokens.set(op.refIndex, i);
			}
			if (hasHyp(op)) {
				this.starts.hyp.set(op.hypSpan.start, i);
				this.ends.hyp.set(op.hypSpan.end, i);
			}
		});
	}

	public opIndexAtStart(charIndex: number, side: AlignmentSide): number | undefined {
		return this.starts[side].get(charIndex);
	}

	public opIndexAtEnd(charIndex: number, side: AlignmentSide): number | undefined {
		return this.ends[side].get(charIndex);
	}

	public opIndexOfRefToken(refIndex: number): number | undefined {
		return this.refTokens.get(refIndex);
	}

	/** Reference token position -> op position, as a fresh map. */
	public refTokenMapping(): Map<number, number> {
		return new Map(this.refTokens);
	}

	/**
	 * The half-open op range `[from, to)` covering reference tokens
	 * `start..stop` inclusive, with every op in between.
	 *
	 * @param start - Reference token position of the first op.
	 * @param stop - Reference token position of the last op; `start` if omitted.
	 * @throws {RefIndexError} If either position has no op, or `stop < start`.
	 */
	public refRange(start: number, stop?: number): [number, number] {
		const from = this.refTokens.get(start);
		if (from === undefined) {
			throw new RefIndexError(`[Alignment] Start index ${start} not found in alignment.`, start, stop);
		}
		if (stop === undefined) {
			return [from, from + 1];
		}
		if (stop < start) {
			throw new RefIndexError(
				`[Alignment] Stop index must be greater than or equal to start index (got start=${start}, stop=${stop}).`,
				start,
				stop,
			);
		}
		const to = this.refTokens.get(stop);
		if (to === undefined) {
			throw new RefIndexError(`[Alignment] Stop index ${stop} not found in alignment.`, start, stop);
		}
		if (to < from) {
			throw new RefIndexError(
				`[Alignment] Reference tokens ${start} and ${stop} appear out of order in the alignment.`,
				start,
				stop,
			);
		}
		return [from, to + 1];
	}
}
