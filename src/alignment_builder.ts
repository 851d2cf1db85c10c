/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { Alignment } from './alignment.js';
import { AlignmentContractError } from './errors.js';
import { OpType, type DeleteOp, type InsertOp, type MatchOp, type Op, type SubstituteOp } from './op.js';
import type { Token } from './token.js';

/**
 * The kinds of step an edit-distance collaborator reports. Matches are
 * never reported.
 */
export type EditKind = 'substitute' | 'insert' | 'delete';

/**
 * One step of a sparse edit script.
 *
 * A substitute needs both indices, an insert its `hypIndex` and a delete its
 * `refIndex`. An insert may also carry a `refIndex`: the reference position
 * it is inserted before (the reference length for "at the end"). Likewise a
 * delete may carry the hypothesis position it sits before in `hypIndex`.
 */
export interface EditStep {
	readonly kind: EditKind;
	readonly refIndex: number | null;
	readonly hypIndex: number | null;
}

/** `[kind, refIndex, hypIndex]` */
export type EditTuple = readonly [kind: string, refIndex: number | null, hypIndex: number | null];

/**
 * What an edit script may contain as handed over by the collaborator. Kinds
 * are checked at run time; `replace` is read as `substitute`.
 */
export type EditInput = EditTuple | { readonly kind: string; readonly refIndex: number | null; readonly hypIndex: number | null };

/**
 * Computes a sparse edit script between two sequences of token texts.
 * Supplied by the dataset; this package never computes edit distance.
 */
export type EditScriptFunction = (ref: readonly string[], hyp: readonly string[]) => Iterable<EditInput>;

/**
 * Configuration options for building an alignment.
 */
export interface AlignmentOptions {
	/** Take op texts from `Token.normalized` rather than `Token.raw`. */
	normalized?: boolean;
	/** Trace every phase to the console. */
	debug?: boolean;
}

/** A step after validation, with its position in the script. */
interface Step extends EditStep {
	readonly seq: number;
}

/** What happens to one reference or hypothesis position. */
type Slot =
	| { readonly kind: 'paired'; readonly partner: number; readonly type: OpType.MATCH | OpType.SUBSTITUTE }
	| { readonly kind: 'alone'; readonly step: Step };

function isTuple(input: EditInput): input is EditTuple {
	return Array.isArray(input);
}

const KIND_ALIASES: Readonly<Record<string, EditKind>> = {
	substitute: 'substitute',
	replace: 'substitute',
	insert: 'insert',
	delete: 'delete',
};

/**
 * Turns a sparse edit script into a total alignment.
 *
 * The collaborator reports only edits. Positions no edit touches are the
 * common subsequence of both sides, so there are as many of them in the
 * reference as in the hypothesis; pairing them in order gives the matches.
 * Matches and substitutions then pin the two sequences together, and the
 * inserts and deletes between two pins are emitted in order.
 *
 * When an insert and a delete compete for the same place, the positions
 * they carry for the other side decide (an insert goes first if it sits
 * before the pending reference token, a delete goes first if it sits
 * before the pending hypothesis token). If both carry positions and
 * disagree, script order decides; if neither carries one, the delete goes
 * first.
 *
 * Any inconsistency in the script is an {@link AlignmentContractError};
 * nothing is returned in that case.
 *
 * @example
 * ```typescript
 * const builder = new AlignmentBuilder();
 * const alignment = builder.build(ref.tokens, hyp.tokens, [['substitute', 3, 3]]);
 * alignment.numEdits; // 1
 * ```
 */
export class AlignmentBuilder {
	public static readonly defaultOptions: Required<AlignmentOptions> = {
		normalized: false,
		debug: false,
	};

	private readonly config: Required<AlignmentOptions>;

	constructor(options?: AlignmentOptions) {
		this.config = { ...AlignmentBuilder.defaultOptions, ...options };
	}

	/**
	 * @param refTokens - The reference tokens, in order.
	 * @param hypTokens - The hypothesis tokens, in order.
	 * @param editScript - The edits between them.
	 * @param options - Overrides the builder's options for this call.
	 * @returns An unsealed alignment covering every token of both sides.
	 * @throws {AlignmentContractError} If the script is not valid for these tokens.
	 */
	public build(
		refTokens: Iterable<Token>,
		hypTokens: Iterable<Token>,
		editScript: Iterable<EditInput>,
		options?: AlignmentOptions,
	): Alignment {
		const config: Required<AlignmentOptions> = { ...this.config, ...options };
		const ref = [...refTokens];
		const hyp = [...hypTokens];
		const debug = config.debug;

		if (debug) {
			console.group(`[AlignmentBuilder] START ref=${ref.length} hyp=${hyp.length}`);
			console.log(`Options:`, config);
		}

		try {
			// --- 1. Validation ---
			const steps = this._readScript(editScript, ref.length, hyp.length);

			// --- 2. Slots touched by edits, then matches from what is left ---
			const { refSlots, hypSlots } = this._assignSlots(steps, ref.length, hyp.length, debug);

			// --- 3. Merge into reading order ---
			const ops = this._merge(refSlots, hypSlots, ref, hyp, config.normalized);

			if (debug) {
				console.log(`[AlignmentBuilder] FINISH. ${ops.length} ops from ${steps.length} edits.`);
			}
			return new Alignment(ops);
		} finally {
			if (debug) {
				console.groupEnd();
			}
		}
	}

	/**
	 * Validates every step and brings it to object form.
	 * @private
	 */
	private _readScript(editScript: Iterable<EditInput>, refLength: number, hypLength: number): Step[] {
		const steps: Step[] = [];
		for (const input of editScript) {
			const seq = steps.length;
			const [rawKind, refIndex, hypIndex]: EditTuple = isTuple(input)
				? input
				: [input.kind, input.refIndex, input.hypIndex];

			const kind = Object.hasOwn(KIND_ALIASES, rawKind) ? KIND_ALIASES[rawKind] : undefined;
			if (kind === undefined) {
				throw new AlignmentContractError(`[AlignmentBuilder] Unknown edit kind '${String(rawKind)}' at step ${seq}.`);
			}

			// The side an edit consumes must be a valid token position; the
			// other side, when given, is a position between tokens.
			const refEnd = kind === 'insert' ? refLength + 1 : refLength;
			const hypEnd = kind === 'delete' ? hypLength + 1 : hypLength;
			const refRequired = kind !== 'insert';
			const hypRequired = kind !== 'delete';
			this._checkIndex('refIndex', refIndex, refRequired, refEnd, kind, seq);
			this._checkIndex('hypIndex', hypIndex, hypRequired, hypEnd, kind, seq);

			steps.push({ kind, refIndex: refIndex ?? null, hypIndex: hypIndex ?? null, seq });
		}
		return steps;
	}

	/** @private */
	private _checkIndex(
		field: 'refIndex' | 'hypIndex',
		value: number | null | undefined,
		required: boolean,
		end: number,
		kind: EditKind,
		seq: number,
	): void {
		if (value === null || value === undefined) {
			if (required) {
				throw new AlignmentContractError(`[AlignmentBuilder] ${kind} at step ${seq} has no ${field}.`);
			}
			return;
		}
		if (!Number.isInteger(value) || value < 0 || value >= end) {
			throw new AlignmentContractError(
				`[AlignmentBuilder] ${kind} at step ${seq} has ${field} ${value}, outside [0, ${end}).`,
			);
		}
	}

	/**
	 * Records what every position on both sides takes part in, and pairs the
	 * untouched positions into matches.
	 * @private
	 */
	private _assignSlots(
		steps: readonly Step[],
		refLength: number,
		hypLength: number,
		debug: boolean,
	): { refSlots: Slot[]; hypSlots: Slot[] } {
		const refSlots: (Slot | undefined)[] = new Array<Slot | undefined>(refLength).fill(undefined);
		const hypSlots: (Slot | undefined)[] = new Array<Slot | undefined>(hypLength).fill(undefined);

		const claim = (slots: (Slot | undefined)[], side: string, position: number, slot: Slot, seq: number) => {
			if (slots[position] !== undefined) {
				throw new AlignmentContractError(
					`[AlignmentBuilder] ${side} position ${position} is touched by more than one edit (again at step ${seq}).`,
				);
			}
			slots[position] = slot;
		};

		for (const step of steps) {
			switch (step.kind) {
				case 'substitute': {
					const refIndex = this._required(step.refIndex);
					const hypIndex = this._required(step.hypIndex);
					claim(refSlots, 'Reference', refIndex, { kind: 'paired', partner: hypIndex, type: OpType.SUBSTITUTE }, step.seq);
					claim(hypSlots, 'Hypothesis', hypIndex, { kind: 'paired', partner: refIndex, type: OpType.SUBSTITUTE }, step.seq);
					break;
				}
				case 'delete':
					claim(refSlots, 'Reference', this._required(step.refIndex), { kind: 'alone', step }, step.seq);
					break;
				case 'insert':
					claim(hypSlots, 'Hypothesis', this._required(step.hypIndex), { kind: 'alone', step }, step.seq);
					break;
			}
		}

		const matchRef: number[] = [];
		const matchHyp: number[] = [];
		refSlots.forEach((slot, i) => { if (slot === undefined) matchRef.push(i); });
		hypSlots.forEach((slot, j) => { if (slot === undefined) matchHyp.push(j); });

		if (matchRef.length !== matchHyp.length) {
			throw new AlignmentContractError(
				`[AlignmentBuilder] Mismatch in match indices: ${matchRef.length} untouched reference positions ` +
				`but ${matchHyp.length} untouched hypothesis positions.`,
			);
		}

		if (debug) {
			console.log(`[AlignmentBuilder] ${matchRef.length} matches synthesized.`);
		}

		const filled: { refSlots: Slot[]; hypSlots: Slot[] } = { refSlots: [], hypSlots: [] };
		matchRef.forEach((i, k) => {
			refSlots[i] = { kind: 'paired', partner: matchHyp[k], type: OpType.MATCH };
			hypSlots[matchHyp[k]] = { kind: 'paired', partner: i, type: OpType.MATCH };
		});
		for (const slot of refSlots) filled.refSlots.push(this._required(slot));
		for (const slot of hypSlots) filled.hypSlots.push(this._required(slot));
		return filled;
	}

	/**
	 * Walks both sides at once. Every pinned pair must line up with the
	 * other side's next pinned position, otherwise the script crosses itself.
	 * @private
	 */
	private _merge(
		refSlots: readonly Slot[],
		hypSlots: readonly Slot[],
		ref: readonly Token[],
		hyp: readonly Token[],
		normalized: boolean,
	): Op[] {
		const textOf = (token: Token): string => (normalized ? token.normalized : token.raw);
		const ops: Op[] = [];
		let i = 0;
		let j = 0;

		const emitDelete = () => {
			const op: DeleteOp = { type: OpType.DELETE, refText: textOf(ref[i]), refIndex: i, refSpan: ref[i].span };
			ops.push(Object.freeze(op));
			i++;
		};
		const emitInsert = () => {
			const op: InsertOp = { type: OpType.INSERT, hypText: textOf(hyp[j]), hypIndex: j, hypSpan: hyp[j].span };
			ops.push(Object.freeze(op));
			j++;
		};

		while (i < ref.length || j < hyp.length) {
			const refSlot = i < ref.length ? refSlots[i] : undefined;
			const hypSlot = j < hyp.length ? hypSlots[j] : undefined;

			if (refSlot?.kind === 'alone' && hypSlot?.kind === 'alone') {
				if (this._insertGoesFirst(refSlot.step, hypSlot.step, i, j)) emitInsert();
				else emitDelete();
			} else if (refSlot?.kind === 'alone') {
				emitDelete();
			} else if (hypSlot?.kind === 'alone') {
				emitInsert();
			} else if (refSlot !== undefined && hypSlot !== undefined && refSlot.partner === j) {
				const op: MatchOp | SubstituteOp = {
					type: refSlot.type,
					refText: textOf(ref[i]),
					hypText: textOf(hyp[j]),
					refIndex: i,
					hypIndex: j,
					refSpan: ref[i].span,
					hypSpan: hyp[j].span,
				};
				ops.push(Object.freeze(op));
				i++;
				j++;
			} else {
				throw new AlignmentContractError(
					`[AlignmentBuilder] Edit script is not order-consistent: reference position ${i} and ` +
					`hypothesis position ${j} cannot both come next.`,
				);
			}
		}
		return ops;
	}

	/**
	 * Decides between a pending delete of reference `i` and a pending insert
	 * of hypothesis `j`.
	 * @private
	 */
	private _insertGoesFirst(deleteStep: Step, insertStep: Step, i: number, j: number): boolean {
		const byInsert = insertStep.refIndex === null ? undefined : insertStep.refIndex <= i;
		const byDelete = deleteStep.hypIndex === null ? undefined : deleteStep.hypIndex > j;
		if (byInsert !== undefined && byDelete !== undefined && byInsert !== byDelete) {
			return insertStep.seq < deleteStep.seq;
		}
		return byInsert ?? byDelete ?? false;
	}

	/** @private */
	private _required<T>(value: T | null | undefined): T {
		if (value === null || value === undefined) {
			throw new AlignmentContractError('[AlignmentBuilder] Internal invariant violated: missing value.');
		}
		return value;
	}
}

/**
 * Builds an alignment with a one-off {@link AlignmentBuilder}.
 */
export function buildAlignment(
	refTokens: Iterable<Token>,
	hypTokens: Iterable<Token>,
	editScript: Iterable<EditInput>,
	options?: AlignmentOptions,
): Alignment {
	return new AlignmentBuilder(options).build(refTokens, hypTokens, editScript);
}
