/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { Span } from './token.js';

/**
 * Enumerates the kinds of alignment operations.
 */
export enum OpType {
	/** The reference token was transcribed as is. */
	MATCH,
	/** The hypothesis has a token the reference does not. */
	INSERT,
	/** The reference has a token the hypothesis does not. */
	DELETE,
	/** A reference token was transcribed as a different token. */
	SUBSTITUTE,
}

/** Fields shared by the operations that consume a reference token. */
interface RefSide {
	readonly refText: string;
	readonly refIndex: number;
	readonly refSpan: Span;
}

/** Fields shared by the operations that consume a hypothesis token. */
interface HypSide {
	readonly hypText: string;
	readonly hypIndex: number;
	readonly hypSpan: Span;
}

export interface MatchOp extends RefSide, HypSide {
	readonly type: OpType.MATCH;
}

export interface SubstituteOp extends RefSide, HypSide {
	readonly type: OpType.SUBSTITUTE;
}

export interface InsertOp extends HypSide {
	readonly type: OpType.INSERT;
}

export interface DeleteOp extends RefSide {
	readonly type: OpType.DELETE;
}

/**
 * One alignment operation. Each variant carries exactly the fields that make
 * sense for it: an insert has no reference side, a delete no hypothesis side.
 * `refIndex`/`hypIndex` are token positions, `refSpan`/`hypSpan` character
 * ranges in the owning texts.
 */
export type Op = MatchOp | SubstituteOp | InsertOp | DeleteOp;

/** Operations that consume a reference token. */
export type RefOp = MatchOp | SubstituteOp | DeleteOp;

/** Operations that consume a hypothesis token. */
export type HypOp = MatchOp | SubstituteOp | InsertOp;

export function hasRef(op: Op): op is RefOp {
	return op.type !== OpType.INSERT;
}

export function hasHyp(op: Op): op is HypOp {
	return op.type !== OpType.DELETE;
}

export function isEdit(op: Op): boolean {
	return op.type !== OpType.MATCH;
}

/**
 * Plain-object form of an Op, as written by {@link opToDict}.
 */
export interface OpRecord {
	type: 'match' | 'substitute' | 'insert' | 'delete';
	ref: string | null;
	hyp: string | null;
	refIndex: number | null;
	hypIndex: number | null;
	refSpan: [number, number] | null;
	hypSpan: [number, number] | null;
}

const typeNames = {
	[OpType.MATCH]: 'match',
	[OpType.INSERT]: 'insert',
	[OpType.DELETE]: 'delete',
	[OpType.SUBSTITUTE]: 'substitute',
} as const satisfies Record<OpType, OpRecord['type']>;

export function opToDict(op: Op): OpRecord {
	const ref = hasRef(op) ? op : undefined;
	const hyp = hasHyp(op) ? op : undefined;
	return {
		type: typeNames[op.type],
		ref: ref?.refText ?? null,
		hyp: hyp?.hypText ?? null,
		refIndex: ref?.refIndex ?? null,
		hypIndex: hyp?.hypIndex ?? null,
		refSpan: ref ? [ref.refSpan.start, ref.refSpan.end] : null,
		hypSpan: hyp ? [hyp.hypSpan.start, hyp.hypSpan.end] : null,
	};
}

/**
 * @example
 * formatOp(op) // 'Op(SUBSTITUTE: "dog" -> "fox")'
 */
export function formatOp(op: Op): string {
	switch (op.type) {
		case OpType.DELETE:
			return `Op(DELETE: "${op.refText}")`;
		case OpType.INSERT:
			return `Op(INSERT: "${op.hypText}")`;
		case OpType.SUBSTITUTE:
			return `Op(SUBSTITUTE: "${op.hypText}" -> "${op.refText}")`;
		case OpType.MATCH:
			return `Op(MATCH: "${op.hypText}" == "${op.refText}")`;
	}
}
