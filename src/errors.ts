/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Base class of every error raised by this package.
 */
export class AlignCoreError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * The edit script handed to the alignment builder is not a valid script for
 * the two token sequences. This is a bug in the edit-distance collaborator,
 * never a property of the data, and no alignment is produced.
 */
export class AlignmentContractError extends AlignCoreError {}

/**
 * A reference index range does not resolve against an alignment.
 * Callers may treat this as "not present" rather than as a bug.
 */
export class RefIndexError extends AlignCoreError {
	constructor(
		message: string,
		public readonly start: number,
		public readonly stop: number | undefined,
	) {
		super(message);
	}
}

/** An alignment was modified or re-bound after being attached to its source. */
export class SealedAlignmentError extends AlignCoreError {}

/** A single-assignment source link was assigned twice. */
export class SourceAlreadySetError extends AlignCoreError {}

/**
 * Common parent of the two ways resolving a pipeline function can fail.
 */
export class PipelineResolutionError extends AlignCoreError {
	constructor(
		message: string,
		public readonly stage: string,
		public readonly pipelineName: string,
	) {
		super(message);
	}
}

/** The instance is not attached to anything that owns a pipeline registry. */
export class MissingRegistryError extends PipelineResolutionError {}

/** A registry was found but has nothing registered under the active name. */
export class UnknownPipelineError extends PipelineResolutionError {}
