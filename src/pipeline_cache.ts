/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { currentPipeline, stagePrefix, type PipelineStage } from './pipeline_context.js';
import { resolveStage, type PipelineOwner, type StageFunctions } from './pipelines.js';

/**
 * A value computed at most once, on first read.
 */
export class Lazy<T> {
	private cell: { readonly value: T } | undefined;

	constructor(private readonly init: () => T) {}

	public get value(): T {
		if (this.cell === undefined) {
			this.cell = { value: this.init() };
		}
		return this.cell.value;
	}

	public get initialized(): boolean {
		return this.cell !== undefined;
	}
}

/**
 * Per-instance memo keyed by the active pipeline names up to and including
 * one stage. Stages after it never take part in the key, so changing a later
 * stage reuses the entry and changing this stage or an earlier one cannot.
 *
 * Entries live as long as the owning instance.
 */
export class StageCache<T> {
	private readonly entries = new Map<string, { readonly value: T }>();

	constructor(public readonly stage: PipelineStage) {}

	/** The key a read would use right now. */
	public currentKey(): string[] {
		return stagePrefix(this.stage, currentPipeline());
	}

	public getOrCompute(compute: (key: readonly string[]) => T): T {
		const key = this.currentKey();
		const id = JSON.stringify(key);
		const hit = this.entries.get(id);
		if (hit !== undefined) {
			return hit.value;
		}
		const value = compute(key);
		this.entries.set(id, { value });
		return value;
	}

	public has(key: readonly string[]): boolean {
		return this.entries.has(JSON.stringify(key));
	}

	/** Every key computed so far, in insertion order. */
	public keys(): string[][] {
		return [...this.entries.keys()].map(id => {
			const key: unknown = JSON.parse(id);
			return Array.isArray(key) ? key.map(String) : [];
		});
	}

	public get size(): number {
		return this.entries.size;
	}
}

/**
 * A derived value of one instance that depends on the pipeline function
 * active for `stage`.
 *
 * On a miss the function is resolved through the owner's lineage with the
 * name active for `stage`, handed to `compute`, and the result is stored
 * under the full stage prefix.
 *
 * @example
 * ```typescript
 * class Text implements PipelineOwner {
 *     private readonly standardizedCache = new PipelineCachedValue('standardizer', fn => fn(this.raw));
 *     get standardized(): string { return this.standardizedCache.get(this); }
 * }
 * ```
 */
export class PipelineCachedValue<S extends PipelineStage, T> {
	private readonly cache: StageCache<T>;

	constructor(
		public readonly stage: S,
		private readonly compute: (fn: StageFunctions[S]) => T,
	) {
		this.cache = new StageCache<T>(stage);
	}

	public get(owner: PipelineOwner): T {
		return this.cache.getOrCompute(key => {
			const name = key[key.length - 1];
			return this.compute(resolveStage(owner, this.stage, name));
		});
	}

	public has(key: readonly string[]): boolean {
		return this.cache.has(key);
	}

	public keys(): string[][] {
		return this.cache.keys();
	}

	public get size(): number {
		return this.cache.size;
	}
}
