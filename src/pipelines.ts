/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { MissingRegistryError, UnknownPipelineError } from './errors.js';
import { PIPELINE_STAGES, type PipelineStage } from './pipeline_context.js';
import type { TokenSpan } from './token.js';

/** Maps a whole text to its standardized form. Stage 1. */
export type Standardizer = (text: string) => string;

/** Splits a standardized text into spans over that text. Stage 2. */
export type Tokenizer = (text: string) => Iterable<TokenSpan>;

/** Maps the raw text of one token to its comparison form. Stage 3. */
export type Normalizer = (token: string) => string;

/**
 * The function type registered for each stage.
 */
export interface StageFunctions {
	standardizer: Standardizer;
	tokenizer: Tokenizer;
	normalizer: Normalizer;
}

/**
 * Plain-object form of a registry, as handed over by configuration code.
 */
export interface PipelineDefinitions {
	standardizers?: Record<string, Standardizer>;
	tokenizers?: Record<string, Tokenizer>;
	normalizers?: Record<string, Normalizer>;
}

/**
 * Anything that can reach a registry through its lineage
 * (token -> text -> example -> dataset).
 */
export interface PipelineOwner {
	readonly pipelines: PipelineRegistry | undefined;
}

/**
 * Named pipeline functions per stage.
 *
 * Names are strings only here, at the configuration boundary; everything
 * downstream receives the resolved function. A name can be registered once:
 * cached derivations are keyed by name and would otherwise go stale.
 */
export class PipelineRegistry {
	private readonly stages: { readonly [S in PipelineStage]: Map<string, StageFunctions[S]> } = {
		standardizer: new Map(),
		tokenizer: new Map(),
		normalizer: new Map(),
	};

	/**
	 * Builds a registry from plain objects.
	 * @param definitions - Functions keyed by name, per stage.
	 */
	public static from(definitions: PipelineDefinitions): PipelineRegistry {
		const registry = new PipelineRegistry();
		for (const [name, fn] of Object.entries(definitions.standardizers ?? {})) {
			registry.register('standardizer', name, fn);
		}
		for (const [name, fn] of Object.entries(definitions.tokenizers ?? {})) {
			registry.register('tokenizer', name, fn);
		}
		for (const [name, fn] of Object.entries(definitions.normalizers ?? {})) {
			registry.register('normalizer', name, fn);
		}
		return registry;
	}

	/**
	 * Registers `fn` under `name` for `stage`.
	 * @throws {TypeError} If the name is empty or already taken for this stage.
	 */
	public register<S extends PipelineStage>(stage: S, name: string, fn: StageFunctions[S]): this {
		const entries: Map<string, StageFunctions[S]> = this.stages[stage];
		if (name.length === 0) {
			throw new TypeError(`[PipelineRegistry] Empty name for ${stage}.`);
		}
		if (entries.has(name)) {
			throw new TypeError(`[PipelineRegistry] ${stage} '${name}' is already registered.`);
		}
		entries.set(name, fn);
		return this;
	}

	public has(stage: PipelineStage, name: string): boolean {
		return this.stages[stage].has(name);
	}

	/** Registered names for `stage`, in registration order. */
	public names(stage: PipelineStage): string[] {
		return [...this.stages[stage].keys()];
	}

	/**
	 * Returns the function registered under `name` for `stage`.
	 * @throws {UnknownPipelineError} If nothing is registered under that name.
	 */
	public resolve<S extends PipelineStage>(stage: S, name: string): StageFunctions[S] {
		const entries: Map<string, StageFunctions[S]> = this.stages[stage];
		const fn = entries.get(name);
		if (fn === undefined) {
			const known = this.names(stage).map(n => `'${n}'`).join(', ') || 'none';
			throw new UnknownPipelineError(
				`[PipelineRegistry] ${stage} '${name}' is not registered (known: ${known}).`,
				stage,
				name,
			);
		}
		return fn;
	}

	public toString(): string {
		const parts = PIPELINE_STAGES.map(stage => `${stage}s=[${this.names(stage).join(', ')}]`);
		return `PipelineRegistry(${parts.join('; ')})`;
	}
}

/**
 * Resolves a stage function through an owner's lineage.
 *
 * @param owner - The instance being queried.
 * @param stage - The stage to resolve.
 * @param name - The active name for that stage.
 * @throws {MissingRegistryError} If the owner has no registry in its lineage.
 * @throws {UnknownPipelineError} If the registry lacks `name`.
 */
export function resolveStage<S extends PipelineStage>(
	owner: PipelineOwner,
	stage: S,
	name: string,
): StageFunctions[S] {
	const registry = owner.pipelines;
	if (registry === undefined) {
		throw new MissingRegistryError(
			`[resolveStage] Cannot resolve ${stage} '${name}' for ${String(owner)}: it is not attached to anything that owns pipelines.`,
			stage,
			name,
		);
	}
	return registry.resolve(stage, name);
}

/**
 * Adapts a regular expression to the tokenizer contract: every match is one
 * token. The pattern is used with the global flag whether or not it has it.
 */
export function patternTokenizer(pattern: RegExp): Tokenizer {
	const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
	const global = new RegExp(pattern.source, flags);
	return (text: string): TokenSpan[] => {
		const spans: TokenSpan[] = [];
		for (const match of text.matchAll(global)) {
			const start = match.index ?? 0;
			if (match[0].length === 0) continue;
			spans.push({ raw: match[0], start, end: start + match[0].length });
		}
		return spans;
	};
}
