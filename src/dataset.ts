/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { EditScriptFunction } from './alignment_builder.js';
import { Example } from './example.js';
import { PipelineRegistry, type PipelineDefinitions } from './pipelines.js';
import type { Text } from './text.js';

/**
 * Configuration options for a dataset.
 */
export interface DatasetOptions {
	/** The pipeline functions texts of this dataset resolve against. */
	pipelines: PipelineRegistry | PipelineDefinitions;
	/** The edit-distance collaborator. */
	editScript: EditScriptFunction;
	/** Trace alignment building to the console. */
	debug?: boolean;
}

/**
 * A collection of examples sharing one pipeline registry and one
 * edit-script function.
 *
 * @example
 * ```typescript
 * const dataset = new Dataset({ pipelines: { standardizers, tokenizers, normalizers }, editScript });
 * dataset.add('the quick brown fox', 'the quick brown dog');
 * withPipeline({ normalizer: 'casefold' }, () => dataset.at(0)?.alignment().numEdits);
 * ```
 */
export class Dataset implements Iterable<Example> {
	public readonly pipelines: PipelineRegistry;
	public readonly editScript: EditScriptFunction;
	public readonly debug: boolean;
	private readonly examples: Example[] = [];

	constructor(options: DatasetOptions) {
		this.pipelines = options.pipelines instanceof PipelineRegistry
			? options.pipelines
			: PipelineRegistry.from(options.pipelines);
		this.editScript = options.editScript;
		this.debug = options.debug ?? false;
	}

	/**
	 * Appends an example and returns it.
	 * @param keywords - Key terms per vocabulary name.
	 */
	public add(ref: string, hyp: string, keywords?: Record<string, readonly string[]>): Example {
		const example = new Example(ref, hyp, { keywords, dataset: this, index: this.examples.length });
		this.examples.push(example);
		return example;
	}

	public get length(): number {
		return this.examples.length;
	}

	public at(index: number): Example | undefined {
		return this.examples.at(index);
	}

	public [Symbol.iterator](): Iterator<Example> {
		return this.examples[Symbol.iterator]();
	}

	public get refs(): Text[] {
		return this.examples.map(e => e.ref);
	}

	public get hyps(): Text[] {
		return this.examples.map(e => e.hyp);
	}

	/** Every vocabulary name given to at least one example, found in its reference or not. */
	public get vocabs(): string[] {
		const names = new Set<string>();
		for (const example of this.examples) {
			for (const vocab of example.keywords.keys()) names.add(vocab);
			for (const missing of example.missingKeywords) names.add(missing.vocab);
		}
		return [...names];
	}

	public toString(): string {
		return `Dataset(${this.examples.length} examples)`;
	}
}
