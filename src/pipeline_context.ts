/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * The preprocessing stages, in the order each one consumes the previous
 * stage's output: standardize the text, tokenize it, normalize each token.
 */
export const PIPELINE_STAGES = ['standardizer', 'tokenizer', 'normalizer'] as const;

export type PipelineStage = typeof PIPELINE_STAGES[number];

/** The name every stage resolves to when nothing else is active. */
export const DEFAULT_PIPELINE = 'default';

/**
 * The active pipeline name for every stage.
 */
export type PipelineSelection = { readonly [S in PipelineStage]: string };

const defaultSelection: PipelineSelection = Object.freeze({
	standardizer: DEFAULT_PIPELINE,
	tokenizer: DEFAULT_PIPELINE,
	normalizer: DEFAULT_PIPELINE,
});

const storage = new AsyncLocalStorage<PipelineSelection>();

/**
 * Returns the selection active in the current task.
 */
export function currentPipeline(): PipelineSelection {
	return storage.getStore() ?? defaultSelection;
}

/**
 * Runs `fn` with `selection` as the active pipeline and returns its result.
 *
 * Stages missing from `selection` are reset to {@link DEFAULT_PIPELINE}, not
 * inherited from the enclosing scope. The previous selection is back in
 * place as soon as `fn` returns or throws. When `fn` is async, the selection
 * follows the promise chain it starts and nothing else, so concurrent tasks
 * never see each other's pipeline.
 *
 * @example
 * ```typescript
 * const upper = withPipeline({ normalizer: 'casefold' }, () => token.normalized);
 * ```
 */
export function withPipeline<T>(selection: Partial<PipelineSelection>, fn: () => T): T {
	const next: PipelineSelection = Object.freeze({
		standardizer: selection.standardizer ?? DEFAULT_PIPELINE,
		tokenizer: selection.tokenizer ?? DEFAULT_PIPELINE,
		normalizer: selection.normalizer ?? DEFAULT_PIPELINE,
	});
	for (const stage of PIPELINE_STAGES) {
		if (next[stage].length === 0) {
			throw new TypeError(`[withPipeline] Empty pipeline name for stage '${stage}'.`);
		}
	}
	return storage.run(next, fn);
}

/**
 * The names that a derivation at `stage` depends on: the active name of
 * that stage and of every stage before it.
 */
export function stagePrefix(stage: PipelineStage, selection: PipelineSelection = currentPipeline()): string[] {
	const depth = PIPELINE_STAGES.indexOf(stage);
	return PIPELINE_STAGES.slice(0, depth + 1).map(s => selection[s]);
}
