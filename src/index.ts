// src/index.ts
// version: 1.0.0

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Alignment
export { Alignment } from './alignment.js';
export { type AlignmentSide } from './alignment_index.js';
export {
	AlignmentBuilder,
	buildAlignment,
	type AlignmentOptions,
	type EditInput,
	type EditKind,
	type EditScriptFunction,
	type EditStep,
	type EditTuple,
} from './alignment_builder.js';
export {
	OpType,
	formatOp,
	hasHyp,
	hasRef,
	isEdit,
	opToDict,
	type DeleteOp,
	type HypOp,
	type InsertOp,
	type MatchOp,
	type Op,
	type OpRecord,
	type RefOp,
	type SubstituteOp,
} from './op.js';

// Tokens, texts and keywords
export { Token, TokenList, joinTokens, type Span, type TokenSource, type TokenSpan } from './token.js';
export { Text, TextType } from './text.js';
export { Keyword, locateKeyword, type KeywordSource } from './keyword.js';

// Pipelines
export {
	DEFAULT_PIPELINE,
	PIPELINE_STAGES,
	currentPipeline,
	stagePrefix,
	withPipeline,
	type PipelineSelection,
	type PipelineStage,
} from './pipeline_context.js';
export { Lazy, PipelineCachedValue, StageCache } from './pipeline_cache.js';
export {
	PipelineRegistry,
	patternTokenizer,
	resolveStage,
	type Normalizer,
	type PipelineDefinitions,
	type PipelineOwner,
	type StageFunctions,
	type Standardizer,
	type Tokenizer,
} from './pipelines.js';

// Examples, datasets and metrics
export { Example, type MissingKeyword } from './example.js';
export { Dataset, type DatasetOptions } from './dataset.js';
export {
	MEDICAL_TERMS_VOCAB,
	characterErrorRate,
	exampleCharacterErrorRate,
	exampleKeywordErrorRate,
	exampleMedicalTermRecall,
	exampleWordErrorRate,
	keywordErrorRate,
	medicalTermRecall,
	wordErrorRate,
	type CharacterErrorRate,
	type KeywordErrorRate,
	type MedicalTermRecall,
	type MetricOptions,
	type RecallOptions,
	type WordErrorRate,
} from './metrics.js';

// Errors
export {
	AlignCoreError,
	AlignmentContractError,
	MissingRegistryError,
	PipelineResolutionError,
	RefIndexError,
	SealedAlignmentError,
	SourceAlreadySetError,
	UnknownPipelineError,
} from './errors.js';
