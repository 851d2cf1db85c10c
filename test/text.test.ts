// test/text.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    MissingRegistryError,
    SourceAlreadySetError,
    Text,
    TextType,
    withPipeline,
    type PipelineOwner,
} from '../src/index.js';
import { makeRegistry } from './helpers.js';

// =============== HELPER FUNCTIONS ===============

const makeOwner = (): PipelineOwner => ({
    pipelines: makeRegistry()
        .register('standardizer', 'lower', text => text.trim().toLowerCase())
        .register('normalizer', 'upper', token => token.toUpperCase()),
});

suite('Text', () => {

    test('should standardize and tokenize through its owner', () => {
        const text = new Text('  Hello  World ', { source: makeOwner(), textType: TextType.REF });
        assert.strictEqual(text.textType, TextType.REF);
        assert.strictEqual(text.standardized, 'Hello  World');
        assert.deepStrictEqual(text.tokens.raw, ['Hello', 'World']);
        assert.deepStrictEqual([...text.tokens].map(t => t.span), [{ start: 0, end: 5 }, { start: 7, end: 12 }]);
        assert.strictEqual(text.tokens.at(0)?.src, text);
    });

    test('should join its tokens back together', () => {
        const text = new Text('  Hello  World ', { source: makeOwner() });
        assert.strictEqual(text.joined(), 'hello world');
        assert.strictEqual(text.joined(false), 'Hello World');
    });

    test('should keep its tokens when only the normalizer changes', () => {
        const text = new Text('Hello World', { source: makeOwner() });
        const tokens = text.tokens;
        assert.strictEqual(text.tokens, tokens);
        assert.strictEqual(withPipeline({ normalizer: 'upper' }, () => text.tokens), tokens);
        assert.deepStrictEqual(withPipeline({ normalizer: 'upper' }, () => text.tokens.normalized), ['HELLO', 'WORLD']);
        assert.deepStrictEqual(text.tokenKeys, [['default', 'default']]);
    });

    test('should tokenize again when the standardizer changes', () => {
        const text = new Text('Hello World', { source: makeOwner() });
        const tokens = text.tokens;
        const lowered = withPipeline({ standardizer: 'lower' }, () => text.tokens);

        assert.notStrictEqual(lowered, tokens);
        assert.deepStrictEqual(lowered.raw, ['hello', 'world']);
        assert.deepStrictEqual(tokens.raw, ['Hello', 'World']);
        assert.deepStrictEqual(text.tokenKeys, [['default', 'default'], ['lower', 'default']]);
    });

    test('should reject a tokenizer whose tokens are not in the text', () => {
        const owner: PipelineOwner = {
            pipelines: makeRegistry().register('tokenizer', 'shouting', input => [{ raw: input.toUpperCase(), start: 0, end: input.length }]),
        };
        const text = new Text('quiet', { source: owner });
        assert.throws(() => withPipeline({ tokenizer: 'shouting' }, () => text.tokens), RangeError);
        assert.deepStrictEqual(text.tokens.raw, ['quiet']);
    });

    test('should need a registry in its lineage', () => {
        const text = new Text('orphan');
        assert.strictEqual(text.src, undefined);
        assert.throws(() => text.standardized, MissingRegistryError);
        assert.throws(() => text.tokens, MissingRegistryError);
    });

    test('should link to its owner once', () => {
        const owner = makeOwner();
        const text = new Text('late');
        text.attach(owner);
        assert.strictEqual(text.src, owner);
        assert.strictEqual(text.pipelines, owner.pipelines);
        assert.deepStrictEqual(text.tokens.raw, ['late']);
        assert.throws(() => text.attach(owner), SourceAlreadySetError);
    });

    test('should print a shortened form', () => {
        assert.strictEqual(new Text('short').toString(), 'Text("short")');
        assert.strictEqual(new Text('x'.repeat(50)).toString(), `Text("${'x'.repeat(46)}...")`);
    });
});
