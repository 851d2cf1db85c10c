// test/token.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    AlignCoreError,
    MissingRegistryError,
    SourceAlreadySetError,
    Token,
    TokenList,
    joinTokens,
    withPipeline,
    type TokenSource,
} from '../src/index.js';
import { makeDataset, makeRegistry, makeTokenList } from './helpers.js';

// =============== HELPER FUNCTIONS ===============

const SENTENCE = 'the quick brown fox jumps over the lazy dog';

/** A bare source whose standardized text is `text` as given. */
const makeSource = (text: string): TokenSource => ({
    standardized: text,
    pipelines: makeRegistry().register('normalizer', 'upper', token => token.toUpperCase()),
});

const tokenAt = (list: TokenList, position: number): Token => {
    const token = list.at(position);
    assert.ok(token !== undefined, `no token at ${position}`);
    return token;
};

// =============== Token ===============

suite('Token', () => {

    test('should validate its span and index', () => {
        assert.throws(() => new Token('a', 2, 1, 0), RangeError);
        assert.throws(() => new Token('a', -1, 0, 0), RangeError);
        assert.throws(() => new Token('a', 0, 1, -1), RangeError);
        assert.throws(() => new Token('a', 0, 1, 0.5), RangeError);
        assert.strictEqual(new Token('', 3, 3, 0).span.end, 3);
    });

    test('should compare by text and span only', () => {
        const token = new Token('fox', 16, 19, 3);
        assert.ok(token.equals(new Token('fox', 16, 19, 0)));
        assert.ok(!token.equals(new Token('fox', 16, 20, 3)));
        assert.ok(!token.equals(new Token('dog', 16, 19, 3)));
        assert.deepStrictEqual(token.span, { start: 16, end: 19 });
        assert.strictEqual(token.toString(), 'Token("fox")');
    });

    test('should link to its source once', () => {
        const source = makeSource(SENTENCE);
        const token = new Token('the', 0, 3, 0);
        assert.strictEqual(token.src, undefined);
        assert.strictEqual(token.pipelines, undefined);

        token.attach(source);
        assert.strictEqual(token.src, source);
        assert.throws(() => token.attach(source), SourceAlreadySetError);
    });

    test('should normalize through the active pipeline', () => {
        const token = new Token('Quick,', 4, 10, 1, makeSource('The Quick, brown fox'));
        assert.strictEqual(token.normalized, 'quick');
        assert.strictEqual(withPipeline({ normalizer: 'upper' }, () => token.normalized), 'QUICK,');
        assert.deepStrictEqual(token.normalizedKeys, [
            ['default', 'default', 'default'],
            ['default', 'default', 'upper'],
        ]);
    });

    test('should match the source text at its span', () => {
        assert.throws(
            () => new Token('fox', 0, 3, 0, makeSource(SENTENCE)),
            (error: unknown) =>
                error instanceof RangeError &&
                error.message === '[Token] "fox" does not match its source text at [0, 3) ("the").',
        );
        const token = new Token('dog', 40, 43, 8);
        assert.throws(() => token.attach(makeSource('the quick brown fox')), RangeError);
        assert.strictEqual(token.src, undefined);
    });

    test('should need a registry to normalize', () => {
        assert.throws(() => new Token('a', 0, 1, 0).normalized, MissingRegistryError);
    });

    test('should show surrounding text', () => {
        const fox = new Token('fox', 16, 19, 3, makeSource(SENTENCE));
        assert.strictEqual(fox.inContext(5), '...rown fox jump...');
        assert.strictEqual(fox.inContext(5, false), 'rown fox jump');
        assert.strictEqual(fox.inContext(), 'the quick brown fox jumps over the lazy...');
        assert.strictEqual(fox.inContext(100), SENTENCE);
    });

    test('should need a source to show context', () => {
        assert.throws(
            () => new Token('fox', 0, 3, 0).inContext(),
            (error: unknown) => error instanceof AlignCoreError && error.message === '[Token] Token("fox") has no source text.',
        );
    });
});

// =============== joinTokens ===============

suite('joinTokens', () => {

    test('should keep touching tokens together', () => {
        const tokens = [new Token('can', 0, 3, 0), new Token("'t", 3, 5, 1), new Token('stop', 6, 10, 2)];
        assert.strictEqual(joinTokens(tokens, false), "can't stop");
    });

    test('should collapse wide gaps to one space', () => {
        const tokens = [new Token('far', 0, 3, 0), new Token('apart', 10, 15, 1)];
        assert.strictEqual(joinTokens(tokens, false), 'far apart');
        assert.strictEqual(joinTokens([], false), '');
    });
});

// =============== TokenList ===============

suite('TokenList', () => {

    const list = makeTokenList(['the', 'quick', 'brown', 'fox']);

    test('should expose its tokens', () => {
        assert.strictEqual(list.length, 4);
        assert.deepStrictEqual(list.raw, ['the', 'quick', 'brown', 'fox']);
        assert.strictEqual(tokenAt(list, -1).raw, 'fox');
        assert.strictEqual(list.at(4), undefined);
        assert.strictEqual(list.toArray().length, 4);
        assert.ok(Object.isFrozen(list.toArray()));
    });

    test('should look tokens up by character offset', () => {
        assert.strictEqual(list.startIndexToToken(4), list.at(1));
        assert.strictEqual(list.endIndexToToken(15), list.at(2));
        assert.strictEqual(list.startIndexToToken(5), undefined);
        assert.strictEqual(list.endIndexToToken(4), undefined);
    });

    test('should report raw positions of a text', () => {
        const repeated = makeTokenList(['to', 'be', 'or', 'not', 'to', 'be']);
        assert.deepStrictEqual([...repeated.indices('be', false)], [1, 5]);
        assert.strictEqual(repeated.indices('question', false).size, 0);
    });

    test('should report positions within a slice', () => {
        const tail = list.slice(2);
        assert.deepStrictEqual([...tail.indices('fox', false)], [1]);
        assert.strictEqual(tokenAt(tail, 1).index, 3);
    });

    test('should report normalized positions per pipeline', () => {
        const dataset = makeDataset();
        const tokens = dataset.add('The cat saw THE dog', 'the cat saw the dog').ref.tokens;
        assert.deepStrictEqual([...tokens.indices('the')], [0, 3]);
        assert.deepStrictEqual([...tokens.indices('THE', false)], [3]);
        assert.strictEqual(tokens.indices('the', false).size, 0);
        assert.deepStrictEqual(tokens.normalized, ['the', 'cat', 'saw', 'the', 'dog']);
    });

    test('should build n-grams', () => {
        assert.deepStrictEqual(list.ngrams(2, false), ['the quick', 'quick brown', 'brown fox']);
        assert.deepStrictEqual(list.ngrams(4, false), ['the quick brown fox']);
        assert.deepStrictEqual(list.ngrams(5, false), []);
        assert.throws(() => list.ngrams(0, false), RangeError);
    });

    test('should join, concatenate and print', () => {
        assert.strictEqual(list.join(false), 'the quick brown fox');
        const joined = list.slice(0, 1).concat(list.slice(3));
        assert.deepStrictEqual(joined.raw, ['the', 'fox']);
        assert.strictEqual(joined.toString(), 'TokenList([Token("the"), Token("fox")])');
        assert.deepStrictEqual([...joined].map(t => t.index), [0, 3]);
    });

    test('should reject tokenizer output that does not match its source', () => {
        assert.throws(
            () => TokenList.fromSpans([{ raw: 'a', start: 0, end: 1 }, { raw: 'BC', start: 2, end: 4 }], makeSource('a bc')),
            RangeError,
        );
        assert.strictEqual(TokenList.fromSpans([{ raw: 'BC', start: 2, end: 4 }]).length, 1);
    });

    test('should number tokenizer output and link it to its source', () => {
        const source = makeSource('a bc');
        const fromSpans = TokenList.fromSpans([{ raw: 'a', start: 0, end: 1 }, { raw: 'bc', start: 2, end: 4 }], source);
        assert.deepStrictEqual([...fromSpans].map(t => t.index), [0, 1]);
        assert.strictEqual(tokenAt(fromSpans, 1).src, source);
        assert.strictEqual(tokenAt(fromSpans, 1).inContext(2), 'a bc');
    });
});
