// test/helpers.ts
import {
    Dataset,
    PipelineRegistry,
    Token,
    TokenList,
    patternTokenizer,
    type EditStep,
    type Op,
    OpType,
} from '../src/index.js';

// =============== TOKENS ===============

/** Tokens of `words` joined by single spaces, with no source text. */
export const makeTokens = (words: string[]): Token[] => {
    const tokens: Token[] = [];
    let offset = 0;
    words.forEach((word, i) => {
        tokens.push(new Token(word, offset, offset + word.length, i));
        offset += word.length + 1;
    });
    return tokens;
};

export const makeTokenList = (words: string[]): TokenList => new TokenList(makeTokens(words));

// =============== EDIT SCRIPTS ===============

/**
 * In-process stand-in for the edit-distance collaborator: a plain
 * Levenshtein table with a backtrace. Matches are left out; inserts carry the
 * reference position they precede and deletes the hypothesis position.
 */
export const levenshteinEditScript = (ref: readonly string[], hyp: readonly string[]): EditStep[] => {
    const n = ref.length;
    const m = hyp.length;
    const d: number[][] = [];
    for (let i = 0; i <= n; i++) {
        d.push([]);
        for (let j = 0; j <= m; j++) {
            if (i === 0) d[i].push(j);
            else if (j === 0) d[i].push(i);
            else {
                const cost = ref[i - 1] === hyp[j - 1] ? 0 : 1;
                d[i].push(Math.min(d[i - 1][j] + 1, d[i][j - 1] + 1, d[i - 1][j - 1] + cost));
            }
        }
    }

    const steps: EditStep[] = [];
    let i = n;
    let j = m;
    while (i > 0 || j > 0) {
        if (i > 0 && j > 0 && ref[i - 1] === hyp[j - 1] && d[i][j] === d[i - 1][j - 1]) {
            i--;
            j--;
        } else if (i > 0 && j > 0 && d[i][j] === d[i - 1][j - 1] + 1) {
            steps.push({ kind: 'substitute', refIndex: i - 1, hypIndex: j - 1 });
            i--;
            j--;
        } else if (i > 0 && d[i][j] === d[i - 1][j] + 1) {
            steps.push({ kind: 'delete', refIndex: i - 1, hypIndex: j });
            i--;
        } else {
            steps.push({ kind: 'insert', refIndex: i, hypIndex: j - 1 });
            j--;
        }
    }
    return steps.reverse();
};

// =============== PIPELINES ===============

export const whitespaceTokenizer = patternTokenizer(/\S+/);

/** Lower-cases and strips everything but letters, digits and apostrophes. */
export const casefold = (token: string): string => token.toLowerCase().replace(/[^\p{L}\p{N}']/gu, '');

export const makeRegistry = (): PipelineRegistry =>
    PipelineRegistry.from({
        standardizers: { default: (text: string) => text.trim() },
        tokenizers: { default: whitespaceTokenizer },
        normalizers: { default: casefold },
    });

export const makeDataset = (): Dataset =>
    new Dataset({ pipelines: makeRegistry(), editScript: levenshteinEditScript });

// =============== ALIGNMENT READING ===============

/** The reference side of an alignment, inserts skipped. */
export const refSide = (ops: Iterable<Op>): string[] => {
    const texts: string[] = [];
    for (const op of ops) {
        if (op.type !== OpType.INSERT) texts.push(op.refText);
    }
    return texts;
};

/** The hypothesis side of an alignment, deletes skipped. */
export const hypSide = (ops: Iterable<Op>): string[] => {
    const texts: string[] = [];
    for (const op of ops) {
        if (op.type !== OpType.DELETE) texts.push(op.hypText);
    }
    return texts;
};

/** Op types as their enum names, for compact assertions. */
export const typeNames = (ops: Iterable<Op>): string[] => [...ops].map(op => OpType[op.type]);
