import { InvalidMatchExpressionError } from '../types/errors';

export type MatchNode =
    | { kind: 'term'; value: string }
    | { kind: 'phrase'; words: string[] }
    | { kind: 'and'; children: MatchNode[] }
    | { kind: 'or'; children: MatchNode[] };

/**
 * A validated boolean keyword expression. Only produced by
 * `compileMatchExpression`, so every word in it is plain letters and digits.
 */
export interface MatchExpression {
    source: string;
    root: MatchNode;
}

type Token =
    | { type: 'operand'; node: MatchNode }
    | { type: 'operator'; op: 'AND' | 'OR' };

export const MAX_MATCH_TERMS = 32;

// Full-text query control syntax; never passed through
const FORBIDDEN_CHARS = new Set(['*', ':', '&', '|', '!', '(', ')', '<', '>', '^', '\\', '{', '}', '[', ']', '~', '+']);
const RESERVED_WORDS = new Set(['NOT', 'NEAR']);
const WORD_SPLIT = /[^\p{L}\p{N}]+/u;

function splitWords(raw: string): string[] {
    return raw
        .split(WORD_SPLIT)
        .filter(word => word.length > 0)
        .map(word => word.toLowerCase());
}

function wordsToNode(words: string[]): MatchNode {
    return words.length === 1
        ? { kind: 'term', value: words[0] }
        : { kind: 'phrase', words };
}

function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < input.length) {
        const ch = input[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        if (FORBIDDEN_CHARS.has(ch)) {
            throw new InvalidMatchExpressionError(input, `unsupported character "${ch}" at position ${i}`);
        }

        if (ch === '"') {
            const close = input.indexOf('"', i + 1);
            if (close === -1) {
                throw new InvalidMatchExpressionError(input, `unbalanced quote at position ${i}`);
            }
            const inner = input.slice(i + 1, close);
            for (const c of inner) {
                if (FORBIDDEN_CHARS.has(c)) {
                    throw new InvalidMatchExpressionError(input, `unsupported character "${c}" inside phrase`);
                }
            }
            const words = splitWords(inner);
            if (words.length === 0) {
                throw new InvalidMatchExpressionError(input, 'empty phrase');
            }
            tokens.push({ type: 'operand', node: { kind: 'phrase', words } });
            i = close + 1;
            continue;
        }

        let end = i;
        while (end < input.length && !/\s/.test(input[end]) && input[end] !== '"') {
            if (FORBIDDEN_CHARS.has(input[end])) {
                throw new InvalidMatchExpressionError(input, `unsupported character "${input[end]}" at position ${end}`);
            }
            end++;
        }
        const raw = input.slice(i, end);
        i = end;

        if (raw === 'AND' || raw === 'OR') {
            tokens.push({ type: 'operator', op: raw });
            continue;
        }
        if (RESERVED_WORDS.has(raw)) {
            throw new InvalidMatchExpressionError(input, `operator ${raw} is not supported`);
        }

        const words = splitWords(raw);
        if (words.length > 0) {
            tokens.push({ type: 'operand', node: wordsToNode(words) });
        }
    }

    return tokens;
}

function countWords(node: MatchNode): number {
    switch (node.kind) {
        case 'term':
            return 1;
        case 'phrase':
            return node.words.length;
        case 'and':
        case 'or':
            return node.children.reduce((sum, child) => sum + countWords(child), 0);
    }
}

function combine(kind: 'and' | 'or', children: MatchNode[]): MatchNode {
    return children.length === 1 ? children[0] : { kind, children };
}

/**
 * Compile a free-text topic slot into a match expression.
 *
 * Grammar: terms, "quoted phrases", and upper-case AND / OR, with AND binding
 * tighter and adjacent operands implicitly ANDed. Anything that could change
 * query semantics downstream (wildcards, column filters, grouping, negation,
 * unbalanced quotes, dangling operators) is rejected rather than escaped.
 */
export function compileMatchExpression(input: string): MatchExpression {
    const tokens = tokenize(input);

    if (tokens.length === 0) {
        throw new InvalidMatchExpressionError(input, 'expression has no searchable terms');
    }

    const disjuncts: MatchNode[] = [];
    let conjuncts: MatchNode[] = [];
    let expectOperand = true;

    for (const token of tokens) {
        if (token.type === 'operator') {
            if (expectOperand) {
                throw new InvalidMatchExpressionError(input, `dangling operator ${token.op}`);
            }
            if (token.op === 'OR') {
                disjuncts.push(combine('and', conjuncts));
                conjuncts = [];
            }
            expectOperand = true;
            continue;
        }
        conjuncts.push(token.node);
        expectOperand = false;
    }

    if (expectOperand) {
        throw new InvalidMatchExpressionError(input, 'expression ends with an operator');
    }
    disjuncts.push(combine('and', conjuncts));

    const root = combine('or', disjuncts);
    if (countWords(root) > MAX_MATCH_TERMS) {
        throw new InvalidMatchExpressionError(input, `more than ${MAX_MATCH_TERMS} terms`);
    }

    return { source: input, root };
}

function renderTsQuery(node: MatchNode, nested: boolean): string {
    switch (node.kind) {
        case 'term':
            return node.value;
        case 'phrase': {
            const phrase = node.words.join(' <-> ');
            return node.words.length > 1 ? `(${phrase})` : phrase;
        }
        case 'and':
        case 'or': {
            const joined = node.children
                .map(child => renderTsQuery(child, true))
                .join(node.kind === 'and' ? ' & ' : ' | ');
            return nested ? `(${joined})` : joined;
        }
    }
}

/**
 * Render for Postgres `to_tsquery`. Safe to bind as a parameter: words are
 * letters and digits only, operators come from the AST.
 */
export function toTsQuery(expression: MatchExpression): string {
    return renderTsQuery(expression.root, false);
}
