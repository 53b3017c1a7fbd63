// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Formula & Sequent Parser
// Unicode and ASCII notation, recursive descent
// ─────────────────────────────────────────────────────────────

import { fm, type Formula, type TwoSidedSequent } from '../core/ir';
import { negate } from '../core/formula';

// ── Tokens ──────────────────────────────────────────────────

export type TokenType =
    | 'IDENT'
    | 'ONE' | 'ZERO' | 'TOP' | 'BOTTOM'
    | 'TENSOR' | 'PAR' | 'LOLLI' | 'WITH' | 'PLUS'
    | 'BANG' | 'QUEST' | 'NEG'
    | 'TURNSTILE' | 'COMMA' | 'LPAREN' | 'RPAREN'
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    pos: number;
}

export type ParseErrorKind = 'EmptyInput' | 'UnexpectedToken' | 'UnexpectedEnd' | 'UnknownOperator';

export class ParseError extends Error {
    constructor(message: string, readonly kind: ParseErrorKind, readonly position: number) {
        super(message);
        this.name = 'ParseError';
    }
}

const SYMBOLS: Record<string, TokenType> = {
    '|-': 'TURNSTILE', '⊢': 'TURNSTILE',
    '-o': 'LOLLI', '⊸': 'LOLLI',
    '*': 'TENSOR', '⊗': 'TENSOR',
    '|': 'PAR', '⅋': 'PAR',
    '&': 'WITH',
    '+': 'PLUS', '⊕': 'PLUS',
    '!': 'BANG', '?': 'QUEST',
    '^': 'NEG', '⊥': 'BOTTOM',
    '⊤': 'TOP',
    '1': 'ONE', '0': 'ZERO',
    ',': 'COMMA', '(': 'LPAREN', ')': 'RPAREN',
};

const KEYWORDS: Record<string, TokenType> = {
    one: 'ONE', zero: 'ZERO', top: 'TOP', bot: 'BOTTOM', bottom: 'BOTTOM',
};

// longest symbols first so `|-` wins over `|`
const SYMBOL_KEYS = Object.keys(SYMBOLS).sort((a, b) => b.length - a.length);

export function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < input.length) {
        const ch = input[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        if (/[A-Za-z_]/.test(ch)) {
            let ident = '';
            while (i < input.length && /[A-Za-z0-9_']/.test(input[i])) { ident += input[i]; i++; }
            tokens.push({ type: KEYWORDS[ident] ?? 'IDENT', value: ident, pos: i - ident.length });
            continue;
        }

        const symbol = SYMBOL_KEYS.find(s => input.startsWith(s, i));
        if (symbol === undefined) {
            throw new ParseError(`Unknown operator '${ch}' at position ${i}`, 'UnknownOperator', i);
        }
        tokens.push({ type: SYMBOLS[symbol], value: symbol, pos: i });
        i += symbol.length;
    }

    tokens.push({ type: 'EOF', value: '', pos: input.length });
    return tokens;
}

// ── Recursive-descent parser ────────────────────────────────
//
// Loosest to tightest:  ⊸ (right)  ⅋  ⊗  ⊕  &  then prefix ! ?
// and postfix negation. Binary operators other than ⊸ associate left.

class FormulaParser {
    private pos = 0;

    constructor(private readonly tokens: Token[]) {}

    private peek(): Token {
        return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
    }

    private advance(): Token {
        const tok = this.peek();
        if (tok.type !== 'EOF') this.pos++;
        return tok;
    }

    private match(type: TokenType): boolean {
        if (this.peek().type !== type) return false;
        this.advance();
        return true;
    }

    private expect(type: TokenType, what: string): Token {
        const tok = this.peek();
        if (tok.type !== type) throw this.unexpected(tok, what);
        return this.advance();
    }

    private unexpected(tok: Token, expected: string): ParseError {
        if (tok.type === 'EOF') {
            return new ParseError(`Unexpected end of input, expected ${expected}`, 'UnexpectedEnd', tok.pos);
        }
        return new ParseError(
            `Unexpected '${tok.value}' at position ${tok.pos}, expected ${expected}`,
            'UnexpectedToken',
            tok.pos,
        );
    }

    isAtEnd(): boolean {
        return this.peek().type === 'EOF';
    }

    finish(): void {
        if (!this.isAtEnd()) throw this.unexpected(this.peek(), 'end of input');
    }

    // ── Sequents ──────────────────────────────────────────

    sequent(): TwoSidedSequent {
        const before = this.peek().type === 'TURNSTILE' ? [] : this.formulaList();
        if (!this.match('TURNSTILE')) {
            this.finish();
            return { antecedent: [], succedent: before };
        }
        const after = this.isAtEnd() ? [] : this.formulaList();
        this.finish();
        return { antecedent: before, succedent: after };
    }

    private formulaList(): Formula[] {
        const list = [this.formula()];
        while (this.match('COMMA')) list.push(this.formula());
        return list;
    }

    // ── Formulas ──────────────────────────────────────────

    formula(): Formula {
        return this.lolli();
    }

    private lolli(): Formula {
        const left = this.par();
        if (this.match('LOLLI')) return fm.lolli(left, this.lolli());
        return left;
    }

    private par(): Formula {
        let left = this.tensor();
        while (this.match('PAR')) left = fm.par(left, this.tensor());
        return left;
    }

    private tensor(): Formula {
        let left = this.plus();
        while (this.match('TENSOR')) left = fm.tensor(left, this.plus());
        return left;
    }

    private plus(): Formula {
        let left = this.with();
        while (this.match('PLUS')) left = fm.plus(left, this.with());
        return left;
    }

    private with(): Formula {
        let left = this.unary();
        while (this.match('WITH')) left = fm.with(left, this.unary());
        return left;
    }

    private unary(): Formula {
        if (this.match('BANG')) return fm.ofCourse(this.unary());
        if (this.match('QUEST')) return fm.whyNot(this.unary());
        return this.postfix();
    }

    /** `A⊥` and `A^`. A `⊥` right after an operand negates it. */
    private postfix(): Formula {
        let f = this.primary();
        for (;;) {
            const tok = this.peek();
            if (tok.type === 'NEG' || (tok.type === 'BOTTOM' && tok.value === '⊥')) {
                this.advance();
                f = negate(f);
                continue;
            }
            return f;
        }
    }

    private primary(): Formula {
        const tok = this.peek();
        switch (tok.type) {
            case 'IDENT': this.advance(); return fm.atom(tok.value);
            case 'ONE': this.advance(); return fm.one;
            case 'ZERO': this.advance(); return fm.zero;
            case 'TOP': this.advance(); return fm.top;
            case 'BOTTOM': this.advance(); return fm.bottom;
            case 'LPAREN': {
                this.advance();
                const inner = this.formula();
                this.expect('RPAREN', "')'");
                return inner;
            }
            default:
                throw this.unexpected(tok, 'a formula');
        }
    }
}

// ── Public API ──────────────────────────────────────────────

function parserFor(input: string): FormulaParser {
    if (input.trim() === '') throw new ParseError('Empty input', 'EmptyInput', 0);
    return new FormulaParser(tokenize(input));
}

export function parseFormula(input: string): Formula {
    const parser = parserFor(input);
    const f = parser.formula();
    parser.finish();
    return f;
}

/**
 * `Γ ⊢ Δ` with either side possibly empty. Without a turnstile the
 * formulas are read as the succedent of a one-sided sequent.
 */
export function parseSequent(input: string): TwoSidedSequent {
    return parserFor(input).sequent();
}
