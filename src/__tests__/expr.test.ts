// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Term Model Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import {
    Expr, add, allSymbols, needsParensInMul, showExponentialAsPower,
} from '../core/expr';
import { ExprMap } from '../core/expr-map';

const f = Expr.symbol('f');
const x = Expr.symbol('x');
const y = Expr.symbol('y');
const Add = Expr.symbol('Add');
const Div = Expr.symbol('Div');
const Sin = Expr.symbol('Sin');
const Sqrt = Expr.symbol('Sqrt');

describe('Expr construction', () => {
    it('interns symbols by name', () => {
        expect(Expr.symbol('x')).toBe(x);
    });

    it('coerces numbers and strings', () => {
        expect(Expr.from(3).integerValue).toBe(3n);
        expect(Expr.from('hello').textValue).toBe('hello');
        expect(Expr.from(x)).toBe(x);
    });

    it('rejects non-integer numbers', () => {
        expect(() => Expr.integer(1.5)).toThrow(TypeError);
    });

    it('exposes head and arguments of applications only', () => {
        const e = f.of(1, x);
        expect(e.head()).toBe(f);
        expect(e.args()?.map(a => a.toString())).toEqual(['1', 'x']);
        expect(x.head()).toBeNull();
        expect(x.args()).toBeNull();
        expect(x.isAtom()).toBe(true);
        expect(e.isAtom()).toBe(false);
    });
});

describe('Expr equality', () => {
    it('compares applications structurally', () => {
        const a = f.of(1, Expr.text('a'));
        const b = f.of(1, Expr.text('a'));
        expect(a).not.toBe(b);
        expect(a.equals(b)).toBe(true);
        expect(a.hash()).toBe(b.hash());
    });

    it('distinguishes atoms of different kinds', () => {
        expect(Expr.integer(1).equals(Expr.text('1'))).toBe(false);
        expect(Expr.symbol('a').equals(Expr.text('a'))).toBe(false);
    });

    it('distinguishes argument order', () => {
        expect(f.of(x, y).equals(f.of(y, x))).toBe(false);
    });
});

describe('source form', () => {
    it('quotes and escapes text', () => {
        expect(f.of(1, Expr.text('a"b')).toString()).toBe('f(1, "a\\"b")');
    });

    it('puts entry items on separate lines', () => {
        const entry = Expr.symbol('Entry').of(Expr.symbol('ID').of('x1'), Expr.symbol('Formula').of(y));
        expect(entry.toString()).toBe('Entry(ID("x1"),\n    Formula(y))');
    });

    it('builds arithmetic applications', () => {
        expect(x.add(1).toString()).toBe('Add(x, 1)');
        expect(add(1, x).toString()).toBe('Add(1, x)');
        expect(x.neg().toString()).toBe('Neg(x)');
        expect(x.pow(y).div(2).toString()).toBe('Div(Pow(x, y), 2)');
    });
});

describe('allSymbols', () => {
    it('lists symbols depth-first with duplicates removed', () => {
        const e = Add.of(x.mul(y), x);
        expect(allSymbols(e).map(s => s.toString())).toEqual(['Add', 'Mul', 'x', 'y']);
    });
});

describe('shape predicates', () => {
    it('parenthesizes sums and negative integers in products', () => {
        expect(needsParensInMul(Expr.integer(-2))).toBe(true);
        expect(needsParensInMul(x.add(1))).toBe(true);
        expect(needsParensInMul(x.sub(1))).toBe(true);
        expect(needsParensInMul(x.neg())).toBe(false);
        expect(needsParensInMul(x.mul(y))).toBe(false);
        expect(needsParensInMul(x)).toBe(false);
    });

    it('shows simple exponents as powers', () => {
        expect(showExponentialAsPower(x)).toBe(true);
        expect(showExponentialAsPower(Div.of(x, 2))).toBe(true);
        expect(showExponentialAsPower(x.add(Sqrt.of(y)))).toBe(true);
    });

    it('keeps exp notation for compound denominators and nested divisions', () => {
        expect(showExponentialAsPower(Div.of(x, y.add(1)))).toBe(false);
        expect(showExponentialAsPower(Div.of(Div.of(x, 2), y))).toBe(false);
        expect(showExponentialAsPower(Sin.of(x))).toBe(false);
    });
});

describe('ExprMap', () => {
    it('finds values by structurally equal keys', () => {
        const map = new ExprMap<string>();
        map.set(f.of(x), 'first');
        expect(map.get(f.of(x))).toBe('first');
        expect(map.has(f.of(y))).toBe(false);

        map.set(f.of(x), 'second');
        expect(map.size).toBe(1);
        expect(map.get(f.of(x))).toBe('second');

        expect(map.delete(f.of(x))).toBe(true);
        expect(map.size).toBe(0);
        expect(map.delete(f.of(x))).toBe(false);
    });
});
