// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Symbol Table Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Expr } from '../core/expr';
import { SealedRegistryError, UnknownSymbolError } from '../core/errors';
import { createDefaultSymbolTable, SymbolTable } from '../core/symbols';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('spelling', () => {
    const table = createDefaultSymbolTable();

    it('spells variables as letters', () => {
        expect(table.spell(Expr.symbol('x'))).toBe('x');
        expect(table.spell(Expr.symbol('alpha'))).toBe('\\alpha');
        expect(table.spell(Expr.symbol('Gamma'))).toBe('\\Gamma');
        expect(table.spell(Expr.symbol('epsilon'))).toBe('\\varepsilon');
    });

    it('uses spelling overrides', () => {
        expect(table.spell(Expr.symbol('GammaFunction'))).toBe('\\Gamma');
        expect(table.spell(Expr.symbol('ConstPi'))).toBe('\\pi');
        expect(table.spell(Expr.symbol('Infinity'))).toBe('\\infty');
    });

    it('wraps other builtins as operator names', () => {
        expect(table.spell(Expr.symbol('Re'))).toBe('\\operatorname{Re}');
    });

    it('warns once about unregistered symbols', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const fresh = createDefaultSymbolTable();
        expect(fresh.spell(Expr.symbol('Mystery'))).toBe('\\operatorname{Mystery}');
        expect(fresh.spell(Expr.symbol('Mystery'))).toBe('\\operatorname{Mystery}');
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith('[Symbols] rendering unregistered symbol Mystery');
    });
});

describe('registration', () => {
    it('resolves printing kinds when a symbol is registered', () => {
        const table = createDefaultSymbolTable();
        expect(table.lookup('Sum')?.form).toBe('Sum');
        expect(table.lookup('Entry')?.structural).toBe('Entry');
        expect(table.lookup('Description')?.form).toBe('Description');
        expect(table.lookup('Description')?.structural).toBe('Description');
        expect(table.lookup('Element')?.infix).toBe('\\in');
        expect(table.lookup('LegendrePolynomial')?.subscriptCall).toBe('P');
    });

    it('returns registered symbols by name', () => {
        const table = createDefaultSymbolTable();
        const [Equal, GammaFunction] = table.symbols('Equal GammaFunction');
        expect(Equal).toBe(Expr.symbol('Equal'));
        expect(GammaFunction).toBe(Expr.symbol('GammaFunction'));
        expect(() => table.symbol('Nope')).toThrow(UnknownSymbolError);
    });

    it('refuses changes once sealed', () => {
        const table = new SymbolTable();
        table.registerBuiltins('Foo');
        table.seal();
        expect(table.isSealed).toBe(true);
        expect(() => table.registerBuiltins('Bar')).toThrow(SealedRegistryError);
        expect(() => table.setSpelling('Foo', 'F')).toThrow(SealedRegistryError);
        expect(() => table.setOverride(Expr.symbol('Foo').of(1), 'F_1')).toThrow(SealedRegistryError);
        expect(table.registerBuiltins('Foo')).toEqual([Expr.symbol('Foo')]);
    });

    it('excludes core logic and set symbols from definitions', () => {
        const table = createDefaultSymbolTable();
        expect(table.isExcludedFromDefinitions(Expr.symbol('And'))).toBe(true);
        expect(table.isExcludedFromDefinitions(Expr.symbol('GammaFunction'))).toBe(false);
    });
});

describe('descriptions', () => {
    it('records descriptions in order and warns on replacement', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const table = createDefaultSymbolTable();
        const [GammaFunction, Sin, z] = table.symbols('GammaFunction Sin z');
        table.describeBrief(GammaFunction, GammaFunction.of(z), 'Gamma function', 'test-entry');
        table.describe(Sin, Sin.of(z), [Expr.symbol('CC')], Expr.symbol('CC'), 'Sine');
        expect(table.describedSymbols()).toEqual([GammaFunction, Sin]);
        expect(table.description(GammaFunction)?.domainTable).toBe('test-entry');
        expect(warn).not.toHaveBeenCalled();

        table.describeBrief(GammaFunction, GammaFunction.of(z), 'The gamma function');
        expect(warn).toHaveBeenCalledWith('[Symbols] replacing description of GammaFunction');
        expect(table.description(GammaFunction)?.description).toBe('The gamma function');
        expect(table.describedSymbols()).toHaveLength(2);
    });
});
