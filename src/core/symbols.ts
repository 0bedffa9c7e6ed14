// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Symbol Table
// Canonical symbols plus their LaTeX spellings and descriptions
// ─────────────────────────────────────────────────────────────

import { Expr } from './expr';
import { ExprMap } from './expr-map';
import { SealedRegistryError, UnknownSymbolError } from './errors';
import { isLatexForm, isStructuralForm, type LatexFormKind, type StructuralKind } from './forms';
import builtinData from './data/builtins.json';
import variableData from './data/variables.json';
import spellingData from './data/spellings.json';

// ── Metadata ────────────────────────────────────────────────

export interface SymbolInfo {
    name: string;
    symbol: Expr;
    variable: boolean;
    latex?: string;
    infix?: string;
    subscriptCall?: string;
    form?: LatexFormKind;
    structural?: StructuralKind;
}

export interface SymbolDescription {
    example: Expr;
    domain: readonly Expr[] | null;
    codomain: Expr | null;
    description: string;
    /** Id of the entry holding the domain table. */
    domainTable?: string;
    longDescription?: Expr;
}

type Names = string | readonly string[];

function splitNames(names: Names): readonly string[] {
    return typeof names === 'string' ? names.split(/\s+/).filter(Boolean) : names;
}

function nameOf(symbol: Expr | string): string {
    if (typeof symbol === 'string') return symbol;
    const name = symbol.symbolName;
    if (name === undefined) throw new TypeError(`Not a symbol: ${symbol.toString()}`);
    return name;
}

// ── Symbol table ────────────────────────────────────────────

export class SymbolTable {
    private infos = new Map<string, SymbolInfo>();
    private overrides = new ExprMap<string>();
    private descriptions = new ExprMap<SymbolDescription>();
    private describedOrder: Expr[] = [];
    private excluded = new Set<string>();
    private warned = new Set<string>();
    private sealed = false;

    get isSealed(): boolean { return this.sealed; }

    /** Blocks further registration and spelling changes. Descriptions stay writable. */
    seal(): void {
        this.sealed = true;
    }

    registerBuiltins(names: Names): Expr[] {
        return splitNames(names).map(name => this.register(name, false));
    }

    registerVariables(names: Names): Expr[] {
        return splitNames(names).map(name => this.register(name, true));
    }

    private register(name: string, variable: boolean): Expr {
        const existing = this.infos.get(name);
        if (existing) {
            if (variable && !existing.variable) {
                this.guard(`mark ${name} as a variable`);
                existing.variable = true;
            }
            return existing.symbol;
        }
        this.guard(`register ${name}`);
        const info: SymbolInfo = { name, symbol: Expr.symbol(name), variable };
        if (isLatexForm(name)) info.form = name;
        if (isStructuralForm(name)) info.structural = name;
        this.infos.set(name, info);
        return info.symbol;
    }

    setSpelling(name: string, latex: string): void {
        this.edit(name, 'set spelling').latex = latex;
    }

    setInfix(name: string, latex: string): void {
        this.edit(name, 'set infix spelling').infix = latex;
    }

    setSubscriptCall(name: string, latex: string): void {
        this.edit(name, 'set subscript-call spelling').subscriptCall = latex;
    }

    /** Fixed LaTeX for one whole expression, checked before any other rule. */
    setOverride(expr: Expr, latex: string): void {
        this.guard(`set override for ${expr.toString()}`);
        this.overrides.set(expr, latex);
    }

    excludeFromDefinitions(names: Names): void {
        for (const name of splitNames(names)) this.excluded.add(name);
    }

    private edit(name: string, action: string): SymbolInfo {
        this.guard(`${action} for ${name}`);
        const info = this.infos.get(name);
        if (!info) throw new UnknownSymbolError(name);
        return info;
    }

    private guard(action: string): void {
        if (this.sealed) throw new SealedRegistryError(action);
    }

    // ── Lookup ──────────────────────────────────────────────

    lookup(symbol: Expr | string): SymbolInfo | undefined {
        const name = typeof symbol === 'string' ? symbol : symbol.symbolName;
        return name === undefined ? undefined : this.infos.get(name);
    }

    override(expr: Expr): string | undefined {
        return this.overrides.get(expr);
    }

    has(name: string): boolean {
        return this.infos.has(name);
    }

    symbol(name: string): Expr {
        const info = this.infos.get(name);
        if (!info) throw new UnknownSymbolError(name);
        return info.symbol;
    }

    /** `symbols('Equal GammaFunction')` → `[Equal, GammaFunction]`. */
    symbols(names: Names): Expr[] {
        return splitNames(names).map(name => this.symbol(name));
    }

    /** LaTeX for a symbol atom. */
    spell(symbol: Expr): string {
        const name = nameOf(symbol);
        const info = this.infos.get(name);
        if (!info) {
            if (!this.warned.has(name)) {
                this.warned.add(name);
                console.warn(`[Symbols] rendering unregistered symbol ${name}`);
            }
            return `\\operatorname{${name}}`;
        }
        if (info.latex !== undefined) return info.latex;
        if (!info.variable) return `\\operatorname{${name}}`;
        if (name.length === 1) return name;
        if (name === 'epsilon') return '\\varepsilon';
        return '\\' + name;
    }

    isExcludedFromDefinitions(symbol: Expr): boolean {
        const name = symbol.symbolName;
        return name !== undefined && this.excluded.has(name);
    }

    // ── Descriptions ────────────────────────────────────────

    describe(symbol: Expr, example: Expr, domain: readonly Expr[] | null, codomain: Expr | null, description: string): void {
        this.putDescription(symbol, { example, domain, codomain, description });
    }

    describeBrief(symbol: Expr, example: Expr, description: string, domainTable?: string, longDescription?: Expr): void {
        this.putDescription(symbol, { example, domain: null, codomain: null, description, domainTable, longDescription });
    }

    private putDescription(symbol: Expr, desc: SymbolDescription): void {
        const name = nameOf(symbol);
        if (this.descriptions.has(symbol)) {
            console.warn(`[Symbols] replacing description of ${name}`);
        } else {
            this.describedOrder.push(symbol);
        }
        this.descriptions.set(symbol, desc);
    }

    description(symbol: Expr): SymbolDescription | undefined {
        return this.descriptions.get(symbol);
    }

    describedSymbols(): readonly Expr[] {
        return this.describedOrder;
    }
}

// ── Default table ───────────────────────────────────────────

export function createDefaultSymbolTable(): SymbolTable {
    const table = new SymbolTable();
    table.registerBuiltins(builtinData.builtins);
    table.registerBuiltins(builtinData.document);
    table.registerVariables(variableData.latin);
    table.registerVariables(variableData.greek);
    table.registerVariables(variableData.greekUpper);
    table.excludeFromDefinitions(builtinData.excludedFromDefinitions);

    const spellings: { symbols: Record<string, string>; infix: Record<string, string>; subscriptCall: Record<string, string> } = spellingData;
    for (const [name, latex] of Object.entries(spellings.symbols)) table.setSpelling(name, latex);
    for (const [name, latex] of Object.entries(spellings.infix)) table.setInfix(name, latex);
    for (const [name, latex] of Object.entries(spellings.subscriptCall)) table.setSubscriptCall(name, latex);
    return table;
}
