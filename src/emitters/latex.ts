// ─────────────────────────────────────────────────────────────
// Mathweave  ·  LaTeX Emitter
// Recursive tree-walk from Expr to LaTeX source, dispatching
// on the head of each application
// ─────────────────────────────────────────────────────────────

import type { Expr } from '../core/expr';
import { ExprMap } from '../core/expr-map';
import type { LatexFormKind } from '../core/forms';
import type { SymbolTable } from '../core/symbols';
import { arithmeticRules } from './latex-rules/arithmetic';
import { calculusRules } from './latex-rules/calculus';
import { collectionRules } from './latex-rules/collections';
import { functionRules } from './latex-rules/functions';
import { logicRules } from './latex-rules/logic';

/**
 * Printing rule for one special form. Returning `undefined` declines the
 * expression and it falls through to generic call notation.
 */
export type LatexRule = (r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind) => string | undefined;

export type LatexRuleGroup = Partial<Record<LatexFormKind, LatexRule>>;

const LATEX_RULES: Record<LatexFormKind, LatexRule> = {
    ...arithmeticRules,
    ...calculusRules,
    ...collectionRules,
    ...functionRules,
    ...logicRules,
};

// ── Cache ───────────────────────────────────────────────────

/** Rendered LaTeX per (expression, compactness). Expressions never change, so entries never expire. */
export class LatexCache {
    private normal = new ExprMap<string>();
    private small = new ExprMap<string>();

    get(expr: Expr, inSmall: boolean): string | undefined {
        return (inSmall ? this.small : this.normal).get(expr);
    }

    set(expr: Expr, inSmall: boolean, latex: string): void {
        (inSmall ? this.small : this.normal).set(expr, latex);
    }

    get size(): number {
        return this.normal.size + this.small.size;
    }
}

// ── Renderer ────────────────────────────────────────────────

export class LatexRenderer {
    readonly cache = new LatexCache();

    /** Seals `table`: spellings must not change under a populated cache. */
    constructor(readonly table: SymbolTable) {
        table.seal();
    }

    latex(expr: Expr, inSmall: boolean = false): string {
        const hit = this.cache.get(expr, inSmall);
        if (hit !== undefined) return hit;
        const tex = this.render(expr, inSmall);
        this.cache.set(expr, inSmall, tex);
        return tex;
    }

    /** Renders every expression with the same compactness. */
    each(args: readonly Expr[], inSmall: boolean): string[] {
        return args.map(arg => this.latex(arg, inSmall));
    }

    /** Name of the head symbol of an application. */
    headName(e: Expr): string | undefined {
        return e.head()?.symbolName;
    }

    /** Subscript-call spelling of the head of `e`, e.g. `P` for LegendrePolynomial. */
    subscriptCallOf(e: Expr): string | undefined {
        const head = e.head();
        return head ? this.table.lookup(head)?.subscriptCall : undefined;
    }

    private render(expr: Expr, inSmall: boolean): string {
        const fixed = this.table.override(expr);
        if (fixed !== undefined) return fixed;
        const d = expr.data;
        switch (d.tag) {
            case 'Symbol': return this.table.spell(expr);
            case 'Integer': return d.value.toString();
            case 'Text': return '\\text{``' + d.value.replace(/_/g, '\\_') + "''}";
            case 'Application': break;
        }

        const [head, ...args] = d.parts;
        const info = this.table.lookup(head);

        if (info?.infix !== undefined) {
            return this.each(args, inSmall).join(` ${info.infix} `);
        }

        // F(n, x, ...) -> F_n(x, ...)
        if (info?.subscriptCall !== undefined) {
            const sub = args.length > 0 ? this.latex(args[0], true) : '';
            const rest = this.each(args.slice(1), inSmall).join(', ');
            return `${info.subscriptCall}_{${sub}}\\!\\left(${rest}\\right)`;
        }

        if (info?.form !== undefined) {
            const tex = LATEX_RULES[info.form](this, args, inSmall, info.form);
            if (tex !== undefined) return tex;
        }

        const spacer = inSmall ? '' : '\\!';
        return `${this.latex(head)}${spacer}\\left(${this.each(args, inSmall).join(', ')}\\right)`;
    }
}
