// ─────────────────────────────────────────────────────────────
// Mathweave  ·  LaTeX Rules: Collections and Grouping
// ─────────────────────────────────────────────────────────────

import { Expr } from '../../core/expr';
import { expectArity, ExprShapeError } from '../../core/errors';
import type { LatexFormKind } from '../../core/forms';
import type { LatexRenderer, LatexRuleGroup } from '../latex';

const Tuple = Expr.symbol('Tuple');
const Otherwise = Expr.symbol('Otherwise');
const Matrix2x2 = Expr.symbol('Matrix2x2');

const INTERVAL_DELIMITERS: Partial<Record<LatexFormKind, [string, string]>> = {
    ClosedInterval: ['[', ']'],
    OpenInterval: ['(', ')'],
    ClosedOpenInterval: ['[', ')'],
    OpenClosedInterval: ['(', ']'],
};

function renderInterval(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 2);
    const [open, close] = INTERVAL_DELIMITERS[kind] ?? ['[', ']'];
    const [a, b] = r.each(args, inSmall);
    return `\\left${open}${a}, ${b}\\right${close}`;
}

// Each case is Tuple(value, condition); the condition may be Otherwise
function renderCases(r: LatexRenderer, args: readonly Expr[], inSmall: boolean): string {
    const rows = args.map(arg => {
        const parts = arg.hasHead(Tuple) ? arg.args() : null;
        if (!parts || parts.length !== 2) {
            throw new ExprShapeError(`Cases: expected Tuple(value, condition), got ${arg.toString()}`);
        }
        const [value, cond] = parts;
        const c = cond.equals(Otherwise) ? '\\text{otherwise}' : r.latex(cond, inSmall);
        return `${r.latex(value, inSmall)}, & ${c}\\\\`;
    });
    return `\\begin{cases} ${rows.join('')} \\end{cases}`;
}

/** Delimited, full-size rendering of a single argument. */
function grouping(kind: LatexFormKind, open: string, close: string) {
    return (r: LatexRenderer, args: readonly Expr[]): string => {
        expectArity(kind, args.length, 1);
        return `\\left${open}${r.latex(args[0])}\\right${close}`;
    };
}

/** A matrix operator; other arguments print as an ordinary call. */
function matrixOperator(kind: LatexFormKind, name: string) {
    return (r: LatexRenderer, args: readonly Expr[], inSmall: boolean): string | undefined => {
        if (args.length === 0 || !args[0].hasHead(Matrix2x2)) return undefined;
        expectArity(kind, args.length, 1);
        return `\\operatorname{${name}}${r.latex(args[0], inSmall)}`;
    };
}

export const collectionRules = {
    Tuple: (r, args, inSmall) => `\\left(${r.each(args, inSmall).join(', ')}\\right)`,
    Set: (r, args, inSmall) => `\\left\\{${r.each(args, inSmall).join(', ')}\\right\\}`,
    List: (r, args, inSmall) => `\\left[${r.each(args, inSmall).join(', ')}\\right]`,

    SetBuilder: (r, args, inSmall) => {
        expectArity('SetBuilder', args.length, 3);
        const [element, , cond] = r.each(args, inSmall);
        return `\\left\\{ ${element} : ${cond} \\right\\}`;
    },

    Cardinality: (r, args, inSmall) => {
        expectArity('Cardinality', args.length, 1);
        return '\\# ' + r.latex(args[0], inSmall);
    },

    Parentheses: grouping('Parentheses', '(', ')'),
    Brackets: grouping('Brackets', '[', ']'),
    Braces: grouping('Braces', '\\{', '\\}'),

    Call: (r, args, inSmall) => {
        const [f, ...rest] = r.each(args, inSmall);
        return `${f ?? ''}\\!\\left(${rest.join(', ')}\\right)`;
    },

    Subscript: (r, args, inSmall) => {
        expectArity('Subscript', args.length, 2);
        return `{${r.latex(args[0], inSmall)}}_{${r.latex(args[1], true)}}`;
    },

    Matrix2x2: (r, args, inSmall) => {
        expectArity('Matrix2x2', args.length, 4);
        const [a, b, c, d] = r.each(args, inSmall);
        return `\\begin{pmatrix} ${a} & ${b} \\\\ ${c} & ${d} \\end{pmatrix}`;
    },

    Matrix2x1: (r, args, inSmall) => {
        expectArity('Matrix2x1', args.length, 2);
        const [a, b] = r.each(args, inSmall);
        return `\\begin{pmatrix} ${a} \\\\ ${b} \\end{pmatrix}`;
    },

    Spectrum: matrixOperator('Spectrum', 'spec'),
    Det: matrixOperator('Det', 'det'),

    Cases: renderCases,

    ZZGreaterEqual: (r, args, inSmall) => {
        expectArity('ZZGreaterEqual', args.length, 1);
        return `\\mathbb{Z}_{\\ge ${r.latex(args[0], inSmall)}}`;
    },

    ZZLessEqual: (r, args, inSmall) => {
        expectArity('ZZLessEqual', args.length, 1);
        const v = args[0].integerValue;
        if (v !== undefined) return `\\{${v}, ${v - 1n}, \\ldots\\}`;
        return `\\mathbb{Z}_{\\le ${r.latex(args[0], inSmall)}}`;
    },

    ZZBetween: (r, args, inSmall) => {
        expectArity('ZZBetween', args.length, 2);
        const [a, b] = r.each(args, inSmall);
        const v = args[0].integerValue;
        if (v !== undefined) return `\\{${a}, ${v + 1n}, \\ldots ${b}\\}`;
        return `\\{${a}, ${a} + 1, \\ldots ${b}\\}`;
    },

    ClosedInterval: renderInterval,
    OpenInterval: renderInterval,
    ClosedOpenInterval: renderInterval,
    OpenClosedInterval: renderInterval,

    RealBall: (r, args) => {
        expectArity('RealBall', args.length, 2);
        const [mid, rad] = r.each(args, true);
        return `\\left[${mid} \\pm ${rad}\\right]`;
    },

    BernsteinEllipse: (r, args, inSmall) => {
        expectArity('BernsteinEllipse', args.length, 1);
        return `\\mathcal{E}_{${r.latex(args[0], inSmall)}}`;
    },

    Lattice: (r, args, inSmall) => `\\Lambda_{(${r.each(args, inSmall).join(', ')})}`,

    // Printed as a plain call; the arity is still checked
    DomainCodomain: (_r, args) => {
        expectArity('DomainCodomain', args.length, 2);
        return undefined;
    },
} satisfies LatexRuleGroup;
