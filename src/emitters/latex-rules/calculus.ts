// ─────────────────────────────────────────────────────────────
// Mathweave  ·  LaTeX Rules: Calculus and Series
// Integrals, big operators, limits, extrema and derivatives
// ─────────────────────────────────────────────────────────────

import type { Expr } from '../../core/expr';
import { expectArity, ExprShapeError } from '../../core/errors';
import type { LatexFormKind } from '../../core/forms';
import { derivativeSpec, iterationBound, rangeBound, smallOrder } from '../../core/patterns';
import type { LatexRenderer, LatexRuleGroup } from '../latex';

// ── Integrals ───────────────────────────────────────────────

function renderIntegral(r: LatexRenderer, args: readonly Expr[], inSmall: boolean): string {
    expectArity('Integral', args.length, 2);
    const { variable, lower, upper } = rangeBound('Integral', args[1]);
    const f = r.latex(args[0], inSmall);
    return `\\int_{${r.latex(lower, true)}}^{${r.latex(upper, true)}} ${f} \\, d${r.latex(variable)}`;
}

// IndefiniteIntegralEqual(f(x), g(x), x) or IndefiniteIntegralEqual(f(x), g(x), x, c)
function renderIndefiniteIntegral(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 3, 4);
    const [fx, gx, x] = r.each(args.slice(0, 3), inSmall);
    const base = `\\int ${fx} \\, d${x} = ${gx} + \\mathcal{C}`;
    if (args.length === 3 || args[2].equals(args[3])) return base;
    return `${base}, ${x} = ${r.latex(args[3], inSmall)}`;
}

// ── Big operators ───────────────────────────────────────────

const BIG_SYMBOL: Partial<Record<LatexFormKind, string>> = {
    Sum: '\\sum', Product: '\\prod',
    DivisorSum: '\\sum', DivisorProduct: '\\prod',
    PrimeSum: '\\sum', PrimeProduct: '\\prod',
};

function bigSymbol(kind: LatexFormKind): string {
    return BIG_SYMBOL[kind] ?? '\\sum';
}

// Sum(f(n), Tuple(n, a, b)) | Sum(f(n), n) | Sum(f(n), n, P(n))
function renderBigOperator(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    const bound = iterationBound(kind, args.slice(1));
    const f = r.latex(args[0], inSmall);
    const ss = bigSymbol(kind);
    switch (bound.tag) {
        case 'Range':
            return `${ss}_{${r.latex(bound.variable)}=${r.latex(bound.lower, true)}}^{${r.latex(bound.upper, true)}} ${f}`;
        case 'Over':
            return `${ss}_{${r.latex(bound.variable)}} ${f}`;
        case 'Predicate':
            return `${ss}_{${r.latex(bound.predicate, true)}} ${f}`;
    }
}

// DivisorSum(f(d), d, n) | DivisorSum(f(d), d, n, P(d))
function renderDivisorOperator(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 3, 4);
    const f = r.latex(args[0], inSmall);
    const v = r.latex(args[1]);
    const n = r.latex(args[2], true);
    const cond = args.length === 4 ? `,\\, ${r.latex(args[3], true)}` : '';
    return `${bigSymbol(kind)}_{${v} \\mid ${n}${cond}} ${f}`;
}

// PrimeSum(f(p), p) | PrimeSum(f(p), p, P(p))
function renderPrimeOperator(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 2, 3);
    const f = r.latex(args[0], inSmall);
    const sub = args.length === 3 ? r.latex(args[2], true) : r.latex(args[1]);
    return `${bigSymbol(kind)}_{${sub}} ${f}`;
}

// ── Limits ──────────────────────────────────────────────────

function renderLimit(r: LatexRenderer, args: readonly Expr[], _inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 3, 4);
    const [formula, variable, point] = args;
    const cond = args.length === 4 ? ', ' + r.latex(args[3], true) : '';
    const v = r.latex(variable);
    const p = r.latex(point, true);
    let f = r.latex(formula);
    if (!point.isAtom() && r.headName(point) !== 'Abs') {
        f = `\\left[ ${f} \\right]`;
    }
    if (kind === 'LeftLimit') return `\\lim_{${v} \\to {${p}}^{-}${cond}} ${f}`;
    if (kind === 'RightLimit') return `\\lim_{${v} \\to {${p}}^{+}${cond}} ${f}`;
    return `\\lim_{${v} \\to ${p}${cond}} ${f}`;
}

// ── Extrema and solution sets ───────────────────────────────

const EXTREMUM_NAME: Partial<Record<LatexFormKind, string>> = {
    Minimum: '\\min',
    Maximum: '\\max',
    ArgMin: '\\operatorname{arg\\,min}',
    ArgMinUnique: '\\operatorname{arg\\,min*}',
    ArgMax: '\\operatorname{arg\\,max}',
    ArgMaxUnique: '\\operatorname{arg\\,max*}',
    Infimum: '\\operatorname{inf}',
    Supremum: '\\operatorname{sup}',
    Zeros: '\\operatorname{zeros}\\,',
    UniqueZero: '\\operatorname{zero*}\\,',
    Solutions: '\\operatorname{solutions}\\,',
    UniqueSolution: '\\operatorname{solution*}\\,',
};

const PLAIN_EXTREMA: LatexFormKind[] = ['Minimum', 'Maximum', 'Supremum', 'Infimum'];

// Minimum(f(x), x, P(x)) or, for plain extrema, Minimum(S)
function renderExtremum(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    const op = EXTREMUM_NAME[kind] ?? `\\operatorname{${kind}}`;
    if (PLAIN_EXTREMA.includes(kind) && args.length === 1) {
        return `${op}\\left(${r.latex(args[0], inSmall)}\\right)`;
    }
    expectArity(kind, args.length, 3);
    const [formula, , predicate] = args;
    const h = r.headName(formula);
    const f = h === 'Add' || h === 'Sub' ? `\\left(${r.latex(formula)}\\right)` : r.latex(formula);
    return `\\mathop{${op}}\\limits_{${r.latex(predicate, true)}} ${f}`;
}

// Residue(f(z), z, a) prints the point alone when it is the variable itself
function renderPointOperator(name: string) {
    return (r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string => {
        expectArity(kind, args.length, 3);
        const [f, v, p] = r.each(args, inSmall);
        const sub = args[1].equals(args[2]) ? p : `${v}=${p}`;
        return `\\mathop{\\operatorname{${name}}}\\limits_{${sub}} ${f}`;
    };
}

// ── Derivatives ─────────────────────────────────────────────

const PRIMES = ['', "'", "''", "'''"];

function renderDerivative(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    if (args.length < 2) {
        throw new ExprShapeError(`${kind}: expected 2 to 4 argument(s), got ${args.length}`);
    }
    const [expr, ...rest] = args;
    const { variable, point, order } = derivativeSpec(kind, rest);
    const primes = smallOrder(order, 3);
    const fhead = expr.head();
    const fargs = expr.args();

    if (fhead && fargs) {
        const name = fhead.symbolName;
        // f(x) differentiated in x: f'(a), f^{(n)}(a)
        if (name !== undefined && name !== 'Exp' && name !== 'Sqrt'
            && fargs.length === 1 && fargs[0].equals(variable)) {
            const f = r.latex(fhead);
            const p = r.latex(point, true);
            if (primes !== undefined) return `${f}${PRIMES[primes]}(${p})`;
            return `{${f}}^{(${r.latex(order)})}(${p})`;
        }
        // F_n(x) differentiated in x: F'_n(a)
        const sym = r.subscriptCallOf(expr);
        if (sym !== undefined && fargs.length === 2 && fargs[1].equals(variable)) {
            const n = r.latex(fargs[0], true);
            const p = r.latex(point, true);
            if (primes !== undefined) return `${sym}${PRIMES[primes]}_{${n}}(${p})`;
            return `{${sym}}^{(${r.latex(order)})}_{${n}}(${p})`;
        }
    }

    const f = r.latex(expr, inSmall);
    const v = r.latex(variable);
    const p = r.latex(point, true);
    const n = r.latex(order);
    const isFirst = order.integerValue === 1n;
    const op = isFirst ? `\\frac{d}{d ${v}}\\, ${f}` : `\\frac{d^{${n}}}{{d ${v}}^{${n}}} ${f}`;
    if (variable.equals(point)) return op;
    return `\\left[ ${op} \\right]_{${v} = ${p}}`;
}

// ── Group ───────────────────────────────────────────────────

export const calculusRules = {
    Integral: renderIntegral,
    IndefiniteIntegralEqual: renderIndefiniteIntegral,
    RealIndefiniteIntegralEqual: renderIndefiniteIntegral,
    ComplexIndefiniteIntegralEqual: renderIndefiniteIntegral,

    Sum: renderBigOperator,
    Product: renderBigOperator,
    DivisorSum: renderDivisorOperator,
    DivisorProduct: renderDivisorOperator,
    PrimeSum: renderPrimeOperator,
    PrimeProduct: renderPrimeOperator,

    Limit: renderLimit,
    SequenceLimit: renderLimit,
    RealLimit: renderLimit,
    LeftLimit: renderLimit,
    RightLimit: renderLimit,
    ComplexLimit: renderLimit,
    MeromorphicLimit: renderLimit,

    Minimum: renderExtremum,
    Maximum: renderExtremum,
    ArgMin: renderExtremum,
    ArgMax: renderExtremum,
    ArgMinUnique: renderExtremum,
    ArgMaxUnique: renderExtremum,
    Supremum: renderExtremum,
    Infimum: renderExtremum,
    Zeros: renderExtremum,
    UniqueZero: renderExtremum,
    Solutions: renderExtremum,
    UniqueSolution: renderExtremum,

    ComplexZeroMultiplicity: renderPointOperator('ord'),
    Residue: renderPointOperator('Res'),

    Derivative: renderDerivative,
    RealDerivative: renderDerivative,
    ComplexDerivative: renderDerivative,
    ComplexBranchDerivative: renderDerivative,
    MeromorphicDerivative: renderDerivative,

    AsymptoticTo: (r, args, inSmall) => {
        expectArity('AsymptoticTo', args.length, 4);
        const [f, g, x, a] = r.each(args, inSmall);
        return `${f} \\sim ${g}, \\; ${x} \\to ${a}`;
    },

    FormalPowerSeries: (r, args, inSmall) => {
        expectArity('FormalPowerSeries', args.length, 2);
        const [ring, x] = r.each(args, inSmall);
        return `${ring}[[${x}]]`;
    },

    FormalLaurentSeries: (r, args, inSmall) => {
        expectArity('FormalLaurentSeries', args.length, 2);
        const [ring, x] = r.each(args, inSmall);
        return `${ring}(\\!(${x})\\!)`;
    },

    SeriesCoefficient: (r, args, inSmall) => {
        expectArity('SeriesCoefficient', args.length, 3);
        const [f, x, n] = r.each(args, inSmall);
        return `[{${x}}^{${n}}] ${f}`;
    },

    FormalGenerator: (r, args, inSmall) => {
        expectArity('FormalGenerator', args.length, 2);
        const [x, ring] = r.each(args, inSmall);
        return `${x} \\text{ is the generator of } ${ring}`;
    },

    // QSeriesCoefficient(f, tau, q, n, qdef)
    QSeriesCoefficient: (r, args, inSmall) => {
        expectArity('QSeriesCoefficient', args.length, 5);
        const [f, , q, n, qdef] = r.each(args, inSmall);
        return `[${q}^{${n}}] ${f} \\; \\left(${qdef}\\right)`;
    },

    // EqualQSeriesEllipsis(f, tau, q, series, qdef)
    EqualQSeriesEllipsis: (r, args, inSmall) => {
        expectArity('EqualQSeriesEllipsis', args.length, 5);
        const [f, , , series, qdef] = r.each(args, inSmall);
        return `${f} = ${series} + \\ldots \\; \\text{ where } ${qdef}`;
    },
} satisfies LatexRuleGroup;
