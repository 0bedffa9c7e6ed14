// ─────────────────────────────────────────────────────────────
// Mathweave  ·  LaTeX Rules: Special Functions and Sequences
// Subscripted sequences, Bessel and Coulomb families, number
// theory notations
// ─────────────────────────────────────────────────────────────

import type { Expr } from '../../core/expr';
import { expectArity, ExprShapeError } from '../../core/errors';
import type { LatexFormKind } from '../../core/forms';
import { smallOrder } from '../../core/patterns';
import type { LatexRenderer, LatexRule, LatexRuleGroup } from '../latex';

/** `S_{a}` or `S_{a,b}` with the arguments joined by `sep`. */
function subscripted(kind: LatexFormKind, symbol: string, arity: number, sep: string = ','): LatexRule {
    return (r, args, inSmall) => {
        expectArity(kind, args.length, arity);
        return `${symbol}_{${r.each(args, inSmall).join(sep)}}`;
    };
}

const call = (name: string, sub: string, arg: string): string => `${name}_{${sub}}\\!\\left(${arg}\\right)`;

// ── Bessel family ───────────────────────────────────────────

const BESSEL_SYMBOL: Partial<Record<LatexFormKind, string>> = {
    BesselJ: 'J', BesselY: 'Y', BesselI: 'I', BesselK: 'K',
    HankelH1: 'H^{(1)}', HankelH2: 'H^{(2)}',
    BesselJDerivative: 'J', BesselYDerivative: 'Y', BesselIDerivative: 'I', BesselKDerivative: 'K',
};

function renderBessel(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 2);
    const [n, z] = args;
    return call(BESSEL_SYMBOL[kind] ?? kind, r.latex(n, true), r.latex(z, inSmall));
}

/** `F'_{n}(z)` for small derivative orders, `F^{(r)}_{n}(z)` otherwise. */
function primedCall(r: LatexRenderer, symbol: string, n: Expr, z: Expr, order: Expr, inSmall: boolean): string {
    const nstr = r.latex(n, true);
    const zstr = r.latex(z, inSmall);
    const k = smallOrder(order, 3);
    const decoration = k !== undefined ? "'".repeat(k) : `^{(${r.latex(order, inSmall)})}`;
    return call(symbol + decoration, nstr, zstr);
}

function renderBesselDerivative(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 3);
    const [n, z, order] = args;
    return primedCall(r, BESSEL_SYMBOL[kind] ?? kind, n, z, order, inSmall);
}

// ── Coulomb wave functions ──────────────────────────────────

function renderCoulombFG(r: LatexRenderer, args: readonly Expr[], _inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 3);
    const [l, eta, z] = args;
    const name = kind === 'CoulombG' ? 'G' : 'F';
    return call(name, `${r.latex(l, true)},${r.latex(eta, true)}`, r.latex(z));
}

function renderCoulombH(r: LatexRenderer, args: readonly Expr[]): string {
    expectArity('CoulombH', args.length, 4);
    const [omega, l, eta, z] = args;
    const w = omega.integerValue;
    const sign = w === undefined ? r.latex(omega, true) : w === -1n ? '-' : '+';
    return call(`H^{${sign}}`, `${r.latex(l, true)},${r.latex(eta, true)}`, r.latex(z));
}

function coulombParameter(kind: LatexFormKind, symbol: string): LatexRule {
    return (r, args) => {
        expectArity(kind, args.length, 2);
        const [l, eta] = args;
        return call(symbol, r.latex(l, true), r.latex(eta));
    };
}

// ── Number theory ───────────────────────────────────────────

function renderResidueSymbol(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, kind: LatexFormKind): string {
    expectArity(kind, args.length, 2);
    const [a, b] = r.each(args, inSmall);
    return `\\left( \\frac{${a}}{${b}} \\right)`;
}

function renderLambertW(r: LatexRenderer, args: readonly Expr[], inSmall: boolean): string {
    expectArity('LambertW', args.length, 2, 3);
    const [n, z, order] = args;
    if (order === undefined) return call('W', r.latex(n, true), r.latex(z, inSmall));
    return primedCall(r, 'W', n, z, order, inSmall);
}

// ── Group ───────────────────────────────────────────────────

export const functionRules = {
    BernoulliB: subscripted('BernoulliB', 'B', 1),
    BellNumber: subscripted('BellNumber', 'B', 1),
    HarmonicNumber: subscripted('HarmonicNumber', 'H', 1),
    PrimeNumber: subscripted('PrimeNumber', 'p', 1),
    RiemannZetaZero: subscripted('RiemannZetaZero', '\\rho', 1),
    DirichletLZero: subscripted('DirichletLZero', '\\rho', 2, ', '),
    LegendrePolynomialZero: subscripted('LegendrePolynomialZero', 'x', 2),
    GaussLegendreWeight: subscripted('GaussLegendreWeight', 'w', 2),
    GeneralizedBernoulliB: subscripted('GeneralizedBernoulliB', 'B', 2),
    LambertWPuiseuxCoefficient: subscripted('LambertWPuiseuxCoefficient', '{\\mu}', 1),

    Fibonacci: (r, args) => {
        expectArity('Fibonacci', args.length, 1);
        return `F_{${r.latex(args[0], true)}}`;
    },

    BesselJ: renderBessel,
    BesselY: renderBessel,
    BesselI: renderBessel,
    BesselK: renderBessel,
    HankelH1: renderBessel,
    HankelH2: renderBessel,
    BesselJDerivative: renderBesselDerivative,
    BesselYDerivative: renderBesselDerivative,
    BesselIDerivative: renderBesselDerivative,
    BesselKDerivative: renderBesselDerivative,

    CoulombF: renderCoulombFG,
    CoulombG: renderCoulombFG,
    CoulombH: renderCoulombH,
    CoulombC: coulombParameter('CoulombC', 'C'),
    CoulombSigma: coulombParameter('CoulombSigma', '\\sigma'),

    StirlingCycle: (r, args, inSmall) => {
        expectArity('StirlingCycle', args.length, 2);
        const [n, k] = r.each(args, inSmall);
        return `\\left[{${n} \\atop ${k}}\\right]`;
    },

    StirlingS1: (r, args, inSmall) => {
        expectArity('StirlingS1', args.length, 2);
        const [n, k] = r.each(args, inSmall);
        return `s\\!\\left(${n}, ${k}\\right)`;
    },

    StirlingS2: (r, args, inSmall) => {
        expectArity('StirlingS2', args.length, 2);
        const [n, k] = r.each(args, inSmall);
        return `\\left\\{{${n} \\atop ${k}}\\right\\}`;
    },

    LambertW: renderLambertW,

    KroneckerDelta: (r, args) => {
        expectArity('KroneckerDelta', args.length, 2);
        const [x, y] = r.each(args, true);
        return `\\delta_{(${x},${y})}`;
    },

    LegendreSymbol: renderResidueSymbol,
    JacobiSymbol: renderResidueSymbol,
    KroneckerSymbol: renderResidueSymbol,

    ModularGroupAction: (r, args, inSmall) => {
        expectArity('ModularGroupAction', args.length, 2);
        const [g, tau] = r.each(args, inSmall);
        return `${g} \\circ ${tau}`;
    },

    PrimitiveReducedPositiveIntegralBinaryQuadraticForms: (r, args, inSmall) => {
        expectArity('PrimitiveReducedPositiveIntegralBinaryQuadraticForms', args.length, 1);
        return `\\mathcal{Q}^{*}_{${r.latex(args[0], inSmall)}}`;
    },

    HypergeometricUStarRemainder: (r, args, inSmall) => {
        expectArity('HypergeometricUStarRemainder', args.length, 4);
        const [n, a, b, z] = r.each(args, inSmall);
        return call('R', n, `${a},${b},${z}`);
    },

    StirlingSeriesRemainder: (r, args, inSmall) => {
        expectArity('StirlingSeriesRemainder', args.length, 2);
        const [n, z] = r.each(args, inSmall);
        return call('R', n, z);
    },

    StieltjesGamma: (r, args, inSmall) => {
        if (args.length === 0) return undefined;
        const n = r.latex(args[0], true);
        if (args.length === 1) return `\\gamma_{${n}}`;
        if (args.length === 2) return `\\gamma_{${n}}\\!\\left(${r.latex(args[1], inSmall)}\\right)`;
        return undefined;
    },

    DirichletCharacter: (r, args, inSmall) => {
        const [q, l, n] = r.each(args, inSmall);
        if (args.length === 2) return `\\chi_{${q}}(${l}, \\cdot)`;
        if (args.length === 3) return `\\chi_{${q}}(${l}, ${n})`;
        throw new ExprShapeError(`DirichletCharacter: expected 2 or 3 argument(s), got ${args.length}`);
    },

    DirichletGroup: (r, args, inSmall) => {
        expectArity('DirichletGroup', args.length, 1);
        return `G_{${r.latex(args[0], inSmall)}}`;
    },

    PrimitiveDirichletCharacters: (r, args, inSmall) => {
        expectArity('PrimitiveDirichletCharacters', args.length, 1);
        return `G_{${r.latex(args[0], inSmall)}}^{\\text{primitive}}`;
    },

    GaussSum: (r, args, inSmall) => {
        expectArity('GaussSum', args.length, 2);
        const [q, chi] = r.each(args, inSmall);
        return call('G', q, chi);
    },

    // DiscreteLog(n, b, p): the k with b^k = n mod p
    DiscreteLog: (r, args, inSmall) => {
        expectArity('DiscreteLog', args.length, 3);
        const [n, b, p] = args;
        return `\\log_{${r.latex(b, true)}}\\!\\left(${r.latex(n, inSmall)}\\right) \\bmod ${r.latex(p, inSmall)}`;
    },

    ConreyGenerator: (r, args, inSmall) => {
        expectArity('ConreyGenerator', args.length, 1);
        return `g_{${r.latex(args[0], inSmall)}}`;
    },
} satisfies LatexRuleGroup;
