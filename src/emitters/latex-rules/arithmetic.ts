// ─────────────────────────────────────────────────────────────
// Mathweave  ·  LaTeX Rules: Arithmetic
// ─────────────────────────────────────────────────────────────

import { Expr, needsParensInMul, showExponentialAsPower } from '../../core/expr';
import { expectArity, expectAtLeast } from '../../core/errors';
import { textOf } from '../../core/patterns';
import type { LatexRenderer, LatexRuleGroup } from '../latex';

const ConstE = Expr.symbol('ConstE');
const Pow = Expr.symbol('Pow');

// Bases whose exponent goes on the function name: sin^2(x)
const POWER_ON_NAME = ['Sin', 'Cos', 'Csc', 'Tan', 'Sinh', 'Cosh', 'Tanh', 'DedekindEta'];
const THETA = ['JacobiTheta1', 'JacobiTheta2', 'JacobiTheta3', 'JacobiTheta4'];
// Bases that already read as a single group and need no parentheses
const SELF_DELIMITED = ['Abs', 'Binomial', 'PrimeNumber', 'Matrix2x2', 'Parentheses', 'Braces', 'Brackets'];

const paren = (s: string): string => `\\left(${s}\\right)`;

function isNonNegativeInteger(e: Expr): boolean {
    const v = e.integerValue;
    return v !== undefined && v >= 0n;
}

function renderPow(r: LatexRenderer, args: readonly Expr[], inSmall: boolean): string {
    expectArity('Pow', args.length, 2);
    const [base, expo] = args;
    const baseArgs = base.args();
    const headName = r.headName(base);

    if (baseArgs && headName !== undefined) {
        const e = r.latex(expo, true);
        const head = base.head();
        if (POWER_ON_NAME.includes(headName) && head && baseArgs.length > 0) {
            return `${r.latex(head)}^{${e}}\\!\\left(${r.latex(baseArgs[0], inSmall)}\\right)`;
        }
        if (headName === 'Fibonacci' && baseArgs.length > 0) {
            return `F_{${r.latex(baseArgs[0], inSmall)}}^{${e}}`;
        }
        if (THETA.includes(headName) && head && baseArgs.length === 2) {
            return `${r.latex(head)}^{${e}}\\!\\left(${r.latex(baseArgs[0])}, ${r.latex(baseArgs[1])}\\right)`;
        }
        const sym = r.subscriptCallOf(base);
        if (sym !== undefined && baseArgs.length === 2) {
            return `${sym}_{${r.latex(baseArgs[0], true)}}^{${e}}\\!\\left(${r.latex(baseArgs[1], inSmall)}\\right)`;
        }
    }

    const b = r.latex(base, inSmall);
    const e = r.latex(expo, true);
    if (base.isSymbol() || isNonNegativeInteger(base) || (headName !== undefined && SELF_DELIMITED.includes(headName))) {
        return `{${b}}^{${e}}`;
    }
    return `{\\left(${b}\\right)}^{${e}}`;
}

function renderDiv(r: LatexRenderer, args: readonly Expr[], inSmall: boolean): string {
    expectArity('Div', args.length, 2);
    const [num, den] = args;
    if (!inSmall) {
        return `\\frac{${r.latex(num)}}{${r.latex(den)}}`;
    }
    const wrap = (e: Expr): string => {
        const s = r.latex(e, true);
        return needsParensInMul(e) ? `\\left( ${s} \\right)` : s;
    };
    return `${wrap(num)} / ${wrap(den)}`;
}

function renderFactorial(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, bang: string): string {
    const [arg] = args;
    const s = r.latex(arg, inSmall);
    if (arg.isSymbol() || isNonNegativeInteger(arg)) return `${s} ${bang}`;
    return `${paren(s)}${bang}`;
}

export const arithmeticRules = {
    Exp: (r, args, inSmall) => {
        expectArity('Exp', args.length, 1);
        if (!showExponentialAsPower(args[0])) return undefined;
        return r.latex(Expr.call(Pow, ConstE, args[0]), inSmall);
    },

    Div: renderDiv,
    Pow: renderPow,

    Where: (r, args, inSmall) => {
        expectAtLeast('Where', args.length, 1);
        const [body, ...defs] = r.each(args, inSmall);
        return `${body}\\; \\text{ where } ${defs.join(',\\,')}`;
    },

    Pos: (r, args, inSmall) => {
        expectArity('Pos', args.length, 1);
        return '+' + r.latex(args[0], inSmall);
    },

    Neg: (r, args, inSmall) => {
        expectArity('Neg', args.length, 1);
        return '-' + r.latex(args[0], inSmall);
    },

    Add: (r, args, inSmall) => r.each(args, inSmall).join(' + '),

    Sub: (r, args, inSmall) => r.each(args, inSmall)
        .map((s, i) => {
            const h = r.headName(args[i]);
            return i > 0 && (h === 'Neg' || h === 'Sub') ? paren(s) : s;
        })
        .join(' - '),

    Mul: (r, args, inSmall) => r.each(args, inSmall)
        .map((s, i) => needsParensInMul(args[i]) ? paren(s) : s)
        .join(' '),

    Sqrt: (r, args, inSmall) => {
        expectArity('Sqrt', args.length, 1);
        return `\\sqrt{${r.latex(args[0], inSmall)}}`;
    },

    Abs: (r, args, inSmall) => {
        expectArity('Abs', args.length, 1);
        return `\\left|${r.latex(args[0], inSmall)}\\right|`;
    },

    Floor: (r, args, inSmall) => {
        expectArity('Floor', args.length, 1);
        return `\\left\\lfloor ${r.latex(args[0], inSmall)} \\right\\rfloor`;
    },

    Ceil: (r, args, inSmall) => {
        expectArity('Ceil', args.length, 1);
        return `\\left\\lceil ${r.latex(args[0], inSmall)} \\right\\rceil`;
    },

    Conjugate: (r, args, inSmall) => {
        expectArity('Conjugate', args.length, 1);
        return `\\overline{${r.latex(args[0], inSmall)}}`;
    },

    Decimal: (_r, args) => {
        expectArity('Decimal', args.length, 1);
        const text = textOf('Decimal', args[0]);
        if (!text.includes('e')) return text;
        const [mant, expo] = text.split('e');
        return `${mant} \\cdot 10^{${expo.replace(/^\++/, '')}}`;
    },

    Factorial: (r, args, inSmall) => {
        expectArity('Factorial', args.length, 1);
        return renderFactorial(r, args, inSmall, '!');
    },

    DoubleFactorial: (r, args, inSmall) => {
        expectArity('DoubleFactorial', args.length, 1);
        return renderFactorial(r, args, inSmall, '!!');
    },

    RisingFactorial: (r, args, inSmall) => {
        expectArity('RisingFactorial', args.length, 2);
        const [x, n] = r.each(args, inSmall);
        return `${paren(x)}_{${n}}`;
    },

    FallingFactorial: (r, args, inSmall) => {
        expectArity('FallingFactorial', args.length, 2);
        const [x, n] = r.each(args, inSmall);
        return `${paren(x)}^{\\underline{${n}}}`;
    },

    Binomial: (r, args, inSmall) => {
        expectArity('Binomial', args.length, 2);
        const [n, k] = r.each(args, inSmall);
        return `{${n} \\choose ${k}}`;
    },
} satisfies LatexRuleGroup;
