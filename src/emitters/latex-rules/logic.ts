// ─────────────────────────────────────────────────────────────
// Mathweave  ·  LaTeX Rules: Logic and Prose
// ─────────────────────────────────────────────────────────────

import type { Expr } from '../../core/expr';
import { expectArity } from '../../core/errors';
import type { LatexRenderer, LatexRuleGroup } from '../latex';

const paren = (s: string): string => `\\left(${s}\\right)`;

/** Renders the arguments, parenthesizing those whose head is listed. */
function connectiveOperands(r: LatexRenderer, args: readonly Expr[], inSmall: boolean, wrapped: string[]): string[] {
    return args.map(arg => {
        const s = r.latex(arg, inSmall);
        const h = r.headName(arg);
        return h !== undefined && wrapped.includes(h) ? paren(s) : s;
    });
}

export const logicRules = {
    And: (r, args, inSmall) => {
        const parts = connectiveOperands(r, args, inSmall, ['And', 'Or']);
        return inSmall ? parts.join(',\\,') : parts.join(' \\,\\mathbin{\\operatorname{and}}\\, ');
    },

    Or: (r, args, inSmall) =>
        connectiveOperands(r, args, inSmall, ['And', 'Or', 'Not']).join(' \\,\\mathbin{\\operatorname{or}}\\, '),

    Not: (r, args, inSmall) => {
        expectArity('Not', args.length, 1);
        return ` \\operatorname{not} ${paren(r.latex(args[0], inSmall))}`;
    },

    Implies: (r, args, inSmall) => r.each(args, inSmall).map(paren).join(' \\implies '),
    Equivalent: (r, args, inSmall) => r.each(args, inSmall).map(paren).join(' \\iff '),

    EqualAndElement: (r, args, inSmall) => {
        expectArity('EqualAndElement', args.length, 3);
        const [a, b, set] = r.each(args, inSmall);
        return `${a} = ${b} \\in ${set}`;
    },

    ForAll: (r, args, inSmall) => {
        expectArity('ForAll', args.length, 3);
        const [v, domain, cond] = r.each(args, inSmall);
        return `\\text{for all } ${v}: ${domain}, ${cond}`;
    },

    Exists: (r, args, inSmall) => {
        expectArity('Exists', args.length, 2);
        const [v, cond] = r.each(args, inSmall);
        return `\\text{there exists } ${v}: ${cond}`;
    },

    CongruentMod: (r, args, inSmall) => {
        expectArity('CongruentMod', args.length, 3);
        const [a, b, m] = r.each(args, inSmall);
        return `${a} \\equiv ${b} \\pmod {${m}}`;
    },

    Odd: (r, args, inSmall) => {
        expectArity('Odd', args.length, 1);
        return `${r.latex(args[0], inSmall)} \\text{ odd}`;
    },

    Even: (r, args, inSmall) => {
        expectArity('Even', args.length, 1);
        return `${r.latex(args[0], inSmall)} \\text{ even}`;
    },

    // Text pieces become \text blocks, anything else is typeset inline
    Description: (r, args) => args
        .map(arg => {
            const text = arg.textValue;
            return text !== undefined ? `\\text{ ${text} }` : r.latex(arg);
        })
        .join(''),
} satisfies LatexRuleGroup;
