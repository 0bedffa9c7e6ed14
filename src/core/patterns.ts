// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Argument Shapes
// Named variants for operators that accept several layouts
// ─────────────────────────────────────────────────────────────

import { Expr } from './expr';
import { ExprShapeError } from './errors';

const Tuple = Expr.symbol('Tuple');

/** Variable, lower and upper bound of a `Tuple(x, a, b)` argument. */
export interface RangeBound {
    tag: 'Range';
    variable: Expr;
    lower: Expr;
    upper: Expr;
}

/** A bare variable with no stated range: Sum(f(n), n). */
export interface OverBound {
    tag: 'Over';
    variable: Expr;
}

/** A variable ranging over a predicate: Sum(f(n), n, P(n)). */
export interface PredicateBound {
    tag: 'Predicate';
    variable: Expr;
    predicate: Expr;
}

export type IterationBound = RangeBound | OverBound | PredicateBound;

export function rangeBound(head: string, arg: Expr): RangeBound {
    const parts = arg.hasHead(Tuple) ? arg.args() : null;
    if (!parts || parts.length !== 3) {
        throw new ExprShapeError(`${head}: expected Tuple(variable, lower, upper), got ${arg.toString()}`);
    }
    const [variable, lower, upper] = parts;
    return { tag: 'Range', variable, lower, upper };
}

/** Bound of a big operator, from the arguments following the summand. */
export function iterationBound(head: string, rest: readonly Expr[]): IterationBound {
    if (rest.length === 1) {
        const [arg] = rest;
        return arg.hasHead(Tuple) ? rangeBound(head, arg) : { tag: 'Over', variable: arg };
    }
    if (rest.length === 2) {
        return { tag: 'Predicate', variable: rest[0], predicate: rest[1] };
    }
    throw new ExprShapeError(`${head}: expected 2 or 3 argument(s), got ${rest.length + 1}`);
}

// ── Derivatives ─────────────────────────────────────────────

export interface DerivativeSpec {
    variable: Expr;
    point: Expr;
    order: Expr;
}

/**
 * Derivative(f, Tuple(x, a, n)), Derivative(f, x, a) or Derivative(f, x, a, n);
 * `rest` is everything after the differentiated expression.
 */
export function derivativeSpec(head: string, rest: readonly Expr[]): DerivativeSpec {
    switch (rest.length) {
        case 1: {
            const parts = rest[0].hasHead(Tuple) ? rest[0].args() : null;
            if (!parts || parts.length !== 3) {
                throw new ExprShapeError(`${head}: expected Tuple(variable, point, order), got ${rest[0].toString()}`);
            }
            const [variable, point, order] = parts;
            return { variable, point, order };
        }
        case 2:
            return { variable: rest[0], point: rest[1], order: Expr.integer(1) };
        case 3:
            return { variable: rest[0], point: rest[1], order: rest[2] };
        default:
            throw new ExprShapeError(`${head}: expected 2 to 4 argument(s), got ${rest.length + 1}`);
    }
}

/** The order as a small integer when it is one, for prime notation. */
export function smallOrder(order: Expr, max: number): number | undefined {
    const v = order.integerValue;
    if (v === undefined || v < 0n || v > BigInt(max)) return undefined;
    return Number(v);
}

/** The string payload of a text atom in a position that requires one. */
export function textOf(head: string, e: Expr): string {
    const text = e.textValue;
    if (text === undefined) {
        throw new ExprShapeError(`${head}: expected a text argument, got ${e.toString()}`);
    }
    return text;
}

/** The only argument of an application `head(x)`. */
export function soleArg(head: string, e: Expr): Expr {
    const args = e.args();
    if (!args || args.length !== 1) {
        throw new ExprShapeError(`${head}: expected 1 argument, got ${e.toString()}`);
    }
    return args[0];
}
