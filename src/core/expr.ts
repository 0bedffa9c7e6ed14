// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Symbolic Expression Terms
// Immutable atoms and applications with structural equality
// ─────────────────────────────────────────────────────────────

// ── Payloads ────────────────────────────────────────────────

export type ExprData =
    | SymbolData
    | IntegerData
    | TextData
    | ApplicationData;

export interface SymbolData {
    tag: 'Symbol';
    name: string;
}

export interface IntegerData {
    tag: 'Integer';
    value: bigint;
}

export interface TextData {
    tag: 'Text';
    value: string;
}

export interface ApplicationData {
    tag: 'Application';
    parts: readonly Expr[];
}

/** Anything `Expr.from` accepts: numbers become integers, strings become text. */
export type ExprLike = Expr | number | bigint | string;

// ── Hashing ─────────────────────────────────────────────────

function hashString(seed: number, s: string): number {
    let h = seed;
    for (let i = 0; i < s.length; i++) {
        h = (Math.imul(h, 31) + s.charCodeAt(i)) | 0;
    }
    return h;
}

function mix(h: number, v: number): number {
    return Math.imul(h ^ v, 0x01000193) | 0;
}

const SYMBOL_SEED = 0x1f3d5b79;
const INTEGER_SEED = 0x2545f491;
const TEXT_SEED = 0x6c8e9cf5;
const APPLICATION_SEED = 0x7feb352d;

function computeHash(d: ExprData): number {
    switch (d.tag) {
        case 'Symbol': return hashString(SYMBOL_SEED, d.name);
        case 'Integer': return hashString(INTEGER_SEED, d.value.toString());
        case 'Text': return hashString(TEXT_SEED, d.value);
        case 'Application': return d.parts.reduce((h, part) => mix(h, part.hash()), APPLICATION_SEED);
    }
}

const symbolCache = new Map<string, Expr>();

// ── Expr ────────────────────────────────────────────────────

export class Expr {
    private hashCode: number | undefined;

    private constructor(readonly data: ExprData) {}

    static symbol(name: string): Expr {
        let sym = symbolCache.get(name);
        if (!sym) {
            sym = new Expr({ tag: 'Symbol', name });
            symbolCache.set(name, sym);
        }
        return sym;
    }

    static integer(n: number | bigint): Expr {
        if (typeof n === 'number' && !Number.isInteger(n)) {
            throw new TypeError(`Not an integer: ${n}`);
        }
        return new Expr({ tag: 'Integer', value: BigInt(n) });
    }

    static text(s: string): Expr {
        return new Expr({ tag: 'Text', value: s });
    }

    static from(x: ExprLike): Expr {
        if (x instanceof Expr) return x;
        if (typeof x === 'string') return Expr.text(x);
        return Expr.integer(x);
    }

    static call(head: ExprLike, ...args: ExprLike[]): Expr {
        const parts = Object.freeze([Expr.from(head), ...args.map(Expr.from)]);
        return new Expr({ tag: 'Application', parts });
    }

    // ── Structure ───────────────────────────────────────────

    isAtom(): boolean { return this.data.tag !== 'Application'; }
    isSymbol(): boolean { return this.data.tag === 'Symbol'; }
    isInteger(): boolean { return this.data.tag === 'Integer'; }
    isText(): boolean { return this.data.tag === 'Text'; }

    head(): Expr | null {
        return this.data.tag === 'Application' ? this.data.parts[0] : null;
    }

    args(): readonly Expr[] | null {
        return this.data.tag === 'Application' ? this.data.parts.slice(1) : null;
    }

    get symbolName(): string | undefined {
        return this.data.tag === 'Symbol' ? this.data.name : undefined;
    }

    get integerValue(): bigint | undefined {
        return this.data.tag === 'Integer' ? this.data.value : undefined;
    }

    get textValue(): string | undefined {
        return this.data.tag === 'Text' ? this.data.value : undefined;
    }

    /** True when this is an application whose head equals `head`. */
    hasHead(head: Expr): boolean {
        return this.data.tag === 'Application' && this.data.parts[0].equals(head);
    }

    /** First argument whose head equals `head`. */
    argWithHead(head: Expr): Expr | undefined {
        if (this.data.tag !== 'Application') return undefined;
        return this.data.parts.slice(1).find(arg => arg.hasHead(head));
    }

    of(...args: ExprLike[]): Expr {
        return Expr.call(this, ...args);
    }

    // ── Equality ────────────────────────────────────────────

    hash(): number {
        if (this.hashCode === undefined) this.hashCode = computeHash(this.data);
        return this.hashCode;
    }

    equals(other: Expr): boolean {
        if (this === other) return true;
        if (this.hash() !== other.hash()) return false;
        const a = this.data;
        const b = other.data;
        switch (a.tag) {
            case 'Symbol': return b.tag === 'Symbol' && a.name === b.name;
            case 'Integer': return b.tag === 'Integer' && a.value === b.value;
            case 'Text': return b.tag === 'Text' && a.value === b.value;
            case 'Application':
                return b.tag === 'Application'
                    && a.parts.length === b.parts.length
                    && a.parts.every((part, i) => part.equals(b.parts[i]));
        }
    }

    // ── Arithmetic sugar (construction only) ────────────────

    pos(): Expr { return Expr.call(Ops.Pos, this); }
    neg(): Expr { return Expr.call(Ops.Neg, this); }
    abs(): Expr { return Expr.call(Ops.Abs, this); }
    add(other: ExprLike): Expr { return Expr.call(Ops.Add, this, other); }
    sub(other: ExprLike): Expr { return Expr.call(Ops.Sub, this, other); }
    mul(other: ExprLike): Expr { return Expr.call(Ops.Mul, this, other); }
    div(other: ExprLike): Expr { return Expr.call(Ops.Div, this, other); }
    pow(other: ExprLike): Expr { return Expr.call(Ops.Pow, this, other); }

    toString(): string {
        return toSourceString(this);
    }
}

// Heads the term model itself refers to.
const Ops = {
    Pos: Expr.symbol('Pos'),
    Neg: Expr.symbol('Neg'),
    Abs: Expr.symbol('Abs'),
    Add: Expr.symbol('Add'),
    Sub: Expr.symbol('Sub'),
    Mul: Expr.symbol('Mul'),
    Div: Expr.symbol('Div'),
    Pow: Expr.symbol('Pow'),
    Sqrt: Expr.symbol('Sqrt'),
    Entry: Expr.symbol('Entry'),
};

// ── Constructors ────────────────────────────────────────────

export const makeSymbol = (name: string): Expr => Expr.symbol(name);
export const makeInteger = (n: number | bigint): Expr => Expr.integer(n);
export const makeText = (s: string): Expr => Expr.text(s);
export const apply = (head: ExprLike, ...args: ExprLike[]): Expr => Expr.call(head, ...args);

// Reflected arithmetic, for a raw left operand: add(1, z) is Add(1, z).
export const add = (a: ExprLike, b: ExprLike): Expr => Expr.call(Ops.Add, a, b);
export const sub = (a: ExprLike, b: ExprLike): Expr => Expr.call(Ops.Sub, a, b);
export const mul = (a: ExprLike, b: ExprLike): Expr => Expr.call(Ops.Mul, a, b);
export const div = (a: ExprLike, b: ExprLike): Expr => Expr.call(Ops.Div, a, b);
export const pow = (a: ExprLike, b: ExprLike): Expr => Expr.call(Ops.Pow, a, b);

// ── Traversal ───────────────────────────────────────────────

/** Symbol leaves in depth-first, left-to-right order, first occurrence kept. */
export function allSymbols(expr: Expr): Expr[] {
    const seen = new Set<string>();
    const out: Expr[] = [];
    const walk = (e: Expr): void => {
        const d = e.data;
        if (d.tag === 'Symbol') {
            if (!seen.has(d.name)) {
                seen.add(d.name);
                out.push(e);
            }
        } else if (d.tag === 'Application') {
            d.parts.forEach(walk);
        }
    };
    walk(expr);
    return out;
}

// ── Source syntax ───────────────────────────────────────────

export function toSourceString(expr: Expr): string {
    const d = expr.data;
    switch (d.tag) {
        case 'Symbol': return d.name;
        case 'Integer': return d.value.toString();
        case 'Text': return '"' + d.value.replace(/"/g, '\\"') + '"';
        case 'Application': {
            const [head, ...args] = d.parts;
            const sep = head.equals(Ops.Entry) ? ',\n    ' : ', ';
            return `${toSourceString(head)}(${args.map(toSourceString).join(sep)})`;
        }
    }
}

// ── Shape predicates ────────────────────────────────────────

/** Whether a factor of a product needs parentheses. Unary Pos/Neg are not wrapped. */
export function needsParensInMul(e: Expr): boolean {
    const d = e.data;
    if (d.tag === 'Integer') return d.value < 0n;
    if (d.tag !== 'Application') return false;
    return d.parts[0].equals(Ops.Add) || d.parts[0].equals(Ops.Sub);
}

const POWER_SAFE_HEADS = [Ops.Pos, Ops.Neg, Ops.Add, Ops.Sub, Ops.Mul, Ops.Div, Ops.Pow, Ops.Abs, Ops.Sqrt];

/**
 * Whether exp(e) reads better as e^{x}: elementary arithmetic all the way down,
 * divisions only by atoms and never a division inside a division.
 */
export function showExponentialAsPower(e: Expr, allowDiv: boolean = true): boolean {
    const d = e.data;
    if (d.tag !== 'Application') return true;
    const [head, ...args] = d.parts;
    if (head.equals(Ops.Div)) {
        if (!allowDiv) return false;
        const den = args[args.length - 1];
        if (den !== undefined && !den.isAtom()) return false;
        allowDiv = false;
    }
    if (!POWER_SAFE_HEADS.some(h => h.equals(head))) return false;
    return args.every(arg => showExponentialAsPower(arg, allowDiv));
}
