// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Error Types
// ─────────────────────────────────────────────────────────────

/** A recognized head was applied to arguments of the wrong shape. */
export class ExprShapeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ExprShapeError';
    }
}

export class UnknownSymbolError extends Error {
    constructor(public readonly symbolName: string) {
        super(`Unknown symbol: ${symbolName}`);
        this.name = 'UnknownSymbolError';
    }
}

export class SealedRegistryError extends Error {
    constructor(action: string) {
        super(`Symbol table is sealed; cannot ${action}`);
        this.name = 'SealedRegistryError';
    }
}

export class DuplicateEntryError extends Error {
    constructor(public readonly entryId: string) {
        super(`Duplicate entry id: ${entryId}`);
        this.name = 'DuplicateEntryError';
    }
}

/** Throws unless `count` is one of the allowed argument counts for `head`. */
export function expectArity(head: string, count: number, ...allowed: number[]): void {
    if (!allowed.includes(count)) {
        const expected = allowed.length === 1 ? String(allowed[0]) : allowed.join(' or ');
        throw new ExprShapeError(`${head}: expected ${expected} argument(s), got ${count}`);
    }
}

export function expectAtLeast(head: string, count: number, min: number): void {
    if (count < min) {
        throw new ExprShapeError(`${head}: expected at least ${min} argument(s), got ${count}`);
    }
}
