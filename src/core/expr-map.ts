// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Structural Maps over Expressions
// ─────────────────────────────────────────────────────────────

import type { Expr } from './expr';

/** Map keyed by structural equality, bucketed on `Expr.hash()`. */
export class ExprMap<V> {
    private buckets = new Map<number, { key: Expr; value: V }[]>();
    private count = 0;

    get size(): number { return this.count; }

    get(key: Expr): V | undefined {
        return this.buckets.get(key.hash())?.find(e => e.key.equals(key))?.value;
    }

    has(key: Expr): boolean {
        return this.buckets.get(key.hash())?.some(e => e.key.equals(key)) ?? false;
    }

    set(key: Expr, value: V): this {
        const h = key.hash();
        const bucket = this.buckets.get(h);
        if (!bucket) {
            this.buckets.set(h, [{ key, value }]);
            this.count++;
            return this;
        }
        const existing = bucket.find(e => e.key.equals(key));
        if (existing) {
            existing.value = value;
        } else {
            bucket.push({ key, value });
            this.count++;
        }
        return this;
    }

    delete(key: Expr): boolean {
        const h = key.hash();
        const bucket = this.buckets.get(h);
        if (!bucket) return false;
        const i = bucket.findIndex(e => e.key.equals(key));
        if (i < 0) return false;
        bucket.splice(i, 1);
        if (bucket.length === 0) this.buckets.delete(h);
        this.count--;
        return true;
    }

    clear(): void {
        this.buckets.clear();
        this.count = 0;
    }
}
