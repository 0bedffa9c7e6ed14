// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Corpus
// Registry of entries and topics built from tagged terms
// ─────────────────────────────────────────────────────────────

import { Expr } from '../core/expr';
import { DuplicateEntryError, expectArity, ExprShapeError } from '../core/errors';
import { textOf } from '../core/patterns';
import type { SymbolTable } from '../core/symbols';
import { idOf, titleOf, topicEntryIds } from './records';

const Entry = Expr.symbol('Entry');
const Topic = Expr.symbol('Topic');
const SymbolDefinition = Expr.symbol('SymbolDefinition');

export interface MissingReference {
    topic: string;
    id: string;
}

export class Corpus {
    private entriesById = new Map<string, Expr>();
    private topicsByTitle = new Map<string, Expr>();
    private entryOrder: Expr[] = [];
    private topicOrder: Expr[] = [];

    constructor(readonly table: SymbolTable) {}

    get entries(): readonly Expr[] { return this.entryOrder; }
    get topics(): readonly Expr[] { return this.topicOrder; }

    /**
     * Builds and registers `Entry(...items)`. A `SymbolDefinition` item also
     * describes its symbol, with this entry as the symbol's domain table.
     */
    makeEntry(...items: Expr[]): Expr {
        const entry = Expr.call(Entry, ...items);
        const id = idOf(entry);
        if (this.entriesById.has(id)) throw new DuplicateEntryError(id);

        const def = entry.argWithHead(SymbolDefinition)?.args();
        if (def) {
            expectArity('SymbolDefinition', def.length, 3);
            const [symbol, example, description] = def;
            if (!symbol.isSymbol()) {
                throw new ExprShapeError(`SymbolDefinition: expected a symbol, got ${symbol.toString()}`);
            }
            this.table.describeBrief(symbol, example, textOf('SymbolDefinition', description), id);
        }

        this.entriesById.set(id, entry);
        this.entryOrder.push(entry);
        return entry;
    }

    defTopic(...items: Expr[]): Expr {
        const topic = Expr.call(Topic, ...items);
        const title = titleOf(topic);
        const previous = this.topicsByTitle.get(title);
        if (previous) {
            console.warn(`[Corpus] replacing topic "${title}"`);
            this.topicOrder = this.topicOrder.filter(t => t !== previous);
        }
        this.topicsByTitle.set(title, topic);
        this.topicOrder.push(topic);
        return topic;
    }

    entry(id: string): Expr | undefined {
        return this.entriesById.get(id);
    }

    topic(title: string): Expr | undefined {
        return this.topicsByTitle.get(title);
    }

    entryId(entry: Expr): string {
        return idOf(entry);
    }

    entryTitle(record: Expr): string {
        return titleOf(record);
    }

    topicEntryIds(topic: Expr): string[] {
        return topicEntryIds(topic);
    }

    /** Topic references to entry ids that were never registered. */
    missingEntries(): MissingReference[] {
        const missing: MissingReference[] = [];
        for (const topic of this.topicOrder) {
            const title = titleOf(topic);
            for (const id of topicEntryIds(topic)) {
                if (!this.entriesById.has(id)) missing.push({ topic: title, id });
            }
        }
        return missing;
    }
}
