// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Entry and Topic Records
// Field access on Entry(...) and Topic(...) terms
// ─────────────────────────────────────────────────────────────

import { Expr } from '../core/expr';
import { ExprShapeError } from '../core/errors';
import { soleArg, textOf } from '../core/patterns';

const ID = Expr.symbol('ID');
const Title = Expr.symbol('Title');
const Entries = Expr.symbol('Entries');

function taggedText(record: Expr, tag: Expr): string {
    const name = tag.symbolName ?? tag.toString();
    const field = record.argWithHead(tag);
    if (!field) throw new ExprShapeError(`${record.head()?.toString() ?? 'record'}: missing ${name}(...) in ${record.toString()}`);
    return textOf(name, soleArg(name, field));
}

/** Text of the `ID(...)` item. */
export function idOf(entry: Expr): string {
    return taggedText(entry, ID);
}

/** Text of the `Title(...)` item. */
export function titleOf(record: Expr): string {
    return taggedText(record, Title);
}

/** Entry ids named by the `Entries(...)` items of a topic, in order. */
export function topicEntryIds(topic: Expr): string[] {
    const ids: string[] = [];
    for (const item of topic.args() ?? []) {
        if (!item.hasHead(Entries)) continue;
        for (const ref of item.args() ?? []) ids.push(textOf('Entries', ref));
    }
    return ids;
}
