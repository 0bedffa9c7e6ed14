// ─────────────────────────────────────────────────────────────
// Mathweave  ·  HTML Emitter
// Math goes through the typesetting callback; document
// structure (tables, images, prose) is written as markup
// ─────────────────────────────────────────────────────────────

import { Expr } from '../core/expr';
import { expectArity, ExprShapeError } from '../core/errors';
import { soleArg, textOf } from '../core/patterns';
import { resolveRenderOptions, type RenderOptions } from '../config';
import type { LatexRenderer } from './latex';
import { escapeHtml, katexTypeset, type TypesetFn } from './typeset';

const headName = (e: Expr): string | undefined => e.head()?.symbolName;

/** Integers, decimals, integer fractions, and tuples or sets made only of those. */
export function canRenderAsPlainText(e: Expr): boolean {
    if (e.isInteger()) return true;
    const args = e.args();
    if (!args) return false;
    switch (headName(e)) {
        case 'Decimal':
            return true;
        case 'Div':
            return args.length === 2 && args[0].isInteger() && args[1].isInteger();
        case 'Tuple':
        case 'Set':
            return args.every(canRenderAsPlainText);
        default:
            return false;
    }
}

/** First argument of `e` whose head is the symbol `tag`. */
export function argTagged(e: Expr, tag: string): Expr | undefined {
    return e.argWithHead(Expr.symbol(tag));
}

const Description = Expr.symbol('Description');

const muted = (label: string): string => `<span style="font-size:85%; color:#888">${label}</span>`;
const DASH = ' <span style="color:#888">&mdash;</span> ';

export class HtmlRenderer {
    readonly options: RenderOptions;

    constructor(
        readonly latex: LatexRenderer,
        readonly typeset: TypesetFn = katexTypeset,
        options: Partial<RenderOptions> = {},
    ) {
        this.options = resolveRenderOptions(options);
    }

    /** Typesets the LaTeX of `e`. */
    math(e: Expr, display: boolean = false): string {
        return this.typeset(this.latex.latex(e), display);
    }

    html(expr: Expr, display: boolean = false, avoidLatex: boolean = false, single: boolean = false): string {
        const args = expr.args();
        if (!args) {
            const n = expr.integerValue;
            if (avoidLatex && n !== undefined) return n.toString();
            return this.math(expr, display);
        }

        if (avoidLatex) {
            const plain = this.plainText(expr, args, display);
            if (plain !== undefined) return plain;
        }

        const head = expr.head();
        const kind = head ? this.latex.table.lookup(head)?.structural : undefined;
        switch (kind) {
            case 'Table': return this.table(expr);
            case 'Formula':
                expectArity('Formula', args.length, 1);
                return this.math(args[0]);
            case 'References': return this.references(args);
            case 'Assumptions': return this.assumptions(args);
            case 'Description': return this.description(args, display);
            case 'SymbolDefinition': return this.symbolDefinition(args);
            case 'Image': return this.image(args, single);
            default: return this.math(expr, display);
        }
    }

    private plainText(expr: Expr, args: readonly Expr[], display: boolean): string | undefined {
        switch (headName(expr)) {
            case 'Decimal': {
                expectArity('Decimal', args.length, 1);
                const text = textOf('Decimal', args[0]);
                if (!text.includes('e')) return text;
                const [mant, expo] = text.split('e');
                return `${mant} &middot; 10<sup>${expo.replace(/^\++/, '')}</sup>`;
            }
            case 'Div': {
                const [p, q] = args;
                if (args.length === 2 && p.isInteger() && q.isInteger()) return `${p.integerValue}/${q.integerValue}`;
                return undefined;
            }
            case 'Neg':
                if (args.length === 1 && canRenderAsPlainText(args[0])) return '-' + this.html(args[0], display, true);
                return undefined;
            case 'Tuple':
                if (!canRenderAsPlainText(expr)) return undefined;
                return '(' + args.map(a => this.html(a, display, true)).join(', ') + ')';
            case 'Set':
                if (!canRenderAsPlainText(expr)) return undefined;
                return '{' + args.map(a => this.html(a, display, true)).join(', ') + '}';
            default:
                return undefined;
        }
    }

    // ── Structural forms ────────────────────────────────────

    private table(expr: Expr): string {
        const rel = argTagged(expr, 'TableRelation');
        const heads = argTagged(expr, 'TableHeadings');
        const data = argTagged(expr, 'List')?.args();
        const split = argTagged(expr, 'TableSplit');
        const colheads = argTagged(expr, 'TableColumnHeadings')?.args();
        if (!data) throw new ExprShapeError(`Table: missing List of rows in ${expr.toString()}`);

        const parts = split ? Number(soleArg('TableSplit', split).integerValue ?? 0n) : 1;
        if (parts < 1) {
            throw new ExprShapeError(`TableSplit: expected a positive integer, got ${String(split)}`);
        }
        const headings = heads?.args() ?? null;
        const cols = headings ? headings.length : (data[0]?.args()?.length ?? 0);
        const perPart = Math.floor(data.length / parts);

        let s = '<div style="overflow-x:auto;">';
        s += '<table align="center" style="border:0; background-color:#fff;">';
        s += '<tr style="border:0; background-color:#fff">';
        let j = 0;
        for (let outer = 0; outer < parts; outer++) {
            s += '<td style="border:0; background-color:#fff; vertical-align:top;">';
            s += '<table style="float: left; margin-right: 1em;">';
            if (headings) {
                // nowrap keeps headings such as "n \ k" on one line
                s += '<tr>' + headings.map(col => `<th style="white-space:nowrap;">${this.html(col, false, true)}</th>`).join('') + '</tr>';
            }
            const end = outer === parts - 1 ? data.length : perPart * (outer + 1);
            for (const row of data.slice(perPart * outer, end)) {
                s += '<tr>';
                const cells = row.args() ?? [];
                if (headName(row) === 'TableSection') {
                    const label = textOf('TableSection', soleArg('TableSection', row));
                    s += `<td colspan="${cols}" style="text-align:center; font-weight: bold">${escapeHtml(label)}</td>`;
                } else {
                    const rowHead = colheads?.[j];
                    if (rowHead) s += `<th>${this.html(rowHead, false, true)}</th>`;
                    s += cells.map(cell => `<td>${this.html(cell, false, true)}</td>`).join('');
                }
                s += '</tr>';
                j++;
            }
            s += '</table></td>';
        }
        s += '</tr></table></div>';

        const relArgs = rel?.args();
        if (relArgs) {
            expectArity('TableRelation', relArgs.length, 2);
            const caption = Expr.call(Description, 'Table data:', relArgs[0], ' such that ', relArgs[1]);
            s += '<div style="text-align:center; margin-top: 0.5em">' + this.html(caption, true) + '</div>';
        }
        return s;
    }

    private references(args: readonly Expr[]): string {
        const items = args.map(ref => `<li>${escapeHtml(textOf('References', ref))}</li>`).join('');
        return `<div class="entrysubhead">References:</div><ul>${items}</ul>`;
    }

    private assumptions(args: readonly Expr[]): string {
        return args.map((arg, i) => {
            const label = i === 0 ? 'Assumptions' : 'Alternative assumptions';
            return '<div style="text-align:center; margin:0.8em">'
                + `<span style="font-size:85%; color:#888; margin-right:0.8em">${label}:</span>`
                + this.html(arg)
                + '</div>';
        }).join('');
    }

    // Prose with inline math; text starting with punctuation attaches to the previous word
    private description(args: readonly Expr[], display: boolean): string {
        let s = display ? '<div style="text-align:center; margin:0.6em">' : '';
        for (const arg of args) {
            const text = arg.textValue;
            const tag = headName(arg);
            if (text !== undefined) {
                if (/^[,.;]/.test(text)) s = s.trimEnd();
                s += escapeHtml(text);
            } else if (tag === 'SourceForm') {
                s += `<tt>${escapeHtml(soleArg('SourceForm', arg).toString())}</tt>`;
            } else if (tag === 'EntryReference') {
                const id = escapeHtml(textOf('EntryReference', soleArg('EntryReference', arg)));
                s += `<a href="${this.options.entryDir}${id}/">${id}</a>`;
            } else {
                s += this.html(arg, false, true);
            }
            s += ' ';
        }
        if (display) s += '</div>';
        return s;
    }

    private symbolDefinition(args: readonly Expr[]): string {
        expectArity('SymbolDefinition', args.length, 3);
        const [symbol, example, description] = args;
        const name = symbol.symbolName;
        if (name === undefined) throw new ExprShapeError(`SymbolDefinition: expected a symbol, got ${symbol.toString()}`);
        return '<div style="text-align:center; margin:0.6em">'
            + muted('Symbol:') + ' '
            + `<tt><a href="${this.options.symbolDir}${name}/">${name}</a></tt>`
            + DASH + this.html(example)
            + DASH + escapeHtml(textOf('SymbolDefinition', description))
            + '</div>';
    }

    /** Image(caption, ImageSource(path)). */
    private image(args: readonly Expr[], single: boolean): string {
        expectArity('Image', args.length, 2);
        const [caption, source] = args;
        const path = imagePath(source);
        const { imageDir, thumbSize, fullSize } = this.options;
        let s = '<div style="text-align:center; margin:0.6em 0.4em 0.0em 0.2em">';
        s += muted('Image:') + ' ' + this.html(caption);
        if (single && this.options.expandSingleImages) {
            s += '<div style="text-align:center; padding-right:1em">';
            s += `<img id="${path}" src="${imageDir}${path}.svg" style="height:${fullSize}; margin-top:0.3em; margin-bottom:0px"/>`;
            s += '</div>';
        } else {
            s += `<button style="margin:0 0 0 0.3em" onclick="toggleBig('${path}', '${imageDir}${path}_small.svg', '${imageDir}${path}.svg')">Big &#x1F50D;</button>`;
            s += '<div style="text-align:center; padding-right:1em;">';
            s += `<img id="${path}" src="${imageDir}${path}_small.svg" style="width:${thumbSize}; max-width:100%; margin-top:0.3em; margin-bottom:0px"/>`;
            s += '</div>';
        }
        s += '</div>';
        return s;
    }
}

/** Asset path of an `ImageSource(path)` term, escaped for attributes. */
export function imagePath(source: Expr): string {
    if (headName(source) !== 'ImageSource') {
        throw new ExprShapeError(`Image: expected ImageSource(path), got ${source.toString()}`);
    }
    return escapeHtml(textOf('ImageSource', soleArg('ImageSource', source)));
}
