// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Entry and Topic Pages
// HTML for one documented fact, the symbol definitions table
// and a topic listing its entries
// ─────────────────────────────────────────────────────────────

import { allSymbols, type Expr } from '../core/expr';
import { ExprShapeError } from '../core/errors';
import { soleArg, textOf } from '../core/patterns';
import { idOf, titleOf } from '../corpus/records';
import { argTagged, imagePath, type HtmlRenderer } from './html';
import { escapeHtml } from './typeset';

/** Anything that resolves entry ids, such as a `Corpus`. */
export interface EntryLookup {
    entry(id: string): Expr | undefined;
}

const headName = (e: Expr): string | undefined => e.head()?.symbolName;

const HIDDEN_ITEMS = ['ID', 'Variables'];
const LISTED_ITEMS = ['Formula', 'Assumptions'];

const DOWNLOADS: [suffix: string, label: string][] = [
    ['_small.png', 'png (small)'],
    ['_medium.png', 'png (medium)'],
    ['_large.png', 'png (large)'],
    ['_small.pdf', 'pdf (small)'],
    ['.pdf', 'pdf (medium/large)'],
    ['_small.svg', 'svg (small)'],
    ['.svg', 'svg (medium/large)'],
];

function downloadLinks(r: HtmlRenderer, path: string): string {
    const links = DOWNLOADS.map(([suffix, label]) => `<a href="${r.options.imageDir}${path}${suffix}">${label}</a>`);
    return '<div style="text-align:center; margin-top:0; margin-bottom:1.1em">'
        + '<span style="font-size:85%; color:#888">Download:</span> '
        + links.join(' <span style="color:#888">&mdash;</span> ')
        + '</div>';
}

// ── Entry ───────────────────────────────────────────────────

/**
 * The first item is always shown; the rest sit in a details panel below it,
 * followed by the TeX listing, the definitions table and the source form.
 */
export function entryHtml(r: HtmlRenderer, entry: Expr, single: boolean = false): string {
    const id = escapeHtml(idOf(entry));
    const items = (entry.args() ?? []).filter(arg => {
        const h = headName(arg);
        return h === undefined || !HIDDEN_ITEMS.includes(h);
    });
    if (items.length === 0) throw new ExprShapeError(`Entry ${id}: nothing to display`);
    const [first, ...rest] = items;

    let s = '<div class="entry">';
    if (single) {
        s += '<div style="padding-top:0.4em">';
    } else {
        s += '<div style="float:left; margin-top:0.0em; margin-right:0.3em">';
        s += `<a href="${r.options.entryDir}${id}/" style="margin-left:3pt; font-size:85%">${id}</a> <span></span><br/>`;
        s += `<button style="margin-top:0.2em; margin-bottom: 0.1em;" onclick="toggleVisible('${id}:info')">Details</button>`;
        s += '</div>';
        s += '<div>';
    }
    s += r.html(first, true, false, single);
    s += '</div>';

    if (single) {
        s += `<div id="${id}:info" style="padding: 1em; clear:both">`;
    } else {
        const shown = r.options.defaultVisible ? 'visible' : 'none';
        s += `<div id="${id}:info" style="display:${shown}; padding: 1em; clear:both">`;
    }

    const image = items.find(item => headName(item) === 'Image');
    const source = image ? argTagged(image, 'ImageSource') : undefined;
    if (source) s += downloadLinks(r, imagePath(source));

    for (const item of rest) {
        s += r.html(item, true) + '\n\n';
    }

    const tex: string[] = [];
    for (const item of entry.args() ?? []) {
        const h = headName(item);
        if (h !== undefined && LISTED_ITEMS.includes(h)) {
            for (const part of item.args() ?? []) tex.push(r.latex.latex(part));
        }
    }
    if (tex.length > 0) {
        s += '<div class="entrysubhead">TeX:</div>';
        s += `<pre>${escapeHtml(tex.join('\n\n'))}</pre>`;
    }

    const table = r.latex.table;
    const symbols = allSymbols(entry).filter(sym => !table.isExcludedFromDefinitions(sym));
    s += '<div class="entrysubhead">Definitions:</div>';
    s += definitionsTableHtml(r, symbols, true);

    s += '<div class="entrysubhead">Source code for this entry:</div>';
    s += `<pre>${escapeHtml(entry.toString())}</pre>`;

    s += '</div></div>\n';
    return s;
}

/** One row per described symbol; symbols without a description are skipped. */
export function definitionsTableHtml(r: HtmlRenderer, symbols: readonly Expr[], center: boolean = false): string {
    let s = center ? '<table style="margin: 0 auto">' : '<table>';
    s += '<tr><th>Symbol</th> <th>Notation</th> <th>Short description</th></tr>';
    for (const symbol of symbols) {
        const desc = r.latex.table.description(symbol);
        const name = symbol.symbolName;
        if (!desc || name === undefined) continue;
        s += `<tr><td><tt><a href="${r.options.symbolDir}${name}/">${name}</a></tt></td>`;
        s += `<td>${r.math(desc.example)}</td>`;
        s += `<td>${escapeHtml(desc.description)}</td></tr>`;
    }
    s += '</table>';
    return s;
}

// ── Topic ───────────────────────────────────────────────────

export function topicHtml(r: HtmlRenderer, topic: Expr, entries: EntryLookup): string {
    const title = titleOf(topic);
    let s = `<h1>${escapeHtml(title)}</h1>\n`;
    for (const item of topic.args() ?? []) {
        switch (headName(item)) {
            case 'Title':
                break;
            case 'Section':
                s += `<h2>${escapeHtml(textOf('Section', soleArg('Section', item)))}</h2>\n`;
                break;
            case 'Subsection':
                s += `<h3>${escapeHtml(textOf('Subsection', soleArg('Subsection', item)))}</h3>\n`;
                break;
            case 'Entries':
                for (const ref of item.args() ?? []) {
                    const id = textOf('Entries', ref);
                    const entry = entries.entry(id);
                    if (!entry) {
                        console.warn(`[Corpus] topic "${title}" references unknown entry ${id}`);
                        continue;
                    }
                    s += entryHtml(r, entry);
                }
                break;
            case 'DefinitionsTable':
                s += definitionsTableHtml(r, item.args() ?? []) + '\n';
                break;
            case 'SeeTopics': {
                const titles = (item.args() ?? []).map(t => escapeHtml(textOf('SeeTopics', t)));
                s += `<p>See topics: ${titles.join(', ')}</p>\n`;
                break;
            }
            default:
                s += r.html(item, true) + '\n';
        }
    }
    return s;
}
