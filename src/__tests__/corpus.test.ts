// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Corpus and Entry Page Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { DuplicateEntryError, ExprShapeError } from '../core/errors';
import { createDefaultSymbolTable } from '../core/symbols';
import { Corpus } from '../corpus/corpus';
import { loadGammaFunction } from '../corpus/gamma';
import { LatexRenderer } from '../emitters/latex';
import { HtmlRenderer } from '../emitters/html';
import { definitionsTableHtml, entryHtml, topicHtml } from '../emitters/entry-html';
import type { TypesetFn } from '../emitters/typeset';
import type { RenderOptions } from '../config';

const stub: TypesetFn = (latex, display) => (display ? `[[${latex}]]` : `[${latex}]`);

function gammaCorpus(): Corpus {
    const corpus = new Corpus(createDefaultSymbolTable());
    loadGammaFunction(corpus);
    return corpus;
}

function renderer(corpus: Corpus, options: Partial<RenderOptions> = {}): HtmlRenderer {
    return new HtmlRenderer(new LatexRenderer(corpus.table), stub, options);
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('Corpus', () => {
    let corpus: Corpus;
    beforeEach(() => {
        corpus = new Corpus(createDefaultSymbolTable());
    });

    it('registers entries by id', () => {
        const [ID, Formula, Equal, x] = corpus.table.symbols('ID Formula Equal x');
        const entry = corpus.makeEntry(ID.of('test01'), Formula.of(Equal.of(x, x)));
        expect(corpus.entry('test01')).toBe(entry);
        expect(corpus.entryId(entry)).toBe('test01');
        expect(corpus.entries).toEqual([entry]);
    });

    it('rejects duplicate ids and entries without one', () => {
        const [ID, Formula, x] = corpus.table.symbols('ID Formula x');
        corpus.makeEntry(ID.of('test01'), Formula.of(x));
        expect(() => corpus.makeEntry(ID.of('test01'), Formula.of(x))).toThrow(DuplicateEntryError);
        expect(() => corpus.makeEntry(Formula.of(x))).toThrow(ExprShapeError);
    });

    it('describes symbols defined by an entry', () => {
        const [ID, SymbolDefinition, Sin, z] = corpus.table.symbols('ID SymbolDefinition Sin z');
        corpus.makeEntry(ID.of('sin001'), SymbolDefinition.of(Sin, Sin.of(z), 'Sine'));
        const desc = corpus.table.description(Sin);
        expect(desc?.description).toBe('Sine');
        expect(desc?.domainTable).toBe('sin001');
        expect(desc?.example.equals(Sin.of(z))).toBe(true);
    });

    it('reports topic references to unknown entries', () => {
        const [Title, Entries, ID, Formula, x] = corpus.table.symbols('Title Entries ID Formula x');
        corpus.makeEntry(ID.of('known1'), Formula.of(x));
        const topic = corpus.defTopic(Title.of('Test topic'), Entries.of('known1', 'absent'));
        expect(corpus.topic('Test topic')).toBe(topic);
        expect(corpus.entryTitle(topic)).toBe('Test topic');
        expect(corpus.topicEntryIds(topic)).toEqual(['known1', 'absent']);
        expect(corpus.missingEntries()).toEqual([{ topic: 'Test topic', id: 'absent' }]);
    });

    it('requires a topic title', () => {
        const [Entries] = corpus.table.symbols('Entries');
        expect(() => corpus.defTopic(Entries.of('a'))).toThrow(ExprShapeError);
    });
});

describe('gamma function topic', () => {
    it('loads every referenced entry', () => {
        const corpus = gammaCorpus();
        expect(corpus.entries).toHaveLength(21);
        expect(corpus.topics).toHaveLength(1);
        expect(corpus.missingEntries()).toEqual([]);
        const topic = corpus.topic('Gamma function');
        expect(topic && corpus.topicEntryIds(topic).slice(0, 3)).toEqual(['09e2ed', 'f1d31a', 'e68d11']);
    });

    it('describes the gamma function', () => {
        const corpus = gammaCorpus();
        const desc = corpus.table.description(corpus.table.symbol('GammaFunction'));
        expect(desc?.description).toBe('Gamma function');
        expect(desc?.domainTable).toBe('09e2ed');
    });
});

describe('entryHtml', () => {
    const corpus = gammaCorpus();
    const h = renderer(corpus);

    function entry(id: string) {
        const e = corpus.entry(id);
        if (!e) throw new Error(`missing entry ${id}`);
        return e;
    }

    it('renders an entry with its TeX, definitions and source', () => {
        const gammaRow = '<tr><td><tt><a href="../../symbol/GammaFunction/">GammaFunction</a></tt></td>'
            + '<td>[\\Gamma\\!\\left(z\\right)]</td><td>Gamma function</td></tr>';
        expect(entryHtml(h, entry('e68d11'))).toBe(
            '<div class="entry">'
            + '<div style="float:left; margin-top:0.0em; margin-right:0.3em">'
            + '<a href="../../entry/e68d11/" style="margin-left:3pt; font-size:85%">e68d11</a> <span></span><br/>'
            + `<button style="margin-top:0.2em; margin-bottom: 0.1em;" onclick="toggleVisible('e68d11:info')">Details</button>`
            + '</div><div>[\\Gamma\\!\\left(1\\right) = 1]</div>'
            + '<div id="e68d11:info" style="display:none; padding: 1em; clear:both">'
            + '<div class="entrysubhead">TeX:</div><pre>\\Gamma\\!\\left(1\\right) = 1</pre>'
            + '<div class="entrysubhead">Definitions:</div>'
            + '<table style="margin: 0 auto"><tr><th>Symbol</th> <th>Notation</th> <th>Short description</th></tr>'
            + gammaRow + '</table>'
            + '<div class="entrysubhead">Source code for this entry:</div>'
            + '<pre>Entry(ID(&quot;e68d11&quot;),\n    Formula(Equal(GammaFunction(1), 1)))</pre>'
            + '</div></div>\n');
    });

    it('lists formulas and assumptions in the TeX block', () => {
        expect(entryHtml(h, entry('f1d31a'))).toContain(
            '<pre>\\Gamma\\!\\left(n\\right) = \\left(n - 1\\right)!\n\nn \\in \\mathbb{C} \\setminus \\{0, -1, \\ldots\\}</pre>');
    });

    it('opens the details panel for single entries', () => {
        const html = entryHtml(h, entry('e68d11'), true);
        expect(html).toContain('<div class="entry"><div style="padding-top:0.4em">');
        expect(html).toContain('<div id="e68d11:info" style="padding: 1em; clear:both">');
        expect(html).not.toContain('toggleVisible');
    });

    it('follows the visibility option', () => {
        const open = renderer(corpus, { defaultVisible: true });
        expect(entryHtml(open, entry('e68d11'))).toContain('<div id="e68d11:info" style="display:visible; padding: 1em; clear:both">');
    });

    it('links image downloads for the first image', () => {
        const own = new Corpus(createDefaultSymbolTable());
        const [ID, Image, ImageSource, Description] = own.table.symbols('ID Image ImageSource Description');
        const withImage = own.makeEntry(ID.of('img001'), Image.of(Description.of('Plot'), ImageSource.of('xray/gamma')));
        const link = (suffix: string, label: string): string => `<a href="../../img/xray/gamma${suffix}">${label}</a>`;
        const sep = ' <span style="color:#888">&mdash;</span> ';
        expect(entryHtml(renderer(own), withImage)).toContain(
            '<div style="text-align:center; margin-top:0; margin-bottom:1.1em">'
            + '<span style="font-size:85%; color:#888">Download:</span> '
            + [
                link('_small.png', 'png (small)'),
                link('_medium.png', 'png (medium)'),
                link('_large.png', 'png (large)'),
                link('_small.pdf', 'pdf (small)'),
                link('.pdf', 'pdf (medium/large)'),
                link('_small.svg', 'svg (small)'),
                link('.svg', 'svg (medium/large)'),
            ].join(sep)
            + '</div>');
    });

    it('renders the domain table', () => {
        const html = entryHtml(h, entry('09e2ed'));
        expect(html).toContain('<td colspan="2" style="text-align:center; font-weight: bold">Numbers</td>');
        expect(html).toContain('<td colspan="2" style="text-align:center; font-weight: bold">Infinities</td>');
    });

    it('skips undescribed symbols in definitions tables', () => {
        const [Equal, GammaFunction] = corpus.table.symbols('Equal GammaFunction');
        const html = definitionsTableHtml(h, [Equal, GammaFunction]);
        expect(html.startsWith('<table><tr><th>Symbol</th>')).toBe(true);
        expect(html.match(/<tr>/g)).toHaveLength(2);
    });
});

describe('topicHtml', () => {
    it('renders headings and entries in order', () => {
        const corpus = gammaCorpus();
        const topic = corpus.topic('Gamma function');
        if (!topic) throw new Error('missing topic');
        const html = topicHtml(renderer(corpus), topic, corpus);
        expect(html.startsWith('<h1>Gamma function</h1>\n<h2>Domain</h2>\n<div class="entry">')).toBe(true);
        expect(html.match(/<div class="entry">/g)).toHaveLength(21);
    });

    it('warns about unknown entries', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const corpus = new Corpus(createDefaultSymbolTable());
        const [Title, Section, Entries] = corpus.table.symbols('Title Section Entries');
        const topic = corpus.defTopic(Title.of('T'), Section.of('S'), Entries.of('nope'));
        expect(topicHtml(renderer(corpus), topic, corpus)).toBe('<h1>T</h1>\n<h2>S</h2>\n');
        expect(warn).toHaveBeenCalledWith('[Corpus] topic "T" references unknown entry nope');
    });
});
