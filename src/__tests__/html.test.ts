// ─────────────────────────────────────────────────────────────
// Mathweave  ·  HTML Emitter Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { Expr } from '../core/expr';
import { ExprShapeError } from '../core/errors';
import { createDefaultSymbolTable } from '../core/symbols';
import { DEFAULT_RENDER_OPTIONS } from '../config';
import { LatexRenderer } from '../emitters/latex';
import { canRenderAsPlainText, HtmlRenderer } from '../emitters/html';
import { escapeHtml, katexTypeset, type TypesetFn } from '../emitters/typeset';

const table = createDefaultSymbolTable();
const [
    Equal, Element, Implies, Neg, Div, Decimal, Tuple, Set, CC, RR, GammaFunction,
    Formula, Description, SourceForm, EntryReference, References, Assumptions, SymbolDefinition,
    Image, ImageSource, Table, TableRelation, TableHeadings, TableSplit, TableSection, List,
    TableColumnHeadings,
] = table.symbols(`
    Equal Element Implies Neg Div Decimal Tuple Set CC RR GammaFunction
    Formula Description SourceForm EntryReference References Assumptions SymbolDefinition
    Image ImageSource Table TableRelation TableHeadings TableSplit TableSection List
    TableColumnHeadings`);
const [x, z, P, Q] = table.symbols('x z P Q');

// Marks inline math with [..] and display math with [[..]]
const stub: TypesetFn = (latex, display) => (display ? `[[${latex}]]` : `[${latex}]`);

const latex = new LatexRenderer(table);
const h = new HtmlRenderer(latex, stub);

function rowsPerSubtable(html: string): number[] {
    return html.split('<table style="float: left; margin-right: 1em;">').slice(1)
        .map(part => (part.split('</table>')[0].match(/<tr>/g) ?? []).length);
}

describe('math and plain text', () => {
    it('typesets atoms unless plain text is requested', () => {
        expect(h.html(Expr.integer(5))).toBe('[5]');
        expect(h.html(Expr.integer(5), true)).toBe('[[5]]');
        expect(h.html(Expr.integer(5), false, true)).toBe('5');
        expect(h.html(x, false, true)).toBe('[x]');
    });

    it('prints numbers as plain text', () => {
        expect(h.html(Decimal.of('1.5e-3'), false, true)).toBe('1.5 &middot; 10<sup>-3</sup>');
        expect(h.html(Div.of(1, 2), false, true)).toBe('1/2');
        expect(h.html(Neg.of(Div.of(1, 2)), false, true)).toBe('-1/2');
        expect(h.html(Tuple.of(1, Div.of(1, 2)), false, true)).toBe('(1, 1/2)');
    });

    it('typesets containers that are not entirely plain', () => {
        expect(canRenderAsPlainText(Set.of(1, x))).toBe(false);
        expect(h.html(Set.of(1, x), false, true)).toBe('[\\left\\{1, x\\right\\}]');
    });

    it('typesets formulas inline', () => {
        expect(h.html(Formula.of(Equal.of(x, 1)), true)).toBe('[x = 1]');
    });
});

describe('structural forms', () => {
    it('joins description text and attaches punctuation', () => {
        expect(h.html(Description.of('Hello', x, ', world'))).toBe('Hello [x], world ');
        expect(h.html(Description.of('a < b'), true))
            .toBe('<div style="text-align:center; margin:0.6em">a &lt; b </div>');
    });

    it('prints source forms and entry links', () => {
        expect(h.html(Description.of(SourceForm.of(x.add(1)), EntryReference.of('abc123'))))
            .toBe('<tt>Add(x, 1)</tt> <a href="../../entry/abc123/">abc123</a> ');
    });

    it('lists references', () => {
        expect(h.html(References.of('A & B')))
            .toBe('<div class="entrysubhead">References:</div><ul><li>A &amp; B</li></ul>');
    });

    it('labels alternative assumptions', () => {
        const block = (label: string, math: string): string =>
            '<div style="text-align:center; margin:0.8em">'
            + `<span style="font-size:85%; color:#888; margin-right:0.8em">${label}:</span>`
            + math + '</div>';
        expect(h.html(Assumptions.of(Element.of(x, CC), Element.of(x, RR)))).toBe(
            block('Assumptions', '[x \\in \\mathbb{C}]')
            + block('Alternative assumptions', '[x \\in \\mathbb{R}]'));
    });

    it('prints symbol definitions', () => {
        expect(h.html(SymbolDefinition.of(GammaFunction, GammaFunction.of(z), 'Gamma function'))).toBe(
            '<div style="text-align:center; margin:0.6em">'
            + '<span style="font-size:85%; color:#888">Symbol:</span> '
            + '<tt><a href="../../symbol/GammaFunction/">GammaFunction</a></tt>'
            + ' <span style="color:#888">&mdash;</span> [\\Gamma\\!\\left(z\\right)]'
            + ' <span style="color:#888">&mdash;</span> Gamma function</div>');
    });

    it('shows image thumbnails with a toggle', () => {
        const img = Image.of(Description.of('Plot'), ImageSource.of('plot_gamma'));
        const html = h.html(img);
        expect(html).toContain(`onclick="toggleBig('plot_gamma', '../../img/plot_gamma_small.svg', '../../img/plot_gamma.svg')"`);
        expect(html).toContain('<img id="plot_gamma" src="../../img/plot_gamma_small.svg" style="width:140px;');
        expect(h.html(img, false, false, true)).toBe(html);
    });

    it('expands images on single pages only when asked to', () => {
        const img = Image.of(Description.of('Plot'), ImageSource.of('p'));
        const expanded = new HtmlRenderer(latex, stub, { expandSingleImages: true });
        expect(expanded.html(img)).toContain('toggleBig');
        expect(expanded.html(img, false, false, true)).toBe(
            '<div style="text-align:center; margin:0.6em 0.4em 0.0em 0.2em">'
            + '<span style="font-size:85%; color:#888">Image:</span> Plot '
            + '<div style="text-align:center; padding-right:1em">'
            + '<img id="p" src="../../img/p.svg" style="height:400px; margin-top:0.3em; margin-bottom:0px"/>'
            + '</div></div>');
    });

    it('takes image locations from the options', () => {
        const custom = new HtmlRenderer(latex, stub, { imageDir: '/img/', thumbSize: '200px' });
        expect(custom.options.fullSize).toBe(DEFAULT_RENDER_OPTIONS.fullSize);
        expect(custom.html(Image.of(Description.of('Plot'), ImageSource.of('p1'))))
            .toContain('<img id="p1" src="/img/p1_small.svg" style="width:200px;');
    });

    it('rejects images without a source', () => {
        expect(() => h.html(Image.of(Description.of('Plot'), x))).toThrow(ExprShapeError);
    });
});

describe('tables', () => {
    const rows = (count: number): Expr[] =>
        Array.from({ length: count }, (_, i) => Tuple.of(i + 1, (i + 1) * (i + 1)));

    it('splits rows across side-by-side tables', () => {
        expect(rowsPerSubtable(h.html(Table.of(List.of(...rows(10)), TableSplit.of(2))))).toEqual([5, 5]);
        expect(rowsPerSubtable(h.html(Table.of(List.of(...rows(10)), TableSplit.of(3))))).toEqual([3, 3, 4]);
        expect(rowsPerSubtable(h.html(Table.of(List.of(...rows(4)))))).toEqual([4]);
    });

    it('prints cells as plain text', () => {
        expect(h.html(Table.of(List.of(Tuple.of(3, 9))))).toContain('<tr><td>3</td><td>9</td></tr>');
    });

    it('spans section rows across all columns', () => {
        const html = h.html(Table.of(
            TableHeadings.of(Description.of('n'), Description.of('value')),
            List.of(TableSection.of('Part A'), Tuple.of(1, 2))));
        expect(html).toContain('<tr><th style="white-space:nowrap;">n </th><th style="white-space:nowrap;">value </th></tr>');
        expect(html).toContain('<td colspan="2" style="text-align:center; font-weight: bold">Part A</td>');
    });

    it('leads each row with its column heading', () => {
        const html = h.html(Table.of(TableColumnHeadings.of(1, 2), List.of(Tuple.of(3), Tuple.of(4))));
        expect(html).toContain('<tr><th>1</th><td>3</td></tr><tr><th>2</th><td>4</td></tr>');
    });

    it('describes the table relation', () => {
        const html = h.html(Table.of(TableRelation.of(Tuple.of(P, Q), Implies.of(P, Q)), List.of(Tuple.of(1, 2))));
        expect(html).toContain(
            '<div style="text-align:center; margin-top: 0.5em">'
            + '<div style="text-align:center; margin:0.6em">'
            + 'Table data: [\\left(P, Q\\right)]  such that  [\\left(P\\right) \\implies \\left(Q\\right)] '
            + '</div></div>');
    });

    it('requires row data', () => {
        expect(() => h.html(Table.of(TableSplit.of(2)))).toThrow(ExprShapeError);
    });
});

describe('typesetting', () => {
    it('escapes markup', () => {
        expect(escapeHtml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#39;');
    });

    it('renders with KaTeX', () => {
        expect(katexTypeset('x^2', false)).toContain('class="katex"');
        expect(katexTypeset('x^2', true)).toContain('katex-display');
    });
});
