// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Public API
// ─────────────────────────────────────────────────────────────

export {
    Expr, makeSymbol, makeInteger, makeText, apply,
    add, sub, mul, div, pow,
    allSymbols, toSourceString, needsParensInMul, showExponentialAsPower,
} from './core/expr';
export type { ExprData, ExprLike } from './core/expr';
export { ExprMap } from './core/expr-map';
export {
    ExprShapeError, UnknownSymbolError, SealedRegistryError, DuplicateEntryError,
    expectArity, expectAtLeast,
} from './core/errors';
export { LATEX_FORMS, STRUCTURAL_FORMS, isLatexForm, isStructuralForm } from './core/forms';
export type { LatexFormKind, StructuralKind } from './core/forms';
export { iterationBound, rangeBound, derivativeSpec } from './core/patterns';
export type { IterationBound, RangeBound, OverBound, PredicateBound, DerivativeSpec } from './core/patterns';
export { SymbolTable, createDefaultSymbolTable } from './core/symbols';
export type { SymbolInfo, SymbolDescription } from './core/symbols';

export { DEFAULT_RENDER_OPTIONS, resolveRenderOptions } from './config';
export type { RenderOptions } from './config';
export { LatexRenderer, LatexCache } from './emitters/latex';
export type { LatexRule, LatexRuleGroup } from './emitters/latex';
export { HtmlRenderer, canRenderAsPlainText } from './emitters/html';
export { entryHtml, definitionsTableHtml, topicHtml } from './emitters/entry-html';
export type { EntryLookup } from './emitters/entry-html';
export { katexTypeset, escapeHtml } from './emitters/typeset';
export type { TypesetFn } from './emitters/typeset';

export { Corpus } from './corpus/corpus';
export type { MissingReference } from './corpus/corpus';
export { loadGammaFunction } from './corpus/gamma';
