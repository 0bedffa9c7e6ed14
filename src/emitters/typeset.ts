// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Math Typesetting
// ─────────────────────────────────────────────────────────────

import katex from 'katex';

/** Turns LaTeX into an HTML fragment, inline or as a display block. */
export type TypesetFn = (latex: string, display: boolean) => string;

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(s: string): string {
    return s.replace(/[&<>"']/g, c => HTML_ESCAPES[c] ?? c);
}

export const katexTypeset: TypesetFn = (latex, display) => {
    try {
        return katex.renderToString(latex, { displayMode: display, throwOnError: false });
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[Typeset] KaTeX failed on ${latex.slice(0, 60)}: ${reason}`);
        return `<code class="typeset-error">${escapeHtml(latex)}</code>`;
    }
};
