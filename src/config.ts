// ─────────────────────────────────────────────────────────────
// Mathweave  ·  Render Options
// ─────────────────────────────────────────────────────────────

export interface RenderOptions {
    /** Prefix of entry page links. */
    entryDir: string;
    /** Prefix of symbol page links. */
    symbolDir: string;
    /** Prefix of image assets. */
    imageDir: string;
    thumbSize: string;
    fullSize: string;
    /** Whether an entry's details panel starts expanded. */
    defaultVisible: boolean;
    /** Show images at `fullSize`, without the preview toggle, on single-entry pages. */
    expandSingleImages: boolean;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
    entryDir: '../../entry/',
    symbolDir: '../../symbol/',
    imageDir: '../../img/',
    thumbSize: '140px',
    fullSize: '400px',
    defaultVisible: false,
    expandSingleImages: false,
};

export function resolveRenderOptions(options: Partial<RenderOptions> = {}): RenderOptions {
    return { ...DEFAULT_RENDER_OPTIONS, ...options };
}
