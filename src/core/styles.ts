/**
 * Fixed inline styles shared by the renderers.
 *
 * Theme-dependent colors live in `themes.ts`; the strings here are the same
 * for every theme. The editor keeps only inline `style` attributes and a few
 * legacy table attributes (`bgcolor`, `cellpadding`, `align`), so every
 * element carries its own style string.
 */

/** Reference-section text: smaller and gray. */
export const MUTED_TEXT_STYLE = 'font-size:0.85em;color:#888888;';

export const INLINE_CODE_STYLE =
  'background:#f4f4f4;padding:2px 6px;font-family:SF Mono,Monaco,monospace;font-size:0.9em;color:#c7254e;';

export const CODE_LISTING_STYLE =
  'font-family:SF Mono,Monaco,Courier New,monospace;font-size:13px;line-height:1.6;';
export const CODE_NUMBER_CELL_STYLE =
  'color:#999999;width:2em;padding-right:1em;vertical-align:top;user-select:none;';
export const CODE_LINE_CELL_STYLE = 'white-space:pre;';

export const TABLE_CELL_STYLE = 'padding:10px 12px;border:1px solid #dddddd;';

/** Attributes of every layout table: full width, no spacing, no border. */
export const LAYOUT_TABLE_ATTRS = 'width="100%" cellspacing="0" border="0"';
