/**
 * Identifier and label sanitizing for Mermaid output.
 *
 * `sanitizeIdentifier` is pure: the same name always yields the same id.
 * Making ids unique across a graph is the diagram renderer's job.
 */

import * as crypto from 'crypto';

/** Every generated node id starts with this, so none can equal a Mermaid token. */
export const ID_NAMESPACE = 'blk_';

export const MAX_LABEL_CHARS = 50;

const ELLIPSIS = '...';

const RESERVED_WORDS: ReadonlySet<string> = new Set([
    'end', 'graph', 'subgraph', 'style', 'class', 'click', 'call',
    'direction', 'tb', 'td', 'bt', 'rl', 'lr',
]);

function shortHash(value: string): string {
    return crypto.createHash('sha256').update(value, 'utf8').digest('hex').slice(0, 8);
}

export function isReservedWord(value: string): boolean {
    return RESERVED_WORDS.has(value.toLowerCase());
}

export function sanitizeIdentifier(rawName: string): string {
    let id = rawName.replace(/[^A-Za-z0-9_]/g, '');

    if (id.length === 0) {
        // distinct degenerate names ("!!!", "???") must not share one id
        id = `anon_${shortHash(rawName)}`;
    }
    if (/^[0-9]/.test(id)) {
        id = `n${id}`;
    }
    if (isReservedWord(id)) {
        id = `kw_${id}`;
    }
    return `${ID_NAMESPACE}${id}`;
}

/**
 * Display-safe label: no double quotes or line breaks, at most
 * MAX_LABEL_CHARS characters including the ellipsis.
 */
export function sanitizeLabel(raw: string): string {
    const flat = raw.replace(/"/g, "'").replace(/[\r\n]+/g, ' ');
    if (flat.length <= MAX_LABEL_CHARS) return flat;
    let cut = MAX_LABEL_CHARS - ELLIPSIS.length;
    const last = flat.charCodeAt(cut - 1);
    // keep surrogate pairs whole
    if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
    return flat.slice(0, cut) + ELLIPSIS;
}
