/**
 * Hosted rendering link for a Mermaid document. The endpoint takes the whole
 * document base64-encoded in the path and rejects long URLs, so large graphs
 * get `too_large` and must be rendered locally.
 */

import { DIAGRAM_IMAGE } from './config';

export type DiagramUrlResult =
    | { ok: true; url: string }
    | { ok: false; reason: 'too_large'; length: number; limit: number };

export function buildDiagramImageUrl(
    diagramText: string,
    maxUrlChars: number = DIAGRAM_IMAGE.MAX_URL_CHARS,
    baseUrl: string = DIAGRAM_IMAGE.BASE_URL
): DiagramUrlResult {
    const url = baseUrl + Buffer.from(diagramText, 'utf8').toString('base64');
    if (url.length > maxUrlChars) {
        return { ok: false, reason: 'too_large', length: url.length, limit: maxUrlChars };
    }
    return { ok: true, url };
}
