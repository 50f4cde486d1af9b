/**
 * Response Extractor
 *
 * Recovers a JSON value from the oracle's raw reply. The oracle is prompted,
 * not programmed: it sometimes wraps the object in markdown fences or prose.
 * Strategies run in order and the first successful parse wins.
 */

export type ExtractionStrategy = 'direct' | 'fence_stripped' | 'object_span' | 'array_span';

export interface ExtractionAttempt {
    strategy: ExtractionStrategy;
    error: string;
}

export type ExtractionResult =
    | { ok: true; value: unknown; strategy: ExtractionStrategy }
    | { ok: false; raw: string; attempts: ExtractionAttempt[] };

type Candidate = (text: string) => string | null;

function stripFences(text: string): string | null {
    if (!text.includes('```')) return null;
    return text.replace(/```[A-Za-z0-9_+-]*[ \t]*/g, '').trim();
}

function span(open: string, close: string): Candidate {
    return (text: string) => {
        const first = text.indexOf(open);
        const last = text.lastIndexOf(close);
        if (first === -1 || last === -1 || last <= first) return null;
        return text.slice(first, last + 1);
    };
}

const STRATEGIES: ReadonlyArray<{ strategy: ExtractionStrategy; candidate: Candidate }> = [
    { strategy: 'direct', candidate: (text) => text },
    { strategy: 'fence_stripped', candidate: stripFences },
    { strategy: 'object_span', candidate: span('{', '}') },
    { strategy: 'array_span', candidate: span('[', ']') },
];

// Matches string literals (kept) or // and /* */ comments (captured, removed)
const COMMENT_PATTERN = /"(?:\\.|[^"\\])*"|(\/\/[^\n]*|\/\*[\s\S]*?\*\/)/g;

export function stripJsonComments(text: string): string {
    return text.replace(COMMENT_PATTERN, (match: string, comment: string | undefined) => (comment ? '' : match));
}

type ParseOutcome = { ok: true; value: unknown } | { ok: false; error: string };

function tryParse(text: string): ParseOutcome {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch (e) {
        const first = e instanceof Error ? e.message : String(e);
        const stripped = stripJsonComments(text);
        if (stripped === text) return { ok: false, error: first };
        try {
            return { ok: true, value: JSON.parse(stripped) };
        } catch {
            return { ok: false, error: first };
        }
    }
}

/** `[ { ... } ]` carries the architecture object one level down. */
function unwrapSingleton(value: unknown): unknown {
    if (Array.isArray(value) && value.length === 1) {
        const only: unknown = value[0];
        if (typeof only === 'object' && only !== null && !Array.isArray(only)) return only;
    }
    return value;
}

export function extractArchitecture(rawOracleText: string): ExtractionResult {
    const text = rawOracleText.trim();
    const attempts: ExtractionAttempt[] = [];

    for (const { strategy, candidate } of STRATEGIES) {
        const input = candidate(text);
        if (input === null) {
            attempts.push({ strategy, error: 'not applicable' });
            continue;
        }
        const parsed = tryParse(input);
        if (parsed.ok) {
            return { ok: true, value: unwrapSingleton(parsed.value), strategy };
        }
        attempts.push({ strategy, error: parsed.error });
    }

    return { ok: false, raw: rawOracleText, attempts };
}
