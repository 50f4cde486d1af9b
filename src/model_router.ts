// model_router.ts - oracle client for OpenAI-compatible chat completion endpoints

import * as crypto from 'crypto';
import { DEFAULT_MODEL_ID, DEFAULT_ORACLE_ENDPOINT, ORACLE_TEMPERATURE, TIMEOUTS } from './config';
import { createLogger, Logger } from './logger';
import { OracleError } from './structured_error';

// ============================================================================
// Types
// ============================================================================

/** The text-generation service, seen from the pipeline. */
export interface Oracle {
    generate(prompt: string): Promise<string>;
}

export type FetchLike = (url: string, init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
}) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface ModelRouterConfig {
    apiKey: string;
    modelId?: string;
    endpoint?: string;
    temperature?: number;
    timeoutMs?: number;
    debug?: boolean;
    fetchImpl?: FetchLike;
    logger?: Logger;
}

// ============================================================================
// Frozen constants
// ============================================================================

const FROZEN = {
    MAX_PROMPT_CHARS: 200_000,
    MAX_COMPLETION_TOKENS: 8192,

    SANITIZE: {
        ERROR_SNIPPET_MAX_CHARS: 500,
        STRIP_PATTERNS: [
            /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
            /[a-fA-F0-9]{32,}/g,
            /sk-[A-Za-z0-9_-]{10,}/g,
            /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        ],
    },
} as const;

// ============================================================================
// Helpers
// ============================================================================

function sha256Hex(s: string): string {
    return crypto.createHash('sha256').update(s).digest('hex');
}

export function sanitizeErrorSnippet(input: string): string {
    let out = input || '';
    for (const re of FROZEN.SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, FROZEN.SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    return out.replace(/[^\x20-\x7E]+/g, ' ');
}

function safeTemperature(x: number | undefined): number {
    if (x === undefined || !Number.isFinite(x)) return ORACLE_TEMPERATURE;
    return Math.max(0, Math.min(2.0, x));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** choices[0].message.content of an OpenAI-compatible response body */
function completionText(data: unknown): string | null {
    if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) return null;
    const choice: unknown = data.choices[0];
    if (!isRecord(choice) || !isRecord(choice.message)) return null;
    const content = choice.message.content;
    return typeof content === 'string' ? content : null;
}

// ============================================================================
// ModelRouter
// ============================================================================

export class ModelRouter implements Oracle {
    private readonly apiKey: string;
    private readonly modelId: string;
    private readonly endpoint: string;
    private readonly temperature: number;
    private readonly timeoutMs: number;
    private readonly debug: boolean;
    private readonly fetchImpl: FetchLike;
    private readonly log: Logger;

    constructor(config: ModelRouterConfig) {
        this.log = config.logger ?? createLogger('model-router');
        this.apiKey = config.apiKey || process.env.OPENROUTER_API_KEY || '';
        if (!this.apiKey) {
            this.log.warn('No API key configured. Set OPENROUTER_API_KEY or run `mbdarch init`.');
        }
        this.modelId = config.modelId || DEFAULT_MODEL_ID;
        this.endpoint = config.endpoint || DEFAULT_ORACLE_ENDPOINT;
        this.temperature = safeTemperature(config.temperature);
        this.timeoutMs = config.timeoutMs ?? TIMEOUTS.ORACLE_CALL_MS;
        this.debug = config.debug ?? false;
        this.fetchImpl = config.fetchImpl ?? fetch;
    }

    async generate(prompt: string): Promise<string> {
        if (prompt.trim().length === 0) {
            throw new OracleError('BAD_RESPONSE', 'prompt must be a non-empty string', false);
        }
        if (prompt.length > FROZEN.MAX_PROMPT_CHARS) {
            throw new OracleError('BAD_RESPONSE', `Prompt too large: ${prompt.length} chars > ${FROZEN.MAX_PROMPT_CHARS}`, false);
        }

        const payload = {
            model: this.modelId,
            messages: [{ role: 'user', content: prompt }],
            temperature: this.temperature,
            max_tokens: FROZEN.MAX_COMPLETION_TOKENS,
            stream: false,
        };

        if (this.debug) {
            this.log.debug('Oracle call', { model: this.modelId, prompt_chars: prompt.length, prompt_hash: sha256Hex(prompt).slice(0, 16) });
        }

        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), this.timeoutMs);
        const started = Date.now();

        let status: number;
        let ok: boolean;
        let bodyText: string;
        try {
            const resp = await this.fetchImpl(this.endpoint, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.apiKey}`,
                    'X-Title': 'MBD Architect',
                },
                body: JSON.stringify(payload),
                signal: ac.signal,
            });
            status = resp.status;
            ok = resp.ok;
            bodyText = await resp.text();
        } catch (e) {
            const isTimeout = e instanceof Error && e.name === 'AbortError';
            if (isTimeout) {
                throw new OracleError('TIMEOUT', `timeout after ${this.timeoutMs}ms`, true);
            }
            throw new OracleError('NETWORK', `network_error: ${sanitizeErrorSnippet(e instanceof Error ? e.message : String(e))}`, true);
        } finally {
            clearTimeout(tid);
        }

        if (!ok) {
            const snippet = sanitizeErrorSnippet(bodyText);
            if (status === 401 || status === 403) {
                throw new OracleError('AUTH', `Provider rejected credentials (HTTP ${status}): ${snippet}`, false, status);
            }
            if (status === 429) {
                throw new OracleError('RATE_LIMIT', `Provider rate limit (HTTP 429): ${snippet}`, true, status);
            }
            throw new OracleError('PROVIDER', `Provider error (HTTP ${status}): ${snippet}`, status >= 500, status);
        }

        let data: unknown;
        try {
            data = JSON.parse(bodyText);
        } catch {
            throw new OracleError('BAD_RESPONSE', `provider_response_not_json: ${sanitizeErrorSnippet(bodyText)}`, true, status);
        }

        const completion = completionText(data);
        if (completion === null) {
            throw new OracleError('BAD_RESPONSE', 'provider response has no completion text', true, status);
        }

        if (this.debug) {
            this.log.debug('Oracle success', { latency_ms: Date.now() - started, completion_chars: completion.length });
        }
        return completion;
    }
}
