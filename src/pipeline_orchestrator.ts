/**
 * Pipeline Orchestrator
 *
 * One run: BUILDING_PROMPT -> AWAITING_ORACLE -> EXTRACTING -> VALIDATING
 * -> RENDERING -> DONE, with FAILED reachable from any state. The
 * oracle/extract/validate loop repeats while the recovery orchestrator
 * answers RETRY. Rendering never fails a run; renderer anomalies come back
 * as warnings next to the artifacts.
 *
 * All session state (oracle, history, logger, debug flag) is handed in at
 * construction. Nothing here is module-global except the logger's
 * correlation context, which is set and cleared around each run.
 */

import * as crypto from 'crypto';
import { PIPELINE_LIMITS } from './config';
import { buildPrompt } from './prompts';
import { extractArchitecture } from './response_extractor';
import { validateArchitecture, toArchitectureGraph } from './schema_validator';
import { renderDiagramReport } from './diagram_renderer';
import { renderBuildScriptReport } from './build_script_renderer';
import { serializeGraph } from './graph_file';
import { PipelineArtifacts } from './output_writer';
import { detectInputKind } from './input_kind';
import { RecoveryOrchestrator } from './recovery_orchestrator';
import { ArchitectureGraph, InputKind } from './graph_types';
import { Oracle } from './model_router';
import { RunHistory, RunSource } from './run_history';
import { DocumentExtractor, FileDocumentExtractor, SourceFile } from './document_extractor';
import { createLogger, setCorrelation, clearCorrelation, Logger } from './logger';
import {
    DocumentExtractionError,
    ErrorFactory,
    OracleError,
    StructuredError,
} from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type PipelineState =
    | 'BUILDING_PROMPT'
    | 'AWAITING_ORACLE'
    | 'EXTRACTING'
    | 'VALIDATING'
    | 'RENDERING'
    | 'DONE'
    | 'FAILED';

export interface SessionContext {
    oracle: Oracle;
    history: RunHistory;
    logger?: Logger;
    /** Keep the raw oracle reply on failed runs and log prompts at debug level. */
    debug?: boolean;
    documentExtractor?: DocumentExtractor;
    now?: () => Date;
}

export interface PipelineOptions {
    maxAttempts?: number;
    maxInputChars?: number;
    /** Append the previous rejection reason to the retry prompt. */
    feedbackOnRetry?: boolean;
}

export type PipelineResult =
    | {
        ok: true;
        runId: string;
        graph: ArchitectureGraph;
        artifacts: PipelineArtifacts;
        warnings: string[];
        attempts: number;
        transitions: PipelineState[];
    }
    | {
        ok: false;
        runId: string;
        error: StructuredError;
        attempts: number;
        transitions: PipelineState[];
        rawResponse?: string;
    };

type AttemptOutcome =
    | { ok: true; graph: ArchitectureGraph; warnings: string[] }
    | { ok: false; error: StructuredError; rawResponse?: string };

const RAW_SNIPPET_CHARS = 500;

/* -------------------------------------------------------------------------- */
/* Run bookkeeping                                                            */
/* -------------------------------------------------------------------------- */

class RunTrace {
    readonly transitions: PipelineState[] = [];
    attempts = 0;

    constructor(readonly runId: string, private readonly log: Logger) {}

    enter(state: PipelineState): void {
        this.transitions.push(state);
        setCorrelation({ state, attempt: this.attempts });
        this.log.debug('State transition', { state });
    }
}

/* -------------------------------------------------------------------------- */
/* Pipeline Orchestrator                                                      */
/* -------------------------------------------------------------------------- */

export class PipelineOrchestrator {
    private readonly oracle: Oracle;
    private readonly history: RunHistory;
    private readonly log: Logger;
    private readonly debug: boolean;
    private readonly documentExtractor: DocumentExtractor;
    private readonly now: () => Date;
    private readonly recovery: RecoveryOrchestrator;
    private readonly maxInputChars: number;
    private readonly feedbackOnRetry: boolean;
    private activeRunId: string | null = null;

    constructor(session: SessionContext, options: PipelineOptions = {}) {
        this.oracle = session.oracle;
        this.history = session.history;
        this.log = session.logger ?? createLogger('pipeline');
        this.debug = session.debug ?? false;
        this.documentExtractor = session.documentExtractor ?? new FileDocumentExtractor(this.log.child('documents'));
        this.now = session.now ?? (() => new Date());
        this.recovery = new RecoveryOrchestrator({ maxAttempts: options.maxAttempts ?? PIPELINE_LIMITS.MAX_ATTEMPTS });
        this.maxInputChars = options.maxInputChars ?? PIPELINE_LIMITS.MAX_INPUT_CHARS;
        this.feedbackOnRetry = options.feedbackOnRetry ?? true;
    }

    get maxAttempts(): number {
        return this.recovery.maxAttempts;
    }

    get busy(): boolean {
        return this.activeRunId !== null;
    }

    /** Full generation run from source text. */
    async run(kind: InputKind, inputText: string): Promise<PipelineResult> {
        return this.exclusive(kind, (trace) => this.generate(trace, kind, inputText));
    }

    /** Validate and render a previously exported graph; the oracle is not called. */
    async renderExisting(candidate: unknown): Promise<PipelineResult> {
        return this.exclusive('EXPORTED_GRAPH', async (trace) => {
            const outcome = this.validate(trace, candidate, false);
            if (!outcome.ok) {
                trace.enter('FAILED');
                return this.failure(trace, outcome.error);
            }
            return this.render(trace, outcome.graph, outcome.warnings);
        });
    }

    /**
     * Extract text from each file, join them under `// FILE: <name>` headers
     * and run the pipeline. The input kind is detected from the file
     * extensions unless `kindOverride` is given.
     */
    async generateFromFiles(files: readonly SourceFile[], kindOverride?: InputKind): Promise<PipelineResult> {
        const kind = kindOverride ?? detectInputKind(files.map((f) => f.name));
        return this.exclusive(kind, async (trace) => {
            if (files.length === 0) {
                trace.enter('FAILED');
                return this.failure(trace, ErrorFactory.invalidInput('No input files given'));
            }

            let combined = '';
            for (const file of files) {
                try {
                    const text = await this.documentExtractor.extractText(file);
                    combined += `\n// FILE: ${file.name}\n` + text;
                } catch (e) {
                    if (!(e instanceof DocumentExtractionError)) throw e;
                    this.log.error('Document extraction failed', { file: e.fileName, error: e.message });
                    trace.enter('FAILED');
                    return this.failure(trace, ErrorFactory.documentExtractionFailed(e));
                }
            }
            this.log.info('Input files loaded', { files: files.length, kind, chars: combined.length });
            return this.generate(trace, kind, combined);
        });
    }

    /* ---------------------------------------------------------------------- */

    private async exclusive(
        source: RunSource,
        body: (trace: RunTrace) => Promise<PipelineResult>
    ): Promise<PipelineResult> {
        const runId = crypto.randomUUID();

        if (this.activeRunId !== null) {
            this.log.warn('Run rejected: pipeline busy', { active_run_id: this.activeRunId });
            return {
                ok: false,
                runId,
                error: ErrorFactory.pipelineBusy(this.activeRunId),
                attempts: 0,
                transitions: [],
            };
        }

        this.activeRunId = runId;
        setCorrelation({ runId });
        const trace = new RunTrace(runId, this.log);
        try {
            const result = await body(trace);
            this.record(source, result);
            return result;
        } catch (e) {
            // Unexpected failure: still leave a history entry before propagating.
            this.history.append({
                runId,
                timestamp: this.now().toISOString(),
                success: false,
                attempts: trace.attempts,
                source,
                systemName: null,
                errorCode: null,
            });
            throw e;
        } finally {
            this.activeRunId = null;
            clearCorrelation();
        }
    }

    private record(source: RunSource, result: PipelineResult): void {
        this.history.append({
            runId: result.runId,
            timestamp: this.now().toISOString(),
            success: result.ok,
            attempts: result.attempts,
            source,
            systemName: result.ok ? result.graph.systemName : null,
            errorCode: result.ok ? null : result.error.code,
        });
    }

    private async generate(trace: RunTrace, kind: InputKind, inputText: string): Promise<PipelineResult> {
        if (inputText.trim().length === 0) {
            trace.enter('FAILED');
            return this.failure(trace, ErrorFactory.invalidInput('Input text is empty', { kind }));
        }

        const previousErrors: StructuredError[] = [];
        let retryFeedback: string | undefined;

        for (;;) {
            trace.attempts += 1;
            const outcome = await this.attempt(trace, kind, inputText, retryFeedback);
            if (outcome.ok) {
                return this.render(trace, outcome.graph, outcome.warnings);
            }

            previousErrors.push(outcome.error);
            const evaluation = this.recovery.evaluate(outcome.error, {
                run_id: trace.runId,
                attempt_number: trace.attempts,
                previous_errors: previousErrors,
            });

            if (evaluation.decision === 'ABORT') {
                this.log.error('Run failed', {
                    code: outcome.error.code,
                    attempts: trace.attempts,
                    reasoning: evaluation.reasoning,
                });
                trace.enter('FAILED');
                const error = { ...outcome.error, context: { ...outcome.error.context, attempts: trace.attempts } };
                return this.failure(trace, error, outcome.rawResponse);
            }

            this.log.warn('Attempt rejected, retrying', {
                code: outcome.error.code,
                message: outcome.error.message,
                action: evaluation.selected_option.action,
            });
            retryFeedback = evaluation.selected_option.action === 'retry_with_validation_hints'
                ? outcome.error.message
                : undefined;
        }
    }

    private async attempt(
        trace: RunTrace,
        kind: InputKind,
        inputText: string,
        retryFeedback: string | undefined
    ): Promise<AttemptOutcome> {
        trace.enter('BUILDING_PROMPT');
        const prompt = buildPrompt(kind, inputText, { maxInputChars: this.maxInputChars, retryFeedback });
        if (this.debug) this.log.debug('Prompt built', { chars: prompt.length, prompt });

        trace.enter('AWAITING_ORACLE');
        let raw: string;
        try {
            raw = await this.oracle.generate(prompt);
        } catch (e) {
            if (!(e instanceof OracleError)) throw e;
            this.log.warn('Oracle call failed', { kind: e.kind, retryable: e.retryable, status: e.httpStatus });
            return { ok: false, error: ErrorFactory.oracleFailed(e) };
        }
        if (this.debug) this.log.debug('Oracle reply', { chars: raw.length, raw });

        trace.enter('EXTRACTING');
        const extracted = extractArchitecture(raw);
        if (!extracted.ok) {
            return {
                ok: false,
                error: ErrorFactory.extractionFailed(
                    { attempts: extracted.attempts, rawSnippet: raw.slice(0, RAW_SNIPPET_CHARS) },
                    this.feedbackOnRetry
                ),
                rawResponse: raw,
            };
        }
        this.log.debug('Reply parsed', { strategy: extracted.strategy });

        const validated = this.validate(trace, extracted.value, this.feedbackOnRetry);
        return validated.ok ? validated : { ...validated, rawResponse: raw };
    }

    private validate(trace: RunTrace, candidate: unknown, withHints: boolean): AttemptOutcome {
        trace.enter('VALIDATING');
        const verdict = validateArchitecture(candidate);
        if (!verdict.ok) {
            return { ok: false, error: ErrorFactory.validationFailed(verdict.reason, withHints) };
        }
        return { ok: true, ...toArchitectureGraph(verdict.value) };
    }

    private render(trace: RunTrace, graph: ArchitectureGraph, normalizeWarnings: string[]): PipelineResult {
        trace.enter('RENDERING');
        const diagram = renderDiagramReport(graph);
        const script = renderBuildScriptReport(graph, { now: this.now });
        const warnings = [...normalizeWarnings, ...diagram.warnings, ...script.warnings]
            .slice(0, PIPELINE_LIMITS.MAX_WARNINGS);

        trace.enter('DONE');
        this.log.info('Run complete', {
            system: graph.systemName,
            components: graph.components.length,
            connections: graph.connections.length,
            attempts: trace.attempts,
            warnings: warnings.length,
        });

        return {
            ok: true,
            runId: trace.runId,
            graph,
            artifacts: {
                graphJson: serializeGraph(graph),
                diagram: diagram.text,
                buildScript: script.text,
            },
            warnings,
            attempts: trace.attempts,
            transitions: trace.transitions,
        };
    }

    private failure(trace: RunTrace, error: StructuredError, rawResponse?: string): PipelineResult {
        const base = {
            ok: false as const,
            runId: trace.runId,
            error,
            attempts: trace.attempts,
            transitions: trace.transitions,
        };
        return this.debug && rawResponse !== undefined ? { ...base, rawResponse } : base;
    }
}
