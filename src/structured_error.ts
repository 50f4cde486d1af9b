/**
 * Structured Error Schema
 *
 * Machine-readable pipeline errors with recovery options that the recovery
 * orchestrator evaluates to decide between another attempt and giving up.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Oracle output issues
    | 'EXTRACTION_FAILED'
    | 'VALIDATION_FAILED'

    // Oracle transport
    | 'ORACLE_ERROR'

    // Input issues
    | 'INVALID_INPUT'
    | 'DOCUMENT_EXTRACTION_FAILED'

    // Session
    | 'PIPELINE_BUSY';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RecoveryAction =
    | 'retry_same_prompt'
    | 'retry_with_validation_hints'
    | 'check_credentials'
    | 'abort_run';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
    estimated_success_probability: number; // 0.0-1.0
    side_effects?: string[];
}

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Thrown errors                                                              */
/* -------------------------------------------------------------------------- */

export type OracleErrorKind = 'NETWORK' | 'TIMEOUT' | 'AUTH' | 'RATE_LIMIT' | 'PROVIDER' | 'BAD_RESPONSE';

/**
 * Transport, auth or quota failure from the text-generation service.
 * `retryable` marks failures likely to clear on their own; the pipeline
 * retries every oracle failure up to its attempt bound.
 */
export class OracleError extends Error {
    constructor(
        public readonly kind: OracleErrorKind,
        message: string,
        public readonly retryable: boolean,
        public readonly httpStatus: number | null = null
    ) {
        super(message);
        this.name = 'OracleError';
    }
}

/** A source document could not be turned into text. */
export class DocumentExtractionError extends Error {
    constructor(public readonly fileName: string, message: string) {
        super(`${fileName}: ${message}`);
        this.name = 'DocumentExtractionError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: [...recoveryOptions].sort(
            (a, b) => b.estimated_success_probability - a.estimated_success_probability
        ),
        human_intervention_required: recoveryOptions.length === 0 ||
            recoveryOptions.every(opt => opt.estimated_success_probability < 0.5),
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = ['PIPELINE_BUSY'];
    if (fatalCodes.includes(code)) return 'FATAL';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    retrySamePrompt: (probability = 0.6): RecoveryOption => ({
        action: 'retry_same_prompt',
        description: 'Re-issue the identical prompt',
        risk_level: 'LOW',
        estimated_success_probability: probability,
        side_effects: ['Additional oracle call']
    }),

    retryWithValidationHints: (reason: string): RecoveryOption => ({
        action: 'retry_with_validation_hints',
        description: `Re-issue the prompt with the rejection reason appended: ${reason}`,
        risk_level: 'LOW',
        estimated_success_probability: 0.75,
        side_effects: ['Additional oracle call', 'Longer prompt']
    }),

    checkCredentials: (): RecoveryOption => ({
        action: 'check_credentials',
        description: 'Check the API key, network connectivity and provider quota',
        risk_level: 'LOW',
        estimated_success_probability: 0.3,
    }),

    abortRun: (reason: string): RecoveryOption => ({
        action: 'abort_run',
        description: `Abort run: ${reason}`,
        risk_level: 'HIGH',
        estimated_success_probability: 1.0,
        side_effects: ['No artifacts produced']
    })
};

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

function retryOption(reason: string, withHints: boolean): RecoveryOption {
    return withHints
        ? CommonRecoveryOptions.retryWithValidationHints(reason)
        : CommonRecoveryOptions.retrySamePrompt();
}

export class ErrorFactory {
    static extractionFailed(
        details: { attempts: Array<{ strategy: string; error: string }>; rawSnippet: string },
        withHints: boolean
    ): StructuredError {
        return createStructuredError(
            'EXTRACTION_FAILED',
            'Could not parse architecture from the oracle reply',
            details,
            [retryOption('the reply was not a parseable JSON object', withHints)]
        );
    }

    static validationFailed(reason: string, withHints: boolean): StructuredError {
        return createStructuredError(
            'VALIDATION_FAILED',
            `Architecture failed schema validation: ${reason}`,
            { reason },
            [retryOption(reason, withHints)]
        );
    }

    static oracleFailed(error: OracleError): StructuredError {
        // retried up to the attempt bound; non-retryable kinds rank below the guidance
        const options: RecoveryOption[] = [
            CommonRecoveryOptions.retrySamePrompt(error.retryable ? 0.6 : 0.2),
            CommonRecoveryOptions.checkCredentials(),
        ];
        return createStructuredError(
            'ORACLE_ERROR',
            `Oracle call failed (${error.kind}): ${error.message}. Check credentials and connectivity.`,
            { kind: error.kind, retryable: error.retryable, http_status: error.httpStatus },
            options
        );
    }

    static invalidInput(message: string, context: Record<string, unknown> = {}): StructuredError {
        return createStructuredError('INVALID_INPUT', message, context);
    }

    static documentExtractionFailed(error: DocumentExtractionError): StructuredError {
        return createStructuredError(
            'DOCUMENT_EXTRACTION_FAILED',
            error.message,
            { file: error.fileName }
        );
    }

    static pipelineBusy(activeRunId: string): StructuredError {
        return createStructuredError(
            'PIPELINE_BUSY',
            'Another run is still in progress on this session',
            { active_run_id: activeRunId }
        );
    }
}
