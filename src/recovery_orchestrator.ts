/**
 * Recovery Orchestrator - retry decisions for one pipeline run
 *
 * Looks at a structured error and the attempt count and decides whether the
 * oracle loop gets another attempt, and with which recovery option.
 */

import { PIPELINE_LIMITS } from './config';
import { RecoveryAction, RecoveryOption, StructuredError, CommonRecoveryOptions } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type RecoveryDecision = 'RETRY' | 'ABORT';

export interface RecoveryEvaluation {
    decision: RecoveryDecision;
    selected_option: RecoveryOption;
    reasoning: string;
}

export interface RecoveryContext {
    run_id: string;
    attempt_number: number;
    previous_errors?: StructuredError[];
}

const RETRY_ACTIONS: ReadonlySet<RecoveryAction> = new Set<RecoveryAction>([
    'retry_same_prompt',
    'retry_with_validation_hints',
]);

const RISK_PENALTY = { LOW: 0, MEDIUM: 0.1, HIGH: 0.3 } as const;

/* -------------------------------------------------------------------------- */
/* Recovery Orchestrator                                                      */
/* -------------------------------------------------------------------------- */

export class RecoveryOrchestrator {
    readonly maxAttempts: number;

    constructor(config?: { maxAttempts?: number }) {
        this.maxAttempts = Math.max(1, config?.maxAttempts ?? PIPELINE_LIMITS.MAX_ATTEMPTS);
    }

    evaluate(error: StructuredError, context: RecoveryContext): RecoveryEvaluation {
        if (context.attempt_number >= this.maxAttempts) {
            return {
                decision: 'ABORT',
                selected_option: CommonRecoveryOptions.abortRun('Retry limit exceeded'),
                reasoning: `Exceeded maximum attempts (${this.maxAttempts})`,
            };
        }

        const retryOptions = error.recovery_options.filter(o => RETRY_ACTIONS.has(o.action));
        if (retryOptions.length === 0) {
            return {
                decision: 'ABORT',
                selected_option: CommonRecoveryOptions.abortRun(`${error.code} is not retryable`),
                reasoning: 'No retry strategy available for this error',
            };
        }

        const best = retryOptions
            .map(option => ({ option, score: this.scoreOption(option, context) }))
            .sort((a, b) => b.score - a.score)[0].option;

        return {
            decision: 'RETRY',
            selected_option: best,
            reasoning: `Selected recovery: ${best.action} (success prob: ${best.estimated_success_probability.toFixed(2)})`,
        };
    }

    /**
     * Score a recovery option (higher is better)
     */
    private scoreOption(option: RecoveryOption, context: RecoveryContext): number {
        let score = option.estimated_success_probability - RISK_PENALTY[option.risk_level];

        // The identical prompt already failed at least once with this action
        if (option.action === 'retry_same_prompt' && (context.previous_errors?.length ?? 0) > 1) {
            score -= 0.2;
        }

        return Math.max(0, Math.min(1, score));
    }
}
