/**
 * Prompt Builder
 *
 * Each input kind has its own instruction template. The schema, the worked
 * example and the instructions are never truncated; only the user-supplied
 * tail is capped.
 */

import { InputKind } from '../graph_types';
import { PIPELINE_LIMITS } from '../config';
import { getCodeAnalysisPrompt } from './code_analysis';
import { getRequirementsAnalysisPrompt } from './requirements_analysis';
import { getSchemaSection, getWorkedExample } from './schema';

// Re-export all prompts
export { getCodeAnalysisPrompt, getRequirementsAnalysisPrompt, getSchemaSection, getWorkedExample };

export const USER_INPUT_HEADER = 'USER INPUT DATA:';
export const RETRY_FEEDBACK_HEADER = 'PREVIOUS ATTEMPT REJECTED:';

export interface PromptOptions {
    maxInputChars?: number;
    /** Why the previous reply was rejected; appended after the input. */
    retryFeedback?: string;
}

export interface TruncatedInput {
    text: string;
    truncated: boolean;
    originalLength: number;
}

export function getInstructionTemplate(kind: InputKind): string {
    switch (kind) {
        case 'CODE':
            return getCodeAnalysisPrompt();
        case 'REQUIREMENTS':
            return getRequirementsAnalysisPrompt();
    }
}

/** Cap `text` at `maxChars` UTF-16 units without splitting a surrogate pair. */
export function truncateInput(text: string, maxChars: number): TruncatedInput {
    if (text.length <= maxChars) {
        return { text, truncated: false, originalLength: text.length };
    }
    let cut = Math.max(0, maxChars);
    if (cut > 0) {
        const last = text.charCodeAt(cut - 1);
        if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
    }
    return { text: text.slice(0, cut), truncated: true, originalLength: text.length };
}

export function buildPrompt(kind: InputKind, inputText: string, options: PromptOptions = {}): string {
    const maxInputChars = options.maxInputChars ?? PIPELINE_LIMITS.MAX_INPUT_CHARS;
    const input = truncateInput(inputText, maxInputChars);

    const sections = [
        getInstructionTemplate(kind),
        getSchemaSection(),
        getWorkedExample(),
    ];

    let userSection = `${USER_INPUT_HEADER}\n${input.text}`;
    if (input.truncated) {
        userSection += `\n[input truncated: ${input.text.length} of ${input.originalLength} characters kept]`;
    }
    sections.push(userSection);

    if (options.retryFeedback) {
        sections.push(`${RETRY_FEEDBACK_HEADER}\n${options.retryFeedback}\nReturn a corrected JSON object that follows the schema.`);
    }

    return sections.join('\n\n');
}
