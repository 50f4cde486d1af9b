/**
 * Input kind detection: majority vote over uploaded file extensions.
 * Extensions that are neither code nor document do not vote; ties go to
 * REQUIREMENTS.
 */

import * as path from 'path';
import { InputKind } from './graph_types';

export const CODE_EXTENSIONS: ReadonlySet<string> = new Set([
    '.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.hh', '.hxx', '.ino',
]);

export const DOCUMENT_EXTENSIONS: ReadonlySet<string> = new Set([
    '.pdf', '.doc', '.docx', '.txt', '.md', '.rtf',
]);

export function detectInputKind(fileNames: readonly string[]): InputKind {
    let code = 0;
    let documents = 0;
    for (const name of fileNames) {
        const ext = path.extname(name).toLowerCase();
        if (CODE_EXTENSIONS.has(ext)) code++;
        else if (DOCUMENT_EXTENSIONS.has(ext)) documents++;
    }
    return code > documents ? 'CODE' : 'REQUIREMENTS';
}

export function parseInputKind(raw: string | undefined): InputKind | null {
    switch ((raw || '').trim().toLowerCase()) {
        case 'code':
            return 'CODE';
        case 'requirements':
        case 'req':
            return 'REQUIREMENTS';
        default:
            return null;
    }
}
