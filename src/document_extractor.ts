/**
 * Document text extraction, dispatched on file extension.
 *
 * PDF goes through pdf-parse and Word (.docx) through mammoth. Everything
 * else is decoded as UTF-8 with invalid byte sequences dropped.
 */

import * as fs from 'fs';
import * as path from 'path';
import pdfParse from 'pdf-parse';
import * as mammoth from 'mammoth';
import { createLogger, Logger } from './logger';
import { DocumentExtractionError } from './structured_error';

export interface SourceFile {
    name: string;
    content: Buffer;
}

export interface DocumentExtractor {
    extractText(file: SourceFile): Promise<string>;
}

/** UTF-8 decode that drops undecodable bytes instead of failing. */
export function decodePlainText(content: Buffer): string {
    return new TextDecoder('utf-8', { fatal: false }).decode(content).replace(/\uFFFD/g, '');
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export class FileDocumentExtractor implements DocumentExtractor {
    private readonly log: Logger;

    constructor(logger?: Logger) {
        this.log = logger ?? createLogger('document-extractor');
    }

    async extractText(file: SourceFile): Promise<string> {
        const ext = path.extname(file.name).toLowerCase();
        switch (ext) {
            case '.pdf':
                return this.extractPdf(file);
            case '.docx':
                return this.extractDocx(file);
            default:
                return decodePlainText(file.content);
        }
    }

    private async extractPdf(file: SourceFile): Promise<string> {
        try {
            const result = await pdfParse(file.content);
            this.log.debug('PDF extracted', { file: file.name, pages: result.numpages, chars: result.text.length });
            return result.text;
        } catch (e) {
            throw new DocumentExtractionError(file.name, `unreadable PDF: ${errorMessage(e)}`);
        }
    }

    private async extractDocx(file: SourceFile): Promise<string> {
        try {
            const result = await mammoth.extractRawText({ buffer: file.content });
            for (const message of result.messages) {
                this.log.warn('Word extraction message', { file: file.name, message: message.message });
            }
            return result.value;
        } catch (e) {
            throw new DocumentExtractionError(file.name, `unreadable Word document: ${errorMessage(e)}`);
        }
    }
}

export function readSourceFile(filePath: string): SourceFile {
    try {
        return { name: path.basename(filePath), content: fs.readFileSync(filePath) };
    } catch (e) {
        throw new DocumentExtractionError(path.basename(filePath), `cannot read file: ${errorMessage(e)}`);
    }
}
