import fs from 'fs/promises';
import path from 'path';
import mammoth from 'mammoth';
import { ResumeParseError, UnsupportedResumeFormatError } from './errors.js';
import { normalizeWhitespace } from './helpers.js';

export type TextExtractor = (buffer: Buffer) => Promise<string>;

// pdf-parse's index runs a self-test when imported as an entry module; the lib file skips it
const extractPdf: TextExtractor = async buffer => {
    const { default: pdf } = await import('pdf-parse/lib/pdf-parse.js');
    return (await pdf(buffer)).text;
};

const extractDocx: TextExtractor = async buffer => (await mammoth.extractRawText({ buffer })).value;

const extractPlain: TextExtractor = async buffer => buffer.toString('utf8');

export const DEFAULT_EXTRACTORS: Record<string, TextExtractor> = {
    '.pdf': extractPdf,
    '.docx': extractDocx,
    '.txt': extractPlain,
    '.md': extractPlain
};

/**
 * Reads a resume and returns its plain text.
 *
 * @throws {@link UnsupportedResumeFormatError} for extensions without an extractor.
 * @throws {@link ResumeParseError} when the file cannot be read or yields no text (e.g. a scanned PDF).
 */
export async function loadResume(filePath: string, extractors: Record<string, TextExtractor> = DEFAULT_EXTRACTORS): Promise<string> {
    const extract = extractors[path.extname(filePath).toLowerCase()];
    if (!extract) throw new UnsupportedResumeFormatError(filePath);
    let text: string;
    try {
        text = await extract(await fs.readFile(filePath));
    } catch (err) {
        throw new ResumeParseError(filePath, err instanceof Error ? err.message : String(err));
    }
    text = normalizeWhitespace(text);
    if (!text) throw new ResumeParseError(filePath, 'no extractable text');
    return text;
}
