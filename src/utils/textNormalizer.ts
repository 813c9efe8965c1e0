import path from 'path';
import { readFile } from 'node:fs/promises';

export type Chunk = {
    text: string;
    index: number;
    startChar: number;
    endChar: number;
};

export const SUPPORTED_EXTENSIONS = ['.md', '.txt'] as const;

export function normalizeText(s: string): string {
    return s
        .replace(/\r\n/g, '\n')
        .replace(/\t/g, '  ')
        .replace(/[ \u00A0]+/g, ' ')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export function isSupportedFile(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

export async function extractTextFromFile(filePath: string): Promise<{ text: string; meta: { extension: string; characters: number } }> {
    const ext = path.extname(filePath).toLowerCase();
    if (!isSupportedFile(filePath)) {
        throw new Error(`Unsupported file type: ${ext} (${filePath})`);
    }
    const text = normalizeText(await readFile(filePath, 'utf8'));
    return { text, meta: { extension: ext, characters: text.length } };
}

const SEPARATORS = ['\n\n', '\n', '. ', ' '];

// Latest separator in the back half of [start, end); `end` when there is none.
function breakPoint(text: string, start: number, end: number): number {
    const floor = start + Math.floor((end - start) / 2);
    for (const separator of SEPARATORS) {
        const at = text.lastIndexOf(separator, end - separator.length);
        if (at >= start && at + separator.length > floor) {
            return at + separator.length;
        }
    }
    return end;
}

function wordStart(text: string, from: number, end: number): number {
    const space = text.indexOf(' ', from);
    return space >= 0 && space < end ? space + 1 : from;
}

/**
 * Splits text into overlapping chunks, preferring paragraph, line, sentence
 * and word boundaries in that order. Defaults target ~1200 characters per
 * chunk with ~150 characters carried over into the next one.
 */
export function splitIntoChunks(
    text: string,
    opts: { chunkSize?: number; overlap?: number } = {},
): Chunk[] {
    const chunkSize = opts.chunkSize ?? 1200;
    const overlap = opts.overlap ?? 150;
    if (overlap < 0 || overlap >= chunkSize) {
        throw new Error(`overlap must be in [0, ${chunkSize}), got ${overlap}`);
    }

    const clean = text.trim();
    const chunks: Chunk[] = [];
    let start = 0;
    while (start < clean.length) {
        let end = Math.min(clean.length, start + chunkSize);
        if (end < clean.length) {
            end = breakPoint(clean, start, end);
        }
        const content = clean.slice(start, end).trim();
        if (content) {
            chunks.push({ text: content, index: chunks.length, startChar: start, endChar: end });
        }
        if (end >= clean.length) break;

        const next = wordStart(clean, end - overlap, end);
        start = next > start ? next : end;
    }
    return chunks;
}
