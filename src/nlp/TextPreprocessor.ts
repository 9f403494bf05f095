/**
 * Normalizes raw user input before any analysis. Offsets reported by the
 * entity extractor refer to the string returned here.
 */
export function preprocess(text: string): string {
    return text
        .replace(/\s+/g, ' ')
        .trim()
        .normalize('NFKD')
        .replace(/--/g, '-')
        .replace(/\.{2,}/g, '...')
        .replace(/[“”„]/g, '"')
        .replace(/[‘’`]/g, "'");
}

/** Comparison form shared by every matcher: compatibility-decomposed, lower case. */
export function foldText(text: string): string {
    return text.normalize('NFKD').toLowerCase();
}

/** Splits folded text into word tokens, dropping punctuation. */
export function tokenize(text: string): string[] {
    return foldText(text).split(/[^\p{L}\p{M}\p{N}-]+/u).filter(token => token.length > 0);
}

/** Folded text that remembers where each of its code units came from. */
export interface FoldedText {
    text: string;
    /** Source offset for every offset in `text`, plus the source length at the end. */
    sourceOffsets: number[];
}

/**
 * Folds one source character at a time, so a match found in the folded
 * text can be mapped back even where folding changed the length.
 */
export function foldWithOffsets(source: string): FoldedText {
    let text = '';
    const sourceOffsets: number[] = [];
    let offset = 0;
    for (const char of source) {
        const folded = foldText(char);
        for (let i = 0; i < folded.length; i++) {
            sourceOffsets.push(offset);
        }
        text += folded;
        offset += char.length;
    }
    sourceOffsets.push(source.length);
    return { text, sourceOffsets };
}

/**
 * Maps a `[start, end)` range of the folded text to the source. An end that
 * falls inside the expansion of one source character takes the whole character.
 */
export function sourceRange(folded: FoldedText, start: number, end: number): { start: number; end: number } {
    const { sourceOffsets } = folded;
    let next = end;
    if (end > start) {
        while (next < folded.text.length && sourceOffsets[next] === sourceOffsets[end - 1]) {
            next++;
        }
    }
    return { start: sourceOffsets[start], end: sourceOffsets[next] };
}
