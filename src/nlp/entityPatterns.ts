import type { Entity, EntityType } from './nlp_types';

export interface EntityPattern {
    readonly type: EntityType;
    readonly regex: RegExp;
    readonly confidence: number;
    /** Capture group holding the entity text; 0 takes the whole match. */
    readonly group: number;
    readonly validate?: (value: string) => boolean;
}

const EAN_LENGTHS = new Set([8, 12, 13, 14]);

/**
 * GS1 check digit test for EAN-8, UPC-A, EAN-13 and GTIN-14. Weights 3 and 1
 * alternate leftwards starting at the digit next to the check digit.
 */
export function isValidEan(value: string): boolean {
    if (!/^\d+$/.test(value) || !EAN_LENGTHS.has(value.length)) {
        return false;
    }
    const digits = Array.from(value, Number);
    const checkDigit = digits[digits.length - 1];
    const sum = digits
        .slice(0, -1)
        .reverse()
        .reduce((acc, digit, i) => acc + digit * (i % 2 === 0 ? 3 : 1), 0);
    return (10 - (sum % 10)) % 10 === checkDigit;
}

// The d flag exposes group offsets; every pattern needs g for matchAll.
// Input arrives NFKD-normalized, so letters with diacritics are matched in both forms.
export const ENTITY_PATTERNS: readonly EntityPattern[] = Object.freeze([
    {
        type: 'ARTICLE_NUMBER',
        regex: /art(?:ikel)?\.?(?:nr|nummer)\.?\s*[:=]?\s*([A-Z0-9-]{5,15})/dgi,
        confidence: 0.9,
        group: 1,
    },
    {
        type: 'ARTICLE_NUMBER',
        regex: /(?<!\d)(\d{8})(?!\d)/dg,
        confidence: 0.9,
        group: 1,
    },
    {
        type: 'EAN',
        regex: /EAN(?:-13)?\s*[:=]?\s*(\d{13})/dgi,
        confidence: 0.95,
        group: 1,
        validate: isValidEan,
    },
    {
        type: 'EAN',
        regex: /(?<!\d)(\d{13})(?!\d)/dg,
        confidence: 0.95,
        group: 1,
        validate: isValidEan,
    },
    {
        type: 'EAN',
        regex: /EAN(?:-8)?\s*[:=]?\s*(\d{8})(?!\d)/dgi,
        confidence: 0.95,
        group: 1,
        validate: isValidEan,
    },
    {
        type: 'DIMENSION',
        regex: /\b\d+(?:[.,]\d+)?\s*(?:mm|cm|m|tum)\b/dgi,
        confidence: 0.85,
        group: 0,
    },
    {
        type: 'COMPATIBILITY',
        regex: /\b(?:kompatibel|passar|fungerar)\s+(?:med|till|f(?:ö|o\u0308)r|tillsammans)(?![\p{L}\p{M}])/dgiu,
        confidence: 0.85,
        group: 0,
    },
]);

/** Runs every pattern over the text. Overlaps are left for the merge step. */
export function matchPatterns(text: string, patterns: readonly EntityPattern[] = ENTITY_PATTERNS): Entity[] {
    const entities: Entity[] = [];
    for (const pattern of patterns) {
        for (const match of text.matchAll(pattern.regex)) {
            const value = match[pattern.group];
            const span = match.indices?.[pattern.group];
            if (value === undefined || span === undefined) {
                continue;
            }
            if (pattern.validate && !pattern.validate(value)) {
                continue;
            }
            entities.push({
                type: pattern.type,
                text: value,
                start: span[0],
                end: span[1],
                confidence: pattern.confidence,
                source: 'regex',
            });
        }
    }
    return entities;
}
