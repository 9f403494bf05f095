import { z } from 'zod';
import type { ILLMClient } from '../llm/ILLMClient';
import { dbg, errorMessage } from '../utils';
import { foldText, foldWithOffsets, sourceRange } from './TextPreprocessor';

/** A labelled span as reported by a statistical recognizer, before label mapping. */
export interface RecognizedSpan {
    label: string;
    text: string;
    start: number;
    end: number;
}

export interface EntityRecognizer {
    recognize(text: string): Promise<RecognizedSpan[]>;
}

/** Used when no model backend is configured. */
export class NullEntityRecognizer implements EntityRecognizer {
    async recognize(): Promise<RecognizedSpan[]> {
        return [];
    }
}

const RECOGNITION_PROMPT = `Du hittar namngivna entiteter i en svensk fråga om byggbeslag och produkter.
Returnera ENDAST giltig JSON på formen {"entities": [{"text": "...", "label": "..."}]}.
Tillåtna etiketter: PRODUCT (produktnamn), EAN (streckkoder), DIMENSION (mått med enhet),
QUANTITY (antal eller storlekar), COMPATIBILITY (uttryck för att något passar eller fungerar med något).
"text" måste vara exakt som i frågan. Saknas entiteter, returnera {"entities": []}.

Fråga:
`;

const RecognitionResponseSchema = z.object({
    entities: z.array(z.object({
        text: z.string().min(1),
        label: z.string().min(1),
    })),
});

const MAX_TEXT_LENGTH = 2000;

/**
 * Asks a chat model for labelled spans and locates each one in the input.
 * Any failure (transport, malformed JSON, unknown span) yields fewer spans,
 * never an error.
 */
export class LLMEntityRecognizer implements EntityRecognizer {
    constructor(
        private readonly llmClient: ILLMClient,
        private readonly modelName: string,
    ) {}

    async recognize(text: string): Promise<RecognizedSpan[]> {
        if (text.trim().length === 0) {
            return [];
        }
        let response: string;
        try {
            response = await this.llmClient.chatCompletion([], RECOGNITION_PROMPT + text.slice(0, MAX_TEXT_LENGTH), {
                modelName: this.modelName,
                temperature: 0,
            });
        } catch (error) {
            console.warn(`Entity recognition failed, continuing without model entities: ${errorMessage(error)}`);
            return [];
        }
        return locateSpans(text, parseRecognitionResponse(response));
    }
}

export function parseRecognitionResponse(response: string): Array<{ text: string; label: string }> {
    // Models sometimes wrap the JSON in markdown fences
    const jsonMatch = response.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
        dbg('No JSON found in entity recognition response');
        return [];
    }
    let raw: unknown;
    try {
        raw = JSON.parse(jsonMatch[0]);
    } catch (error) {
        dbg(`Failed to parse entity recognition JSON: ${errorMessage(error)}`);
        return [];
    }
    const parsed = RecognitionResponseSchema.safeParse(raw);
    if (!parsed.success) {
        dbg('Entity recognition JSON did not have the expected shape');
        return [];
    }
    return parsed.data.entities;
}

/**
 * Finds each reported span in the text, case-insensitively. Repeated spans
 * take successive occurrences; spans not present in the text are dropped.
 */
export function locateSpans(text: string, found: Array<{ text: string; label: string }>): RecognizedSpan[] {
    const folded = foldWithOffsets(text);
    const nextSearchFrom = new Map<string, number>();
    const spans: RecognizedSpan[] = [];

    for (const item of found) {
        const needle = foldText(item.text);
        const from = nextSearchFrom.get(needle) ?? 0;
        const index = folded.text.indexOf(needle, from);
        if (index === -1) {
            continue;
        }
        nextSearchFrom.set(needle, index + needle.length);
        const { start, end } = sourceRange(folded, index, index + needle.length);
        spans.push({ label: item.label, text: text.slice(start, end), start, end });
    }
    return spans;
}
