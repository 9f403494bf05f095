import { z } from 'zod';

export const TEMPLATE_KEYS = [
    'technical',
    'compatibility',
    'summary',
    'error',
    'generic_clarification',
    'product_clarification',
    'intent_clarification',
    'low_confidence_disclaimer',
    'alternative_intents',
    'technical_beginner_intro',
    'no_technical_info',
    'compatibility_intro',
    'no_compatibility_info',
    'no_summary_info',
    'no_search_results',
] as const;

export type TemplateKey = typeof TEMPLATE_KEYS[number];

export type TemplateValues = Readonly<Record<string, string | number>>;

export const TemplatesConfigSchema = z.object({
    templates: z.record(z.object({
        path: z.string().min(1),
    })),
});

export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
