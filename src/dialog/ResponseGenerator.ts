import type { CompatibilitySuccess, CorpusSuccess, DataFailure, SearchSuccess, SpecsSuccess, SummarySuccess } from '../corpus/corpus_types';
import {
    formatRelationLine,
    formatSpecLine,
    formatSummary,
    relationLabel,
    sortRelationsByConfidence,
    sortSpecsByImportance,
    SEARCH_FOOTER,
    summarySections,
    tidyMarkdown,
} from '../corpus/formatting';
import type { ClarificationQuestion, IntentResult } from '../engine/engine_types';
import type { ConversationContext, ExpertiseLevel } from '../memory/context_types';
import type { ProductDirectory } from '../nlp/EntityExtractor';
import type { IntentName, QueryAnalysis } from '../nlp/nlp_types';
import { foldText } from '../nlp/TextPreprocessor';
import type { TemplateService } from './TemplateService';
import type { TemplateKey } from './templateTypes';

const INTENT_DISPLAY_NAMES: Readonly<Record<IntentName, string>> = {
    technical: 'tekniska specifikationer',
    compatibility: 'kompatibilitetsinformation',
    summary: 'produktsammanfattning',
    search: 'produktsökning',
};

const NOT_FOUND_TEMPLATES: Readonly<Record<IntentName, TemplateKey>> = {
    technical: 'no_technical_info',
    compatibility: 'no_compatibility_info',
    summary: 'no_summary_info',
    search: 'no_search_results',
};

const TECHNICAL_VOCABULARY = [
    'specifikation',
    'dimensioner',
    'tolerans',
    'teknisk',
    'material',
    'effekt',
    'spänning',
    'kompatibilitet',
    'monteringsanvisning',
].map(foldText);

const SIMPLIFICATIONS: ReadonlyArray<readonly [RegExp, string]> = [
    [/(?<![\p{L}\p{M}])[Dd]imensioner(?![\p{L}\p{M}])/gu, 'mått'],
    [/(?<![\p{L}\p{M}])[Kk]ompatibilitet(?![\p{L}\p{M}])/gu, 'passar tillsammans med'],
    [/(?<![\p{L}\p{M}])[Ss]pecifikationer(?![\p{L}\p{M}])/gu, 'egenskaper'],
    [/(?<![\p{L}\p{M}])[Mm]ontering(?![\p{L}\p{M}])/gu, 'installation'],
    [/(?<![\p{L}\p{M}])[Tt]olerans(?![\p{L}\p{M}])/gu, 'tillåten avvikelse'],
    [/(?<![\p{L}\p{M}])[Ee]ffekt(?![\p{L}\p{M}])/gu, 'strömförbrukning'],
];

export function intentDisplayName(intent: IntentName): string {
    return INTENT_DISPLAY_NAMES[intent];
}

/**
 * An explicit level on the context wins. Otherwise the level grows with the
 * number of technical terms used so far and with the length of the conversation.
 */
export function inferExpertiseLevel(context: ConversationContext): ExpertiseLevel {
    if (context.expertiseLevel) {
        return context.expertiseLevel;
    }
    const history = context.queryHistory;
    if (history.length === 0) {
        return 'intermediate';
    }
    let technicalCount = 0;
    for (const query of history) {
        const folded = foldText(query);
        technicalCount += TECHNICAL_VOCABULARY.filter(term => folded.includes(term)).length;
    }
    if (technicalCount >= 3 || history.length >= 10) {
        return 'expert';
    }
    if (technicalCount >= 1 || history.length >= 3) {
        return 'intermediate';
    }
    return 'beginner';
}

export function simplifyTechnicalTerms(text: string): string {
    return SIMPLIFICATIONS.reduce((simplified, [pattern, replacement]) => simplified.replace(pattern, replacement), text);
}

/** Renders engine results as the markdown text shown to the user. */
export class ResponseGenerator {
    constructor(
        private readonly templates: TemplateService,
        private readonly products: Pick<ProductDirectory, 'getProductName'>,
    ) {}

    formatCommandResponse(productId: string, result: CorpusSuccess): string {
        const productName = this.products.getProductName(productId);
        switch (result.kind) {
            case 'specs':
                return tidyMarkdown(this.templates.render('technical', {
                    product_name: productName,
                    product_id: productId,
                    specifications: result.formattedText,
                }));
            case 'compatibility':
                return tidyMarkdown(this.templates.render('compatibility', {
                    product_name: productName,
                    product_id: productId,
                    compatibility: result.formattedText,
                }));
            case 'summary':
                return tidyMarkdown(this.templates.render('summary', {
                    ...summarySections(result.summary, productId),
                    product_id: productId,
                }));
            case 'full_info':
                return result.content;
            case 'search':
                return result.formattedText;
        }
    }

    generateNlResponse(analysis: QueryAnalysis, result: IntentResult, context: ConversationContext, productId?: string): string {
        if (result.status !== 'success') {
            return this.formatFailure(analysis.primaryIntent, result, productId);
        }
        const expertise = inferExpertiseLevel(context);
        switch (result.kind) {
            case 'specs':
                return this.technicalResponse(result, expertise);
            case 'compatibility':
                return this.compatibilityResponse(result, expertise);
            case 'summary':
                return this.summaryResponse(result, expertise);
            case 'search':
                return this.searchResponse(result, analysis.originalQuery, expertise);
        }
    }

    /** The regular answer between a disclaimer naming the guessed intent and up to two alternatives. */
    formatLowConfidenceResponse(analysis: QueryAnalysis, result: IntentResult, context: ConversationContext, productId?: string): string {
        const disclaimer = this.templates.render('low_confidence_disclaimer', {
            intent: intentDisplayName(analysis.primaryIntent),
        });
        const parts = [disclaimer, this.generateNlResponse(analysis, result, context, productId)];
        const alternatives = analysis.intents.slice(1, 3).map(ranked => intentDisplayName(ranked.intent));
        if (alternatives.length > 0) {
            parts.push(this.templates.render('alternative_intents', { alternatives: alternatives.join(', ') }));
        }
        return parts.join('\n\n');
    }

    /** Renders the first question; with none it asks the user to rephrase. */
    formatClarificationRequest(analysis: QueryAnalysis, questions: readonly ClarificationQuestion[]): string {
        const [question] = questions;
        if (!question || question.type === 'general_clarification') {
            return this.templates.render('generic_clarification', { query: analysis.originalQuery });
        }
        if (question.type === 'intent_selection') {
            return this.templates.render('intent_clarification', {
                question: question.question,
                options: question.options.map(option => `- ${option.name}`).join('\n'),
            });
        }
        return this.templates.render('product_clarification', {
            question: question.question,
            options: question.options.map(option => `- ${option.name} (Art.nr: ${option.id})`).join('\n'),
        });
    }

    formatErrorResponse(message: string): string {
        return this.templates.render('error', { error: message });
    }

    private formatFailure(intent: IntentName, failure: DataFailure, productId?: string): string {
        if (failure.status === 'error' || !productId) {
            return this.formatErrorResponse(failure.message);
        }
        return this.templates.render(NOT_FOUND_TEMPLATES[intent], { product_name: this.products.getProductName(productId) });
    }

    private technicalResponse(result: SpecsSuccess, expertise: ExpertiseLevel): string {
        if (expertise !== 'beginner') {
            return result.formattedText;
        }
        const intro = this.templates.render('technical_beginner_intro', {
            product_name: this.products.getProductName(result.productId),
        });
        const lines = sortSpecsByImportance([...result.specsByCategory.values()].flat())
            .filter(spec => spec.name && spec.raw_value)
            .map(spec => formatSpecLine(spec.name, spec.raw_value, spec.unit));
        return `${intro}\n\n${simplifyTechnicalTerms(lines.join('\n'))}`;
    }

    private compatibilityResponse(result: CompatibilitySuccess, expertise: ExpertiseLevel): string {
        if (expertise === 'expert') {
            return result.formattedText;
        }
        const intro = this.templates.render('compatibility_intro', {
            product_name: this.products.getProductName(result.productId),
        });
        if (expertise === 'intermediate') {
            return `${intro}\n\n${result.formattedText}`;
        }
        const lines: string[] = [];
        for (const [relationType, relations] of result.relationsByType) {
            for (const relation of sortRelationsByConfidence(relations)) {
                if (relation.related_product) {
                    const line = formatRelationLine(relation.related_product, relation.numeric_ids);
                    lines.push(`- ${relationLabel(relationType)}: ${line.slice(2)}`);
                }
            }
        }
        return `${intro}\n\n${simplifyTechnicalTerms(lines.join('\n'))}`;
    }

    private summaryResponse(result: SummarySuccess, expertise: ExpertiseLevel): string {
        if (expertise === 'beginner') {
            return formatSummary(result.summary, result.productId, 'flat');
        }
        return result.formattedText;
    }

    private searchResponse(result: SearchSuccess, query: string, expertise: ExpertiseLevel): string {
        if (result.matches.length === 0) {
            return this.templates.render('no_search_results', { query });
        }
        if (expertise !== 'expert') {
            return result.formattedText;
        }
        const lines = [
            `# Sökresultat för '${query}'`,
            '',
            '| Produkt | Artikelnummer | Matchningspoäng |',
            '|---------|---------------|-----------------|',
            ...result.matches.map(match => `| ${match.name} | ${match.productId} | ${match.score.toFixed(2)} |`),
            '',
            SEARCH_FOOTER,
        ];
        return lines.join('\n');
    }
}
