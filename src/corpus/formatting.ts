import type { CompatibilityRelation, KeyCompatibility, KeySpecification, ProductSummary, SearchMatch, TechnicalSpec } from './corpus_types';

const RELATION_LABELS: ReadonlyMap<string, string> = new Map([
    ['direct', 'Kompatibel med'],
    ['compatible_with', 'Kompatibel med'],
    ['fits', 'Passar till'],
    ['requires', 'Kräver'],
    ['recommended', 'Rekommenderas med'],
    ['designed_for', 'Designad för'],
    ['accessory', 'Tillbehör till'],
    ['replacement', 'Ersätter'],
    ['replaced_by', 'Ersätts av'],
    ['not_compatible', 'Ej kompatibel med'],
]);

const IMPORTANCE_RANK: ReadonlyMap<string, number> = new Map([
    ['high', 0],
    ['medium', 1],
]);

export const SEARCH_FOOTER = 'Använd kommandot `-s <artikelnr>` för att se mer information om en produkt.';
export const NO_SEARCH_MATCHES = 'Inga produkter hittades som matchar din sökning.';

/** Flat renders lists without category or relation sub-headings. */
export type SummaryLayout = 'categorized' | 'flat';

export function titleCase(text: string): string {
    return text
        .toLowerCase()
        .replace(/(^|[^\p{L}\p{M}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function relationLabel(relationType: string): string {
    return RELATION_LABELS.get(relationType) ?? titleCase(relationType.replace(/_/g, ' '));
}

export function importanceRank(importance: string | null | undefined): number {
    return IMPORTANCE_RANK.get(importance ?? '') ?? 2;
}

/** `- **name:** value unit`, the unit left out when the value already carries it. */
export function formatSpecLine(name: string, value: string, unit?: string | null): string {
    let line = `- **${name}:** ${value}`;
    if (unit && !value.includes(unit)) {
        line += ` ${unit}`;
    }
    return line;
}

export function formatRelationLine(relatedProduct: string, numericIds: readonly string[]): string {
    return numericIds.length > 0
        ? `- ${relatedProduct} (Art.nr: ${numericIds[0]})`
        : `- ${relatedProduct}`;
}

export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

export function sortSpecsByImportance(specs: readonly TechnicalSpec[]): TechnicalSpec[] {
    return [...specs].sort((a, b) => importanceRank(a.importance) - importanceRank(b.importance));
}

export function sortRelationsByConfidence(relations: readonly CompatibilityRelation[]): CompatibilityRelation[] {
    return [...relations].sort((a, b) => b.confidence - a.confidence);
}

/** One `## category` section per group, most important specs first. */
export function formatSpecsByCategory(groups: ReadonlyMap<string, readonly TechnicalSpec[]>): string {
    const lines: string[] = [];
    for (const [category, specs] of groups) {
        lines.push(`## ${category}`);
        for (const spec of sortSpecsByImportance(specs)) {
            if (spec.name && spec.raw_value) {
                lines.push(formatSpecLine(spec.name, spec.raw_value, spec.unit));
            }
        }
        lines.push('');
    }
    return lines.join('\n');
}

export function formatRelationsByType(groups: ReadonlyMap<string, readonly CompatibilityRelation[]>): string {
    const lines: string[] = [];
    for (const [relationType, relations] of groups) {
        lines.push(`## ${relationLabel(relationType)}`);
        for (const relation of sortRelationsByConfidence(relations)) {
            if (relation.related_product) {
                lines.push(formatRelationLine(relation.related_product, relation.numeric_ids));
            }
        }
        lines.push('');
    }
    return lines.join('\n');
}

/** Spec lines, with `### category` sub-headings when there is more than one category. */
export function formatKeySpecifications(specs: readonly KeySpecification[], layout: SummaryLayout = 'categorized'): string {
    const groups = groupBy(specs, spec => spec.category || 'Övrigt');
    const showHeadings = layout === 'categorized' && groups.size > 1;
    const lines: string[] = [];
    for (const [category, categorySpecs] of groups) {
        if (showHeadings) {
            lines.push(`### ${category}`);
        }
        for (const spec of categorySpecs) {
            if (spec.name && spec.value) {
                lines.push(formatSpecLine(spec.name, spec.value, spec.unit));
            }
        }
    }
    return lines.join('\n');
}

/**
 * Relation lines, with `### label` sub-headings when there is more than one
 * relation type. The flat layout puts the label on each line instead.
 */
export function formatKeyCompatibility(relations: readonly KeyCompatibility[], layout: SummaryLayout = 'categorized'): string {
    const groups = groupBy(relations, relation => relation.type);
    const lines: string[] = [];
    for (const [relationType, typeRelations] of groups) {
        if (layout === 'categorized' && groups.size > 1) {
            lines.push(`### ${relationLabel(relationType)}`);
        }
        for (const relation of typeRelations) {
            if (!relation.related_product) {
                continue;
            }
            const line = formatRelationLine(relation.related_product, relation.numeric_ids);
            lines.push(layout === 'flat' ? `- ${relationLabel(relationType)}: ${line.slice(2)}` : line);
        }
    }
    return lines.join('\n');
}

export function formatIdentifiers(identifiers: Readonly<Record<string, readonly string[]>>): string {
    return Object.entries(identifiers)
        .filter(([, values]) => values.length > 0)
        .map(([idType, values]) => `**${idType}:** ${values.join(', ')}`)
        .join('\n');
}

/** The rendered parts of a summary; a part without content is empty. */
export type SummarySections = {
    product_name: string;
    identifiers: string;
    description: string;
    specifications: string;
    compatibility: string;
};

export function summarySections(summary: ProductSummary, productId: string, layout: SummaryLayout = 'categorized'): SummarySections {
    return {
        product_name: summary.product_name || `Produkt ${productId}`,
        identifiers: formatIdentifiers(summary.identifiers),
        description: summary.description ? `## Beskrivning\n${summary.description}` : '',
        specifications: summary.key_specifications.length > 0
            ? `## Viktiga specifikationer\n${formatKeySpecifications(summary.key_specifications, layout)}`
            : '',
        compatibility: summary.key_compatibility.length > 0
            ? `## Kompatibilitet\n${formatKeyCompatibility(summary.key_compatibility, layout)}`
            : '',
    };
}

/**
 * Renders a product summary, cached or generated, as markdown: heading,
 * article number, identifiers, description, key specifications and key
 * compatibility, each section followed by a blank line.
 */
export function formatSummary(summary: ProductSummary, productId: string, layout: SummaryLayout = 'categorized'): string {
    const sections = summarySections(summary, productId, layout);
    const lines = [`# ${sections.product_name}`, '', `**Artikelnummer:** ${productId}`, ''];
    for (const section of [sections.identifiers, sections.description, sections.specifications, sections.compatibility]) {
        if (section) {
            lines.push(section, '');
        }
    }
    return lines.join('\n');
}

export function formatSearchResults(matches: readonly SearchMatch[]): string {
    const lines = ['## Sökresultat', ''];
    if (matches.length === 0) {
        lines.push(NO_SEARCH_MATCHES);
    } else {
        matches.forEach((match, i) => {
            lines.push(`${i + 1}. **${match.name}** (Art.nr: ${match.productId})`);
        });
        lines.push('');
        lines.push(SEARCH_FOOTER);
    }
    return lines.join('\n');
}

/** Collapses runs of blank lines left by empty template sections. */
export function tidyMarkdown(text: string): string {
    return text.replace(/\n{3,}/g, '\n\n').trim();
}
