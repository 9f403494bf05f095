import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
    formatIdentifiers,
    formatRelationLine,
    formatSearchResults,
    formatSpecLine,
    groupBy,
    relationLabel,
    SEARCH_FOOTER,
    tidyMarkdown,
    titleCase,
} from '../src/corpus/formatting';
import { cosineSimilarity, jaccardSimilarity, meanVector, tokenJaccard } from '../src/nlp/similarity';

describe('formatting', () => {
    it('should label known relation types and title-case the rest', () => {
        expect(relationLabel('fits')).to.equal('Passar till');
        expect(relationLabel('made_for')).to.equal('Made For');
        expect(titleCase('ÖVRIGA mått')).to.equal('Övriga Mått');
    });

    it('should leave out a unit the value already carries', () => {
        expect(formatSpecLine('Height', '10', 'mm')).to.equal('- **Height:** 10 mm');
        expect(formatSpecLine('Voltage', '220V', 'V')).to.equal('- **Voltage:** 220V');
        expect(formatSpecLine('Färg', 'Svart', null)).to.equal('- **Färg:** Svart');
    });

    it('should show the first article number of a relation', () => {
        expect(formatRelationLine('Slutbleck 1487', ['50091900', '50091901'])).to.equal('- Slutbleck 1487 (Art.nr: 50091900)');
        expect(formatRelationLine('Cylinder 2000', [])).to.equal('- Cylinder 2000');
    });

    it('should group items in first-seen order', () => {
        const groups = groupBy(['a1', 'b1', 'a2'], item => item[0]);
        expect([...groups.entries()]).to.deep.equal([['a', ['a1', 'a2']], ['b', ['b1']]]);
    });

    it('should skip identifier types without values', () => {
        expect(formatIdentifiers({ EAN: ['4006381333931'], GTIN: [], Artikelnummer: ['50091812', 'X1'] })).to.equal(
            '**EAN:** 4006381333931\n**Artikelnummer:** 50091812, X1',
        );
    });

    it('should number search results and add the footer', () => {
        expect(formatSearchResults([
            { productId: '50091900', name: 'Slutbleck 1487', score: 1, matchType: 'exact' },
            { productId: '50091812', name: 'Låshus 310-50', score: 0.3, matchType: 'fuzzy' },
        ])).to.equal(
            `## Sökresultat\n\n1. **Slutbleck 1487** (Art.nr: 50091900)\n2. **Låshus 310-50** (Art.nr: 50091812)\n\n${SEARCH_FOOTER}`,
        );
    });

    it('should collapse blank-line runs and trim', () => {
        expect(tidyMarkdown('# Rubrik\n\n\n\nText\n\n')).to.equal('# Rubrik\n\nText');
    });
});

describe('similarity', () => {
    it('should compute the Jaccard index of two sets', () => {
        expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).to.be.closeTo(1 / 3, 1e-9);
        expect(jaccardSimilarity(new Set(), new Set(['a']))).to.equal(0);
    });

    it('should compare folded word tokens', () => {
        // {slutbleck, 1487} against {slutbleck, av, stål}
        expect(tokenJaccard('Slutbleck 1487', 'slutbleck av stål')).to.equal(0.25);
    });

    it('should score cosine similarity and treat degenerate vectors as 0', () => {
        expect(cosineSimilarity([1, 0], [1, 0])).to.equal(1);
        expect(cosineSimilarity([1, 1], [1, 0])).to.be.closeTo(Math.SQRT1_2, 1e-9);
        expect(cosineSimilarity([0, 0], [1, 0])).to.equal(0);
        expect(cosineSimilarity([1], [1, 0])).to.equal(0);
    });

    it('should average vectors component-wise', () => {
        expect(meanVector([[1, 0], [0, 1]])).to.deep.equal([0.5, 0.5]);
        expect(meanVector([])).to.deep.equal([]);
    });
});
