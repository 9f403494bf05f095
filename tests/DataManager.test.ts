import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import * as path from 'path';
import sinon from 'sinon';
import { createBotConfig } from '../src/config';
import { DataManager, isSafeProductId } from '../src/corpus/DataManager';
import { SEARCH_FOOTER } from '../src/corpus/formatting';
import { foldText } from '../src/nlp/TextPreprocessor';

const FIXTURE_DIR = path.join(__dirname, 'fixtures', 'corpus');

describe('DataManager', () => {
    let dataManager: DataManager;
    let warnStub: sinon.SinonStub;

    beforeEach(async () => {
        warnStub = sinon.stub(console, 'warn');
        dataManager = new DataManager(createBotConfig({ dataDir: FIXTURE_DIR }));
        await dataManager.load();
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('load', () => {
        it('should build the name index from folded product names', () => {
            expect(dataManager.getNameIndex().get(foldText('Låshus 310-50'))).to.equal('50091812');
            expect(dataManager.getNameIndex().get('slutbleck 1487')).to.equal('50091900');
        });

        it('should resolve article numbers and EANs', () => {
            expect(dataManager.findByArticleNumber('50091900')).to.equal('50091900');
            expect(dataManager.findByEan('4006381333931')).to.equal('50091812');
            expect(dataManager.findByEan('0000000000000')).to.be.undefined;
        });

        it('should fall back to a generic name for unknown products', () => {
            expect(dataManager.getProductName('50091812')).to.equal('Låshus 310-50');
            expect(dataManager.getProductName('123')).to.equal('Produkt 123');
        });

        it('should load missing indices as empty', async () => {
            const missing = Object.assign(new Error('no such file'), { code: 'ENOENT' });
            const empty = new DataManager(createBotConfig({ dataDir: '/corpus' }), {
                readFileFn: sinon.stub().rejects(missing),
            });

            await empty.load();

            expect(empty.getNameIndex().size).to.equal(0);
            expect(empty.findByArticleNumber('50091812')).to.be.undefined;
            expect(warnStub.callCount).to.equal(5);
        });

        it('should ignore an index with an unexpected shape', async () => {
            const readFileFn = sinon.stub().resolves('{}');
            readFileFn.withArgs(path.join('/corpus', 'indices', 'product_names.json')).resolves('["Låshus"]');
            const loaded = new DataManager(createBotConfig({ dataDir: '/corpus' }), { readFileFn });

            await loaded.load();

            expect(loaded.getNameIndex().size).to.equal(0);
            sinon.assert.calledWithMatch(warnStub, 'unexpected shape');
        });
    });

    describe('getTechnicalSpecs', () => {
        it('should group specs by category and skip malformed lines', async () => {
            const result = await dataManager.getTechnicalSpecs('50091812');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect(result.skippedLines).to.equal(1);
            expect([...result.specsByCategory.keys()]).to.deep.equal(['Dimensioner', 'Elektriska']);
            expect(result.formattedText).to.equal(
                '## Dimensioner\n- **Height:** 10 mm\n\n## Elektriska\n- **Voltage:** 220V\n',
            );
            sinon.assert.calledWithMatch(warnStub, 'Skipped 1 malformed line(s)');
        });

        it('should keep only matching specs when filtered by name', async () => {
            const result = await dataManager.getTechnicalSpecs('50091812', 'volt');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect(result.formattedText).to.equal('## Elektriska\n- **Voltage:** 220V\n');
            expect(result.specs).to.have.lengthOf(2);
        });

        it('should keep a whole category when the filter names it', async () => {
            const result = await dataManager.getTechnicalSpecs('50091812', 'DIMENSION');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect([...result.specsByCategory.keys()]).to.deep.equal(['Dimensioner']);
        });

        it('should ignore a filter that matches nothing', async () => {
            const result = await dataManager.getTechnicalSpecs('50091812', 'xyz');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect([...result.specsByCategory.keys()]).to.deep.equal(['Dimensioner', 'Elektriska']);
        });

        it('should report missing specs as not found', async () => {
            expect(await dataManager.getTechnicalSpecs('50091900')).to.deep.equal({
                status: 'not_found',
                message: 'Inga tekniska specifikationer tillgängliga',
            });
        });

        it('should refuse product IDs that leave the products directory', async () => {
            const result = await dataManager.getTechnicalSpecs('../indices');
            expect(result.status).to.equal('not_found');
        });

        it('should report an unreadable file as an error', async () => {
            sinon.stub(console, 'error');
            const denied = Object.assign(new Error('permission denied'), { code: 'EACCES' });
            const broken = new DataManager(createBotConfig({ dataDir: '/corpus' }), {
                readFileFn: sinon.stub().rejects(denied),
            });

            expect(await broken.getTechnicalSpecs('50091812')).to.deep.equal({
                status: 'error',
                message: 'Kunde inte läsa tekniska specifikationer: permission denied',
            });
        });
    });

    describe('getCompatibilityInfo', () => {
        it('should group relations by type with labels', async () => {
            const result = await dataManager.getCompatibilityInfo('50091812');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect(result.formattedText).to.equal(
                '## Passar till\n- Slutbleck 1487 (Art.nr: 50091900)\n\n## Kräver\n- Cylinder 2000\n',
            );
        });

        it('should filter relations by related product', async () => {
            const result = await dataManager.getCompatibilityInfo('50091812', 'cylinder');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect([...result.relationsByType.keys()]).to.deep.equal(['requires']);
        });

        it('should report missing compatibility data as not found', async () => {
            const result = await dataManager.getCompatibilityInfo('50091900');
            expect(result).to.deep.equal({ status: 'not_found', message: 'Ingen kompatibilitetsinformation tillgänglig' });
        });
    });

    describe('getProductSummary', () => {
        it('should use the cached summary when there is one', async () => {
            const result = await dataManager.getProductSummary('50091900');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect(result.dynamicallyGenerated).to.be.false;
            expect(result.formattedText).to.equal([
                '# Slutbleck 1487',
                '',
                '**Artikelnummer:** 50091900',
                '',
                '**Artikelnummer:** 50091900',
                '',
                '## Beskrivning',
                'Slutbleck för låshus.',
                '',
                '## Viktiga specifikationer',
                '### Material',
                '- **Material:** Stål',
                '### Dimensioner',
                '- **Längd:** 120 mm',
                '',
                '## Kompatibilitet',
                '- Låshus 310-50 (Art.nr: 50091812)',
                '',
            ].join('\n'));
        });

        it('should assemble a summary from the product files when none is cached', async () => {
            const result = await dataManager.getProductSummary('50091812');

            expect(result.status).to.equal('success');
            if (result.status !== 'success') return;
            expect(result.dynamicallyGenerated).to.be.true;
            expect(result.summary.product_name).to.equal('Låshus 310-50');
            expect(result.summary.description).to.be.undefined;
            expect(result.summary.key_specifications).to.deep.equal([
                { name: 'Height', value: '10', unit: 'mm', category: 'Dimensioner' },
                { name: 'Voltage', value: '220V', unit: 'V', category: 'Elektriska' },
            ]);
            expect(result.summary.key_compatibility).to.deep.equal([
                { type: 'fits', related_product: 'Slutbleck 1487', has_product_id: true, numeric_ids: ['50091900'] },
                { type: 'requires', related_product: 'Cylinder 2000', has_product_id: false, numeric_ids: [] },
            ]);
            expect(result.summary.identifiers).to.deep.equal({ EAN: ['4006381333931'], Artikelnummer: ['50091812'] });
        });

        it('should report a product without any data as not found', async () => {
            const result = await dataManager.getProductSummary('99999999');
            expect(result).to.deep.equal({ status: 'not_found', message: 'Ingen sammanfattning tillgänglig' });
        });
    });

    describe('getFullInfo', () => {
        it('should return the markdown file as it is', async () => {
            const result = await dataManager.getFullInfo('50091812');

            expect(result).to.deep.equal({
                status: 'success',
                kind: 'full_info',
                productId: '50091812',
                content: '# Låshus 310-50\n\nFullständig produktinformation för låshuset.\n',
                formattedText: '# Låshus 310-50\n\nFullständig produktinformation för låshuset.\n',
            });
        });

        it('should report a missing file as not found', async () => {
            const result = await dataManager.getFullInfo('50091900');
            expect(result).to.deep.equal({ status: 'not_found', message: 'Ingen fullständig information tillgänglig' });
        });
    });

    describe('validateProductId', () => {
        it('should accept products with a directory', async () => {
            expect(await dataManager.validateProductId('50091812')).to.be.true;
        });

        it('should reject unknown and unsafe product IDs', async () => {
            expect(await dataManager.validateProductId('99999999')).to.be.false;
            expect(await dataManager.validateProductId('../indices')).to.be.false;
        });
    });

    describe('searchProducts', () => {
        it('should rank exact index hits first', () => {
            const result = dataManager.searchProducts('Slutbleck av stål');

            expect(result.query).to.equal('slutbleck av stål');
            expect(result.matches).to.deep.equal([
                { productId: '50091900', name: 'Slutbleck 1487', score: 1, matchType: 'exact' },
            ]);
            expect(result.totalMatches).to.equal(1);
            expect(result.formattedText).to.equal(`## Sökresultat\n\n1. **Slutbleck 1487** (Art.nr: 50091900)\n\n${SEARCH_FOOTER}`);
        });

        it('should fall back to fuzzy name matches', () => {
            const result = dataManager.searchProducts('bleck 1487');

            expect(result.matches).to.have.lengthOf(1);
            expect(result.matches[0]).to.deep.include({ productId: '50091900', matchType: 'fuzzy' });
            // one shared word out of three, discounted for a two-word name
            expect(result.matches[0].score).to.be.closeTo(0.26667, 1e-4);
        });

        it('should say when nothing matches', () => {
            const result = dataManager.searchProducts('cylinder');

            expect(result.matches).to.deep.equal([]);
            expect(result.formattedText).to.equal('## Sökresultat\n\nInga produkter hittades som matchar din sökning.');
        });
    });

    describe('findRelatedProducts', () => {
        it('should list related products from the compatibility map', () => {
            expect(dataManager.findRelatedProducts('50091812')).to.deep.equal([
                { productId: '50091900', name: 'Slutbleck 1487', relationType: 'fits', numericIds: ['50091900'] },
                { productId: undefined, name: 'Cylinder 2000', relationType: 'requires', numericIds: [] },
            ]);
        });

        it('should filter by relation type', () => {
            const related = dataManager.findRelatedProducts('50091812', ['requires']);
            expect(related.map(product => product.name)).to.deep.equal(['Cylinder 2000']);
        });
    });

    describe('isSafeProductId', () => {
        it('should accept plain IDs and reject path tricks', () => {
            expect(isSafeProductId('50091812')).to.be.true;
            expect(isSafeProductId('AB-123_x')).to.be.true;
            expect(isSafeProductId('..')).to.be.false;
            expect(isSafeProductId('a/b')).to.be.false;
            expect(isSafeProductId('.hidden')).to.be.false;
        });
    });
});
