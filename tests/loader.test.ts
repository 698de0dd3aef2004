/**
 * Tests for taxonomy loading
 */

import path from 'node:path';
import { DEFAULT_MODEL_URL_TEMPLATE, loadConfig } from '../src/config.js';
import { TaxonomyLoadError } from '../src/errors.js';
import {
    BUNDLED_MODEL_PATH,
    buildTaxonomy,
    getTaxonomy,
    loadTaxonomy,
    parseSchema,
    resetTaxonomy,
    resolveTaxonomySource,
} from '../src/taxonomy/loader.js';
import { createFetchMock } from './fixtures.js';

const MINIMAL_MODEL = `
name: mini
version: 0.0.1
default_prefix: ex
classes:
  thing: {}
  widget:
    is_a: thing
`;

const taxonomyConfig = (env: Record<string, string>) => loadConfig(env).taxonomy;

describe('resolveTaxonomySource', () => {
    test('defaults to the bundled model', () => {
        expect(resolveTaxonomySource(taxonomyConfig({}))).toEqual({ kind: 'file', location: BUNDLED_MODEL_PATH });
    });

    test('builds a release URL from BIOLINK_VERSION', () => {
        expect(resolveTaxonomySource(taxonomyConfig({ BIOLINK_VERSION: 'v4.2.5' }))).toEqual({
            kind: 'url',
            location: DEFAULT_MODEL_URL_TEMPLATE.replace('{version}', '4.2.5'),
        });
    });

    test('TAXONOMY_SOURCE wins over the version', () => {
        expect(
            resolveTaxonomySource(taxonomyConfig({ BIOLINK_VERSION: '4.2.5', TAXONOMY_SOURCE: 'https://models.test/m.yaml' }))
        ).toEqual({ kind: 'url', location: 'https://models.test/m.yaml' });
        expect(resolveTaxonomySource(taxonomyConfig({ TAXONOMY_SOURCE: 'models/m.yaml' }))).toEqual({
            kind: 'file',
            location: path.resolve('models/m.yaml'),
        });
    });
});

describe('parseSchema', () => {
    test('rejects YAML syntax errors', () => {
        expect(() => parseSchema('classes: [unclosed', 'broken.yaml')).toThrow(TaxonomyLoadError);
    });

    test('names the offending path', () => {
        expect(() => parseSchema('classes:\n  thing:\n    is_a: [a, b]\n', 'bad.yaml')).toThrow(
            /^Failed to load taxonomy from bad\.yaml: invalid model at classes\.thing\.is_a: /
        );
    });

    test('a model without classes is rejected', () => {
        expect(() => buildTaxonomy('name: empty\n', 'empty.yaml')).toThrow(
            'Failed to load taxonomy from empty.yaml: model defines no classes'
        );
    });
});

describe('loadTaxonomy', () => {
    test('loads the bundled model from disk', async () => {
        const model = await loadTaxonomy(taxonomyConfig({}));
        expect(model.version).toBe('4.2.1');
        expect(model.has('biolink:Disease')).toBe(true);
    });

    test('fetches a model from a URL', async () => {
        const fetchImpl = createFetchMock().mockResolvedValue(new Response(MINIMAL_MODEL, { status: 200 }));
        const model = await loadTaxonomy(taxonomyConfig({ TAXONOMY_SOURCE: 'https://models.test/mini.yaml' }), {
            fetchImpl,
        });

        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(fetchImpl.mock.calls[0][0]).toBe('https://models.test/mini.yaml');
        expect(model.namespace).toBe('ex');
        expect(model.ancestors('widget', { formatted: true })).toEqual(['ex:Widget', 'ex:Thing']);
        // base types are merged in
        expect(model.getType('uriorcurie')?.description).toBe('a URI or a CURIE');
    });

    test('HTTP failures become TaxonomyLoadError', async () => {
        const fetchImpl = createFetchMock().mockResolvedValue(
            new Response('missing', { status: 404, statusText: 'Not Found' })
        );
        await expect(
            loadTaxonomy(taxonomyConfig({ BIOLINK_VERSION: '9.9.9' }), { fetchImpl })
        ).rejects.toThrow(
            `Failed to load taxonomy from ${DEFAULT_MODEL_URL_TEMPLATE.replace('{version}', '9.9.9')}: HTTP 404 Not Found`
        );
    });

    test('missing files become TaxonomyLoadError', async () => {
        await expect(
            loadTaxonomy(taxonomyConfig({ TAXONOMY_SOURCE: path.join(__dirname, 'no-such-model.yaml') }))
        ).rejects.toThrow(TaxonomyLoadError);
    });
});

describe('getTaxonomy', () => {
    afterEach(() => {
        resetTaxonomy();
    });

    test('loads once per process', async () => {
        const fetchImpl = createFetchMock().mockImplementation(async () => new Response(MINIMAL_MODEL));
        const config = taxonomyConfig({ TAXONOMY_SOURCE: 'https://models.test/mini.yaml' });

        const [first, second] = await Promise.all([
            getTaxonomy(config, { fetchImpl }),
            getTaxonomy(config, { fetchImpl }),
        ]);

        expect(first).toBe(second);
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    test('a failed load is retried on the next call', async () => {
        const fetchImpl = createFetchMock()
            .mockRejectedValueOnce(new Error('connection reset'))
            .mockImplementation(async () => new Response(MINIMAL_MODEL));
        const config = taxonomyConfig({ TAXONOMY_SOURCE: 'https://models.test/mini.yaml' });

        await expect(getTaxonomy(config, { fetchImpl })).rejects.toThrow(
            'Failed to load taxonomy from https://models.test/mini.yaml: connection reset'
        );
        const model = await getTaxonomy(config, { fetchImpl });
        expect(model.name).toBe('mini');
    });
});
