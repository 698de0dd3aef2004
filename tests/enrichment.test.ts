/**
 * Tests for node properties and CSV row enrichment
 */

import { EntityResolver } from '../src/entities/entity-resolver.js';
import { NodeEnricher, mapRowToProperties, normalizeColumnName } from '../src/enrichment/node-enricher.js';
import { getNodePropertiesForClass } from '../src/enrichment/node-properties.js';
import type { NodeProperty } from '../src/enrichment/types.js';
import { UnknownTypeError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import type { LookupResult, NormalizedNodesResponse } from '../src/services/types.js';
import { createTypeReducer } from '../src/taxonomy/reducer.js';
import { bundledModel } from './fixtures.js';

const ASPIRIN_TYPES = ['biolink:SmallMolecule', 'biolink:MolecularEntity', 'biolink:ChemicalEntity', 'biolink:NamedThing'];

function createEnricher(lookupResults: LookupResult[], nodes: NormalizedNodesResponse, sink = jest.fn()) {
    const model = bundledModel();
    const reduce = createTypeReducer(model);
    const lookup = jest.fn(async () => lookupResults);
    const resolver = new EntityResolver({
        nameResolver: { lookup },
        nodeNormalizer: { getNormalizedNodes: async () => nodes },
        reduce,
    });
    const enricher = new NodeEnricher({
        model,
        resolver,
        reduce,
        logger: createLogger('warn', 'enrichment', sink),
    });
    return { enricher, lookup, sink };
}

describe('getNodePropertiesForClass', () => {
    test('gene: own domain first, then inherited, then domain-free slots', () => {
        const properties = getNodePropertiesForClass(bundledModel(), 'Gene');

        expect(properties.map((p) => p.property)).toEqual([
            'symbol',
            'node_property',
            'synonym',
            'full_name',
            'xref',
            'provided_by',
            'name',
            'iri',
            'description',
            'deprecated',
        ]);
        expect(properties.find((p) => p.property === 'xref')).toEqual({
            property: 'xref',
            type: 'uriorcurie',
            description: 'a URI or a CURIE',
        });
        expect(properties.find((p) => p.property === 'deprecated')).toEqual({
            property: 'deprecated',
            type: 'boolean',
            description: 'A binary (true or false) value',
        });
    });

    test('small molecule picks up chemical and mixin-domain slots', () => {
        const names = getNodePropertiesForClass(bundledModel(), 'biolink:SmallMolecule').map((p) => p.property);

        expect(names).toEqual([
            'is_metabolite',
            'has_chemical_formula',
            'is_toxic',
            'max_tolerated_dose',
            'node_property',
            'synonym',
            'full_name',
            'xref',
            'provided_by',
            'available_from',
            'routes_of_delivery',
            'name',
            'iri',
            'description',
            'deprecated',
        ]);
    });

    test('custom types resolve to their primitive', () => {
        const formula = getNodePropertiesForClass(bundledModel(), 'small molecule').find(
            (p) => p.property === 'has_chemical_formula'
        );
        expect(formula).toEqual({ property: 'has_chemical_formula', type: 'string', description: 'A chemical formula' });
    });

    test('unknown classes throw', () => {
        expect(() => getNodePropertiesForClass(bundledModel(), 'Mystery')).toThrow(UnknownTypeError);
    });
});

describe('mapRowToProperties', () => {
    const properties: NodeProperty[] = [
        { property: 'description', type: 'string', description: null },
        { property: 'xref', type: 'uriorcurie', description: null },
        { property: 'synonym', type: 'string', description: null },
    ];

    test('normalizeColumnName', () => {
        expect(normalizeColumnName('CAS ID')).toBe('cas_id');
        expect(normalizeColumnName('Full-Name')).toBe('full_name');
    });

    test('direct, description-like and identifier-like columns', () => {
        const mapped = mapRowToProperties(
            {
                name: 'aspirin',
                Synonym: 'acetylsalicylic acid',
                'Short Description': 'analgesic',
                xref: 'CHEBI:15365',
                PubChem_ID: 2244,
                Empty: null,
            },
            properties,
            'name'
        );

        expect(mapped).toEqual({
            synonym: { csv_column: 'Synonym', value: 'acetylsalicylic acid', property_type: 'string' },
            description: { csv_column: 'Short Description', value: 'analgesic', property_type: 'string' },
            xref: [
                { csv_column: 'xref', value: 'CHEBI:15365', property_type: 'uriorcurie' },
                { csv_column: 'PubChem_ID', value: 2244, property_type: 'string' },
            ],
        });
    });

    test('nothing maps onto an empty property list', () => {
        expect(mapRowToProperties({ name: 'x', description: 'y', 'CAS ID': 'z' }, [], 'name')).toEqual({});
    });
});

describe('NodeEnricher.enrichNodeFromRow', () => {
    const row = {
        name: 'aspirin',
        Description: 'pain reliever',
        'CAS ID': '50-78-2',
        'is-toxic': 'no',
        Vendor: 'Acme',
        Notes: '',
    };

    test('resolves the entity and maps the row', async () => {
        const { enricher, lookup } = createEnricher([{ curie: 'CHEBI:15365', label: 'aspirin' }], {
            'CHEBI:15365': { id: { identifier: 'CHEBI:15365' }, type: ASPIRIN_TYPES },
        });

        const result = await enricher.enrichNodeFromRow(row);

        expect(lookup).toHaveBeenCalledWith({ string: 'aspirin', limit: 1, biolinkType: undefined, onlyPrefixes: undefined });
        expect(result).toMatchObject({
            entity: 'aspirin',
            curie: 'CHEBI:15365',
            type: 'biolink:SmallMolecule',
            all_curies: ['CHEBI:15365'],
            all_types: ASPIRIN_TYPES,
            mapped_data: {
                description: { csv_column: 'Description', value: 'pain reliever', property_type: 'string' },
                xref: [{ csv_column: 'CAS ID', value: '50-78-2', property_type: 'string' }],
                is_toxic: { csv_column: 'is-toxic', value: 'no', property_type: 'boolean' },
            },
            unmapped_columns: ['Vendor', 'Notes'],
        });
        if (!('valid_properties' in result)) {
            throw new Error('expected an enriched node');
        }
        expect(result.valid_properties).toHaveLength(15);
    });

    test('custom name column', async () => {
        const { enricher, lookup } = createEnricher([], {});

        await enricher.enrichNodeFromRow({ compound: 'ibuprofen' }, { nameColumn: 'compound', limit: 3, biolinkType: 'SmallMolecule' });

        expect(lookup).toHaveBeenCalledWith({
            string: 'ibuprofen',
            limit: 3,
            biolinkType: 'SmallMolecule',
            onlyPrefixes: undefined,
        });
    });

    test('missing name cell', async () => {
        const { enricher, lookup } = createEnricher([], {});

        await expect(enricher.enrichNodeFromRow({ name: '', Vendor: 'Acme' })).resolves.toEqual({
            error: "No value found in column 'name'",
            row_data: { name: '', Vendor: 'Acme' },
        });
        expect(lookup).not.toHaveBeenCalled();
    });

    test('no CURIEs found', async () => {
        const { enricher } = createEnricher([], {});

        await expect(enricher.enrichNodeFromRow(row)).resolves.toEqual({
            entity: 'aspirin',
            curie: null,
            type: 'biolink:NamedThing',
            properties: [],
            mapped_data: {},
            error: 'No CURIEs found',
        });
    });

    test('no types found', async () => {
        const { enricher } = createEnricher([{ curie: 'EX:1' }], { 'EX:1': null });

        await expect(enricher.enrichNodeFromRow(row)).resolves.toEqual({
            entity: 'aspirin',
            curie: 'EX:1',
            type: 'biolink:NamedThing',
            properties: [],
            mapped_data: {},
            error: 'No types found',
        });
    });

    test('a type outside the model maps nothing and warns', async () => {
        const { enricher, sink } = createEnricher([{ curie: 'EX:2' }], {
            'EX:2': { type: ['biolink:Mystery'] },
        });

        const result = await enricher.enrichNodeFromRow({ name: 'thing', Description: 'odd' });

        expect(result).toMatchObject({
            type: 'biolink:Mystery',
            valid_properties: [],
            mapped_data: {},
            unmapped_columns: ['Description'],
        });
        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink.mock.calls[0][0]).toMatch(
            / WARN \[enrichment\] Type 'biolink:Mystery' is not in taxonomy 4\.2\.1; no properties to map$/
        );
    });
});
