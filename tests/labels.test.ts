/**
 * Tests for label form conversions
 */

import {
    splitPrefix,
    syntacticCanonical,
    toClassName,
    toModelName,
    toSlotName,
} from '../src/taxonomy/labels.js';

describe('splitPrefix', () => {
    test('splits a CURIE-style label', () => {
        expect(splitPrefix('biolink:Gene')).toEqual({ prefix: 'biolink', local: 'Gene' });
    });

    test('leaves unprefixed labels alone', () => {
        expect(splitPrefix('named thing')).toEqual({ local: 'named thing' });
    });

    test('does not treat a URL scheme as a prefix', () => {
        expect(splitPrefix('https://w3id.org/biolink/vocab/Gene')).toEqual({
            local: 'https://w3id.org/biolink/vocab/Gene',
        });
    });
});

describe('toModelName', () => {
    test.each([
        ['biolink:GeneOrGeneProduct', 'gene or gene product'],
        ['NamedThing', 'named thing'],
        ['named thing', 'named thing'],
        ['related_to', 'related to'],
        ['biolink:related_to_at_instance_level', 'related to at instance level'],
        ['RNAProduct', 'rna product'],
        ['SNV', 'snv'],
    ])('%s -> %s', (label, expected) => {
        expect(toModelName(label)).toBe(expected);
    });
});

describe('toClassName and toSlotName', () => {
    test('class names are PascalCase', () => {
        expect(toClassName('gene or gene product')).toBe('GeneOrGeneProduct');
        expect(toClassName('RNA product')).toBe('RNAProduct');
    });

    test('slot names are snake_case', () => {
        expect(toSlotName('related to at instance level')).toBe('related_to_at_instance_level');
    });
});

describe('syntacticCanonical', () => {
    test.each([
        ['Mystery', 'biolink:Mystery'],
        ['mystery thing', 'biolink:MysteryThing'],
        ['mystery', 'biolink:Mystery'],
        ['some_slot', 'biolink:some_slot'],
        ['EX:Thing', 'EX:Thing'],
    ])('%s -> %s', (label, expected) => {
        expect(syntacticCanonical(label, 'biolink')).toBe(expected);
    });
});
