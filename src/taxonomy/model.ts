/**
 * In-memory Biolink model
 *
 * Built once from a LinkML schema document and never mutated afterwards.
 * Answers hierarchy queries (ancestors, descendants, mappings, slot domains)
 * over classes, slots and types.
 */

import { UnknownTypeError } from '../errors.js';
import { splitPrefix, syntacticCanonical, toClassName, toModelName, toSlotName, withPrefix } from './labels.js';
import { findMostSpecificTypes } from './reducer.js';
import type { LinkmlSchema, RawElement } from './schema.js';
import type {
  AncestorQueryOptions,
  ElementDefinition,
  ElementKind,
  FormatOptions,
  TaxonomyOracle,
  TypeLabel,
} from './types.js';

interface ElementRecord {
  name: string;
  kind: ElementKind;
  raw: RawElement;
}

type RawElementMap = Record<string, RawElement | null> | null | undefined;

const MAPPING_FIELDS = [
  'exact_mappings',
  'close_mappings',
  'narrow_mappings',
  'broad_mappings',
  'related_mappings',
] as const;

const PREDICATE_ROOT = 'related to';
const NODE_PROPERTY_ROOT = 'node property';
const CATEGORY_ROOT = 'named thing';
const ENTITY_ROOT = 'entity';

export interface TaxonomyModelOptions {
  /** Types from imported schemas (linkml:types); the model's own definitions win */
  baseTypes?: RawElementMap;
}

export interface TaxonomyStats {
  classes: number;
  slots: number;
  types: number;
  enums: number;
}

function indexElements(elements: RawElementMap, kind: ElementKind): Map<string, ElementRecord> {
  const index = new Map<string, ElementRecord>();
  for (const [name, raw] of Object.entries(elements ?? {})) {
    index.set(toModelName(name), { name, kind, raw: raw ?? {} });
  }
  return index;
}

export class TaxonomyModel implements TaxonomyOracle {
  readonly namespace: string;
  readonly version: string;
  readonly name: string;
  private readonly defaultRange: string;
  private readonly classes: ReadonlyMap<string, ElementRecord>;
  private readonly slots: ReadonlyMap<string, ElementRecord>;
  private readonly types: ReadonlyMap<string, ElementRecord>;
  private readonly enums: ReadonlySet<string>;
  private readonly isAChildren = new Map<ElementRecord, ElementRecord[]>();
  private readonly mixinChildren = new Map<ElementRecord, ElementRecord[]>();

  constructor(schema: LinkmlSchema, options: TaxonomyModelOptions = {}) {
    this.namespace = schema.default_prefix ?? 'biolink';
    this.version = schema.version !== undefined ? String(schema.version) : 'unknown';
    this.name = schema.name ?? this.namespace;
    this.defaultRange = schema.default_range ?? 'string';

    this.classes = indexElements(schema.classes, 'class');
    this.slots = indexElements(schema.slots, 'slot');

    const types = indexElements(options.baseTypes, 'type');
    for (const [key, record] of indexElements(schema.types, 'type')) {
      types.set(key, record);
    }
    this.types = types;
    this.enums = new Set(Object.keys(schema.enums ?? {}).map(toModelName));

    for (const record of [...this.classes.values(), ...this.slots.values()]) {
      const parent = record.raw.is_a ? this.lookup(record.raw.is_a, record.kind) : undefined;
      if (parent) {
        this.addChild(this.isAChildren, parent, record);
      }
      for (const mixinName of record.raw.mixins ?? []) {
        const mixin = this.lookup(mixinName, record.kind);
        if (mixin) {
          this.addChild(this.mixinChildren, mixin, record);
        }
      }
    }
  }

  private addChild(
    edges: Map<ElementRecord, ElementRecord[]>,
    parent: ElementRecord,
    child: ElementRecord
  ): void {
    const children = edges.get(parent);
    if (children) {
      children.push(child);
    } else {
      edges.set(parent, [child]);
    }
  }

  private lookup(name: string, kind: ElementKind): ElementRecord | undefined {
    const key = toModelName(name);
    switch (kind) {
      case 'class':
        return this.classes.get(key);
      case 'slot':
        return this.slots.get(key);
      case 'type':
        return this.types.get(key);
    }
  }

  /**
   * Find an element by any label form. A prefix other than the model's
   * namespace never matches.
   */
  private resolve(label: TypeLabel): ElementRecord | undefined {
    const { prefix } = splitPrefix(label);
    if (prefix && prefix.toLowerCase() !== this.namespace.toLowerCase()) {
      return undefined;
    }
    const key = toModelName(label);
    return this.classes.get(key) ?? this.slots.get(key) ?? this.types.get(key);
  }

  private require(label: TypeLabel): ElementRecord {
    const record = this.resolve(label);
    if (!record) {
      throw new UnknownTypeError(label);
    }
    return record;
  }

  private format(record: ElementRecord, formatted = false): TypeLabel {
    const local = record.kind === 'slot' ? toSlotName(record.name) : toClassName(record.name);
    return formatted ? withPrefix(this.namespace, local) : local;
  }

  private parents(record: ElementRecord, mixins: boolean): ElementRecord[] {
    const parents: ElementRecord[] = [];
    const isA = record.raw.is_a ? this.lookup(record.raw.is_a, record.kind) : undefined;
    if (isA) {
      parents.push(isA);
    }
    if (mixins) {
      for (const mixinName of record.raw.mixins ?? []) {
        const mixin = this.lookup(mixinName, record.kind);
        if (mixin) {
          parents.push(mixin);
        }
      }
    }
    return parents;
  }

  private children(record: ElementRecord, mixins: boolean): ElementRecord[] {
    const children = [...(this.isAChildren.get(record) ?? [])];
    if (mixins) {
      children.push(...(this.mixinChildren.get(record) ?? []));
    }
    return children;
  }

  /** Breadth-first closure over `step`, without repeats */
  private walk(
    start: ElementRecord,
    reflexive: boolean,
    step: (record: ElementRecord) => ElementRecord[]
  ): ElementRecord[] {
    const visited = new Set<ElementRecord>([start]);
    const result: ElementRecord[] = reflexive ? [start] : [];
    const queue: ElementRecord[] = [start];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      for (const next of step(current)) {
        if (!visited.has(next)) {
          visited.add(next);
          result.push(next);
          queue.push(next);
        }
      }
    }

    return result;
  }

  private ancestorRecords(record: ElementRecord, reflexive: boolean, mixins: boolean): ElementRecord[] {
    return this.walk(record, reflexive, (current) => this.parents(current, mixins));
  }

  private descendsFrom(label: TypeLabel, kind: ElementKind, rootName: string): boolean {
    const record = this.resolve(label);
    const root = this.lookup(rootName, kind);
    if (!record || !root || record.kind !== kind) {
      return false;
    }
    return this.ancestorRecords(record, true, true).includes(root);
  }

  ancestors(label: TypeLabel, options: AncestorQueryOptions = {}): TypeLabel[] {
    const { reflexive = true, mixins = true, formatted = false } = options;
    return this.ancestorRecords(this.require(label), reflexive, mixins).map((r) => this.format(r, formatted));
  }

  descendants(label: TypeLabel, options: AncestorQueryOptions = {}): TypeLabel[] {
    const { reflexive = true, mixins = true, formatted = false } = options;
    return this.walk(this.require(label), reflexive, (current) => this.children(current, mixins)).map((r) =>
      this.format(r, formatted)
    );
  }

  canonicalize(label: TypeLabel): TypeLabel {
    const record = this.resolve(label);
    return record ? this.format(record, true) : syntacticCanonical(label, this.namespace);
  }

  has(label: TypeLabel): boolean {
    return this.resolve(label) !== undefined;
  }

  getElement(label: TypeLabel): ElementDefinition | undefined {
    const record = this.resolve(label);
    if (!record) {
      return undefined;
    }
    return { ...record.raw, name: record.name, element_type: record.kind };
  }

  getType(label: TypeLabel): ElementDefinition | undefined {
    const record = this.lookup(label, 'type');
    return record ? { ...record.raw, name: record.name, element_type: 'type' } : undefined;
  }

  allClasses(options: FormatOptions = {}): TypeLabel[] {
    return [...this.classes.values()].map((r) => this.format(r, options.formatted));
  }

  allSlots(options: FormatOptions = {}): TypeLabel[] {
    return [...this.slots.values()].map((r) => this.format(r, options.formatted));
  }

  allTypes(options: FormatOptions = {}): TypeLabel[] {
    return [...this.types.values()].map((r) => this.format(r, options.formatted));
  }

  allEntities(options: FormatOptions = {}): TypeLabel[] {
    const entity = this.lookup(ENTITY_ROOT, 'class');
    if (!entity) {
      return [];
    }
    return this.walk(entity, true, (current) => this.children(current, true)).map((r) =>
      this.format(r, options.formatted)
    );
  }

  /**
   * Element whose mappings contain `identifier`. Exact mappings are tried
   * first; several hits in one tier resolve to the most specific of them.
   */
  elementByMapping(identifier: string, options: FormatOptions = {}): TypeLabel | undefined {
    const candidates = [...this.classes.values(), ...this.slots.values()];

    for (const field of MAPPING_FIELDS) {
      const hits = candidates.filter((record) => record.raw[field]?.includes(identifier));
      if (hits.length === 0) {
        continue;
      }
      const [best] = findMostSpecificTypes(
        hits.map((record) => this.format(record, true)),
        this
      );
      const record = this.resolve(best);
      return record ? this.format(record, options.formatted) : best;
    }

    return undefined;
  }

  isPredicate(label: TypeLabel): boolean {
    return this.descendsFrom(label, 'slot', PREDICATE_ROOT);
  }

  isNodeProperty(label: TypeLabel): boolean {
    return this.descendsFrom(label, 'slot', NODE_PROPERTY_ROOT);
  }

  isCategory(label: TypeLabel): boolean {
    return this.descendsFrom(label, 'class', CATEGORY_ROOT);
  }

  private formatReference(name: string, kind: ElementKind, formatted: boolean): TypeLabel {
    const record = this.lookup(name, kind) ?? this.lookup(name, 'type');
    if (record) {
      return this.format(record, formatted);
    }
    // Enums and references outside the model
    const local = toClassName(name);
    return formatted ? withPrefix(this.namespace, local) : local;
  }

  slotDomain(label: TypeLabel, options: FormatOptions = {}): TypeLabel[] {
    const record = this.require(label);
    if (record.kind !== 'slot' || !record.raw.domain) {
      return [];
    }
    return [this.formatReference(record.raw.domain, 'class', options.formatted ?? false)];
  }

  slotRange(label: TypeLabel, options: FormatOptions = {}): TypeLabel[] {
    const record = this.require(label);
    if (record.kind !== 'slot' || !record.raw.range) {
      return [];
    }
    return [this.formatReference(record.raw.range, 'class', options.formatted ?? false)];
  }

  slotsWithClassDomain(label: TypeLabel, options: FormatOptions = {}): TypeLabel[] {
    const target = this.require(label);
    if (target.kind !== 'class') {
      return [];
    }
    return [...this.slots.values()]
      .filter((slot) => slot.raw.domain !== undefined && this.lookup(slot.raw.domain, 'class') === target)
      .map((slot) => this.format(slot, options.formatted));
  }

  /**
   * Value type of a slot: its range when that is a type, `uriorcurie` for
   * class and enum ranges, the schema default range when none is declared.
   */
  valueTypeForSlot(label: TypeLabel): string {
    const record = this.require(label);
    const range = record.raw.range;
    if (!range) {
      return this.defaultRange;
    }
    const type = this.lookup(range, 'type');
    if (type) {
      return type.name;
    }
    return 'uriorcurie';
  }

  stats(): TaxonomyStats {
    return {
      classes: this.classes.size,
      slots: this.slots.size,
      types: this.types.size,
      enums: this.enums.size,
    };
  }
}
