/**
 * Node properties valid for a class
 */

import type { TaxonomyModel } from '../taxonomy/model.js';
import type { TypeLabel } from '../taxonomy/types.js';
import type { NodeProperty } from './types.js';

/**
 * Node-property slots whose domain is the class or one of its ancestors
 * (mixins included), followed by node-property slots without a domain.
 *
 * @throws UnknownTypeError when `className` is not in the model
 */
export function getNodePropertiesForClass(model: TaxonomyModel, className: TypeLabel): NodeProperty[] {
  const ancestors = model.ancestors(className);

  const withDomain = new Set<string>();
  for (const ancestor of ancestors) {
    for (const slot of model.slotsWithClassDomain(ancestor)) {
      if (model.isNodeProperty(slot)) {
        withDomain.add(slot);
      }
    }
  }

  const withoutDomain = model
    .allSlots()
    .filter((slot) => model.slotDomain(slot).length === 0 && model.isNodeProperty(slot));

  const seen = new Set<string>();
  const properties: NodeProperty[] = [];
  for (const slot of [...withDomain, ...withoutDomain]) {
    if (seen.has(slot)) continue;
    seen.add(slot);

    const valueType = model.valueTypeForSlot(slot);
    const type = model.getType(valueType);
    properties.push({
      property: slot,
      type: type?.typeof ?? valueType,
      description: type?.description ?? null,
    });
  }
  return properties;
}
