/**
 * Shape of a LinkML schema document, as far as the taxonomy reads it.
 * Unknown keys are passed through so element definitions can be returned verbatim.
 */

import * as z from 'zod';

const curieList = z.array(z.string()).optional();

export const elementSchema = z
  .object({
    is_a: z.string().optional(),
    mixins: z.array(z.string()).optional(),
    mixin: z.boolean().optional(),
    abstract: z.boolean().optional(),
    description: z.string().optional(),
    domain: z.string().optional(),
    range: z.string().optional(),
    multivalued: z.boolean().optional(),
    typeof: z.string().optional(),
    slots: z.array(z.string()).optional(),
    exact_mappings: curieList,
    close_mappings: curieList,
    narrow_mappings: curieList,
    broad_mappings: curieList,
    related_mappings: curieList,
  })
  .passthrough();

// Elements declared with an empty body parse as null
const elementMap = z.record(z.string(), elementSchema.nullable()).nullable().optional();

export const linkmlSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    version: z.union([z.string(), z.number()]).optional(),
    default_prefix: z.string().optional(),
    default_range: z.string().optional(),
    imports: z.array(z.string()).optional(),
    classes: elementMap,
    slots: elementMap,
    types: elementMap,
    enums: z.record(z.string(), z.unknown()).nullable().optional(),
  })
  .passthrough();

export type RawElement = z.infer<typeof elementSchema>;
export type LinkmlSchema = z.infer<typeof linkmlSchema>;
