/**
 * MCP Tool Registration
 *
 * Registers the taxonomy, resolution and enrichment tools with the MCP server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod';
import type { ServerContext } from '../context.js';
import { UnknownTypeError, ValidationError } from '../errors.js';
import { ServiceApiError, formatNormalizedNodes } from '../services/index.js';

function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Expected failures become error results the model can read; anything else
 * is a bug and goes to the SDK.
 */
function errorResult(error: unknown): CallToolResult {
  if (error instanceof ServiceApiError || error instanceof UnknownTypeError || error instanceof ValidationError) {
    return {
      content: [{ type: 'text', text: error.message }],
      isError: true,
    };
  }
  throw error;
}

const formattedParam = z.boolean().optional().describe('Return namespaced labels such as biolink:Gene (default: false)');
const biolinkTypeParam = z.string().optional()
  .describe("Filter by Biolink entity type (e.g., 'Disease', 'Gene')");
const onlyPrefixesParam = z.array(z.string()).optional()
  .describe("Only include results from these namespaces (e.g., ['MONDO', 'HGNC'])");

export function registerTools(server: McpServer, context: ServerContext): void {
  const { model, reduce, resolver, enricher, nameResolver, nodeNormalizer } = context;

  // ============================================
  // TAXONOMY TOOLS
  // ============================================

  server.tool(
    'get_element',
    'Get a Biolink Model element (class, slot or type) by name. Returns an empty object when the model has no such element.',
    {
      name: z.string().describe("Element name in any form: 'gene', 'Gene', 'biolink:Gene', 'related_to'"),
    },
    async (params) => jsonResult(model.getElement(params.name) ?? {})
  );

  server.tool(
    'get_ancestors',
    'Get ancestors of a Biolink Model element, the element itself first, nearest ancestors before distant ones.',
    {
      name: z.string().describe('Name of the Biolink element'),
      formatted: formattedParam,
      mixin: z.boolean().optional().describe('Include mixin ancestors (default: true)'),
    },
    async (params) => {
      try {
        return jsonResult(model.ancestors(params.name, { formatted: params.formatted, mixins: params.mixin }));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'get_descendants',
    'Get descendants of a Biolink Model element, the element itself first.',
    {
      name: z.string().describe('Name of the Biolink element'),
      formatted: formattedParam,
      mixin: z.boolean().optional().describe('Include mixin descendants (default: true)'),
    },
    async (params) => {
      try {
        return jsonResult(model.descendants(params.name, { formatted: params.formatted, mixins: params.mixin }));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'get_all_classes',
    'Get all Biolink Model classes',
    { formatted: formattedParam },
    async (params) => jsonResult(model.allClasses({ formatted: params.formatted }))
  );

  server.tool(
    'get_all_slots',
    'Get all Biolink Model slots',
    { formatted: formattedParam },
    async (params) => jsonResult(model.allSlots({ formatted: params.formatted }))
  );

  server.tool(
    'get_all_types',
    'Get all Biolink Model types (value types such as label type, plus the LinkML base types)',
    { formatted: formattedParam },
    async (params) => jsonResult(model.allTypes({ formatted: params.formatted }))
  );

  server.tool(
    'get_all_entities',
    'Get all Biolink Model entities (the class entity and every class below it)',
    { formatted: formattedParam },
    async (params) => jsonResult(model.allEntities({ formatted: params.formatted }))
  );

  server.tool(
    'get_element_by_mapping',
    'Get the Biolink Model element an external CURIE or IRI is mapped to (exact mappings first, then close, narrow, broad and related). Returns null when nothing maps.',
    {
      identifier: z.string().describe("External CURIE or IRI, e.g. 'MONDO:0000001'"),
      formatted: formattedParam,
    },
    async (params) => jsonResult(model.elementByMapping(params.identifier, { formatted: params.formatted }) ?? null)
  );

  server.tool(
    'is_predicate',
    'Check whether a name is a Biolink predicate (a slot below related_to)',
    {
      name: z.string().describe('Name to check'),
    },
    async (params) => jsonResult(model.isPredicate(params.name))
  );

  server.tool(
    'get_slot_domain',
    'Get the domain (subject type) of a Biolink slot',
    {
      slot_name: z.string().describe('Name of the slot'),
    },
    async (params) => {
      try {
        return jsonResult(model.slotDomain(params.slot_name));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'get_slot_range',
    'Get the range (object type) of a Biolink slot',
    {
      slot_name: z.string().describe('Name of the slot'),
    },
    async (params) => {
      try {
        return jsonResult(model.slotRange(params.slot_name));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'find_most_specific_types',
    'Find the most specific Biolink types in a list by dropping every type that is an ancestor of another one. Returns the survivors sorted by their namespaced form; an empty list gives the root type.',
    {
      types: z.union([z.string(), z.array(z.string())])
        .describe("A single type or a list of types (e.g., ['biolink:Disease', 'biolink:NamedThing'])"),
    },
    async (params) => jsonResult(reduce(params.types))
  );

  server.tool(
    'get_node_properties_for_class',
    'List the node properties valid for a Biolink class, with their primitive value type and its description',
    {
      class_name: z.string().describe("Biolink class, e.g. 'Gene' or 'biolink:SmallMolecule'"),
    },
    async (params) => {
      try {
        return jsonResult(enricher.getNodePropertiesForClass(params.class_name));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // ============================================
  // RESOLUTION TOOLS
  // ============================================

  server.tool(
    'lookup',
    'Search the Name Resolution Service for identifiers matching a free-text name',
    {
      query: z.string().describe('Name to search for (e.g., "diabetes", "BRCA1", "aspirin")'),
      limit: z.number().int().positive().optional().describe('Number of results to return (default: 10)'),
      biolink_type: biolinkTypeParam,
      only_prefixes: onlyPrefixesParam,
      autocomplete: z.boolean().optional().describe('Treat the query as an incomplete word (default: false)'),
    },
    async (params) => {
      try {
        const results = await nameResolver.lookup({
          string: params.query,
          limit: params.limit,
          biolinkType: params.biolink_type,
          onlyPrefixes: params.only_prefixes,
          autocomplete: params.autocomplete,
        });
        return jsonResult(results);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'resolve_entity_to_curies',
    'Resolve a biological entity name to CURIEs using the Name Resolution Service',
    {
      entity: z.string().describe('Biological entity name (e.g., "diabetes", "BRCA1", "aspirin")'),
      limit: z.number().int().positive().optional().describe('Number of results to return (default: 5)'),
      biolink_type: biolinkTypeParam,
      only_prefixes: onlyPrefixesParam,
    },
    async (params) => {
      try {
        const curies = await resolver.resolveEntityToCuries(params.entity, {
          limit: params.limit,
          biolinkType: params.biolink_type,
          onlyPrefixes: params.only_prefixes,
        });
        return jsonResult(curies);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'get_types_for_curies',
    'Get the unique Biolink types of a list of CURIEs using the Node Normalization Service',
    {
      curies: z.array(z.string()).describe("List of CURIEs (e.g., ['MONDO:0005148', 'HGNC:1100'])"),
    },
    async (params) => {
      try {
        return jsonResult(await resolver.getTypesForCuries(params.curies));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'get_normalized_nodes',
    'Normalize biological entity CURIEs and apply conflation',
    {
      curies: z.array(z.string()).describe("List of CURIEs to normalize (e.g., ['MESH:D014867', 'NCIT:C34373'])"),
      conflate: z.boolean().optional().describe('Apply gene/protein conflation (default: true)'),
      drug_chemical_conflate: z.boolean().optional().describe('Apply drug/chemical conflation (default: true)'),
      description: z.boolean().optional().describe('Return CURIE descriptions when possible (default: false)'),
      individual_types: z.boolean().optional()
        .describe('Return individual types for equivalent identifiers (default: false)'),
    },
    async (params) => {
      const flags = {
        conflate: params.conflate,
        drugChemicalConflate: params.drug_chemical_conflate,
        description: params.description,
        individualTypes: params.individual_types,
      };
      try {
        const results = await nodeNormalizer.getNormalizedNodes(params.curies, flags);
        return {
          content: [{ type: 'text', text: formatNormalizedNodes(params.curies, results, flags) }],
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'find_most_specific_type_for_entity',
    'Find the most specific Biolink type(s) for a biological entity: name resolution, then node normalization, then type reduction',
    {
      entity: z.string().describe('Biological entity name (e.g., "diabetes", "BRCA1", "aspirin")'),
      limit: z.number().int().positive().optional()
        .describe('Number of name resolution results to consider (default: 5)'),
      biolink_type: biolinkTypeParam,
      only_prefixes: onlyPrefixesParam,
    },
    async (params) => {
      try {
        const types = await resolver.findMostSpecificTypeForEntity(params.entity, {
          limit: params.limit,
          biolinkType: params.biolink_type,
          onlyPrefixes: params.only_prefixes,
        });
        return jsonResult(types);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // ============================================
  // ENRICHMENT TOOLS
  // ============================================

  server.tool(
    'enrich_node_from_row',
    'Enrich a node from a CSV row: resolve the entity named in the row, determine its most specific Biolink type and map the other columns onto that type\'s valid properties',
    {
      row_data: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))
        .describe('One CSV row as column name -> value'),
      name_column: z.string().optional().describe("Column containing the entity name (default: 'name')"),
      limit: z.number().int().positive().optional().describe('Number of CURIE candidates to consider (default: 1)'),
      biolink_type: biolinkTypeParam,
      only_prefixes: onlyPrefixesParam,
    },
    async (params) => {
      try {
        const result = await enricher.enrichNodeFromRow(params.row_data, {
          nameColumn: params.name_column,
          limit: params.limit,
          biolinkType: params.biolink_type,
          onlyPrefixes: params.only_prefixes,
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
