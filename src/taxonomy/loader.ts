/**
 * Taxonomy loading
 *
 * Reads a LinkML model (bundled file, local path or URL), validates it and
 * builds the process-wide TaxonomyModel. The load happens once per process.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'yaml';
import type { Config } from '../config.js';
import { TaxonomyLoadError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { TaxonomyModel } from './model.js';
import { linkmlSchema, type LinkmlSchema } from './schema.js';

export const BUNDLED_MODEL_PATH = path.resolve(__dirname, '../../data/biolink-model.yaml');
export const LINKML_TYPES_PATH = path.resolve(__dirname, '../../data/linkml-types.yaml');

export type TaxonomySource =
  | { kind: 'file'; location: string }
  | { kind: 'url'; location: string };

export interface LoadTaxonomyOptions {
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

function isUrl(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

export function resolveTaxonomySource(config: Config['taxonomy']): TaxonomySource {
  if (config.source) {
    return isUrl(config.source)
      ? { kind: 'url', location: config.source }
      : { kind: 'file', location: path.resolve(config.source) };
  }
  if (config.version) {
    const version = config.version.replace(/^v/i, '');
    return { kind: 'url', location: config.modelUrlTemplate.replace('{version}', version) };
  }
  return { kind: 'file', location: BUNDLED_MODEL_PATH };
}

async function readSource(source: TaxonomySource, fetchImpl: typeof fetch): Promise<string> {
  if (source.kind === 'file') {
    try {
      return await readFile(source.location, 'utf-8');
    } catch (error) {
      throw new TaxonomyLoadError(error instanceof Error ? error.message : String(error), source.location, error);
    }
  }

  let response: Response;
  try {
    response = await fetchImpl(source.location, { headers: { Accept: 'application/yaml, text/plain' } });
  } catch (error) {
    throw new TaxonomyLoadError(error instanceof Error ? error.message : String(error), source.location, error);
  }
  if (!response.ok) {
    throw new TaxonomyLoadError(`HTTP ${response.status} ${response.statusText}`, source.location);
  }
  return response.text();
}

/**
 * Parse and validate a LinkML document
 */
export function parseSchema(text: string, source: string): LinkmlSchema {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new TaxonomyLoadError(error instanceof Error ? error.message : String(error), source, error);
  }

  const result = linkmlSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new TaxonomyLoadError(`invalid model${where}: ${issue.message}`, source);
  }
  return result.data;
}

export function buildTaxonomy(text: string, source: string, baseTypesText?: string): TaxonomyModel {
  const schema = parseSchema(text, source);
  if (Object.keys(schema.classes ?? {}).length === 0) {
    throw new TaxonomyLoadError('model defines no classes', source);
  }
  const baseTypes = baseTypesText ? parseSchema(baseTypesText, LINKML_TYPES_PATH).types : undefined;
  return new TaxonomyModel(schema, { baseTypes });
}

export async function loadTaxonomy(
  config: Config['taxonomy'],
  options: LoadTaxonomyOptions = {}
): Promise<TaxonomyModel> {
  const { fetchImpl = fetch, logger = silentLogger } = options;
  const source = resolveTaxonomySource(config);

  logger.info(`Loading taxonomy from ${source.location}`);
  const [text, baseTypesText] = await Promise.all([
    readSource(source, fetchImpl),
    readFile(LINKML_TYPES_PATH, 'utf-8'),
  ]);

  const model = buildTaxonomy(text, source.location, baseTypesText);
  const stats = model.stats();
  logger.info(
    `Loaded ${model.name} ${model.version}: ${stats.classes} classes, ${stats.slots} slots, ${stats.types} types`
  );
  return model;
}

// Singleton instance for the application
let _instance: Promise<TaxonomyModel> | null = null;

export function getTaxonomy(config: Config['taxonomy'], options?: LoadTaxonomyOptions): Promise<TaxonomyModel> {
  if (!_instance) {
    _instance = loadTaxonomy(config, options).catch((error: unknown) => {
      _instance = null;
      throw error;
    });
  }
  return _instance;
}

export function resetTaxonomy(): void {
  _instance = null;
}
