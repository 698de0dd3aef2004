/**
 * Name Resolution Service client
 *
 * Free-text name -> ranked list of candidate identifiers.
 */

import { ServiceClient, booleanParam, type ServiceClientOptions } from './client.js';
import { lookupResponseSchema, type LookupParams, type LookupResult, type QueryParams } from './types.js';

export const DEFAULT_NAME_RESOLVER_URL = 'https://name-resolution-sri.renci.org';

export class NameResolverClient extends ServiceClient {
  constructor(baseUrl: string = DEFAULT_NAME_RESOLVER_URL, options: ServiceClientOptions = {}) {
    super('Name Resolver', baseUrl, options);
  }

  static buildLookupParams(params: LookupParams): QueryParams {
    const query: Array<[string, string]> = [
      ['string', params.string],
      ['limit', String(params.limit ?? 10)],
      ['autocomplete', booleanParam(params.autocomplete ?? false)],
      ['highlighting', booleanParam(params.highlighting ?? false)],
    ];

    if (params.biolinkType) {
      query.push(['biolink_type', params.biolinkType]);
    }
    for (const prefix of params.onlyPrefixes ?? []) {
      query.push(['only_prefixes', prefix]);
    }
    return query;
  }

  async lookup(params: LookupParams): Promise<LookupResult[]> {
    const { data } = await this.get('/lookup', NameResolverClient.buildLookupParams(params), lookupResponseSchema);
    return data ?? [];
  }
}
