// =============================================================================
// HubSpot Gateway — CRM v3 objects, search and properties
// =============================================================================
// Authenticated with a private-app access token. Search is POST-based with
// filter groups (filters ANDed within a group, groups ORed) and pages via
// the `after` cursor in `paging.next`.
// =============================================================================
import type { AppConfig } from '../config';
import type {
  HubSpotFilterGroup,
  HubSpotGateway,
  HubSpotObject,
  HubSpotObjectType,
  HubSpotProperty,
  HubSpotSearchOptions,
  Page,
} from '../types';
import { GatewayPolicy, RateLimitedHttp } from './apiGateway';

export const HUBSPOT_POLICY: GatewayPolicy = {
  minIntervalMs: 150,
  maxAttempts: 10,
  backoffFactor: 1.5,
  rateLimitCapMs: 30_000,
  serverErrorCapMs: 15_000,
  timeoutMs: 60_000,
  retryAfterHeaders: ['retry-after'],
};

/** HubSpot's maximum search page size */
const SEARCH_PAGE_LIMIT = 100;

interface SearchResponse {
  total?: number;
  results?: HubSpotObject[];
  paging?: { next?: { after?: string } };
}

export class HubSpotClient implements HubSpotGateway {
  constructor(private readonly http: RateLimitedHttp) {}

  static fromConfig(cfg: AppConfig): HubSpotClient {
    return new HubSpotClient(
      new RateLimitedHttp({
        system: 'hubspot',
        baseURL: cfg.hubspotBaseUrl,
        token: cfg.hubspotAccessToken,
        policy: HUBSPOT_POLICY,
      }),
    );
  }

  async searchObjects(
    objectType: HubSpotObjectType,
    filterGroups: HubSpotFilterGroup[],
    options: HubSpotSearchOptions,
  ): Promise<Page<HubSpotObject>> {
    const body = await this.http.request<SearchResponse>('POST', `/crm/v3/objects/${objectType}/search`, {
      data: {
        filterGroups,
        properties: options.properties,
        limit: Math.min(options.limit ?? SEARCH_PAGE_LIMIT, SEARCH_PAGE_LIMIT),
        ...(options.after ? { after: options.after } : {}),
        ...(options.sorts ? { sorts: options.sorts } : {}),
      },
    });
    return { items: body.results ?? [], nextCursor: body.paging?.next?.after || undefined };
  }

  async getObject(objectType: HubSpotObjectType, id: string, properties: string[]): Promise<HubSpotObject> {
    return this.http.request<HubSpotObject>('GET', `/crm/v3/objects/${objectType}/${encodeURIComponent(id)}`, {
      params: { properties: properties.join(',') },
    });
  }

  async createObject(objectType: HubSpotObjectType, properties: Record<string, string>): Promise<HubSpotObject> {
    return this.http.request<HubSpotObject>('POST', `/crm/v3/objects/${objectType}`, {
      data: { properties },
    });
  }

  async updateObject(
    objectType: HubSpotObjectType,
    id: string,
    properties: Record<string, string>,
  ): Promise<HubSpotObject> {
    return this.http.request<HubSpotObject>('PATCH', `/crm/v3/objects/${objectType}/${encodeURIComponent(id)}`, {
      data: { properties },
    });
  }

  async findContactByEmail(email: string, emailProperty: string, properties: string[]): Promise<HubSpotObject | null> {
    const page = await this.searchObjects(
      'contacts',
      [{ filters: [{ propertyName: emailProperty, operator: 'EQ', value: email }] }],
      { properties, limit: 1 },
    );
    return page.items[0] ?? null;
  }

  async listProperties(objectType: HubSpotObjectType): Promise<HubSpotProperty[]> {
    const body = await this.http.request<{ results?: HubSpotProperty[] }>('GET', `/crm/v3/properties/${objectType}`);
    return body.results ?? [];
  }
}
