// =============================================================================
// Wrike Gateway — tasks and custom fields over the v4 REST API
// =============================================================================
// Wrike's published limit is far tighter than HubSpot's, hence one call per
// second. Write bodies are form-encoded with customFields as a JSON string,
// which is what the v4 API expects.
// =============================================================================
import type { AppConfig } from '../config';
import type {
  Page,
  WrikeCustomField,
  WrikeCustomFieldValue,
  WrikeGateway,
  WrikeTask,
  WrikeTaskQuery,
  WrikeTaskUpdate,
} from '../types';
import { NotFoundError } from '../utils/GatewayError';
import { GatewayPolicy, RateLimitedHttp } from './apiGateway';

export const WRIKE_POLICY: GatewayPolicy = {
  minIntervalMs: 1_000,
  maxAttempts: 10,
  backoffFactor: 1.5,
  rateLimitCapMs: 30_000,
  serverErrorCapMs: 15_000,
  timeoutMs: 60_000,
  retryAfterHeaders: ['retry-after', 'x-rate-limit-reset'],
};

const DEFAULT_PAGE_SIZE = 100;

interface WrikeEnvelope<T> {
  kind?: string;
  data?: T[];
  nextPageToken?: string;
}

/** Wrike date filters take second precision with a Z suffix. */
export function toWrikeDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function formBody(fields: Record<string, string | undefined>): URLSearchParams {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) body.append(key, value);
  }
  return body;
}

export class WrikeClient implements WrikeGateway {
  constructor(private readonly http: RateLimitedHttp) {}

  static fromConfig(cfg: AppConfig): WrikeClient {
    return new WrikeClient(
      new RateLimitedHttp({
        system: 'wrike',
        baseURL: cfg.wrikeBaseUrl,
        token: cfg.wrikeApiToken,
        policy: WRIKE_POLICY,
      }),
    );
  }

  async listFolderTasks(folderId: string, query: WrikeTaskQuery = {}): Promise<Page<WrikeTask>> {
    const params: Record<string, string> = {
      descendants: String(query.descendants ?? true),
      pageSize: String(query.pageSize ?? DEFAULT_PAGE_SIZE),
      fields: JSON.stringify(['customFields']),
    };
    if (query.updatedBetween) {
      params.updatedDate = JSON.stringify({
        start: toWrikeDate(query.updatedBetween.start),
        end: toWrikeDate(query.updatedBetween.end),
      });
    }
    if (query.customField) params.customField = JSON.stringify(query.customField);
    if (query.pageToken) params.nextPageToken = query.pageToken;

    const body = await this.http.request<WrikeEnvelope<WrikeTask>>(
      'GET',
      `/folders/${encodeURIComponent(folderId)}/tasks`,
      { params },
    );
    return { items: body.data ?? [], nextCursor: body.nextPageToken || undefined };
  }

  async getTask(taskId: string): Promise<WrikeTask> {
    const path = `/tasks/${encodeURIComponent(taskId)}`;
    const body = await this.http.request<WrikeEnvelope<WrikeTask>>('GET', path);
    const task = body.data?.[0];
    if (!task) throw new NotFoundError('wrike', 'GET', path);
    return task;
  }

  async createTask(folderId: string, title: string, customFields: WrikeCustomFieldValue[]): Promise<WrikeTask> {
    const path = `/folders/${encodeURIComponent(folderId)}/tasks`;
    const body = await this.http.request<WrikeEnvelope<WrikeTask>>('POST', path, {
      data: formBody({ title, customFields: JSON.stringify(customFields) }),
    });
    const task = body.data?.[0];
    if (!task) throw new Error('Wrike create task returned no data');
    return task;
  }

  /** Title is only sent when given; callers updating companies never pass one. */
  async updateTask(taskId: string, update: WrikeTaskUpdate): Promise<WrikeTask> {
    const path = `/tasks/${encodeURIComponent(taskId)}`;
    const body = await this.http.request<WrikeEnvelope<WrikeTask>>('PUT', path, {
      data: formBody({
        title: update.title,
        customFields: update.customFields ? JSON.stringify(update.customFields) : undefined,
      }),
    });
    const task = body.data?.[0];
    if (!task) throw new NotFoundError('wrike', 'PUT', path);
    return task;
  }

  async listCustomFields(): Promise<WrikeCustomField[]> {
    const body = await this.http.request<WrikeEnvelope<WrikeCustomField>>('GET', '/customfields');
    return body.data ?? [];
  }
}
