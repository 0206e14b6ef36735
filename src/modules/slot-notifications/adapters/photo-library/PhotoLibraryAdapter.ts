import axios, { type AxiosInstance, isAxiosError } from 'axios';
import { DateTime } from 'luxon';
import type { ZodType, ZodTypeDef } from 'zod';
import type { IPhotoLibraryClient } from '../../application/ports/IPhotoLibraryClient';
import type { Asset, MemoryRecord, Person } from '../../domain/types';
import { toAssetType } from '../../domain/services/MemoryParser';
import {
  AssetDetailResponseSchema,
  MemoriesResponseSchema,
  PeopleResponseSchema,
  SearchResponseSchema,
  type RawAsset,
  type RawPerson,
  type SearchResponse,
} from '../../../../shared/validation/schemas';
import { UpstreamError } from '../../../../domain/errors/UpstreamError';
import { logger } from '../../../../shared/logger';

const JSON_TIMEOUT_MS = 10000;
const THUMBNAIL_TIMEOUT_MS = 30000;

/**
 * PhotoLibraryAdapter
 *
 * HTTP implementation of IPhotoLibraryClient, bound to one user's API key.
 *
 * **Features:**
 * - `x-api-key` on every request, `Accept: application/json` on JSON calls
 * - 10s timeout for JSON calls, 30s for thumbnails
 * - Response bodies validated with Zod schemas and mapped to domain types
 * - Axios, timeout and decoding failures surface as UpstreamError
 *
 * No retries here: callers wrap each call in a RetryPolicy.
 *
 * @see IPhotoLibraryClient for interface contract
 */
export class PhotoLibraryAdapter implements IPhotoLibraryClient {
  private readonly http: AxiosInstance;

  public constructor(baseUrl: string, apiKey: string) {
    this.http = axios.create({
      baseURL: baseUrl.replace(/\/+$/, ''),
      timeout: JSON_TIMEOUT_MS,
      headers: {
        'x-api-key': apiKey,
      },
    });
  }

  public async fetchMemories(): Promise<MemoryRecord[]> {
    const body = await this.getJson('/api/memories', 'fetchMemories');
    const memories = this.decode(MemoriesResponseSchema, body, 'fetchMemories');

    return memories.map((memory) => ({
      showAt: memory.showAt ?? null,
      year: memory.data?.year ?? null,
      assets: (memory.assets ?? []).map((asset) => ({ id: asset.id ?? null, type: asset.type ?? null })),
    }));
  }

  public async fetchPeople(): Promise<Person[]> {
    const body = await this.getJson('/api/people', 'fetchPeople');
    const decoded = this.decode(PeopleResponseSchema, body, 'fetchPeople');
    const people = Array.isArray(decoded) ? decoded : decoded.people;

    return people.map(toPerson);
  }

  public async countPersonAssets(personId: string): Promise<number> {
    const result = await this.searchByPerson(personId, 1, 'countPersonAssets');

    if (Array.isArray(result.assets)) {
      return result.assets.length;
    }
    return result.assets.total ?? result.assets.items.length;
  }

  public async fetchPersonAssets(personId: string, pageSize: number): Promise<Asset[]> {
    const result = await this.searchByPerson(personId, pageSize, 'fetchPersonAssets');
    const items = Array.isArray(result.assets) ? result.assets : result.assets.items;

    const assets: Asset[] = [];
    for (const item of items) {
      if (item.id) {
        assets.push({ id: item.id, type: toAssetType(item.type), createdAt: createdAtOf(item) });
      }
    }
    return assets;
  }

  public async fetchAssetPeople(assetId: string): Promise<Person[]> {
    const body = await this.getJson(`/api/assets/${encodeURIComponent(assetId)}`, 'fetchAssetPeople');
    const detail = this.decode(AssetDetailResponseSchema, body, 'fetchAssetPeople');

    return (detail.people ?? []).map(toPerson);
  }

  public async fetchThumbnail(assetId: string): Promise<Buffer> {
    const url = `/api/assets/${encodeURIComponent(assetId)}/thumbnail`;
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        params: { size: 'thumbnail' },
        responseType: 'arraybuffer',
        timeout: THUMBNAIL_TIMEOUT_MS,
      });
      return Buffer.from(response.data);
    } catch (error) {
      throw this.toUpstreamError(error, 'fetchThumbnail');
    }
  }

  private async searchByPerson(personId: string, size: number, operation: string): Promise<SearchResponse> {
    try {
      const response = await this.http.post<unknown>(
        '/api/search/metadata',
        { personIds: [personId], size },
        { headers: { Accept: 'application/json' } }
      );
      return this.decode(SearchResponseSchema, response.data, operation);
    } catch (error) {
      throw this.toUpstreamError(error, operation);
    }
  }

  private async getJson(url: string, operation: string): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { headers: { Accept: 'application/json' } });
      return response.data;
    } catch (error) {
      throw this.toUpstreamError(error, operation);
    }
  }

  private decode<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, operation: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new UpstreamError(`Unexpected response from photo service (${operation}): ${result.error.message}`);
    }
    return result.data;
  }

  private toUpstreamError(error: unknown, operation: string): UpstreamError {
    if (error instanceof UpstreamError) {
      return error;
    }

    if (isAxiosError(error)) {
      const status = error.response?.status;
      logger.debug({ msg: 'Photo service request failed', operation, statusCode: status, error: error.message });
      return new UpstreamError(
        status !== undefined
          ? `Photo service ${operation} failed with HTTP ${status}`
          : `Photo service ${operation} failed: ${error.message}`,
        status
      );
    }

    return new UpstreamError(
      `Photo service ${operation} failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function toPerson(raw: RawPerson): Person {
  return { id: raw.id, name: raw.name ?? '', assetCount: 0 };
}

/**
 * First readable timestamp among fileCreatedAt, localDateTime and createdAt
 */
function createdAtOf(raw: RawAsset): DateTime | null {
  for (const value of [raw.fileCreatedAt, raw.localDateTime, raw.createdAt]) {
    if (value) {
      const parsed = DateTime.fromISO(value, { setZone: true });
      if (parsed.isValid) {
        return parsed;
      }
    }
  }
  return null;
}
