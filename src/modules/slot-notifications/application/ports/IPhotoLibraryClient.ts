import type { Asset, MemoryRecord, Person } from '../../domain/types';

/**
 * IPhotoLibraryClient Port Interface
 *
 * Read-only queries against the photo service for one user (the API key is
 * bound when the client is created). Implementations decode every response
 * shape into domain types; callers never see raw payloads.
 *
 * **Retry Behavior:**
 * Implementations do NOT retry. Callers wrap each call in a RetryPolicy.
 *
 * **Error Handling:**
 * - Non-2xx, timeout, network failure or undecodable body: UpstreamError
 *
 * @see PhotoLibraryAdapter for the HTTP implementation
 */
export interface IPhotoLibraryClient {
  /** GET /api/memories */
  fetchMemories(): Promise<MemoryRecord[]>;

  /** GET /api/people; people without a name come back with name '' */
  fetchPeople(): Promise<Person[]>;

  /** Approximate number of assets showing the person (size-1 metadata search) */
  countPersonAssets(personId: string): Promise<number>;

  /** POST /api/search/metadata with { personIds: [personId], size: pageSize } */
  fetchPersonAssets(personId: string, pageSize: number): Promise<Asset[]>;

  /** Faces recognized in one asset */
  fetchAssetPeople(assetId: string): Promise<Person[]>;

  /** Thumbnail bytes */
  fetchThumbnail(assetId: string): Promise<Buffer>;
}

/**
 * Builds a client bound to one user's API key
 */
export type PhotoLibraryClientFactory = (apiKey: string) => IPhotoLibraryClient;
