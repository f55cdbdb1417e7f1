/**
 * Purpose: Adapt the Azure blob container and batch APIs to the migrator's TierStore port.
 * Persists: Changes blob access tiers in the configured container.
 * Security Risks: Blob clients carry the account SAS; only unsigned URLs leave this module.
 */

import type { BatchSubResponse, BlobItem } from "@azure/storage-blob";
import { parseAccessTier, type AccessTier, type BatchSubResult, type BlobRecord } from "@tiermover/types";

export interface TierStore {
  listBlobs(): AsyncIterable<BlobRecord>;
  setTier(blobNames: string[], tier: AccessTier): Promise<BatchSubResult[]>;
}

export const stripQuery = (url: string): string => {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
};

export const toBlobRecord = (item: BlobItem, signedUrl: string): BlobRecord => {
  const tier = item.properties.accessTier;
  return {
    name: item.name,
    url: stripQuery(signedUrl),
    tier: tier ? parseAccessTier(tier) : undefined,
    metadata: { ...(item.metadata ?? {}) },
  };
};

// Sub-responses are indexed by the order the sub-requests were added.
export const toSubResults = (
  blobNames: string[],
  subResponses: ReadonlyArray<Pick<BatchSubResponse, "status" | "errorCode">>
): BatchSubResult[] =>
  blobNames.map((name, index) => {
    const sub = subResponses[index];
    if (!sub) {
      return { name, status: 0, errorCode: "MissingSubResponse" };
    }
    return sub.errorCode ? { name, status: sub.status, errorCode: sub.errorCode } : { name, status: sub.status };
  });

/**
 * The slice of `BlobServiceClient` the adapter uses; `TBlob` is `BlobClient`
 * for the real SDK.
 */
export interface BlobServiceLike<TBlob extends { url: string }> {
  getContainerClient(containerName: string): {
    listBlobsFlat(options: { includeMetadata: boolean }): AsyncIterable<BlobItem>;
    getBlobClient(blobName: string): TBlob;
  };
  getBlobBatchClient(): {
    setBlobsAccessTier(
      blobClients: TBlob[],
      tier: AccessTier
    ): Promise<{ subResponses: ReadonlyArray<Pick<BatchSubResponse, "status" | "errorCode">> }>;
  };
}

export const createAzureTierStore = <TBlob extends { url: string }>(
  serviceClient: BlobServiceLike<TBlob>,
  containerName: string
): TierStore => {
  const containerClient = serviceClient.getContainerClient(containerName);

  return {
    async *listBlobs() {
      for await (const item of containerClient.listBlobsFlat({ includeMetadata: true })) {
        yield toBlobRecord(item, containerClient.getBlobClient(item.name).url);
      }
    },

    async setTier(blobNames, tier) {
      const batchClient = serviceClient.getBlobBatchClient();
      const blobClients = blobNames.map((name) => containerClient.getBlobClient(name));
      const response = await batchClient.setBlobsAccessTier(blobClients, tier);
      return toSubResults(blobNames, response.subResponses);
    },
  };
};
