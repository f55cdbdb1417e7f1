/**
 * Purpose: Sign a time-limited account SAS and build a blob service client bound to it.
 * Persists: None.
 * Security Risks: Handles the storage account key; the SAS grants read/write/list on every container until expiry.
 */

import {
  AccountSASPermissions,
  AccountSASResourceTypes,
  AccountSASServices,
  BlobServiceClient,
  generateAccountSASQueryParameters,
  SASProtocol,
  SASQueryParameters,
  StorageSharedKeyCredential,
} from "@azure/storage-blob";

import { requireAccountKey, type MigrationConfig } from "./config";
import { wrapOperationFailure } from "./errors";

const HOUR_MS = 60 * 60 * 1000;
// Tolerates the client clock running ahead of the storage service.
export const SAS_CLOCK_SKEW_MS = 15 * 60 * 1000;

export type AuthConfig = Pick<MigrationConfig, "accountName" | "accountKey" | "accountUrl" | "sasExpiryHours">;

export const buildAccountSas = (config: AuthConfig, now: Date = new Date()): SASQueryParameters => {
  const accountKey = requireAccountKey(config.accountKey);

  const services = new AccountSASServices();
  services.blob = true;

  const resourceTypes = new AccountSASResourceTypes();
  resourceTypes.service = true;
  resourceTypes.container = true;
  resourceTypes.object = true;

  const permissions = new AccountSASPermissions();
  permissions.read = true;
  permissions.write = true;
  permissions.list = true;

  let credential: StorageSharedKeyCredential;
  try {
    credential = new StorageSharedKeyCredential(config.accountName, accountKey);
  } catch (error) {
    throw wrapOperationFailure("authentication_failed", error, "Unable to build shared key credential");
  }

  return generateAccountSASQueryParameters(
    {
      services: services.toString(),
      resourceTypes: resourceTypes.toString(),
      permissions,
      protocol: config.accountUrl.startsWith("https:") ? SASProtocol.Https : SASProtocol.HttpsAndHttp,
      startsOn: new Date(now.getTime() - SAS_CLOCK_SKEW_MS),
      expiresOn: new Date(now.getTime() + config.sasExpiryHours * HOUR_MS),
    },
    credential
  );
};

export const authenticate = (config: AuthConfig, now: Date = new Date()): BlobServiceClient => {
  const sas = buildAccountSas(config, now);
  return new BlobServiceClient(`${config.accountUrl}?${sas.toString()}`);
};
