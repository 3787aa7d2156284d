/**
 * InPost carrier adapter: checks credentials and builds the ShipX client.
 * Nothing reaches the network when a credential is missing.
 */

import type { CarrierResult } from "../carriers/types.js";
import { fail, ok } from "../carriers/types.js";
import { configurationError } from "../domain/errors.js";
import type { IHttpClient } from "../http/client.js";
import type { Logger } from "../logging/logger.js";
import { ShipxClient, type ShipxClientConfig } from "./shipx-client.js";

export type InpostAdapterConfig = ShipxClientConfig;

export function createInpostAdapter(
  config: InpostAdapterConfig,
  http: IHttpClient,
  logger: Logger
): CarrierResult<ShipxClient> {
  const missing = [
    config.apiToken.trim() === "" ? "API token" : undefined,
    config.organizationId.trim() === "" ? "organization ID" : undefined,
  ].filter((m): m is string => m !== undefined);
  if (missing.length > 0) {
    return fail(configurationError(`${missing.join(" and ")} not found`));
  }
  return ok(new ShipxClient(config, http, logger));
}
