/**
 * Waits for ShipX to confirm a freshly created shipment.
 * Labels and dispatch orders are only available once the status reads "confirmed".
 */

import type { CarrierResult, ShipmentApi } from "../carriers/types.js";
import { fail, ok } from "../carriers/types.js";
import { confirmationFailedError, confirmationTimeoutError } from "../domain/errors.js";
import type { Shipment } from "../domain/types.js";
import type { Logger } from "../logging/logger.js";
import type { ProgressReporter } from "./progress.js";

export const CONFIRMED_STATUS = "confirmed";

export interface ConfirmationPolicy {
  /** Wait between two polls */
  intervalMs: number;
  /** Poll bound; 0 polls until a final status arrives */
  maxAttempts: number;
  /** Statuses that end the wait with an error instead of retrying */
  failureStatuses: readonly string[];
}

export const DEFAULT_CONFIRMATION_POLICY: ConfirmationPolicy = {
  intervalMs: 1_000,
  maxAttempts: 60,
  failureStatuses: [],
};

export type Sleep = (ms: number) => Promise<void>;

export interface ConfirmationDeps {
  api: ShipmentApi;
  logger: Logger;
  progress: ProgressReporter;
  sleep: Sleep;
  policy: ConfirmationPolicy;
}

/**
 * Poll the shipment until it is confirmed. The first poll happens immediately;
 * consecutive polls are separated by exactly one interval.
 */
export async function waitForConfirmation(
  shipmentId: string,
  deps: ConfirmationDeps
): Promise<CarrierResult<Shipment>> {
  const { api, logger, progress, sleep, policy } = deps;
  const failureStatuses = new Set(policy.failureStatuses);

  for (let attempt = 1; ; attempt++) {
    const polled = await api.getShipment(shipmentId);
    if (!polled.ok) return polled;

    const shipment = polled.value;
    logger.info("confirm-shipment", "Shipment status", { attempt, status: shipment.status });

    if (shipment.status === CONFIRMED_STATUS) {
      progress.completed("Shipment confirmed");
      logger.info("confirm-shipment", "Shipment details", shipment.raw);
      return ok(shipment);
    }

    if (failureStatuses.has(shipment.status)) {
      progress.completed(`Shipment ${shipment.status}`);
      const error = confirmationFailedError(shipmentId, shipment.status);
      logger.error("confirm-shipment", "Shipment confirmation failed", { shipmentId, error });
      return fail(error);
    }

    if (policy.maxAttempts > 0 && attempt >= policy.maxAttempts) {
      progress.completed("Shipment not confirmed");
      const error = confirmationTimeoutError(shipmentId, attempt, shipment.status);
      logger.error("confirm-shipment", "Shipment confirmation timed out", { shipmentId, error });
      return fail(error);
    }

    progress.waiting(attempt, shipment.status);
    await sleep(policy.intervalMs);
  }
}
