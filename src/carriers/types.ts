/**
 * Carrier abstraction: the orchestrator talks to this interface, the ShipX client implements it.
 */

import type {
  DispatchOrder,
  DispatchOrderRequest,
  Shipment,
  ShipmentRequest,
} from "../domain/types.js";
import type { CarrierIntegrationError } from "../domain/errors.js";

/** Result of an operation that can fail with a structured error */
export type CarrierResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CarrierIntegrationError };

export function ok<T>(value: T): CarrierResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: CarrierIntegrationError): CarrierResult<T> {
  return { ok: false, error };
}

/** The five provider calls one run makes, in the order it makes them */
export interface ShipmentApi {
  createShipment(request: ShipmentRequest): Promise<CarrierResult<Shipment>>;
  getShipment(shipmentId: string): Promise<CarrierResult<Shipment>>;
  /** Label document (PDF) of a confirmed shipment */
  getLabel(shipmentId: string): Promise<CarrierResult<Uint8Array>>;
  createDispatchOrder(order: DispatchOrderRequest): Promise<CarrierResult<DispatchOrder>>;
  /** Printout document (PDF) the courier takes at pickup */
  getDispatchPrintout(dispatchOrderId: string): Promise<CarrierResult<Uint8Array>>;
}
