/**
 * Maps domain requests to ShipX payloads and ShipX responses back to domain types.
 * Single place for ShipX-specific payload shapes; no raw ShipX types leak to callers.
 */

import { z } from "zod";
import type {
  Address,
  DispatchOrder,
  DispatchOrderRequest,
  Parcel,
  Party,
  Shipment,
  ShipmentRequest,
} from "../domain/types.js";
import {
  authError,
  carrierError,
  invalidRequestError,
  malformedResponseError,
  rateLimitError,
  type CarrierIntegrationError,
} from "../domain/errors.js";
import { formatIssues } from "../domain/validation.js";
import { truncateString } from "../logging/serialize.js";
import type {
  ShipxAddress,
  ShipxDispatchOrderPayload,
  ShipxErrorResponse,
  ShipxParcel,
  ShipxPeer,
  ShipxShipmentPayload,
} from "./shipx-types.js";

function toShipxAddress(addr: Address): ShipxAddress {
  return {
    street: addr.street,
    building_number: addr.buildingNumber,
    city: addr.city,
    post_code: addr.postCode,
    country_code: addr.countryCode,
  };
}

function toShipxPeer(party: Party): ShipxPeer {
  return {
    first_name: party.firstName,
    last_name: party.lastName,
    ...(party.companyName ? { company_name: party.companyName } : {}),
    email: party.email,
    phone: party.phone,
    address: toShipxAddress(party.address),
  };
}

function toShipxParcel(parcel: Parcel): ShipxParcel {
  return {
    dimensions: {
      length: String(parcel.dimensions.length),
      width: String(parcel.dimensions.width),
      height: String(parcel.dimensions.height),
      unit: parcel.dimensions.unit,
    },
    weight: {
      amount: String(parcel.weight.amount),
      unit: parcel.weight.unit,
    },
    is_non_standard: parcel.isNonStandard,
  };
}

/** Build the ShipX create-shipment body */
export function buildShipxShipment(request: ShipmentRequest): ShipxShipmentPayload {
  return {
    receiver: toShipxPeer(request.receiver),
    sender: toShipxPeer(request.sender),
    parcels: request.parcels.map(toShipxParcel),
    ...(request.insurance
      ? { insurance: { amount: String(request.insurance.amount), currency: request.insurance.currency } }
      : {}),
    ...(request.customAttributes ? { custom_attributes: { ...request.customAttributes } } : {}),
    service: request.service,
    reference: request.reference,
    ...(request.comments ? { comments: request.comments } : {}),
  };
}

/** Build the ShipX dispatch-order body */
export function buildShipxDispatchOrder(order: DispatchOrderRequest): ShipxDispatchOrderPayload {
  return {
    status: order.shipmentStatus,
    shipments: [order.shipmentId],
    dispatch_point_id: [order.dispatchPointId],
    address: toShipxAddress(order.address),
    contact: { ...order.contact },
    collection_date: order.collectionDate,
  };
}

/** ShipX ids are numeric; the workflow treats them as opaque strings */
const idSchema = z.union([z.number().int(), z.string().min(1)]).transform(String);

const shipxShipmentSchema = z
  .object({
    id: idSchema,
    status: z.string().min(1),
    sender: z.object({ id: idSchema.optional() }).passthrough().nullish(),
  })
  .passthrough();

const shipxDispatchOrderSchema = z
  .object({
    id: idSchema,
    status: z.string().optional(),
  })
  .passthrough();

const shipxErrorSchema: z.ZodType<ShipxErrorResponse> = z.object({
  status: z.number().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
  description: z.string().optional(),
  details: z.unknown().optional(),
});

function parseJson(body: string, what: string): unknown {
  try {
    return JSON.parse(body);
  } catch (e) {
    throw malformedResponseError(`Malformed JSON in ShipX ${what} response`, e);
  }
}

/** Parse a shipment returned by create-shipment or get-shipment */
export function parseShipxShipment(body: string): Shipment {
  const parsed = shipxShipmentSchema.safeParse(parseJson(body, "shipment"));
  if (!parsed.success) {
    throw malformedResponseError(
      `Unexpected ShipX shipment response: ${formatIssues(parsed.error)}`,
      parsed.error
    );
  }
  const { id, status, sender } = parsed.data;
  return {
    id,
    status,
    dispatchPointId: sender?.id,
    raw: parsed.data,
  };
}

export function parseShipxDispatchOrder(body: string): DispatchOrder {
  const parsed = shipxDispatchOrderSchema.safeParse(parseJson(body, "dispatch order"));
  if (!parsed.success) {
    throw malformedResponseError(
      `Unexpected ShipX dispatch order response: ${formatIssues(parsed.error)}`,
      parsed.error
    );
  }
  return {
    id: parsed.data.id,
    status: parsed.data.status,
    raw: parsed.data,
  };
}

/** Error body as JSON when it is JSON, otherwise the (truncated) text */
function readErrorBody(body: string): unknown {
  if (body.length === 0) return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return truncateString(body);
  }
}

/**
 * Map a non-success ShipX response to a structured error.
 * The provider body is kept on the error so the failure log shows it verbatim.
 */
export function parseShipxErrorResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): CarrierIntegrationError {
  const responseBody = readErrorBody(body);
  const parsed = shipxErrorSchema.safeParse(responseBody);
  const data: ShipxErrorResponse = parsed.success ? parsed.data : {};
  const code = data.error;
  const providerMessage = data.message ?? data.description;
  const message = providerMessage
    ? `ShipX returned ${status}: ${providerMessage}`
    : `ShipX returned ${status}: ${truncateString(body, 200)}`;

  if (status === 401 || status === 403) {
    return authError(`ShipX rejected the API token (${status})`, status, responseBody);
  }
  if (status === 429) {
    const retryAfter = headers["retry-after"];
    return rateLimitError(
      retryAfter ? parseInt(retryAfter, 10) : undefined,
      code,
      providerMessage,
      responseBody
    );
  }
  if (status === 400 || status === 422) {
    return invalidRequestError(message, status, code, providerMessage, responseBody);
  }
  return carrierError(message, status, code, providerMessage, responseBody);
}
