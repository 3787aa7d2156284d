/**
 * Runtime validation for shipment requests using Zod.
 * Only structural completeness is checked; field formats are ShipX's to judge.
 */

import { z } from "zod";
import type { Address, Insurance, Parcel, Party, ShipmentRequest } from "./types.js";

const addressSchema: z.ZodType<Address> = z.object({
  street: z.string().min(1),
  buildingNumber: z.string().min(1),
  city: z.string().min(1),
  postCode: z.string().min(1),
  countryCode: z.string().min(1),
});

const partySchema: z.ZodType<Party> = z.object({
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  companyName: z.string().min(1).optional(),
  email: z.string().min(1),
  phone: z.string().min(1),
  address: addressSchema,
});

const parcelSchema: z.ZodType<Parcel> = z.object({
  dimensions: z.object({
    length: z.number().positive(),
    width: z.number().positive(),
    height: z.number().positive(),
    unit: z.literal("mm"),
  }),
  weight: z.object({
    amount: z.number().positive(),
    unit: z.literal("kg"),
  }),
  isNonStandard: z.boolean(),
});

const insuranceSchema: z.ZodType<Insurance> = z.object({
  amount: z.number().positive(),
  currency: z.string().min(1),
});

export const shipmentRequestSchema: z.ZodType<ShipmentRequest> = z.object({
  receiver: partySchema,
  sender: partySchema,
  parcels: z.array(parcelSchema).min(1),
  insurance: insuranceSchema.optional(),
  customAttributes: z.record(z.string()).optional(),
  service: z.string().min(1),
  reference: z.string().min(1),
  comments: z.string().optional(),
});

/** Validate a shipment request; throws ZodError with details on failure */
export function validateShipmentRequest(input: unknown): ShipmentRequest {
  return shipmentRequestSchema.parse(input);
}

/** Safe parse: returns { success: true, data } or { success: false, error } */
export function parseShipmentRequest(input: unknown): z.SafeParseReturnType<unknown, ShipmentRequest> {
  return shipmentRequestSchema.safeParse(input);
}

/** One line per issue, "path: message" */
export function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join("; ");
}
