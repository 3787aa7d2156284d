import { readFile } from "node:fs/promises";
import type { CarrierResult } from "../carriers/types.js";
import { fail, ok } from "../carriers/types.js";
import { validationError } from "../domain/errors.js";
import { sampleShipment } from "./sample-shipment.js";

/** Shipment JSON from `path`, or the sample shipment when no path is given */
export async function readShipmentFile(path: string | undefined): Promise<CarrierResult<unknown>> {
  if (path === undefined) return ok(sampleShipment);
  try {
    return ok(JSON.parse(await readFile(path, "utf-8")));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(validationError(`Cannot read shipment file ${path}: ${reason}`, err));
  }
}
