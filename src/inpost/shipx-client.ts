/**
 * ShipX REST client: the five calls of the dispatch workflow with auth, error mapping and failure logging.
 */

import type { CarrierResult, ShipmentApi } from "../carriers/types.js";
import { fail, ok } from "../carriers/types.js";
import {
  CarrierIntegrationError,
  malformedResponseError,
  networkError,
  timeoutError,
} from "../domain/errors.js";
import type {
  DispatchOrder,
  DispatchOrderRequest,
  Shipment,
  ShipmentRequest,
  WorkflowStep,
} from "../domain/types.js";
import { HttpRequestError, responseBytes } from "../http/client.js";
import type { HttpRequest, HttpResponse, IHttpClient } from "../http/client.js";
import type { Logger } from "../logging/logger.js";
import {
  buildShipxDispatchOrder,
  buildShipxShipment,
  parseShipxDispatchOrder,
  parseShipxErrorResponse,
  parseShipxShipment,
} from "./shipx-mapper.js";
import type { ShipxLabelType } from "./shipx-types.js";

export const SHIPX_SANDBOX_URL = "https://sandbox-api-shipx-pl.easypack24.net/v1";

export interface ShipxClientConfig {
  baseUrl: string;
  apiToken: string;
  organizationId: string;
  timeoutMs?: number;
  labelType?: ShipxLabelType;
}

interface ShipxCall<T> {
  step: WorkflowStep;
  /** Log message when the call fails */
  failure: string;
  method: HttpRequest["method"];
  url: string;
  payload?: unknown;
  decode: (res: HttpResponse) => T;
}

export class ShipxClient implements ShipmentApi {
  constructor(
    private readonly config: ShipxClientConfig,
    private readonly http: IHttpClient,
    private readonly logger: Logger
  ) {}

  async createShipment(request: ShipmentRequest): Promise<CarrierResult<Shipment>> {
    return this.call({
      step: "create-shipment",
      failure: "Shipment creation failed",
      method: "POST",
      url: this.url(`/organizations/${this.organizationPath}/shipments`),
      payload: buildShipxShipment(request),
      decode: (res) => parseShipxShipment(res.body),
    });
  }

  async getShipment(shipmentId: string): Promise<CarrierResult<Shipment>> {
    return this.call({
      step: "confirm-shipment",
      failure: "Shipment status check failed",
      method: "GET",
      url: this.url(`/shipments/${encodeURIComponent(shipmentId)}`),
      decode: (res) => parseShipxShipment(res.body),
    });
  }

  async getLabel(shipmentId: string): Promise<CarrierResult<Uint8Array>> {
    const query = new URLSearchParams({ format: "Pdf", type: this.config.labelType ?? "A6" });
    return this.call({
      step: "generate-label",
      failure: "Label generation failed",
      method: "GET",
      url: this.url(`/shipments/${encodeURIComponent(shipmentId)}/label?${query.toString()}`),
      decode: (res) => documentBytes(res, "label"),
    });
  }

  async createDispatchOrder(order: DispatchOrderRequest): Promise<CarrierResult<DispatchOrder>> {
    return this.call({
      step: "create-dispatch-order",
      failure: "Dispatch order creation failed",
      method: "POST",
      url: this.url(`/organizations/${this.organizationPath}/dispatch_orders`),
      payload: buildShipxDispatchOrder(order),
      decode: (res) => parseShipxDispatchOrder(res.body),
    });
  }

  async getDispatchPrintout(dispatchOrderId: string): Promise<CarrierResult<Uint8Array>> {
    const query = new URLSearchParams({ format: "Pdf" });
    return this.call({
      step: "generate-printout",
      failure: "Dispatch printout generation failed",
      method: "GET",
      url: this.url(`/dispatch_orders/${encodeURIComponent(dispatchOrderId)}/printout?${query.toString()}`),
      decode: (res) => documentBytes(res, "printout"),
    });
  }

  private get organizationPath(): string {
    return encodeURIComponent(this.config.organizationId);
  }

  private url(path: string): string {
    return `${this.config.baseUrl.replace(/\/$/, "")}${path}`;
  }

  private async call<T>(call: ShipxCall<T>): Promise<CarrierResult<T>> {
    this.logger.debug(call.step, `${call.method} ${call.url}`, {
      endpoint: call.url,
      data: call.payload,
    });

    let result: CarrierResult<T>;
    try {
      const res = await this.http.send({
        method: call.method,
        url: call.url,
        headers: {
          Authorization: `Bearer ${this.config.apiToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: call.payload === undefined ? undefined : JSON.stringify(call.payload),
        timeoutMs: this.config.timeoutMs ?? 30_000,
      });
      result =
        res.status >= 400
          ? fail<T>(parseShipxErrorResponse(res.status, res.body, res.headers))
          : ok(call.decode(res));
    } catch (err) {
      result = fail<T>(toCarrierError(err, call.url));
    }

    if (!result.ok) {
      const error = result.error.withEndpoint(call.url);
      this.logger.error(call.step, call.failure, {
        endpoint: call.url,
        ...(call.payload === undefined ? {} : { data: call.payload }),
        error,
      });
      return fail(error);
    }
    return result;
  }
}

function documentBytes(res: HttpResponse, what: string): Uint8Array {
  const bytes = responseBytes(res);
  if (bytes.byteLength === 0) {
    throw malformedResponseError(`ShipX returned an empty ${what} document`);
  }
  return bytes;
}

function toCarrierError(err: unknown, url: string): CarrierIntegrationError {
  if (err instanceof CarrierIntegrationError) return err;
  if (err instanceof HttpRequestError) {
    return err.code === "ETIMEDOUT" ? timeoutError(url) : networkError(err.message, err);
  }
  return malformedResponseError(
    err instanceof Error ? err.message : "Unknown error during ShipX request",
    err
  );
}
