/**
 * Integration tests: ShipX client over a stubbed transport.
 * Verifies URLs, headers, status mapping and failure logging.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ShipxClient } from "./shipx-client.js";
import { createInpostAdapter } from "./adapter.js";
import { StubHttpClient, jsonResponse, pdfResponse } from "../http/stub-client.js";
import { HttpRequestError } from "../http/client.js";
import { MemoryLogger } from "../logging/logger.js";
import { sampleShipment } from "../demo/sample-shipment.js";

const baseUrl = "https://shipx.test/v1/";
const config = { baseUrl, apiToken: "test-token", organizationId: "org-1" };
const shipmentsUrl = "https://shipx.test/v1/organizations/org-1/shipments";

describe("ShipxClient", () => {
  let http: StubHttpClient;
  let log: MemoryLogger;
  let client: ShipxClient;

  beforeEach(() => {
    http = new StubHttpClient();
    log = new MemoryLogger();
    client = new ShipxClient(config, http, log);
  });

  it("creates a shipment with bearer auth and JSON headers", async () => {
    http.setResponse(jsonResponse(201, { id: 1001, status: "created", sender: { id: 555 } }));
    const result = await client.createShipment(sampleShipment);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.id).toBe("1001");
      expect(result.value.dispatchPointId).toBe("555");
    }
    const [req] = http.getRecordedRequests();
    expect(req.method).toBe("POST");
    expect(req.url).toBe(shipmentsUrl);
    expect(req.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
      Accept: "application/json",
    });
    const body = JSON.parse(req.body ?? "{}");
    expect(body.receiver.last_name).toBe("Kowalski");
    expect(body.service).toBe("inpost_courier_standard");
  });

  it("fetches a shipment by id", async () => {
    http.setResponse(jsonResponse(200, { id: 1001, status: "confirmed" }));
    const result = await client.getShipment("1001");
    expect(result.ok && result.value.status).toBe("confirmed");
    const [req] = http.getRecordedRequests();
    expect(req.method).toBe("GET");
    expect(req.url).toBe("https://shipx.test/v1/shipments/1001");
    expect(req.body).toBeUndefined();
    expect(req.headers?.Authorization).toBe("Bearer test-token");
  });

  it("downloads the label as PDF bytes", async () => {
    http.setResponse(pdfResponse("%PDF-label"));
    const result = await client.getLabel("1001");
    expect(result.ok).toBe(true);
    if (result.ok) expect(new TextDecoder().decode(result.value)).toBe("%PDF-label");
    expect(http.getRecordedRequests()[0].url).toBe(
      "https://shipx.test/v1/shipments/1001/label?format=Pdf&type=A6"
    );
  });

  it("uses the configured label type", async () => {
    client = new ShipxClient({ ...config, labelType: "normal" }, http, log);
    http.setResponse(pdfResponse("%PDF-label"));
    await client.getLabel("1001");
    expect(http.getRecordedRequests()[0].url).toBe(
      "https://shipx.test/v1/shipments/1001/label?format=Pdf&type=normal"
    );
  });

  it("creates a dispatch order under the organization", async () => {
    http.setResponse(jsonResponse(201, { id: 77, status: "new" }));
    const result = await client.createDispatchOrder({
      shipmentId: "1001",
      shipmentStatus: "confirmed",
      dispatchPointId: "555",
      address: sampleShipment.receiver.address,
      contact: { name: "Anna Nowak", phone: "987654321", email: "anna.nowak@example.com" },
      collectionDate: "2026-10-19",
    });
    expect(result.ok && result.value.id).toBe("77");
    const [req] = http.getRecordedRequests();
    expect(req.url).toBe("https://shipx.test/v1/organizations/org-1/dispatch_orders");
    expect(JSON.parse(req.body ?? "{}").shipments).toEqual(["1001"]);
  });

  it("downloads the dispatch printout", async () => {
    http.setResponse(pdfResponse("%PDF-printout"));
    const result = await client.getDispatchPrintout("77");
    expect(result.ok).toBe(true);
    expect(http.getRecordedRequests()[0].url).toBe(
      "https://shipx.test/v1/dispatch_orders/77/printout?format=Pdf"
    );
  });

  it("logs one error entry with endpoint, payload and provider body on rejection", async () => {
    const providerBody = {
      status: 400,
      error: "validation_failed",
      message: "There are some validation errors.",
      details: { receiver: [{ phone: ["invalid"] }] },
    };
    http.setResponse(jsonResponse(400, providerBody));
    const result = await client.createShipment(sampleShipment);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_REQUEST");
      expect(result.error.details.endpoint).toBe(shipmentsUrl);
    }
    const errors = log.ofLevel("error");
    expect(errors).toHaveLength(1);
    expect(errors[0].step).toBe("create-shipment");
    expect(errors[0].message).toBe("Shipment creation failed");
    expect(errors[0].data).toMatchObject({
      endpoint: shipmentsUrl,
      data: { reference: "ORDER_12345", service: "inpost_courier_standard" },
      error: {
        code: "INVALID_REQUEST",
        httpStatus: 400,
        endpoint: shipmentsUrl,
        carrierCode: "validation_failed",
        responseBody: providerBody,
      },
    });
  });

  it("logs the provider body of a rate-limited request", async () => {
    const providerBody = { error: "too_many_requests", message: "Slow down" };
    http.setResponse(jsonResponse(429, providerBody));
    const result = await client.getShipment("1001");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("RATE_LIMITED");
    const errors = log.ofLevel("error");
    expect(errors).toHaveLength(1);
    expect(errors[0].data).toMatchObject({
      endpoint: "https://shipx.test/v1/shipments/1001",
      error: {
        code: "RATE_LIMITED",
        httpStatus: 429,
        carrierCode: "too_many_requests",
        carrierMessage: "Slow down",
        responseBody: providerBody,
      },
    });
  });

  it("maps connection failures to NETWORK_ERROR", async () => {
    http.setResponse(async (request) => {
      throw new HttpRequestError("fetch failed: refused", request, "ECONNREFUSED");
    });
    const result = await client.getShipment("1001");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("NETWORK_ERROR");
      expect(result.error.message).toBe("fetch failed: refused");
    }
    expect(log.ofLevel("error")).toHaveLength(1);
    expect(log.ofLevel("error")[0].data).toMatchObject({
      endpoint: "https://shipx.test/v1/shipments/1001",
      error: { code: "NETWORK_ERROR", message: "fetch failed: refused" },
    });
  });

  it("maps timeouts to TIMEOUT", async () => {
    http.setResponse(async (request) => {
      throw new HttpRequestError("Request timed out", request, "ETIMEDOUT");
    });
    const result = await client.getDispatchPrintout("77");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("TIMEOUT");
      expect(result.error.message).toBe(
        "Request timed out: https://shipx.test/v1/dispatch_orders/77/printout?format=Pdf"
      );
    }
  });

  it("rejects an empty label document", async () => {
    http.setResponse({ status: 200, headers: {}, body: "" });
    const result = await client.getLabel("1001");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("MALFORMED_RESPONSE");
      expect(result.error.message).toBe("ShipX returned an empty label document");
    }
  });

  it("logs requests at debug level only when enabled", async () => {
    http.setResponses([
      jsonResponse(200, { id: 1001, status: "created" }),
      jsonResponse(200, { id: 1001, status: "created" }),
    ]);
    await client.getShipment("1001");
    expect(log.ofLevel("debug")).toHaveLength(0);

    const debugLog = new MemoryLogger("debug");
    const verbose = new ShipxClient(config, http, debugLog);
    await verbose.getShipment("1001");
    expect(debugLog.ofLevel("debug")).toHaveLength(1);
    expect(debugLog.entries[0]).toMatchObject({
      step: "confirm-shipment",
      message: "GET https://shipx.test/v1/shipments/1001",
      data: { endpoint: "https://shipx.test/v1/shipments/1001" },
    });
  });
});

describe("createInpostAdapter", () => {
  it("refuses empty credentials without sending anything", async () => {
    const http = new StubHttpClient();
    const logger = new MemoryLogger();

    const noToken = createInpostAdapter({ ...config, apiToken: "" }, http, logger);
    expect(noToken.ok).toBe(false);
    if (!noToken.ok) {
      expect(noToken.error.code).toBe("CONFIGURATION_ERROR");
      expect(noToken.error.message).toBe("API token not found");
    }

    const neither = createInpostAdapter({ ...config, apiToken: " ", organizationId: "" }, http, logger);
    expect(neither.ok).toBe(false);
    if (!neither.ok) expect(neither.error.message).toBe("API token and organization ID not found");

    expect(http.getRecordedRequests()).toHaveLength(0);
  });

  it("returns a client for complete credentials", () => {
    const result = createInpostAdapter(config, new StubHttpClient(), new MemoryLogger());
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBeInstanceOf(ShipxClient);
  });
});
