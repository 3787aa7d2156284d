/**
 * Shipment workflow: create → confirm → label → dispatch order → printout.
 * Strictly sequential; the first failed step ends the run and is logged once.
 * Nothing already created on the ShipX side is rolled back.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { CarrierResult, ShipmentApi } from "../carriers/types.js";
import { fail, ok } from "../carriers/types.js";
import type { Config } from "../config.js";
import {
  configurationError,
  malformedResponseError,
  storageError,
  unexpectedError,
  validationError,
} from "../domain/errors.js";
import type {
  DispatchOrderRequest,
  Party,
  Shipment,
  ShipmentRequest,
  ShipmentWorkflowReport,
  WorkflowStep,
} from "../domain/types.js";
import { formatIssues, parseShipmentRequest } from "../domain/validation.js";
import type { IHttpClient } from "../http/client.js";
import { FetchHttpClient } from "../http/client.js";
import { createInpostAdapter } from "../inpost/adapter.js";
import { createLogger, type Logger } from "../logging/logger.js";
import {
  FileDocumentStore,
  labelFileName,
  printoutFileName,
  type DocumentStore,
} from "../storage/document-store.js";
import { nextCollectionDate } from "../utils/dates.js";
import {
  DEFAULT_CONFIRMATION_POLICY,
  waitForConfirmation,
  type ConfirmationPolicy,
  type Sleep,
} from "./confirmation.js";
import { silentProgress, type ProgressReporter } from "./progress.js";

export interface ShipmentOrchestratorDeps {
  api: ShipmentApi;
  store: DocumentStore;
  logger: Logger;
  progress?: ProgressReporter;
  confirmation?: ConfirmationPolicy;
  sleep?: Sleep;
  /** Wall clock of the run; the collection date is derived from it */
  clock?: () => Date;
}

export class ShipmentOrchestrator {
  private readonly api: ShipmentApi;
  private readonly store: DocumentStore;
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;
  private readonly policy: ConfirmationPolicy;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;

  constructor(deps: ShipmentOrchestratorDeps) {
    this.api = deps.api;
    this.store = deps.store;
    this.logger = deps.logger;
    this.progress = deps.progress ?? silentProgress;
    this.policy = deps.confirmation ?? DEFAULT_CONFIRMATION_POLICY;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Run the whole workflow for one shipment. `ok` is the run's success flag;
   * which step failed is recorded in the log, not in the result.
   */
  async processShipment(input: unknown): Promise<CarrierResult<ShipmentWorkflowReport>> {
    try {
      return await this.run(input);
    } catch (err) {
      const error = unexpectedError(err);
      try {
        this.logger.error("workflow", "General error", { error });
      } catch (logErr) {
        console.error("General error could not be logged:", error.message, logErr);
      }
      return fail(error);
    }
  }

  private async run(input: unknown): Promise<CarrierResult<ShipmentWorkflowReport>> {
    const parsed = parseShipmentRequest(input);
    if (!parsed.success) {
      const error = validationError(formatIssues(parsed.error), parsed.error);
      this.logger.error("prepare", "Invalid shipment request", { error });
      return fail(error);
    }
    const request = parsed.data;
    this.logger.info("prepare", "Receiver address", request.receiver.address);

    const created = await this.api.createShipment(request);
    if (!created.ok) return created;
    const shipmentId = created.value.id;
    this.logger.info("create-shipment", "Shipment created", created.value.raw);

    const confirmed = await waitForConfirmation(shipmentId, {
      api: this.api,
      logger: this.logger,
      progress: this.progress,
      sleep: this.sleep,
      policy: this.policy,
    });
    if (!confirmed.ok) return confirmed;

    const dispatchPointId = created.value.dispatchPointId ?? confirmed.value.dispatchPointId;
    if (dispatchPointId === undefined) {
      const error = malformedResponseError(`Shipment ${shipmentId} has no sender id to use as dispatch point`);
      this.logger.error("create-dispatch-order", "Dispatch point missing", { shipmentId, error });
      return fail(error);
    }

    const label = await this.api.getLabel(shipmentId);
    if (!label.ok) return label;
    const labelPath = await this.saveDocument("generate-label", labelFileName(shipmentId), label.value);
    if (!labelPath.ok) return labelPath;
    this.progress.notice(`Label generated: ${labelFileName(shipmentId)}`);
    this.logger.info("generate-label", "Label generated", labelPath.value);

    const order = this.buildDispatchOrder(request, confirmed.value, dispatchPointId);
    const dispatch = await this.api.createDispatchOrder(order);
    if (!dispatch.ok) return dispatch;
    this.logger.info("create-dispatch-order", "Courier ordered", dispatch.value.raw);

    const printout = await this.api.getDispatchPrintout(dispatch.value.id);
    if (!printout.ok) return printout;
    const printoutPath = await this.saveDocument(
      "generate-printout",
      printoutFileName(shipmentId),
      printout.value
    );
    if (!printoutPath.ok) return printoutPath;
    this.progress.notice(`Printout generated: ${printoutFileName(shipmentId)}`);
    this.logger.info("generate-printout", "Printout generated", printoutPath.value);

    return ok({
      shipmentId,
      dispatchPointId,
      status: confirmed.value.status,
      dispatchOrderId: dispatch.value.id,
      collectionDate: order.collectionDate,
      labelPath: labelPath.value,
      printoutPath: printoutPath.value,
    });
  }

  /** Pickup from the receiver's address, with the sender as the courier's contact */
  private buildDispatchOrder(
    request: ShipmentRequest,
    shipment: Shipment,
    dispatchPointId: string
  ): DispatchOrderRequest {
    return {
      shipmentId: shipment.id,
      shipmentStatus: shipment.status,
      dispatchPointId,
      address: request.receiver.address,
      contact: pickupContact(request.sender),
      collectionDate: nextCollectionDate(this.clock()),
    };
  }

  private async saveDocument(
    step: WorkflowStep,
    fileName: string,
    content: Uint8Array
  ): Promise<CarrierResult<string>> {
    try {
      return ok(await this.store.save(fileName, content));
    } catch (err) {
      const error = storageError(
        `Could not save ${fileName}: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
      this.logger.error(step, "Document could not be saved", { fileName, error });
      return fail(error);
    }
  }
}

function pickupContact(sender: Party): DispatchOrderRequest["contact"] {
  return {
    name: `${sender.firstName} ${sender.lastName}`,
    phone: sender.phone,
    email: sender.email,
  };
}

export interface OrchestratorRuntime {
  http?: IHttpClient;
  progress?: ProgressReporter;
  sleep?: Sleep;
  clock?: () => Date;
}

/**
 * Wire the production orchestrator from configuration: ShipX client over fetch,
 * winston file log, label directory store and the configured confirmation policy.
 */
export function createShipmentOrchestrator(
  config: Config,
  runtime: OrchestratorRuntime = {}
): CarrierResult<ShipmentOrchestrator> {
  let logger: Logger;
  try {
    logger = createLogger({ filename: config.LOG_FILE, level: config.DEBUG ? "debug" : "info" });
  } catch (err) {
    return fail(
      configurationError(
        `Log file ${config.LOG_FILE} cannot be opened: ${err instanceof Error ? err.message : String(err)}`,
        err
      )
    );
  }
  const adapter = createInpostAdapter(
    {
      baseUrl: config.INPOST_BASE_URL,
      apiToken: config.INPOST_API_TOKEN,
      organizationId: config.INPOST_ORGANIZATION_ID,
      timeoutMs: config.HTTP_TIMEOUT_MS,
      labelType: config.LABEL_TYPE,
    },
    runtime.http ?? new FetchHttpClient(),
    logger
  );
  if (!adapter.ok) return adapter;

  return ok(
    new ShipmentOrchestrator({
      api: adapter.value,
      store: new FileDocumentStore(config.LABEL_DIR),
      logger,
      progress: runtime.progress,
      sleep: runtime.sleep,
      clock: runtime.clock,
      confirmation: {
        intervalMs: config.CONFIRMATION_POLL_INTERVAL_MS,
        maxAttempts: config.CONFIRMATION_MAX_ATTEMPTS,
        failureStatuses: config.CONFIRMATION_FAILURE_STATUSES,
      },
    })
  );
}
