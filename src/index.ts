/**
 * InPost dispatch workflow
 *
 * Public API: domain types, the ShipX client, the orchestrator and its wiring.
 */

export * from "./domain/index.js";
export * from "./carriers/types.js";
export { ShipmentOrchestrator, createShipmentOrchestrator } from "./service/shipment-orchestrator.js";
export type { ShipmentOrchestratorDeps, OrchestratorRuntime } from "./service/shipment-orchestrator.js";
export { waitForConfirmation, DEFAULT_CONFIRMATION_POLICY, CONFIRMED_STATUS } from "./service/confirmation.js";
export type { ConfirmationPolicy, Sleep } from "./service/confirmation.js";
export { ConsoleProgressReporter, silentProgress } from "./service/progress.js";
export type { ProgressReporter } from "./service/progress.js";
export { createInpostAdapter } from "./inpost/adapter.js";
export type { InpostAdapterConfig } from "./inpost/adapter.js";
export { ShipxClient, SHIPX_SANDBOX_URL } from "./inpost/shipx-client.js";
export { FetchHttpClient, HttpRequestError } from "./http/client.js";
export type { IHttpClient, HttpRequest, HttpResponse } from "./http/client.js";
export { createLogger, MemoryLogger } from "./logging/logger.js";
export type { Logger, LogEntry, LogLevel, FileLoggerOptions } from "./logging/logger.js";
export { FileDocumentStore, labelFileName, printoutFileName } from "./storage/document-store.js";
export type { DocumentStore } from "./storage/document-store.js";
export { loadConfig, parseConfig } from "./config.js";
export type { Config } from "./config.js";
