#!/usr/bin/env node
/**
 * CLI: create a ShipX shipment, wait for confirmation, save its label, order a courier
 * and save the dispatch printout.
 * Run: npm run demo [-- shipment.json]
 * Needs INPOST_API_TOKEN and INPOST_ORGANIZATION_ID (environment or .env).
 */

import dotenv from "dotenv";
import { parseConfig } from "../config.js";
import { ConsoleProgressReporter } from "../service/progress.js";
import { createShipmentOrchestrator } from "../service/shipment-orchestrator.js";
import { readShipmentFile } from "./shipment-file.js";

async function main(): Promise<number> {
  dotenv.config();

  const config = parseConfig(process.env);
  if (!config.ok) {
    console.error(`Initialization error: ${config.error.message}`);
    return 1;
  }

  const orchestrator = createShipmentOrchestrator(config.value, {
    progress: new ConsoleProgressReporter(),
  });
  if (!orchestrator.ok) {
    console.error(`Initialization error: ${orchestrator.error.message}`);
    return 1;
  }

  const shipment = await readShipmentFile(process.argv[2]);
  if (!shipment.ok) {
    console.error(`Error occurred: ${shipment.error.message}`);
    return 1;
  }
  const result = await orchestrator.value.processShipment(shipment.value);
  if (result.ok) {
    console.log(`Courier ordered for shipment ID: ${result.value.shipmentId}`);
    return 0;
  }
  console.error(`Error occurred: ${result.error.message}`);
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
