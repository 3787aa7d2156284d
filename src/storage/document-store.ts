/**
 * Persistence of the PDFs a run downloads (shipment label, dispatch printout).
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface DocumentStore {
  /** Save content under fileName; resolves to the path (or key) it was stored at */
  save(fileName: string, content: Uint8Array): Promise<string>;
}

export function labelFileName(shipmentId: string): string {
  return `${shipmentId}_label.pdf`;
}

/** Printouts are keyed by the shipment they were ordered for, like labels */
export function printoutFileName(shipmentId: string): string {
  return `${shipmentId}_printout.pdf`;
}

/**
 * Writes documents into one directory, created (with parents) on first save.
 */
export class FileDocumentStore implements DocumentStore {
  constructor(readonly directory: string) {}

  async save(fileName: string, content: Uint8Array): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, fileName);
    await writeFile(path, content);
    return path;
  }
}
