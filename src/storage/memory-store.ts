/**
 * In-memory document store for tests: keeps saved files in a map.
 */

import type { DocumentStore } from "./document-store.js";

export class MemoryDocumentStore implements DocumentStore {
  readonly files = new Map<string, Uint8Array>();

  async save(fileName: string, content: Uint8Array): Promise<string> {
    this.files.set(fileName, content);
    return `memory://${fileName}`;
  }

  /** Saved content decoded as UTF-8, or undefined */
  text(fileName: string): string | undefined {
    const content = this.files.get(fileName);
    return content === undefined ? undefined : new TextDecoder().decode(content);
  }
}
