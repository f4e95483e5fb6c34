import { randomUUID } from "crypto";
import { DocumentFields, DocumentStore, StoreStatus, StoredDocument } from "./documentStore";

/**
 * MemoryDocumentStore keeps documents in process memory.
 * Used by tests and by `STORE=memory`; nothing survives a restart.
 */
export class MemoryDocumentStore implements DocumentStore {
  private collections = new Map<string, Map<string, DocumentFields>>();

  async createDocument(collection: string, data: DocumentFields): Promise<string> {
    const id = randomUUID();
    this.collectionFor(collection).set(id, structuredClone(data));
    return id;
  }

  async getDocuments(collection: string): Promise<StoredDocument[]> {
    const docs = this.collections.get(collection);
    if (!docs) {
      return [];
    }
    return [...docs.entries()].map(([id, data]) => ({ ...structuredClone(data), id }));
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    const data = this.collections.get(collection)?.get(id);
    return data ? { ...structuredClone(data), id } : null;
  }

  async updateById(collection: string, id: string, fields: DocumentFields): Promise<boolean> {
    const docs = this.collections.get(collection);
    const existing = docs?.get(id);
    if (!docs || !existing) {
      return false;
    }
    docs.set(id, { ...existing, ...structuredClone(fields) });
    return true;
  }

  async status(): Promise<StoreStatus> {
    return { connected: true, collections: [...this.collections.keys()] };
  }

  private collectionFor(collection: string): Map<string, DocumentFields> {
    let docs = this.collections.get(collection);
    if (!docs) {
      docs = new Map();
      this.collections.set(collection, docs);
    }
    return docs;
  }
}
