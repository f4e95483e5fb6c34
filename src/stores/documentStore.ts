export type DocumentFields = Record<string, unknown>;

/** A document as read back from a store, with its identifier exposed as `id`. */
export type StoredDocument = DocumentFields & { id: string };

export interface StoreStatus {
  connected: boolean;
  collections: string[];
}

/**
 * DocumentStore is the persistence seam for the service.
 * Implementations exist for JSON files, memory and MongoDB.
 *
 * Ids are opaque strings chosen by the store. Lookups with an id the store
 * could never have issued return null rather than throwing.
 */
export interface DocumentStore {
  createDocument(collection: string, data: DocumentFields): Promise<string>;
  getDocuments(collection: string): Promise<StoredDocument[]>;
  findById(collection: string, id: string): Promise<StoredDocument | null>;
  /** Shallow-merge fields into an existing document. Returns false if it does not exist. */
  updateById(collection: string, id: string, fields: DocumentFields): Promise<boolean>;
  status(): Promise<StoreStatus>;
}
