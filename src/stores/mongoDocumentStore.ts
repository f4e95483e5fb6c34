import mongoose, { Connection, Types } from "mongoose";
import { DocumentFields, DocumentStore, StoreStatus, StoredDocument } from "./documentStore";

function serializeValue(value: unknown): unknown {
  if (value instanceof Types.ObjectId) {
    return value.toHexString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => (item instanceof Types.ObjectId ? item.toHexString() : item));
  }
  return value;
}

/**
 * Render a raw MongoDB document with `_id` exposed as a string `id`.
 * ObjectIds at the top level or directly inside arrays become hex strings.
 */
export function serializeDocument(doc: DocumentFields): StoredDocument {
  const { _id, ...rest } = doc;
  const fields: DocumentFields = {};
  for (const [key, value] of Object.entries(rest)) {
    fields[key] = serializeValue(value);
  }
  return { ...fields, id: String(serializeValue(_id)) };
}

/**
 * MongoDocumentStore persists documents through a mongoose connection,
 * using the native collections rather than schema models.
 */
export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly connection: Connection) {}

  static async connect(uri: string, dbName?: string): Promise<MongoDocumentStore> {
    const connection = await mongoose.createConnection(uri, { dbName }).asPromise();
    return new MongoDocumentStore(connection);
  }

  async createDocument(collection: string, data: DocumentFields): Promise<string> {
    const result = await this.connection.collection(collection).insertOne({ ...data });
    return String(result.insertedId);
  }

  async getDocuments(collection: string): Promise<StoredDocument[]> {
    const docs = await this.connection.collection(collection).find({}).toArray();
    return docs.map((doc) => serializeDocument(doc));
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    if (!Types.ObjectId.isValid(id)) {
      return null;
    }
    const doc = await this.connection
      .collection(collection)
      .findOne({ _id: new Types.ObjectId(id) });
    return doc ? serializeDocument(doc) : null;
  }

  async updateById(collection: string, id: string, fields: DocumentFields): Promise<boolean> {
    if (!Types.ObjectId.isValid(id)) {
      return false;
    }
    const result = await this.connection
      .collection(collection)
      .updateOne({ _id: new Types.ObjectId(id) }, { $set: fields });
    return result.matchedCount > 0;
  }

  async status(): Promise<StoreStatus> {
    const db = this.connection.db;
    if (!db) {
      return { connected: false, collections: [] };
    }
    const collections = await db.listCollections({}, { nameOnly: true }).toArray();
    return { connected: true, collections: collections.map((c) => c.name) };
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
