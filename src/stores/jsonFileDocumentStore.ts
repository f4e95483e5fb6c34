import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { DocumentFields, DocumentStore, StoreStatus, StoredDocument } from "./documentStore";

const ID_PATTERN = /^[A-Za-z0-9-]+$/;

function isDocumentFields(value: unknown): value is DocumentFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JsonFileDocumentStore saves each document as a JSON file:
 * {dataDir}/{collection}/{id}.json
 *
 * File-based storage keeps local development free of a database server.
 */
export class JsonFileDocumentStore implements DocumentStore {
  constructor(private readonly dataDir: string) {
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  async createDocument(collection: string, data: DocumentFields): Promise<string> {
    const dir = this.ensureCollectionDir(collection);
    const id = randomUUID();
    fs.writeFileSync(path.join(dir, `${id}.json`), JSON.stringify(data, null, 2));
    return id;
  }

  async getDocuments(collection: string): Promise<StoredDocument[]> {
    const dir = path.join(this.dataDir, collection);
    if (!fs.existsSync(dir)) {
      return [];
    }

    const docs: StoredDocument[] = [];
    for (const file of fs.readdirSync(dir).filter((f) => f.endsWith(".json"))) {
      const id = path.basename(file, ".json");
      const data = this.readDocument(path.join(dir, file));
      if (data) {
        docs.push({ ...data, id });
      }
    }
    return docs;
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    const filePath = this.documentPath(collection, id);
    if (!filePath || !fs.existsSync(filePath)) {
      return null;
    }
    const data = this.readDocument(filePath);
    return data ? { ...data, id } : null;
  }

  async updateById(collection: string, id: string, fields: DocumentFields): Promise<boolean> {
    const filePath = this.documentPath(collection, id);
    if (!filePath || !fs.existsSync(filePath)) {
      return false;
    }
    const existing = this.readDocument(filePath);
    if (!existing) {
      return false;
    }
    fs.writeFileSync(filePath, JSON.stringify({ ...existing, ...fields }, null, 2));
    return true;
  }

  async status(): Promise<StoreStatus> {
    const collections = fs
      .readdirSync(this.dataDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);
    return { connected: true, collections };
  }

  private ensureCollectionDir(collection: string): string {
    const dir = path.join(this.dataDir, collection);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    return dir;
  }

  // Ids come from request paths; anything that is not a plain token cannot name a file we wrote
  private documentPath(collection: string, id: string): string | null {
    if (!ID_PATTERN.test(id)) {
      return null;
    }
    return path.join(this.dataDir, collection, `${id}.json`);
  }

  private readDocument(filePath: string): DocumentFields | null {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
      return isDocumentFields(parsed) ? parsed : null;
    } catch (error) {
      console.error(`Skipping unreadable document ${filePath}:`, error);
      return null;
    }
  }
}
