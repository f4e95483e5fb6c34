import { loadConfig } from "../config";
import { DocumentStore } from "../stores/documentStore";
import { JsonFileDocumentStore } from "../stores/jsonFileDocumentStore";
import { MemoryDocumentStore } from "../stores/memoryDocumentStore";
import { MongoDocumentStore } from "../stores/mongoDocumentStore";
import { createApp } from "./app";

async function openStore(config: ReturnType<typeof loadConfig>): Promise<DocumentStore> {
  switch (config.store) {
    case "mongo":
      console.log(`Using MongoDB store${config.databaseName ? ` (${config.databaseName})` : ""}`);
      return MongoDocumentStore.connect(config.databaseUrl ?? "", config.databaseName);
    case "memory":
      console.log("Using in-memory store; data is lost on restart");
      return new MemoryDocumentStore();
    case "file":
      console.log(`Using JSON file store at ${config.dataDir}`);
      return new JsonFileDocumentStore(config.dataDir);
  }
}

async function main() {
  const config = loadConfig();
  const documents = await openStore(config);

  const app = createApp({
    documents,
    corsOrigins: config.corsOrigins,
    databaseUrl: config.databaseUrl,
    databaseName: config.databaseName,
  });

  app.listen(config.port, () => {
    console.log(`API server running on http://localhost:${config.port}`);
  });
}

main().catch((error) => {
  console.error("Failed to start API server:", error);
  process.exit(1);
});
