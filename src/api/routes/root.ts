import { Router } from "express";
import { DocumentStore } from "../../stores/documentStore";

export interface RootRouterOptions {
  documents: DocumentStore;
  databaseUrl?: string;
  databaseName?: string;
}

interface StoreDiagnostic {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
}

export function createRootRouter({ documents, databaseUrl, databaseName }: RootRouterOptions): Router {
  const router = Router();

  // GET / - Liveness
  router.get("/", (req, res) => {
    res.json({ message: "Assessment API running" });
  });

  // GET /test - Store connectivity diagnostic
  router.get("/test", async (req, res) => {
    const info: StoreDiagnostic = {
      backend: "✅ Running",
      database: "❌ Not Available",
      database_url: databaseUrl ? "✅ Set" : "❌ Not Set",
      database_name: databaseName ? "✅ Set" : "❌ Not Set",
      connection_status: "Not Connected",
      collections: [],
    };

    try {
      const status = await documents.status();
      if (status.connected) {
        info.database = "✅ Connected & Working";
        info.connection_status = "Connected";
        info.collections = status.collections;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Store diagnostic failed:", error);
      info.database = `⚠️ Connected but error: ${message.slice(0, 60)}`;
    }

    res.json(info);
  });

  return router;
}
