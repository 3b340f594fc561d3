import express from "express";
import http from "http";
import bodyParser from "body-parser";
import type { IAppendOnlyStore } from "@speedlog/lib";
import { IngestHandler } from "./handler";

export {
  IngestHandler,
  parsePayload,
  formatConfirmation,
  SUCCESS_TOKEN,
  INVALID_LEGACY_DATA,
} from "./handler";
export type { IngestResponse, ParsedPayload } from "./handler";

export class SpeedlogIngestServer {
  private app: express.Express;
  private readonly handler: IngestHandler;

  constructor(
    public readonly store: IAppendOnlyStore,
    public readonly serverOptions: {
      port: number;
      path?: string;
    }
  ) {
    this.handler = new IngestHandler(store);
    this.app = express();
    // Read every body as text so the handler sees JSON syntax errors itself.
    this.app.use(bodyParser.text({ type: () => true, limit: "16kb" }));
    this.app.post(serverOptions.path ?? "/", async (req, res) => {
      const payload = typeof req.body === "string" ? req.body : "";
      try {
        const response = await this.handler.handle(payload);
        res.status(response.status).type("text/plain").send(response.body);
      } catch (err) {
        console.error(`POST ${req.path}: 500`, err);
        res.status(500).type("text/plain").send("Failed to store entry.\n");
      }
    });
    this.app.use(
      (
        err: unknown,
        req: express.Request,
        res: express.Response,
        _next: express.NextFunction
      ) => {
        const status =
          err instanceof Error && "status" in err && typeof err.status === "number"
            ? err.status
            : 500;
        console.error(`${req.method} ${req.path}: ${status}`, err);
        res
          .status(status)
          .type("text/plain")
          .send(`${err instanceof Error ? err.message : "Request failed"}.\n`);
      }
    );
  }

  start(): Promise<http.Server> {
    const httpServer = http.createServer(this.app);
    return new Promise((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(this.serverOptions.port, () => {
        const address = httpServer.address();
        const port =
          typeof address === "object" && address !== null
            ? address.port
            : this.serverOptions.port;
        console.log(`speedlog ingest listening on port ${port}`);
        resolve(httpServer);
      });
    });
  }
}
