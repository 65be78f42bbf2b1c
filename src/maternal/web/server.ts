import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { URL } from "node:url";
import { loadConfig } from "../config";
import { createLogger } from "../logger";
import { MaternalService } from "../service";
import { routeRequest, toJson } from "./router";

function main() {
  const config = loadConfig();
  const logger = createLogger({ name: "maternal-web", level: config.LOG_LEVEL });
  const service = MaternalService.open({
    dbPath: config.MATERNAL_DB_PATH,
    rulesPath: config.MATERNAL_RULES_PATH,
    logger,
  });

  const server = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
      const body = req.method === "POST" ? await readBody(req) : "";
      const response = routeRequest(service, {
        method: req.method ?? "GET",
        pathname: url.pathname,
        body,
      });
      return json(res, response.status, response.payload);
    } catch (error) {
      logger.error({ err: error }, "request failed");
      return json(res, 500, { error: "Internal server error" });
    }
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    server.close(() => {
      service.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  server.listen(config.PORT, config.HOST, () => {
    logger.info(
      { host: config.HOST, port: config.PORT, db: config.MATERNAL_DB_PATH },
      "maternal records RPC listening"
    );
  });
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function json(res: ServerResponse, status: number, payload: unknown) {
  const body = toJson(payload);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

main();
