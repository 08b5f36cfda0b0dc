import { createServer, type Server, type ServerResponse } from "node:http";

import type { RunState } from "etl-core";

import { handleMonitorRequest } from "./routes";

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.setHeader("Cache-Control", "no-store");
  response.end(JSON.stringify(payload));
}

export function createMonitorServer(state: RunState): Server {
  return createServer((request, response) => {
    if (!request.url) {
      writeJson(response, 400, { error: "Missing URL" });
      return;
    }

    const url = new URL(request.url, "http://localhost");
    const result = handleMonitorRequest(state, request.method ?? "GET", url);
    writeJson(response, result.statusCode, result.payload);
  });
}

export function startMonitorServer(
  state: RunState,
  port: number,
  host = "0.0.0.0"
): Promise<Server> {
  const server = createMonitorServer(state);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}

export function closeMonitorServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
