// src/server.ts
// Purpose: HTTP bootstrap + graceful shutdown (server first, then the database).

import http from "http";
import app from "./app";
import { config } from "./config/env";
import { database } from "./lib/db";
import { log } from "./lib/observability/logger";

const server = http.createServer(app);

server.listen(config.port, () => {
  log("INFO", "SERVER_STARTED", {
    url: `http://localhost:${config.port}`,
    mode: config.nodeEnv,
    database: config.databasePath,
  });
});

////////////////////////////////////////////////////////////////
// GRACEFUL SHUTDOWN
////////////////////////////////////////////////////////////////

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;

  log("INFO", "SERVER_SHUTDOWN", { signal });

  server.close((err) => {
    if (err) {
      log("ERROR", "SERVER_CLOSE_FAILED", { message: err.message });
    }

    database.sqlite.close();
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

export default server;
