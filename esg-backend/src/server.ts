import dotenv from "dotenv";
dotenv.config();

import { createApp, createServices } from "./app";
import { loadConfig } from "./config";
import { createDailySweep } from "./services/alertBatchJob";
import { logger, setLogLevel } from "./utils/logger";

const config = loadConfig();
setLogLevel(config.logLevel);

const services = createServices(config);
const app = createApp(config, services);

const server = app.listen(config.port, () => {
  console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   ESG Backend started                                     ║
║                                                           ║
║   Port: ${String(config.port).padEnd(48)}║
║   Environment: ${config.nodeEnv.padEnd(41)}║
║   CORS Origins: ${String(config.allowedOrigins.length).padEnd(2)} configured${" ".repeat(27)}║
║   Catalog: ${services.catalog.version.padEnd(45)}║
║                                                           ║
║   Endpoints:                                              ║
║   • GET  /health                                          ║
║   • GET  /api/esg/questions                               ║
║   • POST /api/esg/score                                   ║
║   • GET  /api/esg/history/:userId                         ║
║   • POST /api/esg/benchmark                               ║
║   • POST /api/esg/suggestions                             ║
║   • POST /api/alerts/generate                             ║
║   • GET  /api/alerts/active/:userId                       ║
║   • POST /api/alerts/:alertId/resolve                     ║
║   • GET  /api/alerts/readiness/:userId                    ║
║   • GET  /api/alerts/recommendations/:userId              ║
║   • GET  /api/alerts/penalty-warnings/:userId             ║
║   • GET  /api/alerts/roi/:userId                          ║
║   • GET  /api/alerts/dashboard/:userId                    ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
  runDailySweep();
});

// daily alert sweep; one job id per UTC day so a restart resumes it
const SWEEP_INTERVAL_MS = 24 * 60 * 60 * 1000;
const sweepController = new AbortController();
const sweep = createDailySweep(
  { repository: services.repository, alerts: services.alerts },
  sweepController.signal
);

function runDailySweep(): void {
  sweep.run().catch((err: unknown) => logger.error("[BATCH] Alert sweep aborted", err));
}

const sweepTimer = setInterval(runDailySweep, SWEEP_INTERVAL_MS);

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down`);
  sweepController.abort();
  clearInterval(sweepTimer);
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
