import "dotenv/config";
import { createServer } from "http";
import net from "net";
import { mkdir } from "fs/promises";
import path from "path";
import { PHOTOS_SUBDIR } from "@shared/const";
import { connectDatabase } from "../db";
import { resolveStorageMode } from "../storage-active";
import { createApp } from "./app";
import { loadConfig, validateConfig } from "./env";
import { errorMeta, logger } from "./logger";
import { createServices } from "./services";

function isPortAvailable(port: number): Promise<boolean> {
  return new Promise(resolve => {
    const server = net.createServer();
    server.listen(port, () => {
      server.close(() => resolve(true));
    });
    server.on("error", () => resolve(false));
  });
}

async function findAvailablePort(startPort: number = 3000): Promise<number> {
  for (let port = startPort; port < startPort + 20; port++) {
    if (await isPortAvailable(port)) {
      return port;
    }
  }
  throw new Error(`No available port found starting from ${startPort}`);
}

async function startServer() {
  const config = loadConfig();
  logger.configure({ json: config.isProduction });
  const storageMode = resolveStorageMode(config);

  const { fatal, warnings } = validateConfig(config, storageMode);
  warnings.forEach((warning) => logger.warn(warning));
  if (fatal.length > 0) {
    fatal.forEach((problem) => logger.error(problem));
    logger.error("Set these in your .env file and restart the server.");
    process.exit(1);
  }

  if (storageMode === "local") {
    await mkdir(path.join(config.uploadDir, PHOTOS_SUBDIR), { recursive: true });
  }

  const services = createServices(config, connectDatabase(config.databaseUrl));
  const app = createApp(services);
  const server = createServer(app);

  const port = await findAvailablePort(config.port);
  if (port !== config.port) {
    logger.warn(`Port ${config.port} is busy, using port ${port} instead`);
  }

  server.listen(port, () => {
    logger.info(`Server running on http://localhost:${port}/`, {
      environment: config.environment,
      storage: storageMode,
    });
  });
}

startServer().catch((error) => {
  logger.error("Server failed to start", errorMeta(error));
  process.exit(1);
});
