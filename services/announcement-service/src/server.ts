import http from "http";
import { createApp } from "./app";
import { Env, loadEnv } from "./config/env";
import { logger } from "./logger";

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
let env: Env;
try {
    env = loadEnv();
} catch (err) {
    logger.fatal({ err }, "Invalid configuration");
    process.exit(1);
}

// -------------------------------------------------
// HTTP Server
// -------------------------------------------------
const app = createApp({ env });
const server = http.createServer(app);

server.listen(env.PORT, () => {
    logger.info(
        { mode: env.FACADE_MODE, basePath: env.BASE_PATH || "/" },
        `Announcement service running on http://localhost:${env.PORT}`
    );
});

server.on("error", (err) => {
    logger.fatal({ err }, "Failed to start server");
    process.exit(1);
});

function shutdown(signal: string) {
    logger.info(`Received ${signal}. Shutting down...`);
    server.close((err) => {
        if (err) {
            logger.error({ err }, "Shutdown failed");
            process.exit(1);
        }
        process.exit(0);
    });
    setTimeout(() => process.exit(0), 5000).unref();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
