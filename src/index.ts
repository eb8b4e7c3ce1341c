import ChatHandler from "./ChatHandler.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./utils/logger.js";
import WebSocketServer from "./WebSocketServer.js";

const config = loadConfig();
const logger = createLogger("server", config.logLevel);

const wsServer = new WebSocketServer({
    port:config.port,
    host:config.host,
    path:config.path,
    maxFrameSize:config.maxFrameSize,
    maxMessageSize:config.maxMessageSize,
    handler:new ChatHandler({logger:createLogger("chat", config.logLevel)}),
    logger,
});

wsServer.on("error", (err) => {
    logger.error("server error:", err);
    process.exitCode = 1;
});

wsServer.on("connection", (ws) => {
    ws.on("pong", (payload) => {
        logger.debug("received pong", payload.toString());
    });
    ws.ping().catch((err:unknown) => logger.warn("ping failed:", err));
});

process.once("SIGINT", () => {
    logger.info("shutting down");
    wsServer.close().catch((err:unknown) => logger.error("shutdown failed:", err));
});
