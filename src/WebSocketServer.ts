import EventEmitter from "events";
import { createServer, type AddressInfo, type Server, type Socket } from "net";
import type { MessageHandler } from "./MessageHandler.js";
import { Code } from "./utils/Code.js";
import { createLogger, type Logger } from "./utils/logger.js";
import WebSocket, { State, type WebSocketOptions } from "./WebSocket.js";

export type WebSocketServerOptions = WebSocketOptions & {
    port:number;
    host?:string;
    /** Pathname upgrades are accepted on. */
    path?:string;
    maxConnections?:number;
    handler?:MessageHandler;
};

declare interface WebSocketServer{
    on(event: "listening", listener: () => void): this;
    on(event: "connection", listener: (websocket: WebSocket) => void): this;
    on(event: "error", listener: (error: Error) => void): this;
    on(event: "close", listener: () => void): this;
    on(event: string, listener: Function): this;
}

/**
 * Accepts TCP connections and runs one WebSocket session per connection.
 * A failing session is logged and dropped; it never reaches the listener.
 */
class WebSocketServer extends EventEmitter{

    readonly connections:Map<string, WebSocket>;
    readonly path:string;
    #server:Server;
    #handler:MessageHandler|undefined;
    #logger:Logger;
    #sessionOptions:WebSocketOptions;

    constructor({port, host, path = "/", maxConnections, handler, logger = createLogger("server"), ...sessionOptions}:WebSocketServerOptions){
        super();
        this.connections = new Map();
        this.path = path;
        this.#handler = handler;
        this.#logger = logger;
        this.#sessionOptions = {...sessionOptions, logger};

        this.#server = createServer((socket) => this.#handleSocket(socket));
        if(maxConnections != null){
            this.#server.maxConnections = maxConnections;
        }
        this.#server.on("error", (err:NodeJS.ErrnoException) => {
            //accept failures only affect the connection being accepted
            if(err.syscall === "accept"){
                this.#logger.error("accept failed:", err.message);
                return;
            }
            this.emit("error", err);
        });
        this.#server.on("listening", () => {
            this.#logger.info(`listening on ${this.#describeAddress()}`);
            this.emit("listening");
        });
        this.#server.on("close", () => this.emit("close"));
        this.#server.listen(port, host);
    }

    /** Bound address, `null` before listening. */
    address():AddressInfo|null{
        const address = this.#server.address();
        return typeof address === "object" ? address : null;
    }

    #describeAddress(){
        const address = this.address();
        return address === null ? "unknown address" : `${address.address}:${address.port}`;
    }

    #handleSocket(socket:Socket){
        const webSocket = new WebSocket(socket, {...this.#sessionOptions, role:"server", path:this.path});
        this.connections.set(webSocket.id, webSocket);
        this.#logger.debug(`accepted ${webSocket.id} from ${socket.remoteAddress}:${socket.remotePort}`);

        webSocket.on("open", () => {
            this.#logger.info(`websocket opened ${webSocket.id}, connections: ${this.connections.size}`);
            this.emit("connection", webSocket);
        });
        webSocket.on("message", (data, type) => {
            if(this.#handler === undefined){
                return;
            }
            Promise.resolve()
                .then(() => this.#handler?.handle({data, type}, webSocket))
                .catch((err:unknown) => this.#logger.error(`message handler failed on ${webSocket.id}:`, err));
        });
        webSocket.on("error", (err) => {
            this.#logger.warn(`websocket ${webSocket.id} failed:`, err.message);
        });
        webSocket.on("close", (code, reason) => {
            this.connections.delete(webSocket.id);
            this.#logger.info(`websocket closed ${webSocket.id} code: ${code} reason: ${reason}, connections: ${this.connections.size}`);
        });
    }

    /** Stops accepting, closes every session with 1001 and resolves once the listener is closed. */
    close(){
        return new Promise<void>((resolve, reject) => {
            this.#server.close((err) => err ? reject(err) : resolve());
            for(const webSocket of this.connections.values()){
                if(webSocket.state !== State.OPEN){
                    webSocket.terminate();
                    continue;
                }
                webSocket.close(Code.GOING_AWAY, "server shutting down")
                    .catch((err:unknown) => this.#logger.debug(`close of ${webSocket.id} failed:`, err));
            }
        });
    }
}

export default WebSocketServer;
