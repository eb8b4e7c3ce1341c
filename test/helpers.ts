import { once } from "events";
import { connect, type Socket } from "net";
import { Duplex } from "stream";
import type { EncodableFrame, Frame } from "../src/Frame.js";
import FrameParser from "../src/FrameParser.js";
import encodeFrame from "../src/utils/encodeFrame.js";
import { createLogger, LogLevel } from "../src/utils/logger.js";
import type WebSocket from "../src/WebSocket.js";
import WebSocketServer, { type WebSocketServerOptions } from "../src/WebSocketServer.js";

export const silentLogger = createLogger("test", LogLevel.SILENT);

export const SAMPLE_KEY = "dGhlIHNhbXBsZSBub25jZQ==";
export const SAMPLE_ACCEPT = "s3pPLMBiTxaQ9kYGzzhZRbK+xOo=";
export const MASKING_KEY = Buffer.from([0x12, 0x34, 0x56, 0x78]);

export function upgradeRequest(key = SAMPLE_KEY, path = "/"){
    return [
        `GET ${path} HTTP/1.1`,
        "Host: 127.0.0.1",
        "Upgrade: websocket",
        "Connection: Upgrade",
        `Sec-WebSocket-Key: ${key}`,
        "Sec-WebSocket-Version: 13",
        "",
        "",
    ].join("\r\n");
}

/** Duplex stand-in for a socket: `push` feeds it, everything written lands in `written`. */
export function createFakeSocket(onWrite?:(chunk:Buffer, socket:Duplex) => void){
    const written:Buffer[] = [];
    const socket:Duplex = new Duplex({
        read(){},
        write(chunk:Buffer, encoding, callback){
            written.push(chunk);
            onWrite?.(chunk, socket);
            callback();
        },
    });
    return {socket, written};
}

export async function startServer(options:Partial<WebSocketServerOptions> = {}){
    const server = new WebSocketServer({port:0, host:"127.0.0.1", logger:silentLogger, closeTimeout:100, ...options});
    await once(server, "listening");
    const address = server.address();
    if(address === null){
        throw new Error("server is not listening");
    }
    return {server, port:address.port};
}

export function nextConnection(server:WebSocketServer){
    return new Promise<WebSocket>((resolve) => server.once("connection", resolve));
}

/**
 * Hand-driven client: writes raw bytes and collects the decoded frames the server sends back.
 */
export class RawClient {

    readonly socket:Socket;
    readonly frames:Frame[] = [];
    readonly errors:Error[] = [];
    response = "";
    closed = false;

    #parser = new FrameParser({expectMasked:false});
    #head = Buffer.alloc(0);

    private constructor(socket:Socket){
        this.socket = socket;
        socket.on("data", (chunk:Buffer) => this.#receive(chunk));
        socket.on("error", (error) => this.errors.push(error));
        socket.on("close", () => {
            this.closed = true;
        });
    }

    /** With `allowHalfOpen` the client keeps writing after the server has ended its side. */
    static async connect(port:number, {request = upgradeRequest(), allowHalfOpen = false} = {}){
        const socket = connect({port, host:"127.0.0.1", allowHalfOpen});
        await once(socket, "connect");
        const client = new RawClient(socket);
        socket.write(request);
        return client;
    }

    #receive(chunk:Buffer){
        if(this.response === ""){
            this.#head = Buffer.concat([this.#head, chunk]);
            const end = this.#head.indexOf("\r\n\r\n");
            if(end === -1){
                return;
            }
            this.response = this.#head.toString("latin1", 0, end + 4);
            chunk = this.#head.subarray(end + 4);
        }
        this.frames.push(...this.#parser.push(chunk));
    }

    send(frame:EncodableFrame){
        this.socket.write(encodeFrame(frame));
    }

    sendBytes(data:Buffer){
        this.socket.write(data);
    }
}
