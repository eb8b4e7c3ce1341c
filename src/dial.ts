import { once } from "events";
import { connect } from "net";
import WebSocket, { type WebSocketOptions } from "./WebSocket.js";

export type DialOptions = WebSocketOptions & {
    port:number;
    host?:string;
    path?:string;
};

/**
 * Opens one TCP connection and performs the client handshake on it.
 * Resolves with the open session, rejects with the transport or handshake error.
 * Reconnecting is left to the caller.
 */
async function dial({port, host = "127.0.0.1", path = "/", ...options}:DialOptions):Promise<WebSocket>{
    const socket = connect({port, host});
    const webSocket = new WebSocket(socket, {...options, role:"client", host:`${host}:${port}`, path});
    await once(webSocket, "open");
    return webSocket;
}

export default dial;
