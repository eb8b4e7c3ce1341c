import { createHash, randomBytes } from "crypto";
import type { Duplex } from "stream";
import formatHttpHead, { formatStatusLine } from "./utils/formatHttpHead.js";
import {
    hasToken,
    parseRequestHead,
    parseResponseHead,
    type HttpRequestHead,
    type HttpResponseHead
} from "./utils/parseHttpHead.js";
import { IOError, InvalidHandshakeError } from "./WebSocketError.js";

export const MAGIC_STRING = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";
export const VERSION = "13";

const HEAD_TERMINATOR = "\r\n\r\n";
const MAX_HEAD_SIZE = 8192;
const KEY_SIZE = 16;
const BASE64_KEY = /^[A-Za-z0-9+/]{22}==$/;

export type HandshakeResult<Head> = {
    head:Head;
    /** Bytes that arrived after the head; they belong to the frame stream. */
    rest:Buffer;
}

export type AcceptHandshakeOptions = {
    /** Only requests for this pathname are upgraded. Any path when omitted. */
    path?:string;
}

export type RequestHandshakeOptions = {
    host:string;
    path?:string;
}

export function computeAcceptKey(key:string){
    return createHash("sha1").update(key + MAGIC_STRING).digest("base64");
}

export function generateKey(){
    return randomBytes(KEY_SIZE).toString("base64");
}

export function isValidKey(key:string){
    return BASE64_KEY.test(key) && Buffer.from(key, "base64").byteLength === KEY_SIZE;
}

/**
 * Reads from `socket` up to and including the first empty line.
 * The socket is left paused so nothing after the head is consumed by anyone else.
 */
export function readHead(socket:Duplex){
    return new Promise<{head:string, rest:Buffer}>((resolve, reject) => {
        let buffered = Buffer.alloc(0);

        const cleanup = () => {
            socket.off("data", onData);
            socket.off("end", onEnd);
            socket.off("close", onEnd);
            socket.off("error", onError);
            socket.pause();
        };
        const onData = (chunk:Buffer) => {
            buffered = Buffer.concat([buffered, chunk]);
            const end = buffered.indexOf(HEAD_TERMINATOR);
            if(end === -1){
                if(buffered.byteLength > MAX_HEAD_SIZE){
                    cleanup();
                    reject(new InvalidHandshakeError(`Handshake head exceeds ${MAX_HEAD_SIZE} bytes`));
                }
                return;
            }
            cleanup();
            if(end > MAX_HEAD_SIZE){
                reject(new InvalidHandshakeError(`Handshake head exceeds ${MAX_HEAD_SIZE} bytes`));
                return;
            }
            resolve({
                head:buffered.toString("latin1", 0, end),
                rest:buffered.subarray(end + HEAD_TERMINATOR.length)
            });
        };
        const onEnd = () => {
            cleanup();
            reject(new InvalidHandshakeError("Connection closed before the handshake completed"));
        };
        const onError = (error:Error) => {
            cleanup();
            reject(new IOError(error));
        };

        socket.on("data", onData);
        socket.on("end", onEnd);
        socket.on("close", onEnd);
        socket.on("error", onError);
        socket.resume();
    });
}

function write(socket:Duplex, data:string){
    return new Promise<void>((resolve, reject) => {
        socket.write(data, (error) => error ? reject(new IOError(error)) : resolve());
    });
}

export function validateUpgradeRequest(request:HttpRequestHead, {path}:AcceptHandshakeOptions = {}){
    if(request.method !== "GET"){
        throw new InvalidHandshakeError(`Unexpected method ${request.method}`);
    }
    if(request.version !== "1.1"){
        throw new InvalidHandshakeError(`Unsupported HTTP version ${request.version}`);
    }
    if(path !== undefined && new URL(request.target, "http://localhost").pathname !== path){
        throw new InvalidHandshakeError(`Unexpected path ${request.target}`);
    }
    if(!hasToken(request.headers.get("connection"), "upgrade")){
        throw new InvalidHandshakeError("Connection header must contain Upgrade");
    }
    if(request.headers.get("upgrade")?.toLowerCase() !== "websocket"){
        throw new InvalidHandshakeError("Upgrade header must be websocket");
    }
    const key = request.headers.get("sec-websocket-key");
    if(key === undefined || !isValidKey(key)){
        throw new InvalidHandshakeError("Missing or malformed Sec-WebSocket-Key");
    }
    return key;
}

/**
 * Server side of the opening handshake. Nothing is written unless the request
 * is a valid upgrade, in which case the 101 response is written before resolving.
 */
export async function acceptHandshake(socket:Duplex, options:AcceptHandshakeOptions = {}):Promise<HandshakeResult<HttpRequestHead>>{
    const {head, rest} = await readHead(socket);
    const request = parseRequestHead(head);
    const key = validateUpgradeRequest(request, options);

    await write(socket, formatHttpHead(formatStatusLine(101, "Switching Protocols"), {
        "Upgrade":"websocket",
        "Connection":"Upgrade",
        "Sec-WebSocket-Accept":computeAcceptKey(key)
    }));

    return {head:request, rest};
}

export function validateUpgradeResponse(response:HttpResponseHead, key:string){
    if(response.statusCode !== 101){
        throw new InvalidHandshakeError(`Unexpected response ${response.statusCode} ${response.statusText}`.trim());
    }
    if(response.headers.get("upgrade")?.toLowerCase() !== "websocket" || !hasToken(response.headers.get("connection"), "upgrade")){
        throw new InvalidHandshakeError("Response is missing the upgrade headers");
    }
    if(response.headers.get("sec-websocket-accept") !== computeAcceptKey(key)){
        throw new InvalidHandshakeError("Invalid Sec-WebSocket-Accept");
    }
}

/** Client side of the opening handshake. */
export async function requestHandshake(socket:Duplex, {host, path = "/"}:RequestHandshakeOptions):Promise<HandshakeResult<HttpResponseHead>>{
    const key = generateKey();
    const request = formatHttpHead(`GET ${path} HTTP/1.1`, {
        "Host":host,
        "Upgrade":"websocket",
        "Connection":"Upgrade",
        "Sec-WebSocket-Key":key,
        "Sec-WebSocket-Version":VERSION
    });

    const [{head, rest}] = await Promise.all([readHead(socket), write(socket, request)]);
    const parsed = parseResponseHead(head);
    validateUpgradeResponse(parsed, key);

    return {head:parsed, rest};
}
