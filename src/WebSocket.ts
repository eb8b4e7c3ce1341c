import EventEmitter from "events";
import { randomBytes, randomUUID } from "crypto";
import type { Duplex } from "stream";
import type { Frame } from "./Frame.js";
import { acceptHandshake, requestHandshake } from "./Handshake.js";
import MessageReassembler, {
    DEFAULT_MAX_FRAME_SIZE,
    MAX_CONTROL_FRAME_PAYLOAD_SIZE,
    fragmentMessage,
    type ReassemblyResult
} from "./MessageReassembler.js";
import Receiver from "./Receiver.js";
import Sender from "./Sender.js";
import { Code, isValidCode } from "./utils/Code.js";
import { CLOSE_FRAME_CODE_SIZE, createCloseFramePayload } from "./utils/closePayload.js";
import createFrame from "./utils/createFrame.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { MASKING_KEY_SIZE } from "./utils/mask.js";
import Opcode, { type MessageType } from "./utils/Opcode.js";
import WebSocketError, { IOError, TruncatedStreamError, toWebSocketError } from "./WebSocketError.js";

const DEFAULT_CLOSE_TIMEOUT = 1000;
const MAX_CLOSE_REASON_SIZE = MAX_CONTROL_FRAME_PAYLOAD_SIZE - CLOSE_FRAME_CODE_SIZE;

export enum State {
    CONNECTING = 0,
    OPEN = 1,
    CLOSING = 2,
    CLOSED = 3
}

export enum HandshakeState {
    PENDING = "pending",
    ESTABLISHED = "established",
    FAILED = "failed"
}

export type Role = "server" | "client";

export type WebSocketOptions = {
    /** Largest reassembled message accepted. */
    maxMessageSize?:number;
    /** Largest single inbound frame payload accepted. */
    maxPayloadSize?:number;
    /** Outbound messages are split into frames of at most this many payload bytes. */
    maxFrameSize?:number;
    /** How long to wait for the peer to close the connection after a close frame was sent. */
    closeTimeout?:number;
    /**
     * Server sessions require masked frames and client sessions unmasked ones.
     * `false` accepts either direction.
     */
    strictMasking?:boolean;
    logger?:Logger;
}

export type SessionOptions = WebSocketOptions & (
    | {role:"server", path?:string}
    | {role:"client", host:string, path?:string}
);

declare interface WebSocket {
    on(event: "open", listener: () => void): this;
    on(event: "message", listener: (message: Buffer, type:MessageType) => void): this;
    on(event: "close", listener: (code:number, reason:string) => void): this;
    on(event: "error", listener:(error:WebSocketError) => void): this;
    on(event: "pong", listener:(payload:Buffer) => void): this;
    on(event: "ping", listener:(payload:Buffer) => void): this;
    on(event: string, listener: Function): this;
}

/**
 * One WebSocket connection. Owns its socket: runs the opening handshake for its role,
 * then decodes frames into messages and writes outbound frames through a single Sender.
 */
class WebSocket extends EventEmitter {

    readonly id:string;
    readonly role:Role;

    #state = State.CONNECTING;
    #handshakeState = HandshakeState.PENDING;
    #socket:Duplex;
    #sender:Sender;
    #receiver:Receiver;
    #reassembler:MessageReassembler;
    #code:number = Code.RESERVED_ABNORMAL_CLOSE;
    #reason = "";
    #error:WebSocketError|null = null;
    #closeSent = false;
    #closeReceived = false;
    #closeTimer?:NodeJS.Timeout;

    readonly #closeTimeout:number;
    readonly #maxFrameSize:number;
    readonly #createMaskingKey:(() => Buffer)|undefined;
    readonly #logger:Logger;

    constructor(socket:Duplex, options:SessionOptions){
        const {
            maxMessageSize,
            maxPayloadSize,
            maxFrameSize = DEFAULT_MAX_FRAME_SIZE,
            closeTimeout = DEFAULT_CLOSE_TIMEOUT,
            strictMasking = true,
            logger = createLogger("websocket"),
        } = options;
        if(!Number.isSafeInteger(maxFrameSize) || maxFrameSize < 1){
            throw new RangeError(`Invalid max frame size: ${maxFrameSize}`);
        }

        super();
        this.id = randomUUID();
        this.role = options.role;
        this.#socket = socket;
        this.#closeTimeout = closeTimeout;
        this.#maxFrameSize = maxFrameSize;
        this.#logger = logger;
        // only the client masks what it sends
        this.#createMaskingKey = this.role === "client" ? () => randomBytes(MASKING_KEY_SIZE) : undefined;

        this.#sender = new Sender();
        this.#receiver = new Receiver({
            maxPayloadSize,
            expectMasked:strictMasking ? this.role === "server" : undefined
        });
        this.#reassembler = new MessageReassembler({maxMessageSize});

        this.#socket.on("error", (error) => this.#fail(new IOError(error)));
        this.#socket.on("close", () => this.#handleSocketClose());
        this.#sender.on("error", (error) => this.#fail(toWebSocketError(error)));
        this.#receiver.on("data", (frame) => this.#receiveFrame(frame));
        this.#receiver.on("error", (error) => this.#fail(error));

        this.#openingHandshake(options).then(
            (rest) => this.#open(rest),
            (error:unknown) => this.#fail(toWebSocketError(error))
        );
    }

    get state(){
        return this.#state;
    }

    get handshakeState(){
        return this.#handshakeState;
    }

    async #openingHandshake(options:SessionOptions):Promise<Buffer>{
        if(options.role === "server"){
            const {rest} = await acceptHandshake(this.#socket, {path:options.path});
            return rest;
        }
        const {rest} = await requestHandshake(this.#socket, {host:options.host, path:options.path});
        return rest;
    }

    #open(rest:Buffer){
        //the socket failed while the handshake was finishing
        if(this.#state !== State.CONNECTING || this.#error !== null){
            return;
        }
        this.#handshakeState = HandshakeState.ESTABLISHED;
        this.#state = State.OPEN;
        this.#logger.debug(`handshake completed (${this.role} ${this.id})`);

        this.#sender.pipe(this.#socket);
        this.emit("open");

        if(rest.byteLength > 0){
            this.#receiver.write(rest);
        }
        this.#socket.pipe(this.#receiver);
    }

    #receiveFrame(frame:Frame){
        if(this.#state === State.CLOSED || this.#error !== null || this.#closeReceived){
            return;
        }

        let result:ReassemblyResult;
        try{
            result = this.#reassembler.push(frame);
        }catch(error){
            this.#fail(toWebSocketError(error));
            return;
        }

        switch(result.kind){
            case "message":
                this.emit("message", result.message.data, result.message.type);
                break;
            case "fragment":
                break;
            case "ping":
                this.emit("ping", result.payload);
                if(!this.#closeSent){
                    this.#sender.write(this.#createFrame(Opcode.PONG, result.payload));
                }
                break;
            case "pong":
                this.emit("pong", result.payload);
                break;
            case "close":
                this.#logger.debug(`received close frame ${result.code} (${this.id})`);
                this.#closeReceived = true;
                this.#code = result.code;
                this.#reason = result.reason;
                this.#state = State.CLOSING;
                if(this.#closeSent){
                    this.#socket.end();
                }else{
                    this.#sendCloseFrame(result.code === Code.RESERVED_NO_STATUS ? null : result.code, result.reason);
                }
                break;
        }
    }

    #createFrame(opcode:Opcode, payload?:Buffer){
        return createFrame({opcode, payload, maskingKey:this.#createMaskingKey?.() ?? null});
    }

    // At most one close frame per connection; the socket is destroyed if the peer does not close it in time.
    #sendCloseFrame(code:number|null, reason = "", callback?:() => void){
        if(this.#closeSent || !this.#sender.writable || !this.#socket.writable){
            callback?.();
            return;
        }
        this.#closeSent = true;

        const payload = code === null
            ? undefined
            : createCloseFramePayload(code, Buffer.byteLength(reason) > MAX_CLOSE_REASON_SIZE ? "" : reason);
        this.#sender.end(this.#createFrame(Opcode.CLOSE, payload), callback);

        this.#closeTimer = setTimeout(() => {
            if(this.#state === State.CLOSED){
                return;
            }
            this.#logger.debug(`close timeout, destroying socket (${this.id})`);
            this.#socket.destroy();
        }, this.#closeTimeout);
    }

    /** Terminates the connection on its first error; later errors are only logged. */
    #fail(error:WebSocketError){
        if(this.#state === State.CLOSED || this.#error !== null){
            this.#logger.debug(`ignored error after termination (${this.id}):`, error.message);
            return;
        }
        //the peer must not send anything after its close frame
        if(this.#closeReceived && !(error instanceof IOError)){
            this.#logger.debug(`dropped bytes after close frame (${this.id}):`, error.message);
            this.#socket.unpipe(this.#receiver);
            this.#socket.resume();
            return;
        }
        this.#error = error;

        if(this.#handshakeState === HandshakeState.PENDING){
            this.#handshakeState = HandshakeState.FAILED;
            this.#socket.destroy();
        }else if(error instanceof IOError){
            this.#socket.destroy();
        }else{
            this.#state = State.CLOSING;
            this.#reassembler.reset();
            //keep reading so the peer's FIN is seen, the bytes themselves are dropped
            this.#socket.unpipe(this.#receiver);
            this.#socket.resume();
            this.#sendCloseFrame(error.code, error.reason);
        }

        this.emit("error", error);
    }

    #handleSocketClose(){
        clearTimeout(this.#closeTimer);
        if(this.#state === State.CLOSED){
            return;
        }
        if(this.#handshakeState === HandshakeState.ESTABLISHED && this.#error === null && !this.#receiver.isIdle){
            this.#fail(new TruncatedStreamError());
        }

        //has not finished closing handshake
        if(!this.#closeReceived){
            this.#code = Code.RESERVED_ABNORMAL_CLOSE;
            this.#reason = "";
        }
        this.#state = State.CLOSED;
        this.#reassembler.reset();
        this.#socket.unpipe(this.#receiver);
        this.#sender.destroy();
        this.#receiver.destroy();
        this.emit("close", this.#code, this.#reason);
    }

    /**
     * Strings are sent as text and buffers as binary unless `type` says otherwise.
     * Resolves once the last frame is encoded and the outbound queue is below its high water mark.
     */
    send(message:Buffer|string, type:MessageType = typeof message === "string" ? Opcode.TEXT : Opcode.BINARY){
        return new Promise<void>((resolve, reject) => {
            if(this.#state !== State.OPEN){
                reject(new Error("Cannot send message when state is not OPEN"));
                return;
            }

            const data = typeof message === "string" ? Buffer.from(message, "utf8") : message;
            const frames = fragmentMessage(data, type, this.#maxFrameSize, this.#createMaskingKey);
            //all frames are queued in one go so nothing can be written between them
            frames.forEach((frame, index) => {
                if(index < frames.length - 1){
                    this.#sender.write(frame);
                    return;
                }
                this.#sender.write(frame, (err) => err ? reject(err) : resolve());
            });
        }).then(() => this.#waitForDrain());
    }

    #waitForDrain(){
        return new Promise<void>((resolve, reject) => {
            if(!this.#sender.writableNeedDrain){
                resolve();
                return;
            }
            const onDrain = () => {
                this.#sender.off("close", onClose);
                resolve();
            };
            const onClose = () => {
                this.#sender.off("drain", onDrain);
                reject(new Error("Connection closed before the message was flushed"));
            };
            this.#sender.once("drain", onDrain);
            this.#sender.once("close", onClose);
        });
    }

    close(code:number = Code.NORMAL_CLOSE, reason = ""){
        return new Promise<void>((resolve, reject) => {
            if(this.#state !== State.OPEN){
                return reject(Error("Cannot send close frame when state is not OPEN"));
            }
            if(Buffer.byteLength(reason) > MAX_CLOSE_REASON_SIZE){
                return reject(Error("Length of reason must not be greater than " + MAX_CLOSE_REASON_SIZE + " bytes"));
            }
            if(!isValidCode(code)){
                return reject(new Error(`Code ${code} can not be sent in a close frame`));
            }

            this.#state = State.CLOSING;
            this.#sendCloseFrame(code, reason, resolve);
        });
    }

    /** Drops the connection without a closing handshake. */
    terminate(){
        this.#socket.destroy();
    }

    ping(payload:Buffer = Buffer.alloc(0)){
        return this.#sendControlFrame(Opcode.PING, payload);
    }

    pong(payload:Buffer = Buffer.alloc(0)){
        return this.#sendControlFrame(Opcode.PONG, payload);
    }

    #sendControlFrame(opcode:Opcode.PING|Opcode.PONG, payload:Buffer){
        return new Promise<void>((resolve, reject) => {
            if(this.#state !== State.OPEN){
                return reject(new Error("State is not OPEN cannot send control frame"));
            }
            if(payload.byteLength > MAX_CONTROL_FRAME_PAYLOAD_SIZE){
                return reject(new Error(`Control frame payload must not exceed ${MAX_CONTROL_FRAME_PAYLOAD_SIZE} bytes`));
            }

            this.#sender.write(this.#createFrame(opcode, payload), (err) => err ? reject(err) : resolve());
        });
    }
}

export default WebSocket;
