import type { EncodableFrame, Frame } from "./Frame.js";
import { Code, isValidCode } from "./utils/Code.js";
import { parseCloseFramePayload } from "./utils/closePayload.js";
import createFrame from "./utils/createFrame.js";
import isControlFrame from "./utils/isControlFrame.js";
import Opcode, { type MessageType } from "./utils/Opcode.js";
import WebSocketError, { ProtocolError } from "./WebSocketError.js";

export const DEFAULT_MAX_MESSAGE_SIZE = 1024**2*10;
export const DEFAULT_MAX_FRAME_SIZE = 65535;
export const MAX_CONTROL_FRAME_PAYLOAD_SIZE = 125;

export type Message = {
    type:MessageType;
    data:Buffer;
}

export type ReassemblyResult =
| {kind:"message", message:Message}
| {kind:"fragment"}
| {kind:"ping", payload:Buffer}
| {kind:"pong", payload:Buffer}
| {kind:"close", code:number, reason:string}

export type MessageReassemblerOptions = {
    maxMessageSize?:number;
}

/**
 * Turns the inbound frame sequence of one connection into messages.
 * Control frames pass through without touching a message being reassembled.
 */
class MessageReassembler {

    readonly #maxMessageSize:number;
    #framePayloads:Buffer[] = [];
    #messageType:MessageType|null = null;
    #bufferedPayloadSize = 0;

    constructor({maxMessageSize = DEFAULT_MAX_MESSAGE_SIZE}:MessageReassemblerOptions = {}){
        this.#maxMessageSize = maxMessageSize;
    }

    get isFragmenting(){
        return this.#messageType !== null;
    }

    /** Opcode of the open fragment sequence, `null` when idle. */
    get pendingType(){
        return this.#messageType;
    }

    get bufferedPayloadSize(){
        return this.#bufferedPayloadSize;
    }

    push(frame:Frame):ReassemblyResult{

        if(isControlFrame(frame.opcode)){
            if(!frame.isFinished){
                throw new ProtocolError("Control frame must not be fragmented");
            }
            if(frame.payload.byteLength > MAX_CONTROL_FRAME_PAYLOAD_SIZE){
                throw new ProtocolError("Control frame payload size exceeds " + MAX_CONTROL_FRAME_PAYLOAD_SIZE);
            }
        }

        switch(frame.opcode){
            case Opcode.CLOSE:
                this.reset();
                return {kind:"close", ...readClosePayload(frame.payload)};
            case Opcode.PING:
                return {kind:"ping", payload:frame.payload};
            case Opcode.PONG:
                return {kind:"pong", payload:frame.payload};
            case Opcode.TEXT:
            case Opcode.BINARY:
                if(this.#messageType !== null){
                    throw new ProtocolError("Expected continuation frame");
                }
                this.#messageType = frame.opcode;
                return this.#append(frame);
            case Opcode.CONTINUATION:
                if(this.#messageType === null){
                    throw new ProtocolError("Unexpected continuation frame");
                }
                return this.#append(frame);
            case "unknown":
                throw new ProtocolError("Unknown opcode");
        }
    }

    /** Drops a partially received message. */
    reset(){
        this.#framePayloads = [];
        this.#messageType = null;
        this.#bufferedPayloadSize = 0;
    }

    #append(frame:Frame):ReassemblyResult{
        this.#bufferedPayloadSize += frame.payload.byteLength;
        if(this.#bufferedPayloadSize > this.#maxMessageSize){
            this.reset();
            throw new WebSocketError(Code.TOO_LARGE, "Exceeded max message size");
        }
        this.#framePayloads.push(frame.payload);

        if(!frame.isFinished || this.#messageType === null){
            return {kind:"fragment"};
        }

        const message:Message = {
            type:this.#messageType,
            data:this.#framePayloads.length === 1 ? this.#framePayloads[0] : Buffer.concat(this.#framePayloads)
        };
        this.reset();
        return {kind:"message", message};
    }
}

function readClosePayload(payload:Buffer){
    if(payload.byteLength === 0){
        return {code:Code.RESERVED_NO_STATUS, reason:""};
    }
    if(payload.byteLength === 1){
        throw new ProtocolError("Close frame payload data is wrong");
    }
    const {code, reason} = parseCloseFramePayload(payload);
    if(!isValidCode(code)){
        throw new ProtocolError(`Close frame is containing an invalid code ${code}`);
    }
    return {code, reason};
}

/**
 * Splits one outbound message into frames of at most `maxFrameSize` payload bytes.
 * `createMaskingKey` is called once per frame; omit it for unmasked frames.
 */
export function fragmentMessage(
    data:Buffer,
    type:MessageType,
    maxFrameSize = DEFAULT_MAX_FRAME_SIZE,
    createMaskingKey?:() => Buffer
):EncodableFrame[]{
    if(!Number.isSafeInteger(maxFrameSize) || maxFrameSize < 1){
        throw new RangeError(`Invalid max frame size: ${maxFrameSize}`);
    }

    const frames:EncodableFrame[] = [];
    let offset = 0;

    do{
        const payload = data.subarray(offset, offset + maxFrameSize);
        offset += payload.byteLength;
        frames.push(createFrame({
            isFinished:offset >= data.byteLength,
            opcode:frames.length === 0 ? type : Opcode.CONTINUATION,
            maskingKey:createMaskingKey?.() ?? null,
            payload
        }));
    }while(offset < data.byteLength);

    return frames;
}

export default MessageReassembler;
