import { Code } from "./utils/Code.js";

class WebSocketError extends Error{

    readonly code:number;

    constructor(code:number, reason?:string, options?:ErrorOptions){
        super(reason, options);
        this.name = new.target.name;
        this.code = code;
    }

    get reason(){
        return this.message;
    }
}

/** The stream ended while a frame field was still being read. */
export class TruncatedStreamError extends WebSocketError{
    constructor(reason = "Stream ended in the middle of a frame"){
        super(Code.PROTOCOL_ERROR, reason);
    }
}

/**
 * The opening handshake was malformed or rejected. The connection is dropped
 * without sending a response, so the code is never put on the wire.
 */
export class InvalidHandshakeError extends WebSocketError{
    constructor(reason:string){
        super(Code.PROTOCOL_ERROR, reason);
    }
}

export class ProtocolError extends WebSocketError{
    constructor(reason:string){
        super(Code.PROTOCOL_ERROR, reason);
    }
}

export class IOError extends WebSocketError{
    constructor(cause:Error){
        super(Code.RESERVED_ABNORMAL_CLOSE, cause.message, {cause});
    }
}

export function toWebSocketError(error:unknown):WebSocketError{
    if(error instanceof WebSocketError){
        return error;
    }
    if(error instanceof Error){
        return new WebSocketError(Code.INTERNAL_SERVER_ERROR, error.message, {cause:error});
    }
    return new WebSocketError(Code.INTERNAL_SERVER_ERROR, String(error));
}

export default WebSocketError;
