import { Transform, type TransformCallback } from "stream";
import type { Frame } from "./Frame.js";
import FrameParser, { type FrameParserOptions } from "./FrameParser.js";
import { TruncatedStreamError, toWebSocketError } from "./WebSocketError.js";
import type WebSocketError from "./WebSocketError.js";

export type ReceiverOptions = FrameParserOptions;

declare interface Receiver{
    on(event: "data", listener:(frame:Frame) => void): this;
    on(event: "error", listener:(error:WebSocketError) => void): this;
    on(event: "end", listener:() => void): this;
    on(event: "close", listener:() => void): this;
    on(event: string, listener: Function): this;
}

/** Bytes in, decoded frames out. */
class Receiver extends Transform{

    #parser:FrameParser;

    constructor(options:ReceiverOptions = {}){
        super({readableObjectMode:true});
        this.#parser = new FrameParser(options);
    }

    /** `false` while a frame is partially read. */
    get isIdle(){
        return this.#parser.isIdle;
    }

    override _transform(chunk:Buffer, encoding:BufferEncoding, callback:TransformCallback): void {
        const frames:Frame[] = [];
        let failure:WebSocketError|null = null;
        try{
            this.#parser.push(chunk, frames);
        }catch(error){
            failure = toWebSocketError(error);
        }

        for(const frame of frames){
            this.push(frame);
        }
        if(failure === null){
            callback();
            return;
        }
        //frames decoded before the failing one are read before the stream errors out
        process.nextTick(callback, failure);
    }

    override _flush(callback:TransformCallback): void {
        if(!this.#parser.isIdle){
            callback(new TruncatedStreamError());
            return;
        }
        callback();
    }
}

export default Receiver;
