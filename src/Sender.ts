import { Transform, type TransformCallback } from "stream";
import type { EncodableFrame } from "./Frame.js";
import encodeFrame from "./utils/encodeFrame.js";

declare interface Sender extends Transform{
    write(frame:EncodableFrame, callback?:(err?:Error|null) => void):boolean;
    write(frame:EncodableFrame, encoding?:BufferEncoding, callback?:(err?:Error|null) => void):boolean;
    end(frame:EncodableFrame, callback?:() => void): this;
    end(callback?:() => void): this;
    on(event: "data", listener:(chunk:Buffer) => void): this;
    on(event: "error", listener:(error:Error) => void): this;
    on(event: "close", listener:() => void): this;
    on(event: string, listener: Function): this;
}

/**
 * Frames in, wire bytes out. Every outbound frame of a connection goes through
 * one Sender, which keeps each frame's header and payload contiguous on the socket.
 */
class Sender extends Transform{

    constructor(){
        super({writableObjectMode:true});
    }

    override _transform(frame:EncodableFrame, encoding:BufferEncoding, callback:TransformCallback): void {
        let data:Buffer;
        try{
            data = encodeFrame(frame);
        }catch(error){
            callback(error instanceof Error ? error : new Error(String(error)));
            return;
        }
        callback(null, data);
    }

}

export default Sender;
