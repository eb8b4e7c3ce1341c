import type { Frame } from "./Frame.js";
import type { FrameOpcode } from "./utils/Opcode.js";
import { Code } from "./utils/Code.js";
import mask, { MASKING_KEY_SIZE } from "./utils/mask.js";
import parseFinAndOpcode from "./utils/parseFinAndOpcode.js";
import parseMaskAndPayloadLength, { type ExtendedPayloadLengthSize } from "./utils/parseMaskAndPayloadLength.js";
import WebSocketError, { ProtocolError } from "./WebSocketError.js";

enum FramePart {
    FIN_AND_OPCODE = 0,
    MASK_AND_PAYLOAD_LENGTH = 1,
    EXTENDED_PAYLOAD_LENGTH = 2,
    MASKING_KEY = 3,
    PAYLOAD = 4,
}

export const DEFAULT_MAX_PAYLOAD_SIZE = 1024**2*10;

export type FrameParserOptions = {
    /** `true` rejects unmasked frames, `false` rejects masked ones, `undefined` accepts both. */
    expectMasked?:boolean;
    maxPayloadSize?:number;
}

/**
 * Incremental frame decoder. Bytes may arrive split at any boundary;
 * `push` returns every frame completed by the chunk, in wire order.
 */
class FrameParser {

    readonly #expectMasked:boolean|undefined;
    readonly #maxPayloadSize:number;

    #framePart = FramePart.FIN_AND_OPCODE;
    #extendedPayloadLength = Buffer.alloc(8);
    #bufferedSize = 0;

    #isFinished = true;
    #rsv:[boolean, boolean, boolean] = [false, false, false];
    #opcode:FrameOpcode = "unknown";
    #isMasked = false;
    #maskingKey:Buffer|null = null;
    #extendedPayloadLengthSize:ExtendedPayloadLengthSize = 0;
    #payloadLength = 0;
    #payload:Buffer|null = null;

    constructor({expectMasked, maxPayloadSize = DEFAULT_MAX_PAYLOAD_SIZE}:FrameParserOptions = {}){
        if(!Number.isSafeInteger(maxPayloadSize) || maxPayloadSize < 0){
            throw new RangeError(`Invalid max payload size: ${maxPayloadSize}`);
        }
        this.#expectMasked = expectMasked;
        this.#maxPayloadSize = maxPayloadSize;
    }

    /** `true` when no frame is partially read. */
    get isIdle(){
        return this.#framePart === FramePart.FIN_AND_OPCODE;
    }

    /**
     * Completed frames are appended to `frames` as they are decoded, so when a later
     * frame in the same chunk breaks a rule the caller still holds the ones before it.
     */
    push(chunk:Buffer, frames:Frame[] = []):Frame[]{

        let offset = 0;

        while(true){
            switch(this.#framePart){
                case FramePart.FIN_AND_OPCODE: {
                    if(offset >= chunk.byteLength){
                        return frames;
                    }
                    const {isFinished, rsv, opcode} = parseFinAndOpcode(chunk[offset]);
                    this.#isFinished = isFinished;
                    this.#rsv = rsv;
                    this.#opcode = opcode;
                    offset++;

                    this.#framePart = FramePart.MASK_AND_PAYLOAD_LENGTH;
                    break;
                }
                case FramePart.MASK_AND_PAYLOAD_LENGTH: {
                    if(offset >= chunk.byteLength){
                        return frames;
                    }
                    const {isMasked, payloadLength, extendedPayloadLengthSize} = parseMaskAndPayloadLength(chunk[offset]);
                    this.#isMasked = isMasked;
                    this.#payloadLength = payloadLength;
                    this.#extendedPayloadLengthSize = extendedPayloadLengthSize;
                    offset++;

                    if(this.#expectMasked === true && !isMasked){
                        throw new ProtocolError("Frame must be masked");
                    }
                    if(this.#expectMasked === false && isMasked){
                        throw new ProtocolError("Frame must not be masked");
                    }

                    if(extendedPayloadLengthSize > 0){
                        this.#framePart = FramePart.EXTENDED_PAYLOAD_LENGTH;
                        break;
                    }
                    this.#checkPayloadLength(payloadLength);
                    this.#framePart = isMasked ? FramePart.MASKING_KEY : FramePart.PAYLOAD;
                    break;
                }
                case FramePart.EXTENDED_PAYLOAD_LENGTH: {
                    offset = this.#fill(this.#extendedPayloadLength, this.#extendedPayloadLengthSize, chunk, offset);
                    if(this.#bufferedSize < this.#extendedPayloadLengthSize){
                        return frames;
                    }
                    this.#bufferedSize = 0;

                    this.#payloadLength = this.#checkPayloadLength(
                        this.#extendedPayloadLengthSize === 2
                            ? this.#extendedPayloadLength.readUInt16BE(0)
                            : this.#extendedPayloadLength.readBigUInt64BE(0)
                    );

                    this.#framePart = this.#isMasked ? FramePart.MASKING_KEY : FramePart.PAYLOAD;
                    break;
                }
                case FramePart.MASKING_KEY: {
                    if(this.#maskingKey === null){
                        this.#maskingKey = Buffer.alloc(MASKING_KEY_SIZE);
                    }
                    offset = this.#fill(this.#maskingKey, MASKING_KEY_SIZE, chunk, offset);
                    if(this.#bufferedSize < MASKING_KEY_SIZE){
                        return frames;
                    }
                    this.#bufferedSize = 0;

                    this.#framePart = FramePart.PAYLOAD;
                    break;
                }
                case FramePart.PAYLOAD: {
                    if(this.#payload === null){
                        this.#payload = Buffer.allocUnsafe(this.#payloadLength);
                    }
                    offset = this.#fill(this.#payload, this.#payloadLength, chunk, offset);
                    if(this.#bufferedSize < this.#payloadLength){
                        return frames;
                    }

                    //unmask payload
                    if(this.#maskingKey !== null){
                        mask(this.#payload, this.#maskingKey);
                    }

                    frames.push({
                        isFinished:this.#isFinished,
                        rsv:this.#rsv,
                        opcode:this.#opcode,
                        isMasked:this.#isMasked,
                        payloadLength:this.#payloadLength,
                        maskingKey:this.#maskingKey,
                        payload:this.#payload
                    });
                    this.#reset();
                    break;
                }
            }
        }
    }

    // copies bytes of `chunk` into `target` until `size` bytes are buffered, returns the new offset
    #fill(target:Buffer, size:number, chunk:Buffer, offset:number){
        const count = Math.min(size - this.#bufferedSize, chunk.byteLength - offset);
        chunk.copy(target, this.#bufferedSize, offset, offset + count);
        this.#bufferedSize += count;
        return offset + count;
    }

    #checkPayloadLength(length:number|bigint):number{
        if(length > this.#maxPayloadSize){
            throw new WebSocketError(Code.TOO_LARGE, "Frame payload exceeds max limit size");
        }
        return Number(length);
    }

    #reset(){
        this.#framePart = FramePart.FIN_AND_OPCODE;
        this.#bufferedSize = 0;
        this.#maskingKey = null;
        this.#payload = null;
        this.#payloadLength = 0;
    }
}

export default FrameParser;
