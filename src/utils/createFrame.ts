import type { EncodableFrame } from "../Frame.js";
import type Opcode from "./Opcode.js";

type CreateFrameOptions = {
    isFinished?:boolean;
    rsv?:[boolean, boolean, boolean];
    opcode:Opcode;
    maskingKey?:Buffer|null;
    payload?:Buffer;
}

function createFrame({isFinished = true, rsv = [false, false, false], opcode, maskingKey = null, payload = Buffer.alloc(0)}:CreateFrameOptions):EncodableFrame{
    const frame:EncodableFrame = {
        isFinished,
        rsv,
        opcode,
        isMasked:maskingKey !== null,
        payloadLength:payload.byteLength,
        maskingKey,
        payload
    };
    return frame;
}

export default createFrame;
