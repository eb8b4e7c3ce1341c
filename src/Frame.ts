import type Opcode from "./utils/Opcode.js";
import type { FrameOpcode } from "./utils/Opcode.js";

export type Frame = {
    isFinished:boolean;
    rsv:[boolean, boolean, boolean];
    opcode:FrameOpcode;
    isMasked:boolean;
    payloadLength:number;
    maskingKey:Buffer|null;
    payload:Buffer;
}

// Frames with an unknown opcode can be decoded but never produced.
export type EncodableFrame = Omit<Frame, "opcode"> & {
    opcode:Opcode;
}
