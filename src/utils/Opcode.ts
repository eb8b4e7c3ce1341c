enum Opcode {
    CONTINUATION = 0x0,
    TEXT = 0x1,
    BINARY = 0x2,
    CLOSE = 0x8,
    PING = 0x9,
    PONG = 0xA,
}

export type FrameOpcode = Opcode | "unknown";

export type MessageType = Opcode.TEXT | Opcode.BINARY;

export function toFrameOpcode(rawOpcode:number):FrameOpcode{
    switch(rawOpcode){
        case Opcode.CONTINUATION: return Opcode.CONTINUATION;
        case Opcode.TEXT: return Opcode.TEXT;
        case Opcode.BINARY: return Opcode.BINARY;
        case Opcode.CLOSE: return Opcode.CLOSE;
        case Opcode.PING: return Opcode.PING;
        case Opcode.PONG: return Opcode.PONG;
        default: return "unknown";
    }
}

export default Opcode;
