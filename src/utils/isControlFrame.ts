import Opcode, { type FrameOpcode } from "./Opcode.js";

type ControlOpcode =
| Opcode.CLOSE
| Opcode.PING
| Opcode.PONG

const CONTROL_FRAME_OPCODE:readonly FrameOpcode[] = [Opcode.CLOSE, Opcode.PING, Opcode.PONG];

function isControlFrame(opcode:FrameOpcode):opcode is ControlOpcode {
    return CONTROL_FRAME_OPCODE.includes(opcode);
}

export default isControlFrame;
