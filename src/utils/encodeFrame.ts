import type { EncodableFrame } from "../Frame.js";
import mask, { MASKING_KEY_SIZE } from "./mask.js";

const MAX_7BIT_PAYLOAD_LENGTH = 125;
const MAX_16BIT_PAYLOAD_LENGTH = 65535;

function encodeFrame({isFinished, rsv, opcode, isMasked, maskingKey, payload}:EncodableFrame):Buffer{

    const payloadSize = payload.byteLength;
    let payloadLength = 0;
    let headerSize = 2;
    let offset = 0;

    if(payloadSize > MAX_16BIT_PAYLOAD_LENGTH){
        payloadLength = 127;
        headerSize += 8;
    }else if(payloadSize > MAX_7BIT_PAYLOAD_LENGTH){
        payloadLength = 126;
        headerSize += 2;
    }else{
        payloadLength = payloadSize;
    }

    if(isMasked){
        if(maskingKey === null || maskingKey.byteLength !== MASKING_KEY_SIZE){
            throw new Error(`Masked frame requires a ${MASKING_KEY_SIZE} byte masking key`);
        }
        headerSize += MASKING_KEY_SIZE;
    }

    const buffer = Buffer.alloc(headerSize + payloadSize);

    if(isFinished){
        buffer[offset] |= 0b10000000;
    }
    if(rsv[0]){
        buffer[offset] |= 0b01000000;
    }
    if(rsv[1]){
        buffer[offset] |= 0b00100000;
    }
    if(rsv[2]){
        buffer[offset] |= 0b00010000;
    }
    buffer[offset] |= opcode;
    offset += 1;

    if(isMasked){
        buffer[offset] |= 0b10000000;
    }
    buffer[offset] |= payloadLength;
    offset += 1;

    if(payloadLength === 127){
        buffer.writeBigUInt64BE(BigInt(payloadSize), offset);
        offset += 8;
    }else if(payloadLength === 126){
        buffer.writeUInt16BE(payloadSize, offset);
        offset += 2;
    }

    if(isMasked && maskingKey !== null){
        maskingKey.copy(buffer, offset);
        offset += MASKING_KEY_SIZE;
        mask(payload, maskingKey, buffer, offset);
    }else{
        payload.copy(buffer, offset);
    }

    return buffer;
}

export default encodeFrame;
