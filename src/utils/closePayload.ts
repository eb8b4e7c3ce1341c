export const CLOSE_FRAME_CODE_SIZE = 2;

export const parseCloseFramePayload = (payload:Buffer) => {

    const code = payload.readUInt16BE(0);
    const reason = payload.toString("utf8", CLOSE_FRAME_CODE_SIZE);

    return {code, reason};
};

export const createCloseFramePayload = (code:number, reason:string = "") => {

    const reasonLength = Buffer.byteLength(reason);
    const payload = Buffer.allocUnsafe(CLOSE_FRAME_CODE_SIZE + reasonLength);
    payload.writeUInt16BE(code, 0);
    payload.write(reason, CLOSE_FRAME_CODE_SIZE, "utf8");

    return payload;
};
