import type { Frame } from "../Frame.js";
import FrameParser, { type FrameParserOptions } from "../FrameParser.js";
import { TruncatedStreamError } from "../WebSocketError.js";

/** Decodes the first frame in `data`. */
function decodeFrame(data:Buffer, options?:FrameParserOptions):Frame{
    const [frame] = new FrameParser(options).push(data);
    if(frame === undefined){
        throw new TruncatedStreamError(`Incomplete frame in ${data.byteLength} bytes`);
    }
    return frame;
}

export default decodeFrame;
