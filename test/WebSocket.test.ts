import { once } from "events";
import { Duplex } from "stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Frame } from "../src/Frame.js";
import { Code } from "../src/utils/Code.js";
import { createCloseFramePayload, parseCloseFramePayload } from "../src/utils/closePayload.js";
import createFrame from "../src/utils/createFrame.js";
import encodeFrame from "../src/utils/encodeFrame.js";
import Opcode, { type MessageType } from "../src/utils/Opcode.js";
import WebSocket, { HandshakeState, State } from "../src/WebSocket.js";
import WebSocketError, { ProtocolError, TruncatedStreamError } from "../src/WebSocketError.js";
import type WebSocketServer from "../src/WebSocketServer.js";
import { MASKING_KEY, RawClient, SAMPLE_ACCEPT, nextConnection, silentLogger, startServer, upgradeRequest } from "./helpers.js";

const masked = (opcode:Opcode, payload:string|Buffer = "", isFinished = true) =>
    createFrame({opcode, isFinished, maskingKey:MASKING_KEY, payload:typeof payload === "string" ? Buffer.from(payload) : payload});

const readClose = (frame:Frame) => {
    expect(frame.opcode).toBe(Opcode.CLOSE);
    return parseCloseFramePayload(frame.payload);
};

function collect(ws:WebSocket){
    const messages:Array<[string, MessageType]> = [];
    const errors:WebSocketError[] = [];
    const closes:Array<[number, string]> = [];
    ws.on("message", (data, type) => messages.push([data.toString(), type]));
    ws.on("error", (error) => errors.push(error));
    ws.on("close", (code, reason) => closes.push([code, reason]));
    return {messages, errors, closes};
}

describe("WebSocket session", () => {

    const servers:WebSocketServer[] = [];
    const clients:RawClient[] = [];

    async function setup(options:Parameters<typeof startServer>[0] = {}, clientOptions:Parameters<typeof RawClient.connect>[1] = {}){
        const {server, port} = await startServer(options);
        servers.push(server);
        const connection = nextConnection(server);
        const client = await RawClient.connect(port, clientOptions);
        clients.push(client);
        const ws = await connection;
        return {server, port, client, ws, ...collect(ws)};
    }

    afterEach(async () => {
        for(const client of clients.splice(0)){
            client.socket.destroy();
        }
        await Promise.all(servers.splice(0).map((server) => server.close()));
    });

    it("completes the opening handshake", async () => {
        const {client, ws} = await setup();

        await vi.waitFor(() => expect(client.response).toContain(`Sec-WebSocket-Accept: ${SAMPLE_ACCEPT}\r\n`));
        expect(client.response.startsWith("HTTP/1.1 101 Switching Protocols\r\n")).toBe(true);
        expect(ws.role).toBe("server");
        expect(ws.state).toBe(State.OPEN);
        expect(ws.handshakeState).toBe(HandshakeState.ESTABLISHED);
    });

    it("reassembles a fragmented message", async () => {
        const {client, messages} = await setup();

        client.send(masked(Opcode.TEXT, "He", false));
        client.send(masked(Opcode.CONTINUATION, "ll", false));
        client.send(masked(Opcode.CONTINUATION, "o"));

        await vi.waitFor(() => expect(messages).toEqual([["Hello", Opcode.TEXT]]));
    });

    it("answers a ping between fragments with exactly one pong", async () => {
        const {client, ws, messages} = await setup();
        const pings:string[] = [];
        ws.on("ping", (payload) => pings.push(payload.toString()));

        client.send(masked(Opcode.TEXT, "He", false));
        client.send(masked(Opcode.PING, "keepalive"));
        client.send(masked(Opcode.CONTINUATION, "llo"));

        await vi.waitFor(() => expect(messages).toEqual([["Hello", Opcode.TEXT]]));
        await vi.waitFor(() => expect(client.frames).toHaveLength(1));
        expect(client.frames[0]).toMatchObject({opcode:Opcode.PONG, isMasked:false});
        expect(client.frames[0].payload.toString()).toBe("keepalive");
        expect(pings).toEqual(["keepalive"]);
    });

    it("emits pong frames it receives", async () => {
        const {client, ws} = await setup();
        const pongs:string[] = [];
        ws.on("pong", (payload) => pongs.push(payload.toString()));

        client.send(masked(Opcode.PONG, "unsolicited"));

        await vi.waitFor(() => expect(pongs).toEqual(["unsolicited"]));
        expect(client.frames).toEqual([]);
    });

    it("closes with 1002 on an unexpected continuation and delivers nothing", async () => {
        const {client, ws, messages, errors, closes} = await setup();

        client.send(masked(Opcode.CONTINUATION, "stray"));

        await vi.waitFor(() => expect(client.frames).toHaveLength(1));
        expect(readClose(client.frames[0])).toEqual({code:Code.PROTOCOL_ERROR, reason:"Unexpected continuation frame"});
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(ProtocolError);

        await vi.waitFor(() => expect(closes).toEqual([[Code.RESERVED_ABNORMAL_CLOSE, ""]]));
        expect(messages).toEqual([]);
        expect(ws.state).toBe(State.CLOSED);
    });

    it("closes with 1002 on an unmasked client frame", async () => {
        const {client, errors} = await setup();

        client.sendBytes(Buffer.from([0x81, 0x00]));

        await vi.waitFor(() => expect(client.frames).toHaveLength(1));
        expect(readClose(client.frames[0])).toEqual({code:Code.PROTOCOL_ERROR, reason:"Frame must be masked"});
        expect(errors.map((error) => error.message)).toEqual(["Frame must be masked"]);
        await vi.waitFor(() => expect(client.closed).toBe(true));
    });

    it("handles the frames ahead of a bad frame that arrived in the same read", async () => {
        const {client, messages, errors} = await setup();

        client.sendBytes(Buffer.concat([
            encodeFrame(masked(Opcode.PING, "p")),
            encodeFrame(masked(Opcode.TEXT, "Hi")),
            Buffer.from([0x81, 0x00]),
        ]));

        await vi.waitFor(() => expect(client.frames).toHaveLength(2));
        expect(client.frames[0]).toMatchObject({opcode:Opcode.PONG, payloadLength:1});
        expect(client.frames[0].payload.toString()).toBe("p");
        expect(readClose(client.frames[1])).toEqual({code:Code.PROTOCOL_ERROR, reason:"Frame must be masked"});
        expect(messages).toEqual([["Hi", Opcode.TEXT]]);
        expect(errors.map((error) => error.message)).toEqual(["Frame must be masked"]);
    });

    it("ignores bytes that follow a close frame", async () => {
        const {client, errors, closes} = await setup();

        client.sendBytes(Buffer.concat([
            encodeFrame(masked(Opcode.CLOSE, createCloseFramePayload(Code.NORMAL_CLOSE, "bye"))),
            Buffer.from([0x81, 0x00]),
        ]));

        await vi.waitFor(() => expect(closes).toEqual([[Code.NORMAL_CLOSE, "bye"]]));
        expect(errors).toEqual([]);
        expect(client.frames).toHaveLength(1);
        expect(readClose(client.frames[0])).toEqual({code:Code.NORMAL_CLOSE, reason:"bye"});
    });

    it("accepts unmasked frames when masking is not enforced", async () => {
        const {client, messages, errors} = await setup({strictMasking:false});

        client.sendBytes(Buffer.from([0x81, 0x02, 0x6f, 0x6b]));
        client.send(masked(Opcode.TEXT, "masked"));

        await vi.waitFor(() => expect(messages).toEqual([["ok", Opcode.TEXT], ["masked", Opcode.TEXT]]));
        expect(errors).toEqual([]);
        expect(client.frames).toEqual([]);
    });

    it("closes with 1009 when a message exceeds the limit", async () => {
        const {client, errors} = await setup({maxMessageSize:4});

        client.send(masked(Opcode.BINARY, "too long"));

        await vi.waitFor(() => expect(client.frames).toHaveLength(1));
        expect(readClose(client.frames[0])).toEqual({code:Code.TOO_LARGE, reason:"Exceeded max message size"});
        expect(errors.map((error) => error.code)).toEqual([Code.TOO_LARGE]);
    });

    it("echoes a close received mid-message and drops the partial message", async () => {
        const {client, messages, closes} = await setup();

        client.send(masked(Opcode.TEXT, "He", false));
        client.send(masked(Opcode.CLOSE, createCloseFramePayload(Code.NORMAL_CLOSE, "bye")));

        await vi.waitFor(() => expect(closes).toEqual([[Code.NORMAL_CLOSE, "bye"]]));
        expect(client.frames).toHaveLength(1);
        expect(readClose(client.frames[0])).toEqual({code:Code.NORMAL_CLOSE, reason:"bye"});
        expect(messages).toEqual([]);
    });

    it("echoes an empty close frame without a status code", async () => {
        const {client, closes} = await setup();

        client.send(masked(Opcode.CLOSE));

        await vi.waitFor(() => expect(closes).toEqual([[Code.RESERVED_NO_STATUS, ""]]));
        expect(client.frames).toHaveLength(1);
        expect(client.frames[0]).toMatchObject({opcode:Opcode.CLOSE, payloadLength:0});
    });

    it("reports a stream that ends inside a frame as truncated", async () => {
        const {client, errors, closes} = await setup();

        client.sendBytes(Buffer.from([0x81, 0x85, 0x12, 0x34, 0x56, 0x78, 0x5a, 0x51]));
        client.socket.end();

        await vi.waitFor(() => expect(closes).toEqual([[Code.RESERVED_ABNORMAL_CLOSE, ""]]));
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(TruncatedStreamError);
    });

    it("reports a clean disconnect without close frame as abnormal", async () => {
        const {client, errors, closes} = await setup();

        client.socket.end();

        await vi.waitFor(() => expect(closes).toEqual([[Code.RESERVED_ABNORMAL_CLOSE, ""]]));
        expect(errors).toEqual([]);
    });

    it("sends unmasked frames split at the frame size", async () => {
        const {client, ws} = await setup({maxFrameSize:2});

        await ws.send("hello");

        await vi.waitFor(() => expect(client.frames).toHaveLength(3));
        expect(client.frames.map((frame) => frame.opcode)).toEqual([Opcode.TEXT, Opcode.CONTINUATION, Opcode.CONTINUATION]);
        expect(client.frames.map((frame) => frame.isFinished)).toEqual([false, false, true]);
        expect(client.frames.map((frame) => frame.isMasked)).toEqual([false, false, false]);
        expect(Buffer.concat(client.frames.map((frame) => frame.payload)).toString()).toBe("hello");
    });

    it("sends buffers as binary messages", async () => {
        const {client, ws} = await setup();

        await ws.send(Buffer.from([1, 2, 3]));

        await vi.waitFor(() => expect(client.frames).toHaveLength(1));
        expect(client.frames[0]).toMatchObject({opcode:Opcode.BINARY, isFinished:true, payloadLength:3});
    });

    it("runs the closing handshake it starts", async () => {
        const {client, ws, closes} = await setup({}, {allowHalfOpen:true});

        await ws.close(Code.NORMAL_CLOSE, "done");
        expect(ws.state).toBe(State.CLOSING);
        await vi.waitFor(() => expect(client.frames).toHaveLength(1));
        expect(readClose(client.frames[0])).toEqual({code:Code.NORMAL_CLOSE, reason:"done"});

        client.send(masked(Opcode.CLOSE, createCloseFramePayload(Code.NORMAL_CLOSE, "done")));
        client.socket.end();

        await vi.waitFor(() => expect(closes).toEqual([[Code.NORMAL_CLOSE, "done"]]));
        await expect(ws.send("late")).rejects.toThrow("Cannot send message when state is not OPEN");
    });

    it("destroys the socket when the peer never answers the close", async () => {
        const {client, ws, closes} = await setup({closeTimeout:20}, {allowHalfOpen:true});

        await ws.close();

        await vi.waitFor(() => expect(closes).toEqual([[Code.RESERVED_ABNORMAL_CLOSE, ""]]));
        expect(client.frames.map((frame) => frame.opcode)).toEqual([Opcode.CLOSE]);
    });

    it("validates what close and ping accept", async () => {
        const {ws} = await setup();

        await expect(ws.close(Code.RESERVED_NO_STATUS)).rejects.toThrow("Code 1005 can not be sent in a close frame");
        await expect(ws.close(Code.NORMAL_CLOSE, "x".repeat(124))).rejects.toThrow("Length of reason must not be greater than 123 bytes");
        await expect(ws.ping(Buffer.alloc(126))).rejects.toThrow("Control frame payload must not exceed 125 bytes");
        expect(ws.state).toBe(State.OPEN);
    });

    it("drops a connection with an invalid upgrade request", async () => {
        const {server, port} = await startServer();
        servers.push(server);
        const client = await RawClient.connect(port, {request:"GET / HTTP/1.1\r\nHost: 127.0.0.1\r\n\r\n"});
        clients.push(client);

        await vi.waitFor(() => expect(client.closed).toBe(true));
        expect(client.response).toBe("");
        await vi.waitFor(() => expect(server.connections.size).toBe(0));
    });
});

describe("WebSocket backpressure", () => {

    const settled = (promise:Promise<void>) => Promise.race([
        promise.then(() => true),
        new Promise<boolean>((resolve) => setTimeout(() => resolve(false), 50)),
    ]);

    it("resolves send once the socket has taken the message", async () => {
        const held:Array<(error?:Error|null) => void> = [];
        let stalled = false;
        const socket = new Duplex({
            read(){},
            write(chunk:Buffer, encoding, callback){
                if(stalled){
                    held.push(callback);
                    return;
                }
                callback();
            },
        });
        const ws = new WebSocket(socket, {role:"server", logger:silentLogger});
        socket.push(upgradeRequest());
        await once(ws, "open");

        stalled = true;
        const sent = ws.send(Buffer.alloc(1024 * 1024));

        expect(await settled(sent)).toBe(false);

        stalled = false;
        for(const callback of held.splice(0)){
            callback();
        }
        await expect(sent).resolves.toBeUndefined();
        ws.terminate();
    });
});
