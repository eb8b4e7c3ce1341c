import type { Message } from "./MessageReassembler.js";
import type WebSocket from "./WebSocket.js";

export type MessageSender = Pick<WebSocket, "send">;

/** Application-level consumer of reassembled messages, one call per message. */
export interface MessageHandler {
    handle(message:Message, connection:MessageSender): Promise<void> | void;
}
