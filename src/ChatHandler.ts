import { z } from "zod";
import type { MessageHandler, MessageSender } from "./MessageHandler.js";
import type { Message } from "./MessageReassembler.js";
import { createLogger, type Logger } from "./utils/logger.js";
import Opcode from "./utils/Opcode.js";

export const ChatMessageSchema = z.object({
    role:z.string(),
    content:z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const CHAT_REPLY:ChatMessage = {role:"agent", content:"Okay i got it"};

/**
 * Demo handler: text messages carry `{role, content}` JSON and each one is acknowledged.
 * Messages that are not valid chat JSON are logged and skipped.
 */
class ChatHandler implements MessageHandler {

    #logger:Logger;

    constructor({logger = createLogger("chat")}:{logger?:Logger} = {}){
        this.#logger = logger;
    }

    async handle({type, data}:Message, connection:MessageSender): Promise<void> {
        if(type !== Opcode.TEXT){
            this.#logger.debug(`ignored binary message of ${data.byteLength} bytes`);
            return;
        }

        const message = this.parse(data.toString("utf8"));
        if(message === null){
            return;
        }
        this.#logger.info(`received message from ${message.role}: ${message.content}`);
        await connection.send(JSON.stringify(CHAT_REPLY));
    }

    parse(text:string):ChatMessage|null{
        let json:unknown;
        try{
            json = JSON.parse(text);
        }catch(err){
            this.#logger.warn("error parsing JSON:", err instanceof Error ? err.message : err);
            return null;
        }

        const result = ChatMessageSchema.safeParse(json);
        if(!result.success){
            this.#logger.warn("invalid chat message:", result.error.issues.map((issue) => issue.message).join("; "));
            return null;
        }
        return result.data;
    }
}

export default ChatHandler;
