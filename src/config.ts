import { z } from "zod";
import { DEFAULT_MAX_FRAME_SIZE, DEFAULT_MAX_MESSAGE_SIZE } from "./MessageReassembler.js";
import { LogLevel, parseLogLevel } from "./utils/logger.js";

const EnvSchema = z.object({
    WS_HOST:z.string().min(1).default("0.0.0.0"),
    WS_PORT:z.coerce.number().int().min(0).max(65535).default(4443),
    WS_PATH:z.string().startsWith("/").default("/"),
    WS_MAX_FRAME_SIZE:z.coerce.number().int().positive().default(DEFAULT_MAX_FRAME_SIZE),
    WS_MAX_MESSAGE_SIZE:z.coerce.number().int().positive().default(DEFAULT_MAX_MESSAGE_SIZE),
    LOG_LEVEL:z.string().default("info").transform((name, ctx) => {
        const level = parseLogLevel(name);
        if(level === undefined){
            ctx.addIssue({code:z.ZodIssueCode.custom, message:`Unknown log level ${name}`});
            return z.NEVER;
        }
        return level;
    }),
});

export type ServerConfig = {
    host:string;
    port:number;
    path:string;
    maxFrameSize:number;
    maxMessageSize:number;
    logLevel:LogLevel;
}

/** Reads the server settings from environment variables; throws on invalid values. */
export function loadConfig(env:NodeJS.ProcessEnv = process.env):ServerConfig{
    const result = EnvSchema.safeParse(env);
    if(!result.success){
        const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ");
        throw new Error(`Invalid configuration: ${details}`);
    }
    const {WS_HOST, WS_PORT, WS_PATH, WS_MAX_FRAME_SIZE, WS_MAX_MESSAGE_SIZE, LOG_LEVEL} = result.data;
    return {
        host:WS_HOST,
        port:WS_PORT,
        path:WS_PATH,
        maxFrameSize:WS_MAX_FRAME_SIZE,
        maxMessageSize:WS_MAX_MESSAGE_SIZE,
        logLevel:LOG_LEVEL,
    };
}
