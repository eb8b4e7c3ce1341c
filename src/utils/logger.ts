export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export type Logger = {
    debug(message:string, ...args:unknown[]):void;
    info(message:string, ...args:unknown[]):void;
    warn(message:string, ...args:unknown[]):void;
    error(message:string, ...args:unknown[]):void;
}

const LOG_LEVEL_NAMES = new Map<string, LogLevel>([
    ["debug", LogLevel.DEBUG],
    ["info", LogLevel.INFO],
    ["warn", LogLevel.WARN],
    ["error", LogLevel.ERROR],
    ["silent", LogLevel.SILENT],
]);

export function parseLogLevel(name:string):LogLevel|undefined{
    return LOG_LEVEL_NAMES.get(name.toLowerCase());
}

/** Console logger printing `[LEVEL] [scope] message`; errors go to stderr. */
export function createLogger(scope:string, level = LogLevel.INFO):Logger{
    const prefix = (name:string) => `[${name}] [${scope}]`;
    return {
        debug(message, ...args){
            if(level <= LogLevel.DEBUG) console.log(prefix("DEBUG"), message, ...args);
        },
        info(message, ...args){
            if(level <= LogLevel.INFO) console.log(prefix("INFO"), message, ...args);
        },
        warn(message, ...args){
            if(level <= LogLevel.WARN) console.warn(prefix("WARN"), message, ...args);
        },
        error(message, ...args){
            if(level <= LogLevel.ERROR) console.error(prefix("ERROR"), message, ...args);
        },
    };
}
