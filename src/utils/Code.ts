export enum Code{
    NORMAL_CLOSE = 1000,
    GOING_AWAY = 1001,
    PROTOCOL_ERROR = 1002,
    UNSUPPORTED_DATA = 1003,
    RESERVED_NO_STATUS = 1005,
    RESERVED_ABNORMAL_CLOSE = 1006,
    INVALID_PAYLOAD = 1007,
    POLICY_VIOLATION = 1008,
    TOO_LARGE = 1009,
    MANDATORY_EXTENSION = 1010,
    INTERNAL_SERVER_ERROR = 1011,
    RESERVED_TLS_HANDSHAKE_FAILED = 1015
}

// Codes a peer may put on the wire in a close frame.
export function isValidCode(code:number){
    return (
        (code >= 1000 && code <= 1003) ||
        (code >= 1007 && code <= 1014) ||
        (code >= 3000 && code <= 4999)
    );
}
