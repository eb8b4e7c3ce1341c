import { InvalidHandshakeError } from "../WebSocketError.js";

export type HttpHeaders = Map<string, string>;

export type HttpRequestHead = {
    method:string;
    target:string;
    version:string;
    headers:HttpHeaders;
}

export type HttpResponseHead = {
    version:string;
    statusCode:number;
    statusText:string;
    headers:HttpHeaders;
}

const REQUEST_LINE = /^([A-Z]+) (\S+) HTTP\/(\d\.\d)$/;
const STATUS_LINE = /^HTTP\/(\d\.\d) (\d{3})(?: (.*))?$/;

function splitHead(head:string){
    const [startLine = "", ...fieldLines] = head.split("\r\n");
    return {startLine, headers:parseHeaderFields(fieldLines)};
}

// Field names are lowercased; repeated fields are joined with ", ".
function parseHeaderFields(lines:string[]):HttpHeaders{
    const headers:HttpHeaders = new Map();
    for(const line of lines){
        if(line === ""){
            continue;
        }
        const separator = line.indexOf(":");
        if(separator <= 0){
            throw new InvalidHandshakeError(`Malformed header field: ${line}`);
        }
        const name = line.slice(0, separator).trim().toLowerCase();
        const value = line.slice(separator + 1).trim();
        const previous = headers.get(name);
        headers.set(name, previous === undefined ? value : `${previous}, ${value}`);
    }
    return headers;
}

export function parseRequestHead(head:string):HttpRequestHead{
    const {startLine, headers} = splitHead(head);
    const match = REQUEST_LINE.exec(startLine);
    if(match === null){
        throw new InvalidHandshakeError(`Malformed request line: ${startLine}`);
    }
    const [, method, target, version] = match;
    return {method, target, version, headers};
}

export function parseResponseHead(head:string):HttpResponseHead{
    const {startLine, headers} = splitHead(head);
    const match = STATUS_LINE.exec(startLine);
    if(match === null){
        throw new InvalidHandshakeError(`Malformed status line: ${startLine}`);
    }
    const [, version, statusCode, statusText = ""] = match;
    return {version, statusCode:Number(statusCode), statusText, headers};
}

/** Case-insensitive check for `token` in a comma-separated header value. */
export function hasToken(value:string|undefined, token:string){
    if(value === undefined){
        return false;
    }
    const expected = token.toLowerCase();
    return value.split(",").some((item) => item.trim().toLowerCase() === expected);
}
