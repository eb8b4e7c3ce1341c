const CRLF = "\r\n";

/** Start line, header fields and the terminating empty line. */
function formatHttpHead(startLine:string, headers:{[k:string]:string|readonly string[]} = {}){

    let head = startLine + CRLF;
    for(let [fieldName, fieldValue] of Object.entries(headers)){
        head += `${fieldName}: ${ Array.isArray(fieldValue) ? fieldValue.join(", ") : fieldValue }${CRLF}`;
    }
    head += CRLF;

    return head;
}

export function formatStatusLine(statusCode:number, statusText:string){
    return "HTTP/1.1" + " " + statusCode + " " + statusText;
}

export default formatHttpHead;
