export const MASKING_KEY_SIZE = 4;

/**
 * XORs `source` with the 4-byte masking key into `target` starting at `targetOffset`.
 * Passing the same buffer as source and target unmasks in place.
 */
function mask(source:Buffer, maskingKey:Buffer, target:Buffer = source, targetOffset = 0){
    for(let index = 0; index < source.byteLength; index++){
        target[targetOffset + index] = source[index] ^ maskingKey[index % MASKING_KEY_SIZE];
    }
    return target;
}

export default mask;
