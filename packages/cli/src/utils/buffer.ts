/**
 * Copy file contents into a standalone ArrayBuffer for the core.
 * A Buffer may be a view into a larger pooled allocation.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    return copy;
}
