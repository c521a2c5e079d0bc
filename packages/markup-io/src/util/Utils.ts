export function toUint8Array(view: DataView) {
    return new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
}
