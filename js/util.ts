import { byte, word } from './types';

const hex_digits = '0123456789ABCDEF';

/** Returns a new Uint8Array with the concatenated data from the inputs. */
export function concat(...arys: Array<byte[] | Uint8Array>) {
    const result = new Uint8Array(arys.reduce((l, ary) => l + ary.length, 0));
    let offset = 0;
    for (let i = 0; i < arys.length; i++) {
        result.set(arys[i], offset);
        offset += arys[i].length;
    }
    return result;
}

/** Writes to the console. */
export function debug(...args: unknown[]): void {
    console.log(...args);
}

/**
 * Returns a string of hex digits (all caps).
 * @param v the value to encode
 * @param n the number of nibbles. If `n` is missing, it is guessed from the value
 *     of `v`. If `v` < 256, it is assumed to be 2 nibbles, otherwise 4.
 */
export function toHex(v: byte | word | number, n?: number) {
    if (!n) {
        n = v < 256 ? 2 : 4;
    }
    let result = '';
    for (let idx = 0; idx < n; idx++) {
        result = hex_digits[v & 0x0f] + result;
        v >>= 4;
    }
    return result;
}

/** Number of set bits in a byte. */
export function popCount(v: byte) {
    let count = 0;
    while (v) {
        count += v & 0x01;
        v >>= 1;
    }
    return count;
}
