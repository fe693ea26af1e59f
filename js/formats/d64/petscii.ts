import { byte } from '../../types';
import { NameTooLongError, UnsupportedCharacterError } from './errors';

/** Shifted space, pads names and fills unused header bytes. */
export const PAD = 0xA0;

export const NAME_LENGTH = 16;

// Unshifted PETSCII shares 0x20-0x5D with ASCII, apart from the pound
// sign that sits where ASCII has a backslash.
function isSupported(code: number) {
    return code >= 0x20 && code <= 0x5D && code !== 0x5C;
}

/**
 * Encodes `text` as PETSCII, right-padded with shifted spaces to `width`
 * bytes.
 *
 * @param text uppercase letters, digits, space and punctuation
 * @param width field width, 16 for file and disk names
 */
export function encode(text: string, width: number = NAME_LENGTH): Uint8Array {
    if (text.length > width) {
        throw new NameTooLongError(text, width);
    }
    const result = new Uint8Array(width).fill(PAD);
    for (let idx = 0; idx < text.length; idx++) {
        const code = text.charCodeAt(idx);
        if (!isSupported(code)) {
            throw new UnsupportedCharacterError(text, idx);
        }
        result[idx] = code;
    }
    return result;
}

function toChar(code: byte, fallback: string) {
    if (isSupported(code)) {
        return String.fromCharCode(code);
    }
    if (code >= 0xC1 && code <= 0xDA) {
        return String.fromCharCode(code - 0x80);
    }
    return fallback;
}

/**
 * Character for one byte in a dump: as `decode`, but `.` for anything
 * without an ASCII counterpart, padding included.
 */
export function displayChar(code: byte) {
    return toChar(code, '.');
}

/**
 * Decodes a padded PETSCII field. Shifted letters list as uppercase,
 * anything else without an ASCII counterpart as `?`.
 */
export function decode(bytes: ArrayLike<byte>): string {
    let end = bytes.length;
    while (end > 0 && (bytes[end - 1] === PAD || bytes[end - 1] === 0x00)) {
        end--;
    }
    let result = '';
    for (let idx = 0; idx < end; idx++) {
        result += toChar(bytes[idx], '?');
    }
    return result;
}

