import { byte } from 'js/types';
import { formatBAM, isFree, markUsed } from 'js/formats/d64/bam';
import { sectorsPerTrack, TrackCount } from 'js/formats/d64/geometry';
import { createImage, D64Image, writeSector } from 'js/formats/d64/image';

/**
 * Formats a fresh image without going through the logged disk commands.
 *
 * @param trackCount 35 or 40
 * @returns image with an empty BAM and directory
 */
export function formattedImage(trackCount: TrackCount = 35): D64Image {
    const image = createImage(trackCount);
    formatBAM(image, { name: 'TEST DISK', id: '2A' });
    writeSector(image, 18, 1, [0x00, 0xFF]);
    return image;
}

/**
 * Predictable, non-repeating-per-sector test data.
 *
 * @param length number of bytes
 * @param seed varies the data between files
 * @returns bytes
 */
export function pattern(length: number, seed: number = 0): Uint8Array {
    const result = new Uint8Array(length);
    for (let idx = 0; idx < length; idx++) {
        result[idx] = (idx * 7 + seed + (idx >> 8)) & 0xff;
    }
    return result;
}

/**
 * Marks every free sector used, optionally sparing some tracks.
 */
export function fillDisk(image: D64Image, except: byte[] = []) {
    for (let track = 1; track <= image.trackCount; track++) {
        if (except.includes(track)) {
            continue;
        }
        const sectors = sectorsPerTrack(track, image.trackCount);
        for (let sector = 0; sector < sectors; sector++) {
            if (isFree(image, track, sector)) {
                markUsed(image, track, sector);
            }
        }
    }
}

/**
 * Convert an ASCII character string into an array of bytes, with optional
 * padding.
 *
 * @param val ASCII character string
 * @param pad byte to fill reach padded length
 * @param padLength padded length
 * @returns an array of bytes
 */
export const stringToBytes = (val: string, pad: byte = 0xa0, padLength: number = 0) => {
    const result = [];
    let idx = 0;
    while (idx < val.length) {
        result.push(val.charCodeAt(idx) & 0x7f);
        idx++;
    }
    while (idx++ < padLength) {
        result.push(pad);
    }
    return result;
};
