import { byte } from '../../types';
import {
    imageSize,
    offsetOf,
    SECTOR_SIZE,
    TrackCount,
    trackCountForSize,
} from './geometry';

/**
 * An in-memory D64 image. The image is owned by whoever created it and
 * handed to each engine call; nothing holds on to it between calls.
 */
export interface D64Image {
    readonly trackCount: TrackCount;
    readonly data: Uint8Array;
}

/**
 * Returns a zero-filled image. It has no BAM until formatted.
 */
export function createImage(trackCount: TrackCount = 35): D64Image {
    return { trackCount, data: new Uint8Array(imageSize(trackCount)) };
}

/**
 * Wraps raw image bytes, which are not copied.
 */
export function imageFromBytes(data: Uint8Array): D64Image {
    return { trackCount: trackCountForSize(data.length), data };
}

/**
 * Returns a live view of a sector; writes through it change the image.
 */
export function sectorView(image: D64Image, track: byte, sector: byte): Uint8Array {
    const offset = offsetOf(track, sector, image.trackCount);
    return image.data.subarray(offset, offset + SECTOR_SIZE);
}

/**
 * Returns a copy of a sector.
 */
export function readSector(image: D64Image, track: byte, sector: byte): Uint8Array {
    // Slice new array so modifications do not apply to the image
    return sectorView(image, track, sector).slice();
}

/**
 * Replaces a sector. Short data is zero-filled to the sector size.
 */
export function writeSector(
    image: D64Image,
    track: byte,
    sector: byte,
    data: ArrayLike<byte>
) {
    if (data.length > SECTOR_SIZE) {
        throw new RangeError(`Sector data too long: ${data.length}`);
    }
    const view = sectorView(image, track, sector);
    view.fill(0);
    view.set(data);
}
