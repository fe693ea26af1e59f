import fs from 'fs';
import { D64Image, imageFromBytes } from './image';
import { IoFailureError } from './errors';

/**
 * Reads a D64 image from disk.
 *
 * @param path image file
 * @returns the image, owning a fresh buffer
 */
export function loadImage(path: string): D64Image {
    let data: Uint8Array;
    try {
        data = new Uint8Array(fs.readFileSync(path));
    } catch (e) {
        throw new IoFailureError(path, e);
    }
    return imageFromBytes(data);
}

/**
 * Writes the image bytes, with no header or footer.
 */
export function saveImage(image: D64Image, path: string) {
    try {
        fs.writeFileSync(path, image.data);
    } catch (e) {
        throw new IoFailureError(path, e);
    }
}
