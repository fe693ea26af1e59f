import { byte } from '../../types';
import { toHex } from '../../util';
import { isFree, parseBAM } from './bam';
import { SECTOR_SIZE, sectorsPerTrack } from './geometry';
import { D64Image, readSector } from './image';
import { displayChar } from './petscii';

/**
 * Renders the BAM, one line per track: free count, then `.` for each
 * free sector and `#` for each used one.
 *
 * @param image Image to report on
 * @returns the report, ending with the free block total
 */
export function showBAM(image: D64Image) {
    const bam = parseBAM(image);
    let result = `DISK NAME: ${bam.diskName}\n`;
    result += `DISK ID: ${bam.diskId}\n`;

    let free = 0;
    for (const { track, free: trackFree } of bam.tracks) {
        let map = '';
        const sectors = sectorsPerTrack(track, image.trackCount);
        for (let sector = 0; sector < sectors; sector++) {
            map += isFree(image, track, sector) ? '.' : '#';
        }
        result += `${String(track).padStart(2)}: ${String(trackFree).padStart(2)} ${map}\n`;
        free += trackFree;
    }
    result += `${free} BLOCKS FREE.\n`;
    return result;
}

/** Bytes per dump line */
const DUMP_WIDTH = 16;

/**
 * Hex dump of a sector, 16 bytes a line: offset, hex bytes, then the
 * bytes as PETSCII with `.` for anything unprintable.
 */
export function dumpSector(image: D64Image, track: byte, sector: byte) {
    const data = readSector(image, track, sector);
    const lines: string[] = [];
    for (let offset = 0; offset < SECTOR_SIZE; offset += DUMP_WIDTH) {
        const row = data.subarray(offset, offset + DUMP_WIDTH);
        const hex = Array.from(row, (b) => `${toHex(b)} `).join('');
        const text = Array.from(row, (b) => displayChar(b)).join('');
        lines.push(`${toHex(offset)}: ${hex}        ${text}\n`);
    }
    return lines.join('');
}
