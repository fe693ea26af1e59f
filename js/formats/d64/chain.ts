import { byte } from '../../types';
import { concat } from '../../util';
import { AllocationHint, allocateSector, isFree, markFree } from './bam';
import { DATA_BYTES_PER_SECTOR, isBAMSector } from './constants';
import { CorruptChainError, D64Error, InvalidGeometryError } from './errors';
import { isValidTrackSector, offsetOf, SECTOR_SIZE, TrackSector } from './geometry';
import { D64Image, sectorView, writeSector } from './image';

/**
 * One sector of a chain, as visited.
 */
export interface ChainLink extends TrackSector {
    /** Live view of the sector */
    data: Uint8Array;
    /** Next sector, or undefined for the last sector of the chain */
    next: TrackSector | undefined;
}

/**
 * Builds the errors a traversal throws, so the directory can report
 * its own kind.
 */
export interface ChainFaults {
    corrupt(track: byte, sector: byte, reason: string): D64Error;
    outOfRange(track: byte, sector: byte): D64Error;
}

const CHAIN_FAULTS: ChainFaults = {
    corrupt: (track, sector, reason) => new CorruptChainError(track, sector, reason),
    outOfRange: (track, sector) => new InvalidGeometryError(track, sector),
};

/**
 * Where a chain starts and the sectors it occupies, in order.
 */
export interface ChainInfo {
    start: TrackSector;
    sectors: TrackSector[];
}

/**
 * Follows the links from `start`, yielding each sector once. A link out
 * of range, onto the BAM, or back to a sector already visited stops the
 * walk with an error.
 */
export function* followChain(
    image: D64Image,
    start: TrackSector,
    faults: ChainFaults = CHAIN_FAULTS
): Generator<ChainLink, void, undefined> {
    const visited = new Set<number>();
    let { track, sector } = start;

    for (;;) {
        if (!isValidTrackSector(track, sector, image.trackCount)) {
            throw faults.outOfRange(track, sector);
        }
        if (isBAMSector(track, sector)) {
            throw faults.corrupt(track, sector, 'links to the BAM');
        }
        const key = offsetOf(track, sector, image.trackCount);
        if (visited.has(key)) {
            throw faults.corrupt(track, sector, 'sector visited twice');
        }
        visited.add(key);

        const data = sectorView(image, track, sector);
        const next = data[0] ? { track: data[0], sector: data[1] } : undefined;
        yield { track, sector, data, next };
        if (!next) {
            return;
        }
        ({ track, sector } = next);
    }
}

/**
 * Reads the payload of a chain, one chunk per sector. The final sector
 * holds as many bytes as its link's sector byte says.
 *
 * @param image Image to read
 * @param start First sector of the chain
 */
export function* readChain(
    image: D64Image,
    start: TrackSector
): Generator<Uint8Array, void, undefined> {
    for (const link of followChain(image, start)) {
        if (link.next) {
            yield link.data.slice(2);
        } else {
            const count = link.data[1];
            if (count > DATA_BYTES_PER_SECTOR) {
                throw new CorruptChainError(link.track, link.sector, `last sector claims ${count} bytes`);
            }
            yield link.data.slice(2, 2 + count);
        }
    }
}

export function readChainBytes(image: D64Image, start: TrackSector) {
    return concat(...readChain(image, start));
}

/**
 * Returns all the track sector pairs of a chain.
 */
export function traceChain(image: D64Image, start: TrackSector): TrackSector[] {
    const sectors: TrackSector[] = [];
    for (const { track, sector } of followChain(image, start)) {
        sectors.push({ track, sector });
    }
    return sectors;
}

/**
 * Writes `payload` to newly allocated sectors. An empty payload still
 * takes one sector. Every sector is allocated before any is written, and
 * if the disk fills part way the sectors taken so far are freed again,
 * so a failed call leaves the image as it was.
 *
 * @param image Image to write
 * @param payload Bytes to store
 * @param trackHint Track to try first
 * @returns where the chain landed
 */
export function writeChain(
    image: D64Image,
    payload: Uint8Array,
    trackHint?: byte
): ChainInfo {
    const required = Math.max(1, Math.ceil(payload.length / DATA_BYTES_PER_SECTOR));
    const sectors: TrackSector[] = [];
    let hint: AllocationHint | undefined = trackHint === undefined
        ? undefined
        : { track: trackHint };

    try {
        while (sectors.length < required) {
            const trackSector = allocateSector(image, hint);
            sectors.push(trackSector);
            hint = trackSector;
        }
    } catch (e) {
        for (const { track, sector } of sectors) {
            markFree(image, track, sector);
        }
        throw e;
    }

    for (let idx = 0; idx < sectors.length; idx++) {
        const { track, sector } = sectors[idx];
        const chunk = payload.subarray(
            idx * DATA_BYTES_PER_SECTOR,
            (idx + 1) * DATA_BYTES_PER_SECTOR
        );
        const data = new Uint8Array(SECTOR_SIZE);
        if (idx < sectors.length - 1) {
            data[0] = sectors[idx + 1].track;
            data[1] = sectors[idx + 1].sector;
        } else {
            data[0] = 0;
            data[1] = chunk.length;
        }
        data.set(chunk, 2);
        writeSector(image, track, sector, data);
    }

    return { start: sectors[0], sectors };
}

/**
 * Frees every sector of a chain. The whole chain is traced and checked
 * against the BAM first; nothing is freed if that fails.
 *
 * @returns the sectors freed
 */
export function releaseChain(image: D64Image, start: TrackSector): TrackSector[] {
    const sectors = traceChain(image, start);
    for (const { track, sector } of sectors) {
        if (isFree(image, track, sector)) {
            throw new CorruptChainError(track, sector, 'sector is marked free');
        }
    }
    for (const { track, sector } of sectors) {
        markFree(image, track, sector);
    }
    return sectors;
}
