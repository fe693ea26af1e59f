import { byte, word } from '../../types';
import { debug } from '../../util';
import { FormatOptions, formatBAM } from './bam';
import { ChainInfo, readChainBytes, traceChain, writeChain } from './chain';
import { DIRECTORY_TRACK_SECTOR, FileType } from './constants';
import {
    addEntry,
    deleteEntry,
    DIRECTORY_OFFSETS,
    findByName,
    liveEntries,
    lookupByName,
    purgeEntry,
} from './directory';
import { FileExistsError } from './errors';
import { SECTOR_SIZE, TrackCount, TrackSector } from './geometry';
import { createImage, D64Image, writeSector } from './image';
import { encode } from './petscii';

export interface CreateOptions extends FormatOptions {
    trackCount?: TrackCount;
}

export interface InsertOptions {
    type?: FileType;
    /** Track to place the file's first sector on, if it has room */
    track?: byte;
}

/**
 * Catalog listing data
 */
export interface FileInfo {
    name: string;
    type: FileType | undefined;
    size: word;
    locked: boolean;
    closed: boolean;
    start: TrackSector;
}

/**
 * Clears the image and writes an empty BAM and directory.
 */
export function formatDisk(image: D64Image, options: FormatOptions) {
    encode(options.name);
    encode(options.id, 2);

    image.data.fill(0);
    formatBAM(image, options);

    const directory = new Uint8Array(SECTOR_SIZE);
    directory[DIRECTORY_OFFSETS.NEXT_DIRECTORY_SECTOR] = 0xFF;
    writeSector(image, DIRECTORY_TRACK_SECTOR.track, DIRECTORY_TRACK_SECTOR.sector, directory);

    debug(`FORMAT ${options.name},${options.id}`);
}

/**
 * Returns a new formatted image.
 */
export function createDisk(options: CreateOptions): D64Image {
    const image = createImage(options.trackCount);
    formatDisk(image, options);
    return image;
}

export function listFiles(image: D64Image): FileInfo[] {
    return liveEntries(image).map(({ entry }) => ({
        name: entry.name,
        type: entry.type,
        size: entry.size,
        locked: entry.locked,
        closed: entry.closed,
        start: entry.start,
    }));
}

/**
 * Stores a file and adds it to the directory. Nothing changes if the
 * name is taken or either step runs out of space.
 *
 * @param image Image to write
 * @param name File name
 * @param data File contents
 * @param options File type, defaults to PRG, and preferred track
 * @returns where the data was written
 */
export function insertFile(
    image: D64Image,
    name: string,
    data: Uint8Array,
    options: InsertOptions = {}
): ChainInfo {
    if (lookupByName(image, name)) {
        throw new FileExistsError(name);
    }

    const snapshot = image.data.slice();
    const chain = writeChain(image, data, options.track);
    try {
        addEntry(image, {
            type: options.type ?? 'PRG',
            name,
            start: chain.start,
            size: chain.sectors.length,
        });
    } catch (e) {
        // The chain's sectors were overwritten as well as allocated
        image.data.set(snapshot);
        throw e;
    }

    debug(`INSERT ${name} ${data.length} BYTES, ${chain.sectors.length} BLOCKS`);
    return chain;
}

export function extractFile(image: D64Image, name: string): Uint8Array {
    const { entry } = findByName(image, name);
    return readChainBytes(image, entry.start);
}

/**
 * Returns all the track sector pairs for a file.
 */
export function traceFile(image: D64Image, name: string): TrackSector[] {
    const { entry } = findByName(image, name);
    return traceChain(image, entry.start);
}

/**
 * Scratches a file's entry, leaving its sectors allocated.
 */
export function deleteFile(image: D64Image, name: string) {
    const { slot } = findByName(image, name);
    deleteEntry(image, slot);
    debug(`DELETE ${name}`);
}

/**
 * Scratches a file and frees its sectors.
 *
 * @returns the sectors freed
 */
export function purgeFile(image: D64Image, name: string): TrackSector[] {
    const { slot } = findByName(image, name);
    const freed = purgeEntry(image, slot);
    debug(`PURGE ${name} ${freed.length} BLOCKS`);
    return freed;
}
