import { byte } from '../../types';
import { popCount } from '../../util';
import {
    BAM_SECTOR,
    DIRECTORY_TRACK,
    DOS_VERSION,
    FIRST_DIRECTORY_SECTOR,
    INTERLEAVE,
    isBAMSector,
} from './constants';
import {
    AlreadyAllocatedError,
    DiskFullError,
    InvalidFormatError,
    InvalidGeometryError,
    ReservedSectorError,
} from './errors';
import {
    isValidTrackSector,
    SECTOR_SIZE,
    sectorsPerTrack,
    TrackSector,
} from './geometry';
import { D64Image, sectorView, writeSector } from './image';
import { decode, encode, PAD } from './petscii';

/**
 * BAM sector offsets
 */
export const BAM_OFFSETS = {
    DIRECTORY_TRACK: 0x00,
    DIRECTORY_SECTOR: 0x01,
    DOS_VERSION: 0x02,
    TRACK_ENTRIES: 0x04,
    DISK_NAME: 0x90,
    DISK_ID: 0xA2,
    DOS_TYPE: 0xA5,
    EXTENDED_TRACK_ENTRIES: 0xC0,
} as const;

/** Bytes per track entry: free count, then three bitmap bytes */
export const TRACK_ENTRY_LENGTH = 4;

/** Tracks with an entry in the standard table */
const STANDARD_TRACKS = 35;

const DOS_TYPE = '2A';

/**
 * Free space of one track
 */
export interface TrackBAM {
    track: byte;
    free: byte;
    /** Three bytes, bit `s & 7` of byte `s >> 3` set when sector `s` is free */
    bitmap: Uint8Array;
}

/**
 * BAM Data
 */
export interface BAM {
    directory: TrackSector;
    dosVersion: byte;
    diskName: string;
    diskId: string;
    dosType: string;
    tracks: TrackBAM[];
}

export interface AllocationHint {
    track: byte;
    /** Previously allocated sector on `track`, to continue the interleave from */
    sector?: byte;
}

export interface AllocationOptions {
    /** Sector stride within a track, defaults to `INTERLEAVE` */
    interleave?: number;
    /** Let allocation use the directory track, for directory sectors only */
    allowDirectoryTrack?: boolean;
}

export interface FormatOptions {
    name: string;
    id: string;
}

function bamData(image: D64Image) {
    return sectorView(image, DIRECTORY_TRACK, BAM_SECTOR);
}

/**
 * Offset of a track's entry in the BAM sector. Tracks past 35 use the
 * table at 0xC0 that 40 track DOS extensions keep there.
 */
export function trackEntryOffset(track: byte) {
    return track <= STANDARD_TRACKS
        ? BAM_OFFSETS.TRACK_ENTRIES + (track - 1) * TRACK_ENTRY_LENGTH
        : BAM_OFFSETS.EXTENDED_TRACK_ENTRIES + (track - STANDARD_TRACKS - 1) * TRACK_ENTRY_LENGTH;
}

function checkTrackSector(image: D64Image, track: byte, sector: byte) {
    if (!isValidTrackSector(track, sector, image.trackCount)) {
        throw new InvalidGeometryError(track, sector);
    }
}

function bitFor(track: byte, sector: byte) {
    return {
        offset: trackEntryOffset(track) + 1 + (sector >> 3),
        mask: 1 << (sector & 0x07),
    };
}

/**
 * Reads and checks the BAM.
 *
 * @param image Image to read
 * @returns BAM
 */
export function parseBAM(image: D64Image): BAM {
    const data = bamData(image);

    if (data[BAM_OFFSETS.DOS_VERSION] !== DOS_VERSION) {
        throw new InvalidFormatError(
            `Unrecognized DOS version ${data[BAM_OFFSETS.DOS_VERSION]}`
        );
    }

    const tracks: TrackBAM[] = [];
    for (let track = 1; track <= image.trackCount; track++) {
        const offset = trackEntryOffset(track);
        const free = data[offset];
        const bitmap = data.slice(offset + 1, offset + TRACK_ENTRY_LENGTH);
        const sectors = sectorsPerTrack(track, image.trackCount);
        const valid = (1 << sectors) - 1;
        const bits = bitmap[0] | (bitmap[1] << 8) | (bitmap[2] << 16);

        if (bits & ~valid) {
            throw new InvalidFormatError(`Track ${track} marks nonexistent sectors free`);
        }
        const population = popCount(bitmap[0]) + popCount(bitmap[1]) + popCount(bitmap[2]);
        if (population !== free) {
            throw new InvalidFormatError(
                `Track ${track} free count ${free} does not match bitmap (${population})`
            );
        }
        tracks.push({ track, free, bitmap });
    }

    if (isFree(image, DIRECTORY_TRACK, BAM_SECTOR)) {
        throw new InvalidFormatError('BAM sector is marked free');
    }

    return {
        directory: {
            track: data[BAM_OFFSETS.DIRECTORY_TRACK],
            sector: data[BAM_OFFSETS.DIRECTORY_SECTOR],
        },
        dosVersion: data[BAM_OFFSETS.DOS_VERSION],
        diskName: getDiskName(image),
        diskId: getDiskId(image),
        dosType: decode(data.subarray(BAM_OFFSETS.DOS_TYPE, BAM_OFFSETS.DOS_TYPE + 2)),
        tracks,
    };
}

export function isFree(image: D64Image, track: byte, sector: byte) {
    checkTrackSector(image, track, sector);
    const { offset, mask } = bitFor(track, sector);
    return !!(bamData(image)[offset] & mask);
}

/**
 * Marks a sector as in use.
 */
export function markUsed(image: D64Image, track: byte, sector: byte) {
    if (!isFree(image, track, sector)) {
        throw new AlreadyAllocatedError(track, sector);
    }
    const data = bamData(image);
    const { offset, mask } = bitFor(track, sector);
    data[offset] &= 0xff ^ mask;
    data[trackEntryOffset(track)] -= 1;
}

/**
 * Marks a sector as free.
 *
 * @returns false if the sector was already free
 */
export function markFree(image: D64Image, track: byte, sector: byte) {
    checkTrackSector(image, track, sector);
    if (isBAMSector(track, sector)) {
        throw new ReservedSectorError(track, sector);
    }
    if (isFree(image, track, sector)) {
        return false;
    }
    const data = bamData(image);
    const { offset, mask } = bitFor(track, sector);
    data[offset] |= mask;
    data[trackEntryOffset(track)] += 1;
    return true;
}

/**
 * Tracks in the order allocation tries them: the hint's track, then
 * outward from the directory track, alternating lower and higher.
 */
export function trackOrder(
    image: D64Image,
    hint?: AllocationHint,
    allowDirectoryTrack: boolean = false
) {
    const tracks: byte[] = [];
    const add = (track: byte) => {
        if (track >= 1 && track <= image.trackCount &&
            (allowDirectoryTrack || track !== DIRECTORY_TRACK) &&
            !tracks.includes(track)) {
            tracks.push(track);
        }
    };

    if (hint) {
        add(hint.track);
    }
    add(DIRECTORY_TRACK);
    for (let distance = 1; distance < image.trackCount; distance++) {
        add(DIRECTORY_TRACK - distance);
        add(DIRECTORY_TRACK + distance);
    }
    return tracks;
}

function checkInterleave(interleave: number) {
    if (!Number.isInteger(interleave) || interleave < 1) {
        throw new RangeError(`Invalid interleave ${interleave}`);
    }
}

/**
 * Sectors of a track in the order allocation tries them: stepping by
 * `interleave` from `start` until the walk comes back to a sector it has
 * seen, then any sectors it missed, lowest first.
 */
export function sectorOrder(count: number, start: number, interleave: number) {
    checkInterleave(interleave);
    const seen = new Array<boolean>(count).fill(false);
    const order: byte[] = [];
    let sector = start % count;
    while (!seen[sector]) {
        seen[sector] = true;
        order.push(sector);
        sector = (sector + interleave) % count;
    }
    for (let idx = 0; idx < count; idx++) {
        if (!seen[idx]) {
            order.push(idx);
        }
    }
    return order;
}

/**
 * Finds a free sector without allocating it.
 *
 * @param image Image to search
 * @param hint Track, and optionally sector, of the previous allocation
 * @param options Interleave and directory track eligibility
 * @returns track and sector pair
 */
export function findFreeSector(
    image: D64Image,
    hint?: AllocationHint,
    options: AllocationOptions = {}
): TrackSector {
    const interleave = options.interleave ?? INTERLEAVE;
    checkInterleave(interleave);
    if (hint) {
        sectorsPerTrack(hint.track, image.trackCount);
    }

    for (const track of trackOrder(image, hint, options.allowDirectoryTrack)) {
        const count = sectorsPerTrack(track, image.trackCount);
        const start = hint?.track === track && hint.sector !== undefined
            ? hint.sector + interleave
            : 0;
        for (const sector of sectorOrder(count, start, interleave)) {
            if (!isBAMSector(track, sector) && isFree(image, track, sector)) {
                return { track, sector };
            }
        }
    }
    throw new DiskFullError();
}

/**
 * Allocate a new sector
 *
 * @returns track and sector pair
 */
export function allocateSector(
    image: D64Image,
    hint?: AllocationHint,
    options?: AllocationOptions
): TrackSector {
    const trackSector = findFreeSector(image, hint, options);
    markUsed(image, trackSector.track, trackSector.sector);
    return trackSector;
}

/**
 * Free sectors on one track, as recorded in the BAM.
 */
export function trackFreeCount(image: D64Image, track: byte) {
    sectorsPerTrack(track, image.trackCount);
    return bamData(image)[trackEntryOffset(track)];
}

/**
 * Compute free sector count from the per track counts.
 *
 * @returns count of free sectors
 */
export function freeSectorCount(image: D64Image) {
    let count = 0;
    for (let track = 1; track <= image.trackCount; track++) {
        count += trackFreeCount(image, track);
    }
    return count;
}

/**
 * Count of free sectors from the bitmaps alone, ignoring the stored
 * per track counts.
 */
export function bitmapPopulation(image: D64Image) {
    let count = 0;
    for (let track = 1; track <= image.trackCount; track++) {
        const sectors = sectorsPerTrack(track, image.trackCount);
        for (let sector = 0; sector < sectors; sector++) {
            if (isFree(image, track, sector)) {
                count++;
            }
        }
    }
    return count;
}

/**
 * Writes an empty BAM: every sector free apart from the BAM itself and
 * the first directory sector.
 */
export function formatBAM(image: D64Image, options: FormatOptions) {
    const name = encode(options.name);
    const id = encode(options.id, 2);
    const data = new Uint8Array(SECTOR_SIZE);

    data[BAM_OFFSETS.DIRECTORY_TRACK] = DIRECTORY_TRACK;
    data[BAM_OFFSETS.DIRECTORY_SECTOR] = FIRST_DIRECTORY_SECTOR;
    data[BAM_OFFSETS.DOS_VERSION] = DOS_VERSION;

    for (let track = 1; track <= image.trackCount; track++) {
        const sectors = sectorsPerTrack(track, image.trackCount);
        const bits = (1 << sectors) - 1;
        const offset = trackEntryOffset(track);
        data[offset] = sectors;
        data[offset + 1] = bits & 0xff;
        data[offset + 2] = (bits >> 8) & 0xff;
        data[offset + 3] = (bits >> 16) & 0xff;
    }

    data.fill(PAD, BAM_OFFSETS.DISK_NAME, BAM_OFFSETS.DOS_TYPE + 6);
    data.set(name, BAM_OFFSETS.DISK_NAME);
    data.set(id, BAM_OFFSETS.DISK_ID);
    data.set(encode(DOS_TYPE, 2), BAM_OFFSETS.DOS_TYPE);

    writeSector(image, DIRECTORY_TRACK, BAM_SECTOR, data);
    markUsed(image, DIRECTORY_TRACK, BAM_SECTOR);
    markUsed(image, DIRECTORY_TRACK, FIRST_DIRECTORY_SECTOR);
}

export function getDiskName(image: D64Image) {
    const data = bamData(image);
    return decode(data.subarray(BAM_OFFSETS.DISK_NAME, BAM_OFFSETS.DISK_NAME + 16));
}

export function setDiskName(image: D64Image, name: string) {
    bamData(image).set(encode(name), BAM_OFFSETS.DISK_NAME);
}

export function getDiskId(image: D64Image) {
    const data = bamData(image);
    return decode(data.subarray(BAM_OFFSETS.DISK_ID, BAM_OFFSETS.DISK_ID + 2));
}

export function setDiskId(image: D64Image, id: string) {
    bamData(image).set(encode(id, 2), BAM_OFFSETS.DISK_ID);
}
