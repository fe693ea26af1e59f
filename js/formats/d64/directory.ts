import { byte, word } from '../../types';
import { allocateSector } from './bam';
import { ChainFaults, followChain, releaseChain } from './chain';
import {
    DIRECTORY_INTERLEAVE,
    DIRECTORY_TRACK_SECTOR,
    FILE_TYPE_FLAGS,
    FILE_TYPES,
    FileType,
} from './constants';
import { CorruptDirectoryError, FileNotFoundError } from './errors';
import { SECTOR_SIZE, TrackSector } from './geometry';
import { D64Image, sectorView, writeSector } from './image';
import { decode, encode, NAME_LENGTH } from './petscii';

/**
 * Directory sector offsets
 */
export const DIRECTORY_OFFSETS = {
    NEXT_DIRECTORY_TRACK: 0x00,
    NEXT_DIRECTORY_SECTOR: 0x01,
} as const;

/**
 * Directory entry offsets, from the start of the 32 byte slot. The first
 * two bytes of slot 0 are the sector link.
 */
export const ENTRY_OFFSETS = {
    FILE_TYPE: 0x02,
    START_TRACK: 0x03,
    START_SECTOR: 0x04,
    FILE_NAME: 0x05,
    SIZE_LOW: 0x1E,
    SIZE_HIGH: 0x1F,
} as const;

export const ENTRY_LENGTH = 0x20;

export const ENTRIES_PER_SECTOR = SECTOR_SIZE / ENTRY_LENGTH;

/** Sector byte of the last directory sector's link */
const LAST_DIRECTORY_SECTOR = 0xFF;

/**
 * Position of an entry: directory sector and slot within it.
 */
export interface SlotAddress extends TrackSector {
    index: number;
}

/**
 * Directory entry data
 */
export interface DirectoryEntry {
    typeByte: byte;
    /** Undefined for the unassigned type codes 5-7 */
    type: FileType | undefined;
    closed: boolean;
    locked: boolean;
    /** Scratched: type byte cleared, the rest of the entry left behind */
    deleted: boolean;
    /** Never used since the sector was created */
    blank: boolean;
    start: TrackSector;
    name: string;
    nameBytes: Uint8Array;
    /** Size in sectors */
    size: word;
}

/**
 * Fields needed to write an entry.
 */
export interface NewDirectoryEntry {
    type: FileType;
    name: string;
    start: TrackSector;
    size: word;
    locked?: boolean;
}

export interface DirectorySlot {
    slot: SlotAddress;
    entry: DirectoryEntry;
}

const DIRECTORY_FAULTS: ChainFaults = {
    corrupt: (track, sector, reason) => new CorruptDirectoryError(track, sector, reason),
    outOfRange: (track, sector) => new CorruptDirectoryError(track, sector, 'link out of range'),
};

function slotData(image: D64Image, slot: SlotAddress) {
    if (!Number.isInteger(slot.index) || slot.index < 0 || slot.index >= ENTRIES_PER_SECTOR) {
        throw new RangeError(`Invalid directory slot ${slot.index}`);
    }
    const offset = slot.index * ENTRY_LENGTH;
    return sectorView(image, slot.track, slot.sector).subarray(offset, offset + ENTRY_LENGTH);
}

function decodeEntry(data: Uint8Array): DirectoryEntry {
    const typeByte = data[ENTRY_OFFSETS.FILE_TYPE];
    const nameBytes = data.slice(ENTRY_OFFSETS.FILE_NAME, ENTRY_OFFSETS.FILE_NAME + NAME_LENGTH);
    const blank = data.subarray(ENTRY_OFFSETS.FILE_TYPE).every((b) => b === 0);

    return {
        typeByte,
        type: FILE_TYPES[typeByte & FILE_TYPE_FLAGS.TYPE_MASK],
        closed: !!(typeByte & FILE_TYPE_FLAGS.CLOSED),
        locked: !!(typeByte & FILE_TYPE_FLAGS.LOCKED),
        deleted: typeByte === 0 && !blank,
        blank,
        start: {
            track: data[ENTRY_OFFSETS.START_TRACK],
            sector: data[ENTRY_OFFSETS.START_SECTOR],
        },
        name: decode(nameBytes),
        nameBytes,
        size: data[ENTRY_OFFSETS.SIZE_LOW] | (data[ENTRY_OFFSETS.SIZE_HIGH] << 8),
    };
}

/**
 * True for an entry naming a file, closed or not.
 */
export function isLive(entry: DirectoryEntry) {
    return entry.typeByte !== 0;
}

export function readEntry(image: D64Image, slot: SlotAddress): DirectoryEntry {
    return decodeEntry(slotData(image, slot));
}

/**
 * Writes an entry into a slot, leaving the slot's link bytes alone.
 */
export function writeEntry(image: D64Image, slot: SlotAddress, entry: NewDirectoryEntry) {
    const nameBytes = encode(entry.name);
    const data = slotData(image, slot);

    data.fill(0, ENTRY_OFFSETS.FILE_TYPE);
    data[ENTRY_OFFSETS.FILE_TYPE] = FILE_TYPE_FLAGS.CLOSED |
        (entry.locked ? FILE_TYPE_FLAGS.LOCKED : 0) |
        FILE_TYPES.indexOf(entry.type);
    data[ENTRY_OFFSETS.START_TRACK] = entry.start.track;
    data[ENTRY_OFFSETS.START_SECTOR] = entry.start.sector;
    data.set(nameBytes, ENTRY_OFFSETS.FILE_NAME);
    data[ENTRY_OFFSETS.SIZE_LOW] = entry.size & 0xff;
    data[ENTRY_OFFSETS.SIZE_HIGH] = (entry.size >> 8) & 0xff;
}

/**
 * Every slot of the directory, in order, whether in use or not.
 */
export function* entries(image: D64Image): Generator<DirectorySlot, void, undefined> {
    for (const link of followChain(image, DIRECTORY_TRACK_SECTOR, DIRECTORY_FAULTS)) {
        for (let index = 0; index < ENTRIES_PER_SECTOR; index++) {
            const offset = index * ENTRY_LENGTH;
            yield {
                slot: { track: link.track, sector: link.sector, index },
                entry: decodeEntry(link.data.subarray(offset, offset + ENTRY_LENGTH)),
            };
        }
    }
}

/**
 * Entries naming files, skipping deleted and never used slots.
 */
export function liveEntries(image: D64Image): DirectorySlot[] {
    const result: DirectorySlot[] = [];
    for (const item of entries(image)) {
        if (isLive(item.entry)) {
            result.push(item);
        }
    }
    return result;
}

/**
 * Looks a file up by name. Names may repeat on disk; the first wins.
 *
 * @returns the entry, or undefined if no live entry has the name
 */
export function lookupByName(image: D64Image, name: string): DirectorySlot | undefined {
    const key = encode(name);
    for (const item of entries(image)) {
        const { entry } = item;
        if (isLive(entry) && entry.nameBytes.every((b, idx) => b === key[idx])) {
            return item;
        }
    }
    return undefined;
}

/**
 * As `lookupByName`, but a missing file is an error.
 */
export function findByName(image: D64Image, name: string): DirectorySlot {
    const item = lookupByName(image, name);
    if (!item) {
        throw new FileNotFoundError(name);
    }
    return item;
}

/**
 * Adds an entry, reusing the first free or deleted slot. With none left
 * the directory grows by a sector, on the directory track if it has room.
 *
 * @returns where the entry was written
 */
export function addEntry(image: D64Image, entry: NewDirectoryEntry): SlotAddress {
    encode(entry.name);

    let last: TrackSector = DIRECTORY_TRACK_SECTOR;
    for (const { slot, entry: existing } of entries(image)) {
        if (!isLive(existing)) {
            writeEntry(image, slot, entry);
            return slot;
        }
        last = slot;
    }

    const next = allocateSector(image, last, {
        allowDirectoryTrack: true,
        interleave: DIRECTORY_INTERLEAVE,
    });
    const data = new Uint8Array(SECTOR_SIZE);
    data[DIRECTORY_OFFSETS.NEXT_DIRECTORY_SECTOR] = LAST_DIRECTORY_SECTOR;
    writeSector(image, next.track, next.sector, data);

    const previous = sectorView(image, last.track, last.sector);
    previous[DIRECTORY_OFFSETS.NEXT_DIRECTORY_TRACK] = next.track;
    previous[DIRECTORY_OFFSETS.NEXT_DIRECTORY_SECTOR] = next.sector;

    const slot = { track: next.track, sector: next.sector, index: 0 };
    writeEntry(image, slot, entry);
    return slot;
}

/**
 * Scratches an entry by clearing its type byte. Its sectors stay
 * allocated; see `purgeEntry`.
 */
export function deleteEntry(image: D64Image, slot: SlotAddress) {
    slotData(image, slot)[ENTRY_OFFSETS.FILE_TYPE] = 0;
}

/**
 * Frees an entry's sectors, then scratches it. A corrupt chain fails
 * before anything is changed.
 *
 * @returns the sectors freed
 */
export function purgeEntry(image: D64Image, slot: SlotAddress): TrackSector[] {
    const entry = readEntry(image, slot);
    if (!isLive(entry)) {
        throw new FileNotFoundError(entry.name);
    }
    const freed = releaseChain(image, entry.start);
    deleteEntry(image, slot);
    return freed;
}
