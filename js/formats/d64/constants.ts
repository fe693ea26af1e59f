import { byte, MemberOf } from '../../types';

/** Track holding the BAM and the directory */
export const DIRECTORY_TRACK = 18;

/** Sector of the BAM */
export const BAM_SECTOR = 0;

/** First directory sector */
export const FIRST_DIRECTORY_SECTOR = 1;

/** Usual track, sector for the BAM */
export const BAM_TRACK_SECTOR = {
    track: DIRECTORY_TRACK,
    sector: BAM_SECTOR,
} as const;

/** Usual track, sector for the first directory sector */
export const DIRECTORY_TRACK_SECTOR = {
    track: DIRECTORY_TRACK,
    sector: FIRST_DIRECTORY_SECTOR,
} as const;

/** Sector stride when laying out file data on a track */
export const INTERLEAVE = 10;

/** Sector stride when extending the directory */
export const DIRECTORY_INTERLEAVE = 3;

/** Payload bytes per chained sector, after the two link bytes */
export const DATA_BYTES_PER_SECTOR = 254;

/** DOS version marker in the BAM */
export const DOS_VERSION = 0x41;

/**
 * File types, from the low three bits of a directory entry's type byte.
 */
export const FILE_TYPES = ['DEL', 'SEQ', 'PRG', 'USR', 'REL'] as const;
export type FileType = MemberOf<typeof FILE_TYPES>;

export const FILE_TYPE_FLAGS = {
    LOCKED: 0x40,
    CLOSED: 0x80,
    TYPE_MASK: 0x07,
} as const;

export function isBAMSector(track: byte, sector: byte) {
    return track === DIRECTORY_TRACK && sector === BAM_SECTOR;
}
