import { byte, MemberOf } from '../../types';
import { InvalidFormatError, InvalidGeometryError } from './errors';

export const SECTOR_SIZE = 0x100;

export const TRACK_COUNTS = [35, 40] as const;
export type TrackCount = MemberOf<typeof TRACK_COUNTS>;

export const MAX_TRACKS = 40;

/**
 * Track and sector address. Tracks count from 1, sectors from 0.
 */
export interface TrackSector {
    track: byte;
    sector: byte;
}

/**
 * Sectors per track, by speed zone. Index is track - 1.
 */
export const SECTORS_PER_TRACK: readonly byte[] = [
    21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, 21, // 1-17
    19, 19, 19, 19, 19, 19, 19, // 18-24
    18, 18, 18, 18, 18, 18, // 25-30
    17, 17, 17, 17, 17, 17, 17, 17, 17, 17, // 31-40
];

/** First sector index of each track, from the start of the image. */
const TRACK_START: readonly number[] = SECTORS_PER_TRACK.reduce<number[]>(
    (starts, count, idx) => {
        starts.push(idx === 0 ? 0 : starts[idx - 1] + SECTORS_PER_TRACK[idx - 1]);
        return starts;
    }, []);

export function isTrackCount(n: number): n is TrackCount {
    return n === 35 || n === 40;
}

function checkTrack(track: byte, trackCount: TrackCount) {
    if (!Number.isInteger(track) || track < 1 || track > trackCount) {
        throw new InvalidGeometryError(track);
    }
}

/**
 * Number of sectors on `track`.
 */
export function sectorsPerTrack(track: byte, trackCount: TrackCount = MAX_TRACKS) {
    checkTrack(track, trackCount);
    return SECTORS_PER_TRACK[track - 1];
}

export function isValidTrackSector(
    track: byte,
    sector: byte,
    trackCount: TrackCount = MAX_TRACKS
) {
    return Number.isInteger(track) && track >= 1 && track <= trackCount &&
        Number.isInteger(sector) && sector >= 0 &&
        sector < SECTORS_PER_TRACK[track - 1];
}

/**
 * Byte offset of a sector within the image.
 */
export function offsetOf(track: byte, sector: byte, trackCount: TrackCount = MAX_TRACKS) {
    if (!isValidTrackSector(track, sector, trackCount)) {
        throw new InvalidGeometryError(track, sector);
    }
    return (TRACK_START[track - 1] + sector) * SECTOR_SIZE;
}

/**
 * Inverse of `offsetOf`: the track and sector containing `offset`.
 */
export function locate(offset: number, trackCount: TrackCount = MAX_TRACKS): TrackSector {
    const index = Math.floor(offset / SECTOR_SIZE);
    if (offset < 0 || index >= totalSectors(trackCount)) {
        throw new InvalidGeometryError(0);
    }
    let track = trackCount;
    while (TRACK_START[track - 1] > index) {
        track--;
    }
    return { track, sector: index - TRACK_START[track - 1] };
}

export function totalSectors(trackCount: TrackCount) {
    return TRACK_START[trackCount - 1] + SECTORS_PER_TRACK[trackCount - 1];
}

export function imageSize(trackCount: TrackCount) {
    return totalSectors(trackCount) * SECTOR_SIZE;
}

/**
 * Track count of an image of `size` bytes.
 */
export function trackCountForSize(size: number): TrackCount {
    const trackCount = TRACK_COUNTS.find((count) => imageSize(count) === size);
    if (trackCount === undefined) {
        throw new InvalidFormatError(`Invalid D64 image size ${size}`);
    }
    return trackCount;
}
