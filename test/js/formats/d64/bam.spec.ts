import {
    allocateSector,
    BAM_OFFSETS,
    bitmapPopulation,
    findFreeSector,
    freeSectorCount,
    getDiskId,
    getDiskName,
    isFree,
    markFree,
    markUsed,
    parseBAM,
    sectorOrder,
    setDiskId,
    setDiskName,
    trackEntryOffset,
    trackFreeCount,
    trackOrder,
} from 'js/formats/d64/bam';
import {
    AlreadyAllocatedError,
    DiskFullError,
    InvalidFormatError,
    InvalidGeometryError,
    ReservedSectorError,
} from 'js/formats/d64/errors';
import { totalSectors } from 'js/formats/d64/geometry';
import { readSector, sectorView } from 'js/formats/d64/image';
import { fillDisk, formattedImage, stringToBytes } from '../util';

describe('BAM', () => {
    describe('formatBAM', () => {
        it('writes the header and track entries', () => {
            const image = formattedImage();
            const data = readSector(image, 18, 0);

            expect([...data.subarray(0, 4)]).toEqual([18, 1, 0x41, 0x00]);
            expect([...data.subarray(4, 8)]).toEqual([21, 0xff, 0xff, 0x1f]);
            // Track 18 loses the BAM and first directory sector
            expect([...data.subarray(72, 76)]).toEqual([17, 0xfc, 0xff, 0x07]);
            expect([...data.subarray(140, 144)]).toEqual([17, 0xff, 0xff, 0x01]);
            expect([...data.subarray(0x90, 0xab)]).toEqual([
                ...stringToBytes('TEST DISK', 0xa0, 16),
                0xa0, 0xa0,
                0x32, 0x41,
                0xa0,
                0x32, 0x41,
                0xa0, 0xa0, 0xa0, 0xa0,
            ]);
            expect(data[0xc0]).toBe(0);
        });

        it('uses the extended table for tracks 36-40', () => {
            const image = formattedImage(40);
            const data = readSector(image, 18, 0);

            expect(trackEntryOffset(36)).toBe(0xc0);
            expect(trackEntryOffset(40)).toBe(0xd0);
            expect([...data.subarray(0xc0, 0xc4)]).toEqual([17, 0xff, 0xff, 0x01]);
            expect([...data.subarray(0xd0, 0xd4)]).toEqual([17, 0xff, 0xff, 0x01]);
        });

        it('leaves everything but the BAM and directory free', () => {
            const image = formattedImage();
            expect(freeSectorCount(image)).toBe(totalSectors(35) - 2);
            expect(bitmapPopulation(image)).toBe(681);
            expect(isFree(image, 18, 0)).toBe(false);
            expect(isFree(image, 18, 1)).toBe(false);
            expect(isFree(image, 18, 2)).toBe(true);

            const image40 = formattedImage(40);
            expect(freeSectorCount(image40)).toBe(766);
            expect(bitmapPopulation(image40)).toBe(766);
        });
    });

    describe('parseBAM', () => {
        it('reads a fresh BAM', () => {
            const bam = parseBAM(formattedImage());

            expect(bam.directory).toEqual({ track: 18, sector: 1 });
            expect(bam.dosVersion).toBe(0x41);
            expect(bam.diskName).toBe('TEST DISK');
            expect(bam.diskId).toBe('2A');
            expect(bam.dosType).toBe('2A');
            expect(bam.tracks.length).toBe(35);
            expect(bam.tracks[0]).toEqual({
                track: 1,
                free: 21,
                bitmap: new Uint8Array([0xff, 0xff, 0x1f]),
            });
            expect(bam.tracks[17].free).toBe(17);
        });

        it('rejects an unknown DOS version', () => {
            const image = formattedImage();
            sectorView(image, 18, 0)[BAM_OFFSETS.DOS_VERSION] = 0x00;
            expect(() => parseBAM(image)).toThrow(InvalidFormatError);
        });

        it('rejects a free count that disagrees with the bitmap', () => {
            const image = formattedImage();
            sectorView(image, 18, 0)[4] = 20;
            expect(() => parseBAM(image)).toThrow(
                'Track 1 free count 20 does not match bitmap (21)'
            );
        });

        it('rejects bits past the end of a track', () => {
            const image = formattedImage();
            const data = sectorView(image, 18, 0);
            data[143] |= 0x02;
            data[140] += 1;
            expect(() => parseBAM(image)).toThrow('Track 35 marks nonexistent sectors free');
        });

        it('rejects a BAM that marks itself free', () => {
            const image = formattedImage();
            const data = sectorView(image, 18, 0);
            data[73] |= 0x01;
            data[72] += 1;
            expect(() => parseBAM(image)).toThrow('BAM sector is marked free');
        });

        it('rejects an unformatted image', () => {
            const image = formattedImage();
            image.data.fill(0);
            expect(() => parseBAM(image)).toThrow(InvalidFormatError);
        });
    });

    describe('markUsed and markFree', () => {
        it('keep the free count in step', () => {
            const image = formattedImage();

            markUsed(image, 1, 0);
            expect(isFree(image, 1, 0)).toBe(false);
            expect(trackFreeCount(image, 1)).toBe(20);
            expect(readSector(image, 18, 0)[5]).toBe(0xfe);

            expect(markFree(image, 1, 0)).toBe(true);
            expect(isFree(image, 1, 0)).toBe(true);
            expect(trackFreeCount(image, 1)).toBe(21);
            expect(() => parseBAM(image)).not.toThrow();
        });

        it('refuse to allocate twice', () => {
            const image = formattedImage();
            markUsed(image, 5, 20);
            expect(() => markUsed(image, 5, 20)).toThrow(AlreadyAllocatedError);
            expect(trackFreeCount(image, 5)).toBe(20);
        });

        it('ignore freeing a free sector', () => {
            const image = formattedImage();
            expect(markFree(image, 5, 3)).toBe(false);
            expect(trackFreeCount(image, 5)).toBe(21);
        });

        it('never free the BAM sector', () => {
            const image = formattedImage();
            expect(() => markFree(image, 18, 0)).toThrow(ReservedSectorError);
        });

        it('check geometry', () => {
            const image = formattedImage();
            expect(() => isFree(image, 36, 0)).toThrow(InvalidGeometryError);
            expect(() => markUsed(image, 1, 21)).toThrow(InvalidGeometryError);
            expect(() => markFree(image, 0, 0)).toThrow(InvalidGeometryError);
        });
    });

    describe('trackOrder', () => {
        it('spirals out from the directory track', () => {
            const image = formattedImage();
            const order = trackOrder(image);
            expect(order.slice(0, 6)).toEqual([17, 19, 16, 20, 15, 21]);
            expect(order.length).toBe(34);
            expect(order).not.toContain(18);
            expect(order.slice(-3)).toEqual([34, 1, 35]);
        });

        it('puts the hint first', () => {
            const image = formattedImage();
            expect(trackOrder(image, { track: 5 }).slice(0, 4)).toEqual([5, 17, 19, 16]);
        });

        it('includes the directory track when allowed', () => {
            const image = formattedImage(40);
            const order = trackOrder(image, undefined, true);
            expect(order.slice(0, 3)).toEqual([18, 17, 19]);
            expect(order.length).toBe(40);
        });
    });

    describe('sectorOrder', () => {
        it('walks the whole track when the stride allows', () => {
            expect(sectorOrder(21, 0, 10)).toEqual([
                0, 10, 20, 9, 19, 8, 18, 7, 17, 6, 16, 5, 15, 4, 14, 3, 13, 2, 12, 1, 11,
            ]);
        });

        it('falls back to a linear scan', () => {
            expect(sectorOrder(18, 0, 10)).toEqual([
                0, 10, 2, 12, 4, 14, 6, 16, 8, 1, 3, 5, 7, 9, 11, 13, 15, 17,
            ]);
        });

        it('wraps the start sector', () => {
            expect(sectorOrder(17, 20, 10).slice(0, 3)).toEqual([3, 13, 6]);
        });

        it('refuses a stride that is not a positive integer', () => {
            expect(() => sectorOrder(21, 0, -1)).toThrow(RangeError);
            expect(() => sectorOrder(21, 0, 0)).toThrow('Invalid interleave 0');
            expect(() => sectorOrder(21, 0, 2.5)).toThrow('Invalid interleave 2.5');
        });
    });

    describe('findFreeSector', () => {
        it('checks the interleave before allocating anything', () => {
            const image = formattedImage();
            expect(() => allocateSector(image, undefined, { interleave: -3 })).toThrow(RangeError);
            expect(freeSectorCount(image)).toBe(681);
        });

        it('starts next to the directory', () => {
            const image = formattedImage();
            expect(findFreeSector(image)).toEqual({ track: 17, sector: 0 });
            expect(isFree(image, 17, 0)).toBe(true);
        });

        it('continues the interleave from the hint', () => {
            const image = formattedImage();
            expect(findFreeSector(image, { track: 17, sector: 0 })).toEqual({ track: 17, sector: 10 });
            expect(findFreeSector(image, { track: 17, sector: 20 })).toEqual({ track: 17, sector: 9 });
        });

        it('falls back to sectors the interleave missed', () => {
            const image = formattedImage();
            for (const sector of [0, 10, 2, 12, 4, 14, 6, 16, 8]) {
                markUsed(image, 25, sector);
            }
            expect(findFreeSector(image, { track: 25 })).toEqual({ track: 25, sector: 1 });
        });

        it('moves on when the hinted track is full', () => {
            const image = formattedImage();
            for (let sector = 0; sector < 21; sector++) {
                markUsed(image, 17, sector);
            }
            expect(findFreeSector(image, { track: 17, sector: 20 })).toEqual({ track: 19, sector: 0 });
        });

        it('keeps off the directory track unless asked', () => {
            const image = formattedImage();
            fillDisk(image, [18]);
            expect(() => findFreeSector(image)).toThrow(DiskFullError);
            expect(findFreeSector(image, undefined, { allowDirectoryTrack: true }))
                .toEqual({ track: 18, sector: 10 });
            expect(findFreeSector(image, { track: 18, sector: 1 }, {
                allowDirectoryTrack: true,
                interleave: 3,
            })).toEqual({ track: 18, sector: 4 });
        });

        it('never returns the BAM sector', () => {
            const image = formattedImage();
            fillDisk(image);
            // Corrupt the map so the BAM sector looks free
            const data = sectorView(image, 18, 0);
            data[73] |= 0x01;
            data[72] += 1;
            expect(() => findFreeSector(image, undefined, { allowDirectoryTrack: true }))
                .toThrow(DiskFullError);
        });

        it('rejects a hint off the disk', () => {
            const image = formattedImage();
            expect(() => findFreeSector(image, { track: 36 })).toThrow(InvalidGeometryError);
        });
    });

    describe('allocateSector', () => {
        it('marks what it finds', () => {
            const image = formattedImage();
            const first = allocateSector(image);
            const second = allocateSector(image, first);
            expect(first).toEqual({ track: 17, sector: 0 });
            expect(second).toEqual({ track: 17, sector: 10 });
            expect(trackFreeCount(image, 17)).toBe(19);
            expect(freeSectorCount(image)).toBe(679);
        });
    });

    describe('disk name and id', () => {
        it('can be changed', () => {
            const image = formattedImage();
            setDiskName(image, 'GAMES');
            setDiskId(image, 'XY');
            expect(getDiskName(image)).toBe('GAMES');
            expect(getDiskId(image)).toBe('XY');
            expect(parseBAM(image).diskName).toBe('GAMES');
        });
    });
});
