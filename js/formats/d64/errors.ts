import { byte } from '../../types';
import { toHex } from '../../util';

export const D64_ERROR_KINDS = [
    'InvalidGeometry',
    'CorruptChain',
    'CorruptDirectory',
    'DiskFull',
    'AlreadyAllocated',
    'ReservedSector',
    'FileNotFound',
    'FileExists',
    'NameTooLong',
    'UnsupportedCharacter',
    'InvalidFormat',
    'IoFailure',
] as const;

export type D64ErrorKind = typeof D64_ERROR_KINDS[number];

function where(track: byte, sector: byte) {
    return `track ${track} (${toHex(track)}), sector ${sector} (${toHex(sector)})`;
}

/**
 * Base for every error raised by the disk image engine. `kind` lets
 * callers map a failure to a message or exit code without `instanceof`
 * chains.
 */
export abstract class D64Error extends Error {
    abstract readonly kind: D64ErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidGeometryError extends D64Error {
    readonly kind = 'InvalidGeometry';

    constructor(readonly track: byte, readonly sector?: byte) {
        super(sector === undefined
            ? `Invalid track ${track} (${toHex(track)})`
            : `Invalid ${where(track, sector)}`);
    }
}

export class CorruptChainError extends D64Error {
    readonly kind = 'CorruptChain';

    constructor(readonly track: byte, readonly sector: byte, reason: string) {
        super(`Corrupt chain at ${where(track, sector)}: ${reason}`);
    }
}

export class CorruptDirectoryError extends D64Error {
    readonly kind = 'CorruptDirectory';

    constructor(readonly track: byte, readonly sector: byte, reason: string) {
        super(`Corrupt directory at ${where(track, sector)}: ${reason}`);
    }
}

export class DiskFullError extends D64Error {
    readonly kind = 'DiskFull';

    constructor() {
        super('Disk full');
    }
}

export class AlreadyAllocatedError extends D64Error {
    readonly kind = 'AlreadyAllocated';

    constructor(readonly track: byte, readonly sector: byte) {
        super(`Already allocated: ${where(track, sector)}`);
    }
}

export class ReservedSectorError extends D64Error {
    readonly kind = 'ReservedSector';

    constructor(readonly track: byte, readonly sector: byte) {
        super(`Reserved sector: ${where(track, sector)}`);
    }
}

export class FileNotFoundError extends D64Error {
    readonly kind = 'FileNotFound';

    constructor(readonly fileName: string) {
        super(`File not found: ${fileName}`);
    }
}

export class FileExistsError extends D64Error {
    readonly kind = 'FileExists';

    constructor(readonly fileName: string) {
        super(`File exists: ${fileName}`);
    }
}

export class NameTooLongError extends D64Error {
    readonly kind = 'NameTooLong';

    constructor(readonly text: string, readonly maxLength: number) {
        super(`Name too long (${text.length} > ${maxLength}): ${text}`);
    }
}

export class UnsupportedCharacterError extends D64Error {
    readonly kind = 'UnsupportedCharacter';

    constructor(readonly text: string, readonly position: number) {
        super(`Unsupported character '${text.charAt(position)}' at ${position} in ${text}`);
    }
}

export class InvalidFormatError extends D64Error {
    readonly kind = 'InvalidFormat';
}

export class IoFailureError extends D64Error {
    readonly kind = 'IoFailure';

    constructor(readonly path: string, e: unknown) {
        super(`I/O failure on ${path}: ` +
            (e instanceof Error ? `${e.message}` : `${String(e)}`));
    }
}

/**
 * Type guard for engine errors, optionally of a single kind.
 */
export function isD64Error<K extends D64ErrorKind>(
    e: unknown,
    kind?: K
): e is D64Error & { kind: K } {
    return e instanceof D64Error && (kind === undefined || e.kind === kind);
}
