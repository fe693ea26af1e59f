export * from './constants';
export * from './errors';
export * from './geometry';
export * from './petscii';
export * from './image';
export * from './image_file';
export * from './bam';
export * from './chain';
export * from './directory';
export * from './disk';
export * from './report';
