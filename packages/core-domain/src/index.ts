export type { CapturedFile } from './entities/captured-file';
export type { DirectoryEntry } from './entities/directory-entry';
export type { PathNode } from './entities/path-node';
export * from './value-objects/filter-rules';
