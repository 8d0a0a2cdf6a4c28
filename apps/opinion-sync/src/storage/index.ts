export { appendJsonLines } from './jsonLines';
export { readUserIndex, recordUserFile } from './userIndex';
export type { UserIndex } from './userIndex';
export { readSinceFile, writeSinceFile } from './sinceFile';
