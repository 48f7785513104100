export { StageWriter } from './stage-writer.js';
export type { StagedFile } from './stage-writer.js';
