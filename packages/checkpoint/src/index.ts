export {
  CHECKPOINT_EXTENSION, encodeState, decodeState, writeCheckpoint, readCheckpoint,
} from "./format.js";
export {
  CheckpointSaver, StateCheckpointSaver, ModelCheckpointSaver, checkpointFileName,
  type Saver,
} from "./savers.js";
export { RollingSaver, type RollingSaverOptions } from "./rolling.js";
export {
  resolveCheckpoint, listCheckpoints, compareRecords,
  type CheckpointRecord, type Resolution,
} from "./resolve.js";
export {
  CheckpointLoader, StateCheckpointLoader, ModelCheckpointLoader, modelParams,
} from "./loaders.js";
