export { assert, describe, test } from "./nodeTest.js";
export {
  type MemorySink,
  type RecordedLog,
  type RecordingLogger,
  createMemorySink,
  createRecordingLogger,
} from "./memory.js";
