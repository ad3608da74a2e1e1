export { BufferSink, MemoryWritable, type OutputSink, type PagedSink } from "./sink.js";
export { linkSignals, type LinkedSignal } from "./signals.js";
export { DEFAULT_PAGER, PagerSink, type PagerOptions } from "./pager.js";
export { FileSink } from "./file-sink.js";
export {
  exitError,
  loginShell,
  processProducer,
  runInherited,
  runToFile,
  startProcess,
  type ExitInfo,
  type StartedProcess,
} from "./process.js";
