export {
  GraphConfigLive,
  PixelPoolService,
  PixelPoolFrom,
  PixelPoolLive,
  makePixelGraph,
} from "./layers.js";

export {
  prettyLogger,
  prettyLogging,
  formatLogLine,
  parseLogLevel,
} from "./logging.js";

export { renderFrame, acquireGraph, toFrameError } from "./frame.js";
export type { FrameError, FrameRequest, FrameResult } from "./frame.js";
