export * from "./codecs.js";
export * from "./errors.js";
export { default as log, setLogFilter } from "./logging.js";
export type { LogFilter } from "./logging.js";
