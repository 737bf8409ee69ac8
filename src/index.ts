export * from "./common/index.js";
export * from "./tlv/index.js";
export * from "./pdu/index.js";
export * from "./builder/index.js";
export * from "./parser/index.js";
