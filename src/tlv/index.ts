export * from "./tag.js";
export * from "./value.js";
export * from "./tlv.js";
